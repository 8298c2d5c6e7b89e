import type { RuntimeConfig, WorkerConfig } from "./config.js";
import { createHttpLoginFlow } from "./credentials/login.js";
import { CredentialStore } from "./credentials/store.js";
import { ControlGateway } from "./gateway/gateway.js";
import { buildServer } from "./gateway/server.js";
import { createStrategyFactory } from "./participant/factory.js";
import { createPuppeteerLauncher } from "./participant/surface/puppeteer-driver.js";
import { getLogger } from "./util/logger.js";

const log = getLogger("worker");

/** Wire a gateway with the credential store, login flow and strategies this runtime allows. */
export function createGateway(runtime: RuntimeConfig): ControlGateway {
  const credentials = new CredentialStore({
    dataDir: runtime.dataDir,
    login: createHttpLoginFlow({ cookieName: runtime.cookieName, timeoutMs: runtime.timeouts.authMs }),
  });
  const launchSurface = runtime.chromePath
    ? createPuppeteerLauncher({
        executablePath: runtime.chromePath,
        headless: runtime.headless,
        navigationTimeoutMs: runtime.timeouts.joinMs,
      })
    : undefined;
  if (!launchSurface) log.debug("no CHROME_PATH; surface participants are unavailable");

  return new ControlGateway({
    strategyFactory: createStrategyFactory({
      launchSurface,
      cookieName: runtime.cookieName,
      signalingPath: runtime.signalingPath,
    }),
    credentials,
    defaultStrategy: runtime.defaultStrategy,
    timeouts: runtime.timeouts,
    closeGraceMs: runtime.closeGraceMs,
  });
}

export async function runWorker(config: WorkerConfig): Promise<void> {
  const gateway = createGateway(config.runtime);
  const app = await buildServer(gateway);

  let stopping: Promise<void> | null = null;
  const stop = (): Promise<void> => {
    if (!stopping) {
      log.info("shutting down worker...");
      stopping = gateway
        .shutdown()
        .then(() => app.close())
        .then(() => {
          log.info("worker stopped");
        });
    }
    return stopping;
  };

  const closed = new Promise<void>((resolve, reject) => {
    const handler = (): void => {
      stop().then(resolve, reject);
    };
    process.once("SIGINT", handler);
    process.once("SIGTERM", handler);
  });

  const address = await app.listen({ host: config.host, port: config.port });
  log.info(`worker listening on ${address}`);
  await closed;
}
