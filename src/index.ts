#!/usr/bin/env node
import { parseConfig } from "./config.js";
import { initLogger, getLogger } from "./util/logger.js";
import { runConsole } from "./console.js";
import { runWorker } from "./worker.js";

async function main(): Promise<void> {
  const result = parseConfig();
  initLogger(result.config.verbose ? "debug" : result.config.logLevel);
  const log = getLogger("main");

  switch (result.mode) {
    case "worker":
      log.info(`confsim v0.1.0 worker on ${result.config.host}:${result.config.port}`);
      await runWorker(result.config);
      return;

    case "console":
      await runConsole(result.config);
      return;

    case "orchestrate": {
      const { runOrchestrate } = await import("./orchestrate/run.js");
      const summary = await runOrchestrate(result.config);
      if (summary.joined < summary.total) process.exitCode = 1;
      return;
    }
  }
}

main().catch((err) => {
  console.error("Fatal error:", err instanceof Error ? err.message : err);
  process.exit(1);
});
