import { config as dotenvConfig } from "dotenv";
import { Command, InvalidArgumentError, Option } from "commander";
import path from "path";
import type { OrchestrateConfig } from "./orchestrate/types.js";
import { DEFAULT_TIMEOUTS, type StrategyTimeouts } from "./participant/strategy.js";
import { DEFAULT_SIGNALING_PATH } from "./participant/protocol/protocol-strategy.js";
import type { StrategyKind } from "./participant/types.js";
import { MAX_TIMER_MS } from "./util/timing.js";

dotenvConfig();

/** Settings every process that hosts participants needs. */
export interface RuntimeConfig {
  dataDir: string;
  /** Chromium binary for surface participants; unset disables them. */
  chromePath?: string;
  headless: boolean;
  cookieName: string;
  signalingPath: string;
  defaultStrategy: StrategyKind;
  closeGraceMs: number;
  timeouts: StrategyTimeouts;
}

export interface WorkerConfig {
  host: string;
  port: number;
  verbose: boolean;
  logLevel: string;
  runtime: RuntimeConfig;
}

export interface ConsoleConfig {
  sessionUrl: string;
  strategy: StrategyKind;
  verbose: boolean;
  logLevel: string;
  runtime: RuntimeConfig;
}

export type ParseResult =
  | { mode: "worker"; config: WorkerConfig }
  | { mode: "orchestrate"; config: OrchestrateConfig }
  | { mode: "console"; config: ConsoleConfig };

interface RuntimeOptions {
  dataDir: string;
  chromePath?: string;
  headful: boolean;
  cookieName: string;
  signalingPath: string;
  strategy: StrategyKind;
  closeGrace: number;
  authTimeout: number;
  joinTimeout: number;
  mediaTimeout: number;
  waitRetries: number;
  verbose: boolean;
}

interface WorkerOptions extends RuntimeOptions {
  host: string;
  port: number;
}

interface OrchestrateOptions extends RuntimeOptions {
  tui: boolean;
  summary?: string;
  logFile: string;
}

export function parseConfig(argv: string[] = process.argv): ParseResult {
  const parsed: { result?: ParseResult } = {};
  const logLevel = process.env.LOG_LEVEL || "info";

  const program: Command = new Command()
    .name("confsim")
    .description("Simulated conference participants for load testing video sessions")
    .showHelpAfterError();

  const worker = withRuntimeOptions(program.command("worker"))
    .description("run a control gateway behind its HTTP + WebSocket API")
    .option("--host <address>", "listen address", process.env.CONFSIM_HOST || "0.0.0.0")
    .option("-p, --port <number>", "listen port", parseInteger, Number(process.env.CONFSIM_PORT || 7400))
    .action(() => {
      const opts = worker.opts<WorkerOptions>();
      parsed.result = {
        mode: "worker",
        config: { host: opts.host, port: opts.port, verbose: opts.verbose, logLevel, runtime: runtimeFrom(opts) },
      };
    });

  const orchestrate = withRuntimeOptions(program.command("orchestrate"))
    .description("run a batch of participants against a list of workers")
    .argument("<batch-file>", "batch specification (YAML or JSON)")
    .option("--no-tui", "headless mode, print events as lines")
    .option("--summary <file>", "also write the batch summary as JSON")
    .option("--log-file <file>", "log file while the monitor owns the terminal", "confsim.log")
    .action((batchFile: string) => {
      const opts = orchestrate.opts<OrchestrateOptions>();
      parsed.result = {
        mode: "orchestrate",
        config: {
          batchFile,
          noTui: opts.tui === false, // commander flips --no-tui to tui: false
          summaryFile: opts.summary,
          logFile: path.resolve(opts.logFile),
          verbose: opts.verbose,
          logLevel,
          runtime: runtimeFrom(opts),
        },
      };
    });

  const consoleCommand = withRuntimeOptions(program.command("console"))
    .description("drive participants by hand from an interactive prompt")
    .argument("<session-url>", "session to join")
    .action((sessionUrl: string) => {
      const opts = consoleCommand.opts<RuntimeOptions>();
      parsed.result = {
        mode: "console",
        config: { sessionUrl, strategy: opts.strategy, verbose: opts.verbose, logLevel, runtime: runtimeFrom(opts) },
      };
    });

  program.parse(argv);
  if (!parsed.result) {
    program.help({ error: true });
  }
  return parsed.result;
}

function withRuntimeOptions(command: Command): Command {
  return command
    .option("--data-dir <dir>", "credential storage", process.env.CONFSIM_DATA_DIR || ".confsim")
    .option("--chrome-path <path>", "Chromium binary for surface participants", process.env.CHROME_PATH)
    .option("--headful", "show browser windows", false)
    .option("--cookie-name <name>", "session cookie set by the server", process.env.SESSION_COOKIE || "session")
    .option("--signaling-path <path>", "protocol endpoint path", DEFAULT_SIGNALING_PATH)
    .addOption(
      new Option("--strategy <kind>", "default participant strategy").choices(["protocol", "surface"]).default("protocol"),
    )
    .option("--close-grace <ms>", "orderly leave budget before a forced close", parseMilliseconds, 10_000)
    .option("--auth-timeout <ms>", "authentication timeout", parseMilliseconds, DEFAULT_TIMEOUTS.authMs)
    .option("--join-timeout <ms>", "join attempt timeout", parseMilliseconds, DEFAULT_TIMEOUTS.joinMs)
    .option("--media-timeout <ms>", "media acknowledgment timeout", parseMilliseconds, DEFAULT_TIMEOUTS.mediaMs)
    .option("--wait-retries <n>", "retries for surface waits", parseInteger, DEFAULT_TIMEOUTS.waitRetries)
    .option("-v, --verbose", "debug logging", false);
}

function runtimeFrom(opts: RuntimeOptions): RuntimeConfig {
  return {
    dataDir: path.resolve(opts.dataDir),
    chromePath: opts.chromePath || undefined,
    headless: !opts.headful,
    cookieName: opts.cookieName,
    signalingPath: opts.signalingPath,
    defaultStrategy: opts.strategy,
    closeGraceMs: opts.closeGrace,
    timeouts: {
      authMs: opts.authTimeout,
      joinMs: opts.joinTimeout,
      mediaMs: opts.mediaTimeout,
      waitRetries: opts.waitRetries,
    },
  };
}

function parseInteger(value: string): number {
  const n = Number(value);
  if (!Number.isInteger(n) || n < 0) {
    throw new InvalidArgumentError("expected a non-negative integer");
  }
  return n;
}

/** Durations end up in setTimeout, which cannot wait longer than MAX_TIMER_MS. */
export function parseMilliseconds(value: string): number {
  const n = parseInteger(value);
  if (n > MAX_TIMER_MS) {
    throw new InvalidArgumentError(`expected at most ${MAX_TIMER_MS}ms`);
  }
  return n;
}
