import readline from "readline";
import type { ConsoleConfig } from "./config.js";
import { toSimulatorError } from "./errors.js";
import type { ControlGateway } from "./gateway/gateway.js";
import type { ParticipantEvent } from "./participant/events.js";
import {
  NoiseSuppressionSchema,
  NOISE_SUPPRESSION_LEVELS,
  RESOLUTIONS,
  ResolutionSchema,
  type ParticipantCommand,
} from "./participant/types.js";
import { formatEvent, formatMedia, pad } from "./util/format.js";
import { getLogger } from "./util/logger.js";
import { createGateway } from "./worker.js";

export type ConsoleCommand =
  | { type: "spawn"; username: string }
  | { type: "command"; id: string; command: ParticipantCommand }
  | { type: "list" }
  | { type: "help" }
  | { type: "quit" }
  | { type: "invalid"; message: string };

const ID_COMMANDS: Record<string, ParticipantCommand> = {
  join: { kind: "join" },
  leave: { kind: "leave" },
  audio: { kind: "toggle-audio" },
  video: { kind: "toggle-video" },
  share: { kind: "toggle-screenshare" },
  blur: { kind: "toggle-blur" },
  close: { kind: "close" },
};

const HELP = [
  "spawn <username>                      create a participant",
  "join|leave|audio|video|share|blur <id> send a command",
  `ns <id> <${NOISE_SUPPRESSION_LEVELS.join("|")}>`,
  `res <id> <${RESOLUTIONS.join("|")}>`,
  "close <id>                            leave and release the participant",
  "list                                  show every participant",
  "quit                                  close everything and exit",
];

/** Parse one console line; null for a blank line. */
export function parseConsoleLine(line: string): ConsoleCommand | null {
  const [verb, ...args] = line.trim().split(/\s+/).filter((word) => word.length > 0);
  if (!verb) return null;

  switch (verb) {
    case "quit":
    case "exit":
      return { type: "quit" };
    case "help":
    case "?":
      return { type: "help" };
    case "list":
    case "ls":
      return { type: "list" };
    case "spawn":
      if (args.length !== 1) return { type: "invalid", message: "usage: spawn <username>" };
      return { type: "spawn", username: args[0] };
    case "ns": {
      if (args.length !== 2) return { type: "invalid", message: "usage: ns <id> <level>" };
      const level = NoiseSuppressionSchema.safeParse(args[1]);
      if (!level.success) return { type: "invalid", message: `unknown noise suppression level "${args[1]}"` };
      return { type: "command", id: args[0], command: { kind: "set-noise-suppression", level: level.data } };
    }
    case "res": {
      if (args.length !== 2) return { type: "invalid", message: "usage: res <id> <resolution>" };
      const resolution = ResolutionSchema.safeParse(args[1]);
      if (!resolution.success) return { type: "invalid", message: `unknown resolution "${args[1]}"` };
      return { type: "command", id: args[0], command: { kind: "set-resolution", resolution: resolution.data } };
    }
  }

  const command = ID_COMMANDS[verb];
  if (!command) return { type: "invalid", message: `unknown command "${verb}" (try help)` };
  if (args.length !== 1) return { type: "invalid", message: `usage: ${verb} <id>` };
  return { type: "command", id: args[0], command };
}

/** Run one parsed command against the gateway, printing the result. */
export async function executeConsoleCommand(
  gateway: ControlGateway,
  command: ConsoleCommand,
  config: Pick<ConsoleConfig, "sessionUrl" | "strategy">,
): Promise<void> {
  switch (command.type) {
    case "spawn": {
      const snapshot = gateway.spawn({
        identity: { username: command.username, sessionUrl: config.sessionUrl },
        strategy: config.strategy,
      });
      console.log(`spawned ${snapshot.id} (${snapshot.username}, ${snapshot.strategy})`);
      return;
    }
    case "command": {
      const ack = await gateway.send(command.id, command.command);
      const media = ack.media ? ` ${formatMedia(ack.media)}` : "";
      console.log(`${ack.participantId} ${ack.command}: ${ack.state}${ack.noop ? " (no-op)" : ""}${media}`);
      return;
    }
    case "list": {
      const snapshots = gateway.list();
      if (snapshots.length === 0) {
        console.log("  (no participants)");
        return;
      }
      for (const s of snapshots) {
        console.log(`  ${pad(s.id, 8)}${pad(s.username, 16)}${pad(s.state, 15)}${formatMedia(s.media)}`);
      }
      return;
    }
    case "help":
      for (const line of HELP) console.log(`  ${line}`);
      return;
    case "invalid":
      console.log(command.message);
      return;
    case "quit":
      return;
  }
}

export async function runConsole(config: ConsoleConfig): Promise<void> {
  const log = getLogger("console");
  const gateway = createGateway(config.runtime);

  const onEvent = (event: ParticipantEvent): void => {
    if (event.type === "log-line" && event.level === "debug") return;
    console.log(`  ${pad(event.participantId, 6)} ${pad(event.username, 14)} ${formatEvent(event)}`);
  };
  gateway.on("event", onEvent);

  const rl = readline.createInterface({ input: process.stdin, output: process.stdout });

  console.log(`\n--- confsim console ---`);
  console.log(`Session: ${config.sessionUrl} | strategy: ${config.strategy}`);
  console.log(`Type "help" for commands.\n`);

  await new Promise<void>((resolve) => {
    rl.on("close", () => resolve());
    rl.on("SIGINT", () => resolve());

    const ask = (): void => {
      rl.question("confsim> ", (line) => {
        const command = parseConsoleLine(line);
        if (command?.type === "quit") {
          resolve();
          return;
        }
        if (!command) {
          ask();
          return;
        }
        executeConsoleCommand(gateway, command, config).then(ask, (err: unknown) => {
          const error = toSimulatorError(err);
          console.log(`${error.kind}: ${error.message}`);
          ask();
        });
      });
    };
    ask();
  });

  console.log("closing participants...");
  await gateway.shutdown();
  gateway.off("event", onEvent);
  rl.close();
  log.debug("console closed");
  console.log("Bye.");
}
