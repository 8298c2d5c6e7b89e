import { ClosedError, InvalidStateError } from "../errors.js";
import type { CommandKind, ParticipantState } from "./types.js";

const TRANSITIONS: Record<ParticipantState, readonly ParticipantState[]> = {
  spawned: ["authenticated", "failed", "closed"],
  authenticated: ["joined", "failed", "closed"],
  joined: ["active", "failed", "closed"],
  active: ["closed", "failed"],
  closed: [],
  failed: [],
};

const MEDIA_STATES: readonly ParticipantState[] = ["joined", "active"];

const COMMAND_STATES: Record<CommandKind, readonly ParticipantState[]> = {
  join: ["authenticated"],
  leave: MEDIA_STATES,
  "toggle-audio": MEDIA_STATES,
  "toggle-video": MEDIA_STATES,
  "toggle-screenshare": MEDIA_STATES,
  "toggle-blur": MEDIA_STATES,
  "set-noise-suppression": MEDIA_STATES,
  "set-resolution": MEDIA_STATES,
  close: ["spawned", "authenticated", "joined", "active"],
};

export function isTerminal(state: ParticipantState): boolean {
  return state === "closed" || state === "failed";
}

export function canTransition(from: ParticipantState, to: ParticipantState): boolean {
  return TRANSITIONS[from].includes(to);
}

/** Throws ClosedError on a terminal state, InvalidStateError when the command is out of place. */
export function assertCommandAllowed(state: ParticipantState, command: CommandKind): void {
  if (isTerminal(state)) {
    throw new ClosedError(`participant is ${state}; no further commands are accepted`);
  }
  if (!COMMAND_STATES[command].includes(state)) {
    throw new InvalidStateError(command, state);
  }
}

export function failurePhase(lastState: ParticipantState): string {
  switch (lastState) {
    case "spawned":
      return "never authenticated";
    case "authenticated":
      return "authenticated but never joined";
    default:
      return "joined then disconnected";
  }
}
