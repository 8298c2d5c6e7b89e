import { z } from "zod";
import { isErrorKind, type ErrorKind } from "../errors.js";
import {
  FailureInfoSchema,
  MediaStateSchema,
  ParticipantStateSchema,
  type FailureInfo,
  type MediaState,
  type ParticipantState,
} from "./types.js";

export type ParticipantEventType = ParticipantEvent["type"];

export type LogLevel = "error" | "warn" | "info" | "debug";

interface EventBase {
  participantId: string;
  username: string;
  timestamp: number;
  /** Per-participant, strictly increasing. */
  seq: number;
}

export interface StateChangedEvent extends EventBase {
  type: "state-changed";
  from: ParticipantState;
  to: ParticipantState;
  reason?: string;
  failure?: FailureInfo;
}

export interface LogLineEvent extends EventBase {
  type: "log-line";
  level: LogLevel;
  message: string;
}

export interface MediaChangedEvent extends EventBase {
  type: "media-changed";
  media: MediaState;
}

export interface ErrorEvent extends EventBase {
  type: "error";
  kind: ErrorKind;
  message: string;
}

export type ParticipantEvent = StateChangedEvent | LogLineEvent | MediaChangedEvent | ErrorEvent;

type DistributiveOmit<T, K extends PropertyKey> = T extends unknown ? Omit<T, K> : never;

/** An event before the actor stamps id, username, timestamp and sequence on it. */
export type EventPayload = DistributiveOmit<ParticipantEvent, keyof EventBase>;

const eventBase = {
  participantId: z.string(),
  username: z.string(),
  timestamp: z.number(),
  seq: z.number(),
};

/** Events as they arrive over the wire from a remote gateway. */
export const ParticipantEventSchema = z.discriminatedUnion("type", [
  z.object({
    ...eventBase,
    type: z.literal("state-changed"),
    from: ParticipantStateSchema,
    to: ParticipantStateSchema,
    reason: z.string().optional(),
    failure: FailureInfoSchema.optional(),
  }),
  z.object({ ...eventBase, type: z.literal("log-line"), level: z.enum(["error", "warn", "info", "debug"]), message: z.string() }),
  z.object({ ...eventBase, type: z.literal("media-changed"), media: MediaStateSchema }),
  z.object({ ...eventBase, type: z.literal("error"), kind: z.custom<ErrorKind>(isErrorKind), message: z.string() }),
]);
