import { z } from "zod";
import { ResolutionSchema, TransportModeSchema } from "../types.js";

/*
 * Signaling messages exchanged with the session backend over one WebSocket.
 * Every client message carries a requestId; the backend answers with a
 * message bearing the same requestId. `kicked` is the only unsolicited push.
 */

const MediaKindSchema = z.enum(["audio", "video", "screenshare"]);

export const HelloMessageSchema = z.object({
  type: z.literal("hello"),
  requestId: z.string(),
  token: z.string(),
  username: z.string(),
});

export const JoinMessageSchema = z.object({
  type: z.literal("join"),
  requestId: z.string(),
  space: z.string(),
  displayName: z.string(),
  transport: TransportModeSchema,
  resolution: ResolutionSchema,
  fakeMedia: z.string(),
});

export const MediaMessageSchema = z.object({
  type: z.literal("media"),
  requestId: z.string(),
  kind: MediaKindSchema,
  enabled: z.boolean(),
});

export const LeaveMessageSchema = z.object({
  type: z.literal("leave"),
  requestId: z.string(),
});

export const ClientMessageSchema = z.discriminatedUnion("type", [
  HelloMessageSchema,
  JoinMessageSchema,
  MediaMessageSchema,
  LeaveMessageSchema,
]);

export const ServerMessageSchema = z.discriminatedUnion("type", [
  z.object({ type: z.literal("welcome"), requestId: z.string(), sessionId: z.string() }),
  z.object({ type: z.literal("rejected"), requestId: z.string(), reason: z.string() }),
  z.object({ type: z.literal("joined"), requestId: z.string(), participantId: z.string() }),
  z.object({ type: z.literal("media-ack"), requestId: z.string(), kind: MediaKindSchema, enabled: z.boolean() }),
  z.object({ type: z.literal("left"), requestId: z.string() }),
  z.object({
    type: z.literal("error"),
    requestId: z.string().optional(),
    code: z.string(),
    message: z.string(),
  }),
  z.object({ type: z.literal("kicked"), reason: z.string() }),
]);

export type ClientMessage = z.infer<typeof ClientMessageSchema>;
export type ServerMessage = z.infer<typeof ServerMessageSchema>;

/** A client message before the connection assigns its requestId. */
export type ClientRequest = ClientMessage extends infer M ? (M extends ClientMessage ? Omit<M, "requestId"> : never) : never;

/** Server messages that answer a request. */
export type ServerReply = Exclude<ServerMessage, { type: "kicked" }>;
