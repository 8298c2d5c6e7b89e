import { z } from "zod";

export const NOISE_SUPPRESSION_LEVELS = [
  "none",
  "deepfilternet",
  "rnnoise",
  "iris-shepherd",
  "krisp-high",
  "krisp-medium",
  "krisp-low",
  "krisp-high-with-bvc",
  "krisp-medium-with-bvc",
] as const;

export const RESOLUTIONS = [
  "auto",
  "144p",
  "240p",
  "360p",
  "480p",
  "720p",
  "1080p",
  "1440p",
  "2160p",
  "4320p",
] as const;

export const NoiseSuppressionSchema = z.enum(NOISE_SUPPRESSION_LEVELS);
export const ResolutionSchema = z.enum(RESOLUTIONS);

/** `datagram` prefers the datagram transport; `stream` forces the fallback. */
export const TransportModeSchema = z.enum(["datagram", "stream"]);

export const StrategyKindSchema = z.enum(["surface", "protocol"]);

/** "none", "builtin", or an http(s) URL / file path of a media file. */
export const FakeMediaSchema = z.string().min(1);

export const MediaSettingsSchema = z.object({
  audioEnabled: z.boolean().default(true),
  videoEnabled: z.boolean().default(true),
  screenshareEnabled: z.boolean().default(false),
  blur: z.boolean().default(false),
  fakeMedia: FakeMediaSchema.default("builtin"),
  resolution: ResolutionSchema.default("auto"),
  noiseSuppression: NoiseSuppressionSchema.default("none"),
  transport: TransportModeSchema.default("datagram"),
});

export const ParticipantIdentitySchema = z.object({
  username: z.string().min(1).max(64),
  sessionUrl: z.string().url(),
  media: MediaSettingsSchema.default({}),
});

export const ParticipantCommandSchema = z.discriminatedUnion("kind", [
  z.object({ kind: z.literal("join") }),
  z.object({ kind: z.literal("leave") }),
  z.object({ kind: z.literal("toggle-audio") }),
  z.object({ kind: z.literal("toggle-video") }),
  z.object({ kind: z.literal("toggle-screenshare") }),
  z.object({ kind: z.literal("toggle-blur") }),
  z.object({ kind: z.literal("set-noise-suppression"), level: NoiseSuppressionSchema }),
  z.object({ kind: z.literal("set-resolution"), resolution: ResolutionSchema }),
  z.object({ kind: z.literal("close") }),
]);

export type NoiseSuppression = z.infer<typeof NoiseSuppressionSchema>;
export type Resolution = z.infer<typeof ResolutionSchema>;
export type TransportMode = z.infer<typeof TransportModeSchema>;
export type StrategyKind = z.infer<typeof StrategyKindSchema>;
export type MediaSettings = z.infer<typeof MediaSettingsSchema>;
export type ParticipantIdentity = Readonly<
  Omit<z.infer<typeof ParticipantIdentitySchema>, "media"> & { media: Readonly<MediaSettings> }
>;
export type ParticipantCommand = z.infer<typeof ParticipantCommandSchema>;
export type CommandKind = ParticipantCommand["kind"];

export const ParticipantStateSchema = z.enum(["spawned", "authenticated", "joined", "active", "closed", "failed"]);

export const MediaStateSchema = z.object({
  audio: z.boolean(),
  video: z.boolean(),
  screenshare: z.boolean(),
  blur: z.boolean(),
  noiseSuppression: NoiseSuppressionSchema,
});

export const FailureInfoSchema = z.object({
  kind: z.string(),
  reason: z.string(),
  lastState: ParticipantStateSchema,
  /** "never authenticated", "authenticated but never joined" or "joined then disconnected". */
  phase: z.string(),
  forced: z.boolean(),
});

export const ParticipantSnapshotSchema = z.object({
  id: z.string(),
  username: z.string(),
  sessionUrl: z.string(),
  strategy: StrategyKindSchema,
  state: ParticipantStateSchema,
  media: MediaStateSchema,
  createdAt: z.number(),
  updatedAt: z.number(),
  failure: FailureInfoSchema.optional(),
});

export const CommandAckSchema = z.object({
  participantId: z.string(),
  command: z.enum([
    "join",
    "leave",
    "toggle-audio",
    "toggle-video",
    "toggle-screenshare",
    "toggle-blur",
    "set-noise-suppression",
    "set-resolution",
    "close",
  ]),
  state: ParticipantStateSchema,
  /** Set when the command had nothing to do, e.g. close on a terminal participant. */
  noop: z.boolean().optional(),
  media: MediaStateSchema.optional(),
});

export type ParticipantState = z.infer<typeof ParticipantStateSchema>;
export type MediaState = z.infer<typeof MediaStateSchema>;
export type FailureInfo = z.infer<typeof FailureInfoSchema>;
export type ParticipantSnapshot = z.infer<typeof ParticipantSnapshotSchema>;
export type CommandAck = z.infer<typeof CommandAckSchema>;

/** Parse and freeze an identity; throws ZodError on invalid input. */
export function parseIdentity(input: unknown): ParticipantIdentity {
  const parsed = ParticipantIdentitySchema.parse(input);
  return Object.freeze({ ...parsed, media: Object.freeze({ ...parsed.media }) });
}

export function initialMediaState(settings: MediaSettings): MediaState {
  return {
    audio: false,
    video: false,
    screenshare: false,
    blur: false,
    noiseSuppression: settings.noiseSuppression,
  };
}
