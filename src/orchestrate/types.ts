import { z } from "zod";
import type { ParticipantEvent } from "../participant/events.js";
import {
  FakeMediaSchema,
  NoiseSuppressionSchema,
  ResolutionSchema,
  StrategyKindSchema,
  TransportModeSchema,
} from "../participant/types.js";
import type { RuntimeConfig } from "../config.js";
import { MAX_TIMER_MS } from "../util/timing.js";

export interface OrchestrateConfig {
  batchFile: string;
  noTui: boolean;               // headless mode
  summaryFile?: string;         // write the summary as JSON here too
  logFile: string;              // winston target while the TUI owns the terminal
  verbose: boolean;
  logLevel: string;
  runtime: RuntimeConfig;       // used by in-process (local://) workers
}

const MAX_SECONDS = Math.floor(MAX_TIMER_MS / 1000);
const TOO_LONG = `must be at most ${MAX_SECONDS} seconds`;

/** Media settings a batch may override; anything left out keeps its default. */
export const MediaOverridesSchema = z
  .object({
    audioEnabled: z.boolean(),
    videoEnabled: z.boolean(),
    screenshareEnabled: z.boolean(),
    blur: z.boolean(),
    fakeMedia: FakeMediaSchema,
    resolution: ResolutionSchema,
    noiseSuppression: NoiseSuppressionSchema,
    transport: TransportModeSchema,
  })
  .partial()
  .strict();

export const ParticipantSpecSchema = z
  .object({
    username: z.string().min(1).max(64).optional(),
    joinDelaySeconds: z.number().min(0, "join delay must not be negative").max(MAX_SECONDS, TOO_LONG).default(0),
    initial: MediaOverridesSchema.default({}),
  })
  .strict();

export const RetrySchema = z
  .object({
    attempts: z.number().int().min(1).default(3),
    baseDelayMs: z.number().int().min(0).max(MAX_TIMER_MS).default(500),
    maxDelayMs: z.number().int().min(0).max(MAX_TIMER_MS).default(5_000),
  })
  .strict();

/** Worker endpoints are http(s) URLs, or local://<name> for an in-process gateway. */
export const WorkerEndpointSchema = z
  .string()
  .url()
  .refine((value) => /^(https?|local):\/\//.test(value), "worker endpoint must be http(s):// or local://");

export const BatchSpecSchema = z
  .object({
    sessionUrl: z.string().url(),
    workers: z.array(WorkerEndpointSchema).min(1, "at least one worker is required"),
    strategy: StrategyKindSchema.default("protocol"),
    defaults: MediaOverridesSchema.default({}),
    participants: z.array(ParticipantSpecSchema).default([]),
    defaultParticipants: z.number().int().min(0).max(10_000).default(0),
    usernamePrefix: z.string().min(1).default("sim"),
    joinTimeoutSeconds: z.number().positive().max(MAX_SECONDS, TOO_LONG).default(60),
    holdSeconds: z.number().min(0).max(MAX_SECONDS, TOO_LONG).default(0),
    batchTimeoutSeconds: z.number().positive().max(MAX_SECONDS, TOO_LONG).default(300),
    retry: RetrySchema.default({}),
  })
  .strict();

export type MediaOverrides = z.infer<typeof MediaOverridesSchema>;
export type ParticipantSpec = z.infer<typeof ParticipantSpecSchema>;
export type BatchSpec = z.infer<typeof BatchSpecSchema>;

/** One participant of a batch with everything needed to dispatch it. */
export interface PlannedParticipant {
  index: number;
  username: string;
  worker: string;
  joinDelayMs: number;
  identity: {
    username: string;
    sessionUrl: string;
    media: MediaOverrides;
  };
}

export type Outcome = "joined" | "failed" | "timed-out";

export interface ParticipantOutcome {
  index: number;
  username: string;
  worker: string;
  participantId?: string;
  outcome: Outcome;
  reason?: string;
  /** From batch start to the outcome. */
  elapsedMs: number;
}

export interface BatchSummary {
  sessionUrl: string;
  startedAt: string;
  finishedAt: string;
  cancelled: boolean;
  total: number;
  joined: number;
  failed: number;
  timedOut: number;
  participants: ParticipantOutcome[];
}

export interface DispatchInfo {
  index: number;
  username: string;
  worker: string;
  participantId: string;
}

export interface WorkerEvent {
  worker: string;
  event: ParticipantEvent;
}
