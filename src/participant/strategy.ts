import type { LogLevel } from "./events.js";
import type { MediaState, NoiseSuppression, ParticipantIdentity, Resolution, StrategyKind } from "./types.js";

export type MediaKind = "audio" | "video" | "screenshare";

/** Features only a rendering surface can exercise. */
export type Capability = "blur" | "noise-suppression" | "resolution";

export interface StrategyTimeouts {
  /** Bound on authentication (connect + credential exchange). */
  authMs: number;
  /** Bound on one join attempt, including waits for UI conditions. */
  joinMs: number;
  /** Bound on one media acknowledgment. */
  mediaMs: number;
  /** Retries for a surface wait before giving up. */
  waitRetries: number;
}

export const DEFAULT_TIMEOUTS: StrategyTimeouts = {
  authMs: 30_000,
  joinMs: 30_000,
  mediaMs: 10_000,
  waitRetries: 3,
};

/** Callbacks a strategy uses to talk back to the actor that owns it. */
export interface StrategyContext {
  identity: ParticipantIdentity;
  timeouts: StrategyTimeouts;
  log: (level: LogLevel, message: string) => void;
  /** The session dropped us (socket closed, kicked, surface crashed). */
  onFatal: (err: Error) => void;
}

/**
 * What every way of being a participant must be able to do. The actor owns
 * life-cycle and ordering; strategies only perform the work.
 */
export interface ParticipantStrategy {
  readonly kind: StrategyKind;
  readonly capabilities: ReadonlySet<Capability>;

  /** Open the connection / surface and present the token. Throws TokenRejectedError on refusal. */
  authenticate(token: string, signal: AbortSignal): Promise<void>;
  join(signal: AbortSignal): Promise<void>;
  /** Bring media in line with the identity's preferences once joined. */
  applyInitialMedia(signal: AbortSignal): Promise<MediaState>;
  toggle(kind: MediaKind, signal: AbortSignal): Promise<MediaState>;
  toggleBlur(signal: AbortSignal): Promise<MediaState>;
  setNoiseSuppression(level: NoiseSuppression, signal: AbortSignal): Promise<MediaState>;
  /** Outgoing camera resolution while in the session. */
  setResolution(resolution: Resolution, signal: AbortSignal): Promise<MediaState>;
  leave(signal: AbortSignal): Promise<void>;
  /** Orderly release of the connection or surface. */
  dispose(): Promise<void>;
  /** Unconditional teardown; must not throw. */
  terminate(): void;
}

export type StrategyFactory = (kind: StrategyKind, context: StrategyContext) => ParticipantStrategy;
