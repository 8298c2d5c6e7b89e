import { CredentialError, TokenRejectedError } from "../../src/errors.js";
import type { CredentialProvider } from "../../src/credentials/store.js";
import type { ParticipantEvent } from "../../src/participant/events.js";
import type {
  Capability,
  MediaKind,
  ParticipantStrategy,
  StrategyContext,
  StrategyFactory,
} from "../../src/participant/strategy.js";
import type {
  MediaState,
  NoiseSuppression,
  ParticipantState,
  Resolution,
  StrategyKind,
} from "../../src/participant/types.js";
import { sleep } from "../../src/util/timing.js";

export interface FakeStrategyOptions {
  /** How many authenticate() calls refuse the token before one succeeds. */
  rejectTokens?: number;
  authDelayMs?: number;
  joinDelayMs?: number;
  joinError?: Error;
  /** leave() never settles and ignores its signal. */
  hangOnLeave?: boolean;
  capabilities?: Capability[];
}

/** Strategy that records what the actor asked of it. */
export class FakeStrategy implements ParticipantStrategy {
  readonly kind: StrategyKind;
  readonly capabilities: ReadonlySet<Capability>;
  readonly calls: string[] = [];
  readonly context: StrategyContext;
  private options: FakeStrategyOptions;
  private rejectionsLeft: number;
  private media: MediaState;

  constructor(kind: StrategyKind, context: StrategyContext, options: FakeStrategyOptions = {}) {
    this.kind = kind;
    this.context = context;
    this.options = options;
    this.capabilities = new Set(options.capabilities ?? []);
    this.rejectionsLeft = options.rejectTokens ?? 0;
    this.media = {
      audio: false,
      video: false,
      screenshare: false,
      blur: false,
      noiseSuppression: context.identity.media.noiseSuppression,
    };
  }

  async authenticate(token: string, signal: AbortSignal): Promise<void> {
    this.calls.push(`authenticate:${token}`);
    await sleep(this.options.authDelayMs ?? 0, signal);
    if (this.rejectionsLeft > 0) {
      this.rejectionsLeft--;
      throw new TokenRejectedError("token refused");
    }
  }

  async join(signal: AbortSignal): Promise<void> {
    this.calls.push("join");
    await sleep(this.options.joinDelayMs ?? 0, signal);
    if (this.options.joinError) throw this.options.joinError;
  }

  async applyInitialMedia(): Promise<MediaState> {
    this.calls.push("applyInitialMedia");
    const wanted = this.context.identity.media;
    this.media = {
      audio: wanted.audioEnabled,
      video: wanted.videoEnabled,
      screenshare: wanted.screenshareEnabled,
      blur: wanted.blur,
      noiseSuppression: wanted.noiseSuppression,
    };
    return { ...this.media };
  }

  async toggle(kind: MediaKind): Promise<MediaState> {
    this.calls.push(`toggle:${kind}`);
    this.media[kind] = !this.media[kind];
    return { ...this.media };
  }

  async toggleBlur(): Promise<MediaState> {
    this.calls.push("toggleBlur");
    this.media.blur = !this.media.blur;
    return { ...this.media };
  }

  async setNoiseSuppression(level: NoiseSuppression): Promise<MediaState> {
    this.calls.push(`noiseSuppression:${level}`);
    this.media.noiseSuppression = level;
    return { ...this.media };
  }

  async setResolution(resolution: Resolution): Promise<MediaState> {
    this.calls.push(`resolution:${resolution}`);
    return { ...this.media };
  }

  async leave(): Promise<void> {
    this.calls.push("leave");
    if (this.options.hangOnLeave) await new Promise<never>(() => {});
  }

  async dispose(): Promise<void> {
    this.calls.push("dispose");
  }

  terminate(): void {
    this.calls.push("terminate");
  }

  /** Simulate the session dropping the participant. */
  drop(err: Error): void {
    this.context.onFatal(err);
  }
}

/** A factory that keeps every strategy it builds, newest last. */
export function fakeStrategyFactory(options: FakeStrategyOptions = {}): {
  factory: StrategyFactory;
  created: FakeStrategy[];
} {
  const created: FakeStrategy[] = [];
  const factory: StrategyFactory = (kind, context) => {
    const strategy = new FakeStrategy(kind, context, options);
    created.push(strategy);
    return strategy;
  };
  return { factory, created };
}

export class FakeCredentials implements CredentialProvider {
  readonly gets: string[] = [];
  readonly invalidated: string[] = [];
  private issued = 0;
  private failure?: string;

  constructor(options: { failWith?: string } = {}) {
    this.failure = options.failWith;
  }

  async get(username: string, origin: string): Promise<string> {
    this.gets.push(`${username}@${origin}`);
    if (this.failure) throw new CredentialError(this.failure);
    return `test-token-${++this.issued}`;
  }

  async invalidate(username: string): Promise<void> {
    this.invalidated.push(username);
  }
}

interface EventSource {
  on(event: "event", listener: (event: ParticipantEvent) => void): unknown;
  off(event: "event", listener: (event: ParticipantEvent) => void): unknown;
}

/** Resolve once a participant reaches `state` (checked via its events). */
export function waitForState(
  source: EventSource,
  participantId: string,
  state: ParticipantState,
  timeoutMs = 2_000,
): Promise<ParticipantEvent> {
  return new Promise((resolve, reject) => {
    const timer = setTimeout(() => {
      source.off("event", listener);
      reject(new Error(`${participantId} never reached ${state}`));
    }, timeoutMs);
    const listener = (event: ParticipantEvent): void => {
      if (event.participantId !== participantId) return;
      if (event.type !== "state-changed" || event.to !== state) return;
      clearTimeout(timer);
      source.off("event", listener);
      resolve(event);
    };
    source.on("event", listener);
  });
}

export function stateChanges(events: ParticipantEvent[]): string[] {
  return events.flatMap((event) => (event.type === "state-changed" ? [`${event.from}->${event.to}`] : []));
}
