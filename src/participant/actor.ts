import { EventEmitter } from "events";
import type winston from "winston";
import {
  ClosedError,
  CredentialError,
  TimeoutError,
  TokenRejectedError,
  UnsupportedError,
  toSimulatorError,
} from "../errors.js";
import type { CredentialProvider } from "../credentials/store.js";
import { EventStream } from "../util/event-stream.js";
import { getLogger } from "../util/logger.js";
import { withTimeout } from "../util/timing.js";
import type { EventPayload, LogLevel, ParticipantEvent } from "./events.js";
import { assertCommandAllowed, canTransition, failurePhase, isTerminal } from "./state-machine.js";
import {
  DEFAULT_TIMEOUTS,
  type Capability,
  type ParticipantStrategy,
  type StrategyFactory,
  type StrategyTimeouts,
} from "./strategy.js";
import {
  initialMediaState,
  type CommandAck,
  type CommandKind,
  type FailureInfo,
  type MediaState,
  type ParticipantCommand,
  type ParticipantIdentity,
  type ParticipantSnapshot,
  type ParticipantState,
  type StrategyKind,
} from "./types.js";

const DEFAULT_CLOSE_GRACE_MS = 10_000;

/** Commands that go through the mailbox; close bypasses it. */
type QueuedCommand = Exclude<ParticipantCommand, { kind: "close" }>;

export interface ParticipantActorOptions {
  id: string;
  identity: ParticipantIdentity;
  strategy: StrategyKind;
  strategyFactory: StrategyFactory;
  credentials: CredentialProvider;
  timeouts?: Partial<StrategyTimeouts>;
  closeGraceMs?: number;
}

/**
 * One simulated participant. Every life-cycle step and command runs through
 * a serialized mailbox, so the actor handles one thing at a time and its
 * state-changed events come out in transition order, exactly once each.
 *
 * Emits "event" (ParticipantEvent) for every notification.
 */
export class ParticipantActor extends EventEmitter {
  readonly id: string;
  readonly identity: ParticipantIdentity;
  readonly strategyKind: StrategyKind;

  private strategy: ParticipantStrategy;
  private credentials: CredentialProvider;
  private timeouts: StrategyTimeouts;
  private closeGraceMs: number;
  private log: winston.Logger;

  private state: ParticipantState = "spawned";
  private media: MediaState;
  private failure?: FailureInfo;
  private createdAt = Date.now();
  private updatedAt = this.createdAt;
  private seq = 0;

  private mailbox: Promise<void> = Promise.resolve();
  private inFlight: AbortController | null = null;
  private closeRequested = false;
  private closing: Promise<CommandAck> | null = null;
  private started = false;

  constructor(options: ParticipantActorOptions) {
    super();
    this.id = options.id;
    this.identity = options.identity;
    this.strategyKind = options.strategy;
    this.credentials = options.credentials;
    this.timeouts = { ...DEFAULT_TIMEOUTS, ...options.timeouts };
    this.closeGraceMs = options.closeGraceMs ?? DEFAULT_CLOSE_GRACE_MS;
    this.media = initialMediaState(options.identity.media);
    this.log = getLogger("participant").child({ participant: `${this.id}/${this.identity.username}` });

    this.strategy = options.strategyFactory(options.strategy, {
      identity: this.identity,
      timeouts: this.timeouts,
      log: (level, message) => this.logLine(level, message),
      onFatal: (err) => this.handleFatal(err),
    });
  }

  /** Kick off authentication. Idempotent. */
  start(): void {
    if (this.started) return;
    this.started = true;
    this.enqueue("authenticate", (signal) => this.authenticate(signal)).catch((err: unknown) =>
      this.handleLifecycleFailure(err),
    );
  }

  getState(): ParticipantState {
    return this.state;
  }

  snapshot(): ParticipantSnapshot {
    return {
      id: this.id,
      username: this.identity.username,
      sessionUrl: this.identity.sessionUrl,
      strategy: this.strategyKind,
      state: this.state,
      media: { ...this.media },
      createdAt: this.createdAt,
      updatedAt: this.updatedAt,
      ...(this.failure ? { failure: { ...this.failure } } : {}),
    };
  }

  /**
   * Queue a command. Resolves once applied; rejects with InvalidState when the
   * command does not fit the state at the time it is dequeued, and with Closed
   * once the participant is terminal or closing.
   */
  send(command: ParticipantCommand): Promise<CommandAck> {
    if (command.kind === "close") return this.close();
    if (isTerminal(this.state)) {
      return Promise.reject(new ClosedError(`participant ${this.id} is ${this.state}`));
    }
    if (this.closeRequested) {
      return Promise.reject(new ClosedError(`participant ${this.id} is closing`));
    }
    const queued: QueuedCommand = command;
    return this.enqueue(queued.kind, (signal) => this.apply(queued, signal));
  }

  /**
   * Leave gracefully within the grace period, then release the strategy. Past
   * the grace period the strategy is torn down and the participant fails with
   * `forced: true`. On a terminal participant this is a no-op.
   */
  close(): Promise<CommandAck> {
    if (this.closing) return this.closing;
    if (isTerminal(this.state)) return Promise.resolve(this.ack("close", true));
    this.closeRequested = true;
    this.closing = this.performClose();
    return this.closing;
  }

  /** Events from now on; the stream ends after the terminal state change. */
  events(): EventStream<ParticipantEvent> {
    const listener = (event: ParticipantEvent): void => {
      stream.push(event);
      if (event.type === "state-changed" && isTerminal(event.to)) stream.end();
    };
    const stream = new EventStream<ParticipantEvent>(() => this.off("event", listener));
    if (isTerminal(this.state)) {
      stream.end();
      return stream;
    }
    this.on("event", listener);
    return stream;
  }

  // --- mailbox -----------------------------------------------------------

  private enqueue<T>(label: string, task: (signal: AbortSignal) => Promise<T>): Promise<T> {
    const run = this.mailbox.then(async () => {
      if (isTerminal(this.state)) {
        throw new ClosedError(`participant ${this.id} is ${this.state}; "${label}" dropped`);
      }
      if (this.closeRequested) {
        throw new ClosedError(`participant ${this.id} is closing; "${label}" dropped`);
      }
      const controller = new AbortController();
      this.inFlight = controller;
      try {
        return await task(controller.signal);
      } finally {
        if (this.inFlight === controller) this.inFlight = null;
      }
    });
    this.mailbox = run.then(
      () => undefined,
      () => undefined,
    );
    return run;
  }

  private async apply(command: QueuedCommand, signal: AbortSignal): Promise<CommandAck> {
    assertCommandAllowed(this.state, command.kind);

    switch (command.kind) {
      case "join":
        await this.lifecycleStep(() => this.join(signal));
        return this.ack("join");
      case "leave":
        await this.lifecycleStep(() => this.leave(signal));
        return this.ack("leave");
      case "toggle-audio":
        return this.mediaStep("toggle-audio", () => this.strategy.toggle("audio", signal), signal);
      case "toggle-video":
        return this.mediaStep("toggle-video", () => this.strategy.toggle("video", signal), signal);
      case "toggle-screenshare":
        return this.mediaStep("toggle-screenshare", () => this.strategy.toggle("screenshare", signal), signal);
      case "toggle-blur":
        this.requireCapability("blur");
        return this.mediaStep("toggle-blur", () => this.strategy.toggleBlur(signal), signal);
      case "set-noise-suppression":
        this.requireCapability("noise-suppression");
        return this.mediaStep(
          "set-noise-suppression",
          () => this.strategy.setNoiseSuppression(command.level, signal),
          signal,
        );
      case "set-resolution":
        this.requireCapability("resolution");
        return this.mediaStep("set-resolution", () => this.strategy.setResolution(command.resolution, signal), signal);
    }
  }

  // --- life-cycle steps --------------------------------------------------

  private async authenticate(signal: AbortSignal): Promise<void> {
    const origin = new URL(this.identity.sessionUrl).origin;
    try {
      await this.authenticateOnce(origin, signal);
    } catch (err) {
      if (!(err instanceof TokenRejectedError)) throw err;
      this.logLine("warn", `session token rejected (${err.message}), refreshing credential`);
      await this.credentials.invalidate(this.identity.username);
      try {
        await this.authenticateOnce(origin, signal);
      } catch (retryErr) {
        if (retryErr instanceof TokenRejectedError) {
          throw new CredentialError(`session token for ${this.identity.username} rejected after refresh`);
        }
        throw retryErr;
      }
    }
    this.transition("authenticated");
  }

  private async authenticateOnce(origin: string, signal: AbortSignal): Promise<void> {
    const token = await withTimeout(
      this.credentials.get(this.identity.username, origin),
      this.timeouts.authMs,
      "credential lookup",
      signal,
    );
    await withTimeout(this.strategy.authenticate(token, signal), this.timeouts.authMs, "authentication", signal);
  }

  private async join(signal: AbortSignal): Promise<void> {
    await withTimeout(this.strategy.join(signal), this.timeouts.joinMs, "join", signal);
    this.transition("joined");

    const media = await withTimeout(
      this.strategy.applyInitialMedia(signal),
      this.timeouts.mediaMs,
      "initial media setup",
      signal,
    );
    this.updateMedia(media);
    this.transition("active");
  }

  private async leave(signal: AbortSignal): Promise<void> {
    await withTimeout(this.strategy.leave(signal), this.timeouts.mediaMs, "leave", signal);
    await this.strategy.dispose();
    this.transition("closed", "left the session");
  }

  /** A life-cycle step that fails the participant when it throws. */
  private async lifecycleStep(step: () => Promise<void>): Promise<void> {
    try {
      await step();
    } catch (err) {
      this.handleLifecycleFailure(err);
      throw err;
    }
  }

  /** Media commands report errors to the caller but leave the participant in place. */
  private async mediaStep(
    command: CommandKind,
    step: () => Promise<MediaState>,
    signal: AbortSignal,
  ): Promise<CommandAck> {
    try {
      const media = await withTimeout(step(), this.timeouts.mediaMs, command, signal);
      this.updateMedia(media);
      return this.ack(command);
    } catch (err) {
      if (!this.closeRequested) {
        const error = toSimulatorError(err);
        this.logLine("error", `${command} failed: ${error.message}`);
        this.emitEvent({ type: "error", kind: error.kind, message: error.message });
      }
      throw err;
    }
  }

  private requireCapability(capability: Capability): void {
    if (!this.strategy.capabilities.has(capability)) {
      throw new UnsupportedError(`${this.strategyKind} participants cannot change ${capability}`);
    }
  }

  private async performClose(): Promise<CommandAck> {
    this.inFlight?.abort(new ClosedError("close requested"));

    const grace = new AbortController();
    const graceful = (async () => {
      await this.mailbox;
      if (isTerminal(this.state)) return;
      if (this.state === "joined" || this.state === "active") {
        try {
          await this.strategy.leave(grace.signal);
        } catch (err) {
          this.logLine("warn", `leave during close failed: ${toSimulatorError(err).message}`);
        }
      }
      await this.strategy.dispose();
    })();

    try {
      await withTimeout(graceful, this.closeGraceMs, "graceful close");
      this.transition("closed", "closed on request");
    } catch (err) {
      grace.abort(err);
      this.strategy.terminate();
      const forced = err instanceof TimeoutError;
      this.fail(
        forced ? new TimeoutError("graceful close (forced termination)", this.closeGraceMs) : err,
        forced,
      );
    }
    return this.ack("close");
  }

  private handleLifecycleFailure(err: unknown): void {
    if (this.closeRequested) return;
    this.fail(err);
  }

  private handleFatal(err: Error): void {
    if (this.closeRequested || isTerminal(this.state)) return;
    this.logLine("error", `session lost: ${err.message}`);
    this.inFlight?.abort(err);
    this.fail(err);
  }

  private fail(err: unknown, forced = false): void {
    if (isTerminal(this.state)) return;
    const error = toSimulatorError(err);
    const failure: FailureInfo = {
      kind: error.kind,
      reason: error.message,
      lastState: this.state,
      phase: failurePhase(this.state),
      forced,
    };
    this.failure = failure;
    this.emitEvent({ type: "error", kind: error.kind, message: error.message });
    this.transition("failed", `${failure.phase}: ${error.message}`, failure);
    this.strategy.terminate();
  }

  // --- state & events ----------------------------------------------------

  private transition(to: ParticipantState, reason?: string, failure?: FailureInfo): boolean {
    const from = this.state;
    if (!canTransition(from, to)) {
      this.log.debug(`ignoring transition ${from} -> ${to}`);
      return false;
    }
    this.state = to;
    this.updatedAt = Date.now();
    this.log.info(`${from} -> ${to}${reason ? ` (${reason})` : ""}`);
    this.emitEvent({
      type: "state-changed",
      from,
      to,
      ...(reason ? { reason } : {}),
      ...(failure ? { failure } : {}),
    });
    return true;
  }

  private updateMedia(media: MediaState): void {
    this.media = { ...media };
    this.updatedAt = Date.now();
    this.emitEvent({ type: "media-changed", media: { ...media } });
  }

  private logLine(level: LogLevel, message: string): void {
    this.log.log(level, message);
    this.emitEvent({ type: "log-line", level, message });
  }

  private emitEvent(payload: EventPayload): void {
    const event: ParticipantEvent = {
      ...payload,
      participantId: this.id,
      username: this.identity.username,
      timestamp: Date.now(),
      seq: ++this.seq,
    };
    this.emit("event", event);
  }

  private ack(command: CommandKind, noop = false): CommandAck {
    return {
      participantId: this.id,
      command,
      state: this.state,
      ...(noop ? { noop: true } : {}),
      media: { ...this.media },
    };
  }
}
