import { EventEmitter } from "events";
import { ZodError } from "zod";
import type { CredentialProvider } from "../credentials/store.js";
import { ClosedError, NotFoundError, ValidationError, violationsFrom } from "../errors.js";
import { ParticipantActor } from "../participant/actor.js";
import type { ParticipantEvent } from "../participant/events.js";
import { isTerminal } from "../participant/state-machine.js";
import type { StrategyFactory, StrategyTimeouts } from "../participant/strategy.js";
import {
  parseIdentity,
  type CommandAck,
  type ParticipantCommand,
  type ParticipantIdentity,
  type ParticipantSnapshot,
  type StrategyKind,
} from "../participant/types.js";
import { EventStream } from "../util/event-stream.js";
import { getLogger } from "../util/logger.js";
import { nextParticipantId, ParticipantRegistry } from "./registry.js";

const log = getLogger("gateway");

export interface GatewayOptions {
  strategyFactory: StrategyFactory;
  credentials: CredentialProvider;
  defaultStrategy?: StrategyKind;
  timeouts?: Partial<StrategyTimeouts>;
  closeGraceMs?: number;
}

export interface SpawnRequest {
  /** Raw identity; validated here. */
  identity: unknown;
  strategy?: StrategyKind;
}

export interface EventFilter {
  participantId?: string;
}

/**
 * Entry point for everything that drives participants, local or remote.
 * Emits "event" (ParticipantEvent) for every participant it owns.
 */
export class ControlGateway extends EventEmitter {
  private registry = new ParticipantRegistry();
  private options: GatewayOptions;
  private shuttingDown = false;

  constructor(options: GatewayOptions) {
    super();
    this.options = options;
    this.setMaxListeners(0);
  }

  spawn(request: SpawnRequest): ParticipantSnapshot {
    if (this.shuttingDown) throw new ClosedError("gateway is shutting down");

    const identity = this.validateIdentity(request.identity);
    const strategy = request.strategy ?? this.options.defaultStrategy ?? "protocol";
    const actor = new ParticipantActor({
      id: nextParticipantId(),
      identity,
      strategy,
      strategyFactory: this.options.strategyFactory,
      credentials: this.options.credentials,
      timeouts: this.options.timeouts,
      closeGraceMs: this.options.closeGraceMs,
    });

    actor.on("event", (event: ParticipantEvent) => {
      if (event.type === "state-changed" && isTerminal(event.to)) {
        this.registry.retire(actor.id);
      }
      this.emit("event", event);
    });
    this.registry.add(actor);
    log.info(`spawned ${actor.id} (${identity.username}, ${strategy})`);
    actor.start();
    return actor.snapshot();
  }

  /** Throws NotFound synchronously for ids this gateway never issued. */
  send(id: string, command: ParticipantCommand): Promise<CommandAck> {
    const entry = this.registry.lookup(id);
    if (!entry) throw new NotFoundError(`no participant ${id}`);

    if (entry.kind === "live") return entry.actor.send(command);

    if (command.kind === "close") {
      return Promise.resolve({
        participantId: id,
        command: "close",
        state: entry.snapshot.state,
        noop: true,
        media: { ...entry.snapshot.media },
      });
    }
    return Promise.reject(new ClosedError(`participant ${id} is ${entry.snapshot.state}`));
  }

  close(id: string): Promise<CommandAck> {
    return this.send(id, { kind: "close" });
  }

  get(id: string): ParticipantSnapshot {
    const entry = this.registry.lookup(id);
    if (!entry) throw new NotFoundError(`no participant ${id}`);
    return entry.kind === "live" ? entry.actor.snapshot() : entry.snapshot;
  }

  list(): ParticipantSnapshot[] {
    return this.registry.snapshots();
  }

  /**
   * Events from now on, optionally for one participant. A per-participant
   * stream ends after that participant's terminal state change; an unfiltered
   * one lasts until the gateway shuts down or the consumer stops.
   */
  subscribe(filter: EventFilter = {}): EventStream<ParticipantEvent> {
    const { participantId } = filter;
    if (participantId !== undefined) {
      const entry = this.registry.lookup(participantId);
      if (!entry) throw new NotFoundError(`no participant ${participantId}`);
      if (entry.kind === "tombstone") {
        const done = new EventStream<ParticipantEvent>();
        done.end();
        return done;
      }
    }

    const listener = (event: ParticipantEvent): void => {
      if (participantId !== undefined && event.participantId !== participantId) return;
      stream.push(event);
      if (participantId !== undefined && event.type === "state-changed" && isTerminal(event.to)) {
        stream.end();
      }
    };
    const stream = new EventStream<ParticipantEvent>(() => {
      this.off("event", listener);
      this.off("shutdown", endStream);
    });
    const endStream = (): void => stream.end();
    this.on("event", listener);
    this.once("shutdown", endStream);
    return stream;
  }

  /** Close every live participant, then end open subscriptions. */
  async shutdown(): Promise<void> {
    this.shuttingDown = true;
    const actors = this.registry.liveActors();
    log.info(`shutting down, closing ${actors.length} participant(s)`);
    const results = await Promise.allSettled(actors.map((actor) => actor.close()));
    for (const [i, result] of results.entries()) {
      if (result.status === "rejected") {
        log.warn(`closing ${actors[i].id} failed: ${String(result.reason)}`);
      }
    }
    this.emit("shutdown");
  }

  private validateIdentity(input: unknown): ParticipantIdentity {
    try {
      return parseIdentity(input);
    } catch (err) {
      if (err instanceof ZodError) {
        throw new ValidationError(violationsFrom(err.issues, "identity"), "participant identity");
      }
      throw err;
    }
  }
}
