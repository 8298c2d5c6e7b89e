import { EventEmitter } from "events";
import { ClosedError, InternalError, TimeoutError, toSimulatorError } from "../errors.js";
import type { ParticipantEvent } from "../participant/events.js";
import type { ParticipantSnapshot } from "../participant/types.js";
import type { EventStream } from "../util/event-stream.js";
import { getLogger } from "../util/logger.js";
import { abortable, retry, sleep, withTimeout } from "../util/timing.js";
import { planBatch } from "./batch.js";
import type {
  BatchSpec,
  BatchSummary,
  DispatchInfo,
  Outcome,
  ParticipantOutcome,
  PlannedParticipant,
  WorkerEvent,
} from "./types.js";
import type { WorkerClient } from "./worker-client.js";

const log = getLogger("orchestrator");

const DEFAULT_CLOSE_TIMEOUT_MS = 15_000;
const DEFAULT_SPAWN_TIMEOUT_MS = 30_000;

export interface OrchestratorOptions {
  clientFor: (endpoint: string) => WorkerClient;
  /** Bound on closing one participant while the batch winds down. */
  closeTimeoutMs?: number;
  /** Bound on one spawn request; a stop does not cut it short. */
  spawnTimeoutMs?: number;
}

interface Dispatched {
  client: WorkerClient;
  participantId: string;
}

type StopReason = "cancelled" | "batch-timeout";

/**
 * Runs one batch: every participant gets its own timer, is spawned on its
 * round-robin worker and sent `join`. One participant's failure never holds
 * up another.
 *
 * Emits "participant:dispatch" (DispatchInfo), "participant:outcome"
 * (ParticipantOutcome), "participant:event" (WorkerEvent) and "done"
 * (BatchSummary).
 */
export class Orchestrator extends EventEmitter {
  private spec: BatchSpec;
  private plan: PlannedParticipant[];
  private clients = new Map<string, WorkerClient>();
  private closeTimeoutMs: number;
  private spawnTimeoutMs: number;

  private outcomes = new Map<number, ParticipantOutcome>();
  private dispatched = new Map<number, Dispatched>();
  private subscriptions = new Set<EventStream<ParticipantEvent>>();
  private pumps: Promise<void>[] = [];
  private spawns: Promise<void>[] = [];
  private stop = new AbortController();
  private stopReason: StopReason | null = null;
  private startedAt = 0;
  private running: Promise<BatchSummary> | null = null;

  constructor(spec: BatchSpec, options: OrchestratorOptions) {
    super();
    this.spec = spec;
    this.plan = planBatch(spec);
    this.closeTimeoutMs = options.closeTimeoutMs ?? DEFAULT_CLOSE_TIMEOUT_MS;
    this.spawnTimeoutMs = options.spawnTimeoutMs ?? DEFAULT_SPAWN_TIMEOUT_MS;
    for (const endpoint of spec.workers) {
      if (!this.clients.has(endpoint)) this.clients.set(endpoint, options.clientFor(endpoint));
    }
  }

  getPlan(): readonly PlannedParticipant[] {
    return this.plan;
  }

  getOutcomes(): ParticipantOutcome[] {
    return [...this.outcomes.values()].sort((a, b) => a.index - b.index);
  }

  isCancelled(): boolean {
    return this.stopReason === "cancelled";
  }

  run(): Promise<BatchSummary> {
    if (!this.running) this.running = this.execute();
    return this.running;
  }

  /** Stop dispatching, close everything dispatched, and let run() resolve. */
  cancel(): void {
    if (this.stopReason) return;
    this.stopReason = "cancelled";
    log.info("batch cancelled");
    this.stop.abort(new ClosedError("batch cancelled"));
  }

  private async execute(): Promise<BatchSummary> {
    this.startedAt = Date.now();
    const startedAt = new Date(this.startedAt).toISOString();
    const batchTimeoutMs = this.spec.batchTimeoutSeconds * 1000;
    log.info(
      `batch of ${this.plan.length} participant(s) on ${this.clients.size} worker(s), timeout ${this.spec.batchTimeoutSeconds}s`,
    );

    const timer = setTimeout(() => {
      if (this.stopReason) return;
      this.stopReason = "batch-timeout";
      log.warn(`batch timeout after ${this.spec.batchTimeoutSeconds}s`);
      this.stop.abort(new TimeoutError("batch", batchTimeoutMs));
    }, batchTimeoutMs);

    try {
      await Promise.all(this.plan.map((participant) => this.runParticipant(participant)));
      await this.hold();
    } finally {
      clearTimeout(timer);
    }

    await this.closeAll();
    const summary = this.summarize(startedAt);
    log.info(
      `batch finished: ${summary.joined} joined, ${summary.failed} failed, ${summary.timedOut} timed out of ${summary.total}`,
    );
    this.emit("done", summary);
    return summary;
  }

  private async runParticipant(participant: PlannedParticipant): Promise<void> {
    const batchTimeoutMs = this.spec.batchTimeoutSeconds * 1000;
    if (participant.joinDelayMs > batchTimeoutMs) {
      this.record(
        participant,
        "timed-out",
        `join delay of ${participant.joinDelayMs}ms exceeds the batch timeout of ${batchTimeoutMs}ms`,
      );
      return;
    }

    let dispatched: Dispatched | undefined;
    try {
      await sleep(participant.joinDelayMs, this.stop.signal);
      const client = this.clientOf(participant.worker);
      const snapshot = await this.spawnWithRetry(client, participant);
      dispatched = { client, participantId: snapshot.id };
      const info: DispatchInfo = {
        index: participant.index,
        username: participant.username,
        worker: participant.worker,
        participantId: snapshot.id,
      };
      this.emit("participant:dispatch", info);

      await this.follow(client, participant, snapshot.id);
      await this.join(client, participant, snapshot.id);
      this.record(participant, "joined", undefined, snapshot.id);
    } catch (err) {
      const [outcome, reason] = await this.classify(err, dispatched);
      this.record(participant, outcome, reason, dispatched?.participantId);
    }
  }

  private spawnWithRetry(client: WorkerClient, participant: PlannedParticipant): Promise<ParticipantSnapshot> {
    const { attempts, baseDelayMs, maxDelayMs } = this.spec.retry;
    return retry(
      () => abortable(this.spawnOnce(client, participant), this.stop.signal),
      {
        attempts,
        baseDelayMs,
        maxDelayMs,
        signal: this.stop.signal,
        shouldRetry: (err) => toSimulatorError(err).kind === "Unreachable" && !this.stop.signal.aborted,
        onRetry: (err, attempt, delayMs) =>
          log.warn(
            `spawn of ${participant.username} on ${participant.worker} failed (attempt ${attempt}): ${toSimulatorError(err).message}; retrying in ${delayMs}ms`,
          ),
      },
    );
  }

  /**
   * One spawn request. A stop only stops waiting for it: the worker may have
   * created the participant already, so whatever it answers is registered
   * for closing, however late.
   */
  private spawnOnce(client: WorkerClient, participant: PlannedParticipant): Promise<ParticipantSnapshot> {
    const request = withTimeout(
      client.spawn({ identity: participant.identity, strategy: this.spec.strategy }),
      this.spawnTimeoutMs,
      `spawn of ${participant.username} on ${participant.worker}`,
    );
    const registered = request.then(
      (snapshot) => {
        if (this.stopReason) log.info(`${participant.username} spawned as ${snapshot.id} after the batch stopped`);
        this.dispatched.set(participant.index, { client, participantId: snapshot.id });
      },
      () => undefined,
    );
    this.spawns.push(registered);
    return request;
  }

  private async join(client: WorkerClient, participant: PlannedParticipant, id: string): Promise<void> {
    const joinTimeoutMs = this.spec.joinTimeoutSeconds * 1000;
    const request = new AbortController();
    const onStop = (): void => request.abort(this.stop.signal.reason);
    this.stop.signal.addEventListener("abort", onStop, { once: true });
    try {
      await withTimeout(
        client.send(id, { kind: "join" }, request.signal),
        joinTimeoutMs,
        `join of ${participant.username}`,
        this.stop.signal,
      );
    } catch (err) {
      request.abort(err);
      throw err;
    } finally {
      this.stop.signal.removeEventListener("abort", onStop);
    }
  }

  /** Forward a participant's events until its stream ends. */
  private async follow(client: WorkerClient, participant: PlannedParticipant, id: string): Promise<void> {
    let stream: EventStream<ParticipantEvent>;
    try {
      stream = await client.subscribe(id, this.stop.signal);
    } catch (err) {
      log.warn(`no event stream for ${participant.username}: ${toSimulatorError(err).message}`);
      return;
    }
    this.subscriptions.add(stream);
    const pump = async (): Promise<void> => {
      try {
        for await (const event of stream) {
          const forwarded: WorkerEvent = { worker: participant.worker, event };
          this.emit("participant:event", forwarded);
        }
      } catch (err) {
        log.warn(`event stream for ${participant.username} broke: ${toSimulatorError(err).message}`);
      } finally {
        this.subscriptions.delete(stream);
      }
    };
    this.pumps.push(pump());
  }

  private async classify(err: unknown, dispatched: Dispatched | undefined): Promise<[Outcome, string]> {
    if (this.stopReason === "batch-timeout") return ["timed-out", "batch timeout reached"];
    if (this.stopReason === "cancelled") return ["failed", "cancelled"];
    const error = toSimulatorError(err);
    if (error.kind === "Timeout") return ["timed-out", error.message];
    if (!dispatched) return ["failed", `${error.kind}: ${error.message}`];

    // The join was refused because the participant already failed; its snapshot says why.
    try {
      const snapshot = await dispatched.client.get(dispatched.participantId, this.stop.signal);
      if (snapshot.failure) return ["failed", `${snapshot.failure.kind}: ${snapshot.failure.reason}`];
    } catch (lookupErr) {
      log.debug(`could not read ${dispatched.participantId} after failure: ${toSimulatorError(lookupErr).message}`);
    }
    return ["failed", `${error.kind}: ${error.message}`];
  }

  private record(participant: PlannedParticipant, outcome: Outcome, reason?: string, participantId?: string): void {
    if (this.outcomes.has(participant.index)) return;
    const result: ParticipantOutcome = {
      index: participant.index,
      username: participant.username,
      worker: participant.worker,
      ...(participantId ? { participantId } : {}),
      outcome,
      ...(reason ? { reason } : {}),
      elapsedMs: Date.now() - this.startedAt,
    };
    this.outcomes.set(participant.index, result);
    log.info(`${participant.username}: ${outcome}${reason ? ` (${reason})` : ""}`);
    this.emit("participant:outcome", result);
  }

  private async hold(): Promise<void> {
    const holdMs = this.spec.holdSeconds * 1000;
    if (this.stopReason || holdMs <= 0 || this.dispatched.size === 0) return;
    log.info(`holding participants for ${this.spec.holdSeconds}s`);
    try {
      await sleep(holdMs, this.stop.signal);
    } catch (err) {
      log.info(`hold ended early: ${toSimulatorError(err).message}`);
    }
  }

  private async closeAll(): Promise<void> {
    await Promise.all(this.spawns);
    const entries = [...this.dispatched.values()];
    if (entries.length > 0) log.info(`closing ${entries.length} participant(s)`);
    const results = await Promise.allSettled(
      entries.map(({ client, participantId }) =>
        withTimeout(client.send(participantId, { kind: "close" }), this.closeTimeoutMs, `close of ${participantId}`),
      ),
    );
    results.forEach((result, i) => {
      if (result.status === "rejected") {
        log.warn(`closing ${entries[i].participantId} failed: ${toSimulatorError(result.reason).message}`);
      }
    });

    for (const stream of this.subscriptions) stream.end();
    await Promise.all(this.pumps);

    const disposals = await Promise.allSettled([...this.clients.values()].map((client) => client.dispose()));
    for (const disposal of disposals) {
      if (disposal.status === "rejected") {
        log.warn(`worker client cleanup failed: ${toSimulatorError(disposal.reason).message}`);
      }
    }
  }

  private clientOf(worker: string): WorkerClient {
    const client = this.clients.get(worker);
    if (!client) throw new InternalError(`no client for worker ${worker}`);
    return client;
  }

  private summarize(startedAt: string): BatchSummary {
    const participants = this.getOutcomes();
    const count = (outcome: Outcome): number => participants.filter((p) => p.outcome === outcome).length;
    return {
      sessionUrl: this.spec.sessionUrl,
      startedAt,
      finishedAt: new Date().toISOString(),
      cancelled: this.isCancelled(),
      total: participants.length,
      joined: count("joined"),
      failed: count("failed"),
      timedOut: count("timed-out"),
      participants,
    };
  }
}
