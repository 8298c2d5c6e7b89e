import WebSocket from "ws";
import { z } from "zod";
import {
  InternalError,
  TimeoutError,
  UnreachableError,
  errorFromWire,
  isErrorKind,
  type ErrorKind,
} from "../errors.js";
import type { ControlGateway, SpawnRequest } from "../gateway/gateway.js";
import { ParticipantEventSchema, type ParticipantEvent } from "../participant/events.js";
import {
  CommandAckSchema,
  ParticipantSnapshotSchema,
  type CommandAck,
  type ParticipantCommand,
  type ParticipantSnapshot,
} from "../participant/types.js";
import { EventStream } from "../util/event-stream.js";
import { getLogger } from "../util/logger.js";
import { rawToString } from "../util/raw-data.js";
import { withTimeout } from "../util/timing.js";

const log = getLogger("worker-client");

/** What the orchestrator needs from a worker, wherever it runs. */
export interface WorkerClient {
  readonly endpoint: string;
  spawn(request: SpawnRequest, signal?: AbortSignal): Promise<ParticipantSnapshot>;
  send(id: string, command: ParticipantCommand, signal?: AbortSignal): Promise<CommandAck>;
  get(id: string, signal?: AbortSignal): Promise<ParticipantSnapshot>;
  /** Resolves once the subscription is live, so no later event is missed. */
  subscribe(id: string, signal?: AbortSignal): Promise<EventStream<ParticipantEvent>>;
  dispose(): Promise<void>;
}

const ErrorBodySchema = z.object({
  error: z.object({
    kind: z.custom<ErrorKind>(isErrorKind),
    message: z.string(),
  }),
});

export interface HttpWorkerClientOptions {
  /** Bound on a single API call; joins can take a while. */
  requestTimeoutMs?: number;
}

/** Talks to a `confsim worker` over its HTTP API and events socket. */
export class HttpWorkerClient implements WorkerClient {
  readonly endpoint: string;
  private base: string;
  private requestTimeoutMs: number;
  private sockets = new Set<WebSocket>();

  constructor(endpoint: string, options: HttpWorkerClientOptions = {}) {
    this.endpoint = endpoint;
    this.base = endpoint.replace(/\/+$/, "");
    this.requestTimeoutMs = options.requestTimeoutMs ?? 120_000;
  }

  spawn(request: SpawnRequest, signal?: AbortSignal): Promise<ParticipantSnapshot> {
    return this.call("POST", "/participants", request, ParticipantSnapshotSchema, signal);
  }

  send(id: string, command: ParticipantCommand, signal?: AbortSignal): Promise<CommandAck> {
    return this.call("POST", `/participants/${encodeURIComponent(id)}/commands`, command, CommandAckSchema, signal);
  }

  get(id: string, signal?: AbortSignal): Promise<ParticipantSnapshot> {
    return this.call("GET", `/participants/${encodeURIComponent(id)}`, undefined, ParticipantSnapshotSchema, signal);
  }

  async subscribe(id: string, signal?: AbortSignal): Promise<EventStream<ParticipantEvent>> {
    const url = `${this.base.replace(/^http/, "ws")}/events?participantId=${encodeURIComponent(id)}`;
    const socket = new WebSocket(url);
    this.sockets.add(socket);
    const stream = new EventStream<ParticipantEvent>(() => {
      if (socket.readyState === WebSocket.OPEN || socket.readyState === WebSocket.CONNECTING) socket.close(1000);
    });

    socket.on("message", (data) => {
      const text = rawToString(data);
      const parsed = ParticipantEventSchema.safeParse(parseJson(text));
      if (parsed.success) {
        stream.push(parsed.data);
      } else {
        log.debug(`ignoring frame from ${this.endpoint}: ${text.slice(0, 200)}`);
      }
    });
    socket.on("close", () => {
      this.sockets.delete(socket);
      stream.end();
    });
    socket.on("error", (err) => log.debug(`events socket ${url}: ${err.message}`));

    await withTimeout(
      new Promise<void>((resolve, reject) => {
        socket.once("open", () => resolve());
        socket.once("error", (err) => reject(new UnreachableError(`worker ${this.endpoint} unreachable: ${err.message}`)));
      }),
      this.requestTimeoutMs,
      `events subscription on ${this.endpoint}`,
      signal,
    ).catch((err: unknown) => {
      this.sockets.delete(socket);
      socket.terminate();
      throw err;
    });
    return stream;
  }

  async dispose(): Promise<void> {
    for (const socket of this.sockets) socket.terminate();
    this.sockets.clear();
  }

  private async call<T>(
    method: string,
    path: string,
    body: unknown,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    signal?: AbortSignal,
  ): Promise<T> {
    const url = `${this.base}${path}`;
    let response: Response;
    try {
      response = await withTimeout(
        fetch(url, {
          method,
          headers: body === undefined ? undefined : { "Content-Type": "application/json" },
          body: body === undefined ? undefined : JSON.stringify(body),
          signal,
        }),
        this.requestTimeoutMs,
        `${method} ${url}`,
        signal,
      );
    } catch (err) {
      if (signal?.aborted) throw signal.reason;
      if (err instanceof TimeoutError) throw err;
      const message = err instanceof Error ? err.message : String(err);
      throw new UnreachableError(`worker ${this.endpoint} unreachable: ${message}`, { cause: err });
    }

    const payload = parseJson(await response.text());
    if (!response.ok) {
      const failure = ErrorBodySchema.safeParse(payload);
      if (failure.success) throw errorFromWire(failure.data.error.kind, failure.data.error.message);
      throw new InternalError(`${method} ${url} answered HTTP ${response.status}`);
    }
    const parsed = schema.safeParse(payload);
    if (!parsed.success) {
      throw new InternalError(`${method} ${url} returned an unexpected body`);
    }
    return parsed.data;
  }
}

/** Drives a gateway living in this process. */
export class LocalWorkerClient implements WorkerClient {
  readonly endpoint: string;
  private gateway: ControlGateway;

  constructor(endpoint: string, gateway: ControlGateway) {
    this.endpoint = endpoint;
    this.gateway = gateway;
  }

  async spawn(request: SpawnRequest): Promise<ParticipantSnapshot> {
    return this.gateway.spawn(request);
  }

  async send(id: string, command: ParticipantCommand): Promise<CommandAck> {
    return this.gateway.send(id, command);
  }

  async get(id: string): Promise<ParticipantSnapshot> {
    return this.gateway.get(id);
  }

  async subscribe(id: string): Promise<EventStream<ParticipantEvent>> {
    return this.gateway.subscribe({ participantId: id });
  }

  dispose(): Promise<void> {
    return this.gateway.shutdown();
  }
}

function parseJson(raw: string): unknown {
  if (raw.length === 0) return undefined;
  try {
    return JSON.parse(raw);
  } catch (err) {
    log.debug(`response is not JSON: ${String(err)}`);
    return undefined;
  }
}
