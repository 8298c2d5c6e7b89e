import { EventEmitter } from "events";
import WebSocket from "ws";
import { UnreachableError } from "../../errors.js";
import { getLogger } from "../../util/logger.js";
import { rawToString } from "../../util/raw-data.js";
import { withTimeout } from "../../util/timing.js";
import {
  ServerMessageSchema,
  type ClientMessage,
  type ClientRequest,
  type ServerReply,
} from "./messages.js";

const log = getLogger("signaling");

interface PendingRequest {
  resolve: (reply: ServerReply) => void;
  reject: (err: Error) => void;
}

/**
 * One signaling WebSocket. Requests are correlated with replies by requestId.
 *
 * Emits "kicked" (reason) on a server push, and "close" (code, reason,
 * expected) once an open connection goes away; `expected` is false when the
 * backend or the network dropped us.
 */
export class SignalingConnection extends EventEmitter {
  private socket: WebSocket | null = null;
  private url: string;
  private connected = false;
  private closingByUs = false;
  private nextRequestId = 0;
  private pending = new Map<string, PendingRequest>();

  constructor(url: string) {
    super();
    this.url = url;
  }

  async connect(timeoutMs: number, signal?: AbortSignal): Promise<void> {
    const socket = new WebSocket(this.url, { handshakeTimeout: timeoutMs });
    this.socket = socket;

    socket.on("message", (data) => this.handleMessage(rawToString(data)));

    socket.on("close", (code, reason) => {
      const expected = this.closingByUs;
      const wasConnected = this.connected;
      this.connected = false;
      this.rejectPending(new UnreachableError(`signaling connection closed (code ${code})`));
      if (wasConnected) {
        log.debug(`connection to ${this.url} closed (code ${code})`);
        this.emit("close", code, reason.toString(), expected);
      }
    });

    socket.on("error", (err) => {
      log.debug(`socket error on ${this.url}: ${err.message}`);
    });

    const opened = new Promise<void>((resolve, reject) => {
      socket.once("open", () => {
        this.connected = true;
        log.debug(`connected to ${this.url}`);
        resolve();
      });
      socket.once("error", (err) => {
        reject(new UnreachableError(`cannot reach ${this.url}: ${err.message}`, { cause: err }));
      });
      socket.once("close", (code) => {
        reject(new UnreachableError(`cannot reach ${this.url}: closed during handshake (code ${code})`));
      });
    });

    try {
      await withTimeout(opened, timeoutMs, `connect to ${this.url}`, signal);
    } catch (err) {
      this.terminate();
      throw err;
    }
  }

  /** Send a request and wait for the reply carrying its requestId. */
  async request(message: ClientRequest, timeoutMs: number, signal?: AbortSignal): Promise<ServerReply> {
    const socket = this.socket;
    if (!socket || !this.connected) {
      throw new UnreachableError("signaling connection is not open");
    }

    const requestId = String(++this.nextRequestId);
    const full: ClientMessage = { ...message, requestId };
    const reply = new Promise<ServerReply>((resolve, reject) => {
      this.pending.set(requestId, { resolve, reject });
    });

    socket.send(JSON.stringify(full));
    try {
      return await withTimeout(reply, timeoutMs, `${message.type} request`, signal);
    } finally {
      this.pending.delete(requestId);
    }
  }

  /** Close with a normal close frame and wait until the socket is gone. */
  async disconnect(timeoutMs = 2_000): Promise<void> {
    const socket = this.socket;
    if (!socket || socket.readyState === WebSocket.CLOSED) return;
    this.closingByUs = true;
    const closed = new Promise<void>((resolve) => socket.once("close", () => resolve()));
    socket.close(1000, "bye");
    try {
      await withTimeout(closed, timeoutMs, "signaling close");
    } catch (err) {
      log.debug(`close handshake did not finish: ${err instanceof Error ? err.message : String(err)}`);
      socket.terminate();
    }
  }

  terminate(): void {
    this.closingByUs = true;
    this.socket?.terminate();
    this.connected = false;
  }

  isConnected(): boolean {
    return this.connected;
  }

  private handleMessage(raw: string): void {
    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch (err) {
      log.warn(`ignoring non-JSON signaling frame: ${String(err)}`);
      return;
    }

    const parsed = ServerMessageSchema.safeParse(json);
    if (!parsed.success) {
      log.warn(`ignoring unknown signaling message: ${raw.slice(0, 200)}`);
      return;
    }

    const message = parsed.data;
    if (message.type === "kicked") {
      this.emit("kicked", message.reason);
      return;
    }
    const pending = message.requestId ? this.pending.get(message.requestId) : undefined;
    if (!pending) {
      log.debug(`unsolicited ${message.type} message`);
      return;
    }
    pending.resolve(message);
  }

  private rejectPending(err: Error): void {
    for (const pending of this.pending.values()) pending.reject(err);
    this.pending.clear();
  }
}
