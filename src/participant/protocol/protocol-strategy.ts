import {
  InternalError,
  TokenRejectedError,
  UnreachableError,
  UnsupportedError,
  ValidationError,
} from "../../errors.js";
import type { Capability, MediaKind, ParticipantStrategy, StrategyContext } from "../strategy.js";
import { initialMediaState, type MediaState } from "../types.js";
import { SignalingConnection } from "./connection.js";
import type { ServerReply } from "./messages.js";

export const DEFAULT_SIGNALING_PATH = "/api/v1/signal";

export interface ProtocolStrategyOptions {
  /** Path of the signaling endpoint on the session origin. */
  signalingPath?: string;
}

/** ws(s)://<session origin><signaling path> */
export function signalingUrlFor(sessionUrl: string, signalingPath = DEFAULT_SIGNALING_PATH): string {
  const url = new URL(sessionUrl);
  const scheme = url.protocol === "https:" ? "wss:" : "ws:";
  return `${scheme}//${url.host}${signalingPath}`;
}

/** The space is the last non-empty path segment of the session URL. */
export function spaceFor(sessionUrl: string): string | undefined {
  const segments = new URL(sessionUrl).pathname.split("/").filter((s) => s.length > 0);
  const last = segments.at(-1);
  return last === undefined ? undefined : decodeURIComponent(last);
}

/**
 * A participant that speaks the session's signaling protocol directly. Cheap
 * enough to run hundreds per worker; it cannot exercise features that only
 * exist in a rendering surface.
 */
export class ProtocolStrategy implements ParticipantStrategy {
  readonly kind = "protocol";
  readonly capabilities: ReadonlySet<Capability> = new Set<Capability>();

  private context: StrategyContext;
  private url: string;
  private connection: SignalingConnection | null = null;
  private media: MediaState;
  /** Once we asked to leave, the backend hanging up is expected. */
  private leaving = false;

  constructor(context: StrategyContext, options: ProtocolStrategyOptions = {}) {
    this.context = context;
    this.url = signalingUrlFor(context.identity.sessionUrl, options.signalingPath);
    this.media = initialMediaState(context.identity.media);
  }

  async authenticate(token: string, signal: AbortSignal): Promise<void> {
    const { timeouts, identity } = this.context;
    this.connection?.terminate();

    const connection = new SignalingConnection(this.url);
    this.connection = connection;
    await connection.connect(timeouts.authMs, signal);

    const reply = await connection.request(
      { type: "hello", token, username: identity.username },
      timeouts.authMs,
      signal,
    );
    if (reply.type === "rejected") {
      connection.terminate();
      this.connection = null;
      throw new TokenRejectedError(reply.reason);
    }
    expectReply(reply, "welcome");

    connection.on("kicked", (reason: string) => {
      this.context.onFatal(new UnreachableError(`removed from the session: ${reason}`));
    });
    connection.on("close", (code: number, _reason: string, expected: boolean) => {
      if (!expected && !this.leaving) this.context.onFatal(new UnreachableError(`signaling connection dropped (code ${code})`));
    });
    this.context.log("debug", `signaling session ${reply.sessionId} open`);
  }

  async join(signal: AbortSignal): Promise<void> {
    const { identity, timeouts } = this.context;
    const space = spaceFor(identity.sessionUrl);
    if (!space) throw new ValidationError([`${identity.sessionUrl} names no space`], "session URL");

    const reply = await this.requireConnection().request(
      {
        type: "join",
        space,
        displayName: identity.username,
        transport: identity.media.transport,
        resolution: identity.media.resolution,
        fakeMedia: identity.media.fakeMedia,
      },
      timeouts.joinMs,
      signal,
    );
    expectReply(reply, "joined");
    this.context.log("info", `joined space ${space} as ${reply.participantId}`);
  }

  async applyInitialMedia(signal: AbortSignal): Promise<MediaState> {
    const prefs = this.context.identity.media;
    const wanted: Record<MediaKind, boolean> = {
      audio: prefs.audioEnabled,
      video: prefs.videoEnabled,
      screenshare: prefs.screenshareEnabled,
    };
    for (const kind of ["audio", "video", "screenshare"] as const) {
      if (wanted[kind] !== this.media[kind]) await this.setMedia(kind, wanted[kind], signal);
    }
    return { ...this.media };
  }

  async toggle(kind: MediaKind, signal: AbortSignal): Promise<MediaState> {
    await this.setMedia(kind, !this.media[kind], signal);
    return { ...this.media };
  }

  toggleBlur(): Promise<MediaState> {
    return Promise.reject(new UnsupportedError("protocol participants have no background blur"));
  }

  setNoiseSuppression(): Promise<MediaState> {
    return Promise.reject(new UnsupportedError("protocol participants have no noise suppression"));
  }

  /** The resolution goes out with the join; the protocol has no way to change it later. */
  setResolution(): Promise<MediaState> {
    return Promise.reject(new UnsupportedError("protocol participants cannot change resolution after joining"));
  }

  async leave(signal: AbortSignal): Promise<void> {
    this.leaving = true;
    const reply = await this.requireConnection().request({ type: "leave" }, this.context.timeouts.mediaMs, signal);
    expectReply(reply, "left");
  }

  async dispose(): Promise<void> {
    const connection = this.connection;
    this.connection = null;
    await connection?.disconnect();
  }

  terminate(): void {
    this.connection?.terminate();
    this.connection = null;
  }

  private async setMedia(kind: MediaKind, enabled: boolean, signal: AbortSignal): Promise<void> {
    const reply = await this.requireConnection().request(
      { type: "media", kind, enabled },
      this.context.timeouts.mediaMs,
      signal,
    );
    expectReply(reply, "media-ack");
    this.media = { ...this.media };
    this.media[reply.kind] = reply.enabled;
  }

  private requireConnection(): SignalingConnection {
    const connection = this.connection;
    if (!connection || !connection.isConnected()) {
      throw new UnreachableError("signaling connection is not open");
    }
    return connection;
  }
}

/** Narrow a reply to the expected type; an `error` reply or anything else throws. */
function expectReply<T extends ServerReply["type"]>(
  reply: ServerReply,
  type: T,
): asserts reply is Extract<ServerReply, { type: T }> {
  if (reply.type === type) return;
  if (reply.type === "error") {
    throw new InternalError(`backend refused: ${reply.code}: ${reply.message}`);
  }
  throw new InternalError(`expected "${type}" reply, got "${reply.type}"`);
}
