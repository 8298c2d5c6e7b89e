import {
  ClosedError,
  InternalError,
  SimulatorError,
  TimeoutError,
  TokenRejectedError,
  UnreachableError,
} from "../../errors.js";
import { retry, sleep } from "../../util/timing.js";
import type { Capability, MediaKind, ParticipantStrategy, StrategyContext } from "../strategy.js";
import { initialMediaState, type MediaState, type NoiseSuppression, type Resolution } from "../types.js";
import type { JsonValue, SurfaceDriver, SurfaceLauncher } from "./driver.js";
import {
  PROBE_SCREEN,
  PageSettingsSchema,
  READ_SETTINGS,
  STORAGE_KEYS,
  WRITE_SETTING,
  type PageSettings,
  type SettingName,
} from "./scripts.js";
import { JOIN_BUTTON, LEAVE_BUTTON, LOGIN_FORM, MEDIA_BUTTONS, NAME_INPUT, STATE_ATTRIBUTE } from "./selectors.js";

const MEDIA_KINDS: readonly MediaKind[] = ["audio", "video", "screenshare"];

export interface SurfaceStrategyOptions {
  launch: SurfaceLauncher;
  /** Cookie the frontend reads the session token from. */
  cookieName: string;
  pollIntervalMs?: number;
}

/**
 * A participant that drives a full rendering surface through the session's
 * own frontend, so it exercises everything a person in the call would.
 */
export class SurfaceStrategy implements ParticipantStrategy {
  readonly kind = "surface";
  readonly capabilities: ReadonlySet<Capability> = new Set<Capability>([
    "blur",
    "noise-suppression",
    "resolution",
  ]);

  private context: StrategyContext;
  private launch: SurfaceLauncher;
  private cookieName: string;
  private pollIntervalMs: number;
  private driver: SurfaceDriver | null = null;
  private released = false;
  private media: MediaState;

  constructor(context: StrategyContext, options: SurfaceStrategyOptions) {
    this.context = context;
    this.launch = options.launch;
    this.cookieName = options.cookieName;
    this.pollIntervalMs = options.pollIntervalMs ?? 100;
    this.media = initialMediaState(context.identity.media);
  }

  async authenticate(token: string, signal: AbortSignal): Promise<void> {
    const { identity, timeouts } = this.context;
    const driver = await this.ensureDriver();

    await driver.setCookie({ name: this.cookieName, value: token, url: identity.sessionUrl });
    await driver.navigate(identity.sessionUrl);

    const screen = await this.poll(
      async () => {
        const result = await driver.evaluate(PROBE_SCREEN, NAME_INPUT, LOGIN_FORM);
        return result === "lobby" || result === "login" ? result : undefined;
      },
      timeouts.authMs,
      "waiting for the lobby",
      signal,
    );
    if (screen === "login") {
      throw new TokenRejectedError("session frontend asked for a login");
    }
    this.context.log("debug", "lobby reached");
  }

  async join(signal: AbortSignal): Promise<void> {
    const driver = this.requireDriver();
    const { identity } = this.context;

    await this.waitFor(NAME_INPUT, signal);
    await driver.invoke(NAME_INPUT, { type: identity.username });
    await this.waitFor(JOIN_BUTTON, signal);

    try {
      await this.applySettings();
    } catch (err) {
      this.context.log("warn", `pre-join settings not applied: ${err instanceof Error ? err.message : String(err)}`);
    }

    await driver.invoke(JOIN_BUTTON, "click");
    await this.waitFor(LEAVE_BUTTON, signal);
    this.context.log("info", "joined the space");
  }

  async applyInitialMedia(signal: AbortSignal): Promise<MediaState> {
    const prefs = this.context.identity.media;
    const wanted: Record<MediaKind, boolean> = {
      audio: prefs.audioEnabled,
      video: prefs.videoEnabled,
      screenshare: prefs.screenshareEnabled,
    };
    for (const kind of MEDIA_KINDS) {
      const current = await this.readToggle(kind);
      if (current !== wanted[kind]) await this.flip(kind, current, signal);
    }
    return this.readBack();
  }

  async toggle(kind: MediaKind, signal: AbortSignal): Promise<MediaState> {
    await this.flip(kind, await this.readToggle(kind), signal);
    return this.readBack();
  }

  async toggleBlur(): Promise<MediaState> {
    const settings = await this.readSettings();
    const current = settings?.blur ?? this.media.blur;
    await this.writeSetting("blur", !current);
    return this.readBack();
  }

  async setNoiseSuppression(level: NoiseSuppression): Promise<MediaState> {
    await this.writeSetting("noiseSuppression", level);
    const media = await this.readBack();
    if (media.noiseSuppression !== level) {
      throw new InternalError(`frontend kept noise suppression at ${media.noiseSuppression}, wanted ${level}`);
    }
    return media;
  }

  async setResolution(resolution: Resolution): Promise<MediaState> {
    await this.writeSetting("resolution", resolution);
    const settings = await this.readSettings();
    const current = settings?.resolution ?? "auto";
    if (current !== resolution) {
      throw new InternalError(`frontend kept camera resolution at ${current}, wanted ${resolution}`);
    }
    this.context.log("info", `camera resolution set to ${resolution}`);
    return this.readBack();
  }

  async leave(): Promise<void> {
    await this.requireDriver().invoke(LEAVE_BUTTON, "click");
    this.context.log("info", "left the space");
  }

  async dispose(): Promise<void> {
    this.released = true;
    const driver = this.driver;
    this.driver = null;
    await driver?.close();
  }

  terminate(): void {
    this.released = true;
    this.driver?.kill();
    this.driver = null;
  }

  private async ensureDriver(): Promise<SurfaceDriver> {
    if (this.driver) return this.driver;
    const { identity } = this.context;
    const driver = await this.launch({ username: identity.username, media: identity.media });
    if (this.released) {
      driver.kill();
      throw new ClosedError("surface released while launching");
    }
    driver.onDisconnected(() => {
      if (!this.released) this.context.onFatal(new UnreachableError("rendering surface disconnected"));
    });
    this.driver = driver;
    return driver;
  }

  private requireDriver(): SurfaceDriver {
    if (!this.driver) throw new UnreachableError("no rendering surface");
    return this.driver;
  }

  /** Wait for a selector, retrying a bounded number of times. */
  private async waitFor(selector: string, signal: AbortSignal): Promise<void> {
    const driver = this.requireDriver();
    const { joinMs, waitRetries } = this.context.timeouts;
    const attempts = waitRetries + 1;
    const perAttemptMs = Math.max(1, Math.floor(joinMs / attempts));
    try {
      await retry(() => driver.waitFor(selector, perAttemptMs), {
        attempts,
        baseDelayMs: this.pollIntervalMs,
        maxDelayMs: 1_000,
        shouldRetry: () => !signal.aborted,
        onRetry: (err, attempt) =>
          this.context.log("debug", `still waiting for ${selector} (attempt ${attempt}): ${String(err)}`),
        signal,
      });
    } catch (err) {
      if (err instanceof SimulatorError) throw err;
      throw new TimeoutError(`waiting for ${selector}`, perAttemptMs * attempts);
    }
  }

  private async poll<T>(
    probe: () => Promise<T | undefined>,
    timeoutMs: number,
    operation: string,
    signal: AbortSignal,
  ): Promise<T> {
    const deadline = Date.now() + timeoutMs;
    for (;;) {
      const value = await probe();
      if (value !== undefined) return value;
      if (Date.now() >= deadline) throw new TimeoutError(operation, timeoutMs);
      await sleep(this.pollIntervalMs, signal);
    }
  }

  /** Click a toggle and wait until its state attribute flips. */
  private async flip(kind: MediaKind, before: boolean, signal: AbortSignal): Promise<void> {
    await this.requireDriver().invoke(MEDIA_BUTTONS[kind], "click");
    await this.poll(
      async () => ((await this.readToggle(kind)) !== before ? true : undefined),
      this.context.timeouts.mediaMs,
      `toggling ${kind}`,
      signal,
    );
  }

  private async readToggle(kind: MediaKind): Promise<boolean> {
    const value = await this.requireDriver().readAttribute(MEDIA_BUTTONS[kind], STATE_ATTRIBUTE);
    return value === "true";
  }

  private async applySettings(): Promise<void> {
    const prefs = this.context.identity.media;
    await this.writeSetting("noiseSuppression", prefs.noiseSuppression);
    await this.writeSetting("blur", prefs.blur);
    await this.writeSetting("resolution", prefs.resolution);
    await this.writeSetting("forceStream", prefs.transport === "stream");
  }

  private async writeSetting(name: SettingName, value: JsonValue): Promise<void> {
    await this.requireDriver().evaluate(WRITE_SETTING, STORAGE_KEYS[name], value);
  }

  private async readSettings(): Promise<PageSettings | undefined> {
    const raw = await this.requireDriver().evaluate(READ_SETTINGS, STORAGE_KEYS);
    const parsed = PageSettingsSchema.safeParse(raw);
    if (parsed.success) return parsed.data;
    this.context.log("warn", "frontend settings unreadable");
    return undefined;
  }

  /** Refresh the media view from what the surface shows. */
  private async readBack(): Promise<MediaState> {
    const settings = await this.readSettings();
    const media: MediaState = {
      audio: await this.readToggle("audio"),
      video: await this.readToggle("video"),
      screenshare: await this.readToggle("screenshare"),
      blur: settings?.blur ?? this.media.blur,
      noiseSuppression: settings?.noiseSuppression ?? this.media.noiseSuppression,
    };
    this.media = media;
    return { ...media };
  }
}
