import type { MediaSettings } from "../types.js";

export type JsonValue = string | number | boolean | null | JsonValue[] | { [key: string]: JsonValue };

export type SurfaceAction = "click" | { type: string };

export interface SurfaceCookie {
  name: string;
  value: string;
  /** Page URL the cookie belongs to. */
  url: string;
}

/**
 * The narrow set of things a strategy may ask of a rendering surface. One
 * driver is one surface, owned by exactly one participant.
 */
export interface SurfaceDriver {
  navigate(url: string): Promise<void>;
  /** Resolves once the selector matches; rejects after timeoutMs. */
  waitFor(selector: string, timeoutMs: number): Promise<void>;
  invoke(selector: string, action: SurfaceAction): Promise<void>;
  /** Run a function source in the page, called with the given arguments. */
  evaluate(script: string, ...args: JsonValue[]): Promise<unknown>;
  readAttribute(selector: string, name: string): Promise<string | null>;
  setCookie(cookie: SurfaceCookie): Promise<void>;
  /** Called once if the surface goes away without close() or kill(). */
  onDisconnected(listener: () => void): void;
  close(): Promise<void>;
  /** Must not throw. */
  kill(): void;
}

export interface SurfaceLaunchRequest {
  username: string;
  media: Readonly<MediaSettings>;
}

export type SurfaceLauncher = (request: SurfaceLaunchRequest) => Promise<SurfaceDriver>;
