import { CredentialError, UnreachableError } from "../errors.js";
import { withTimeout } from "../util/timing.js";
import { getLogger } from "../util/logger.js";

const log = getLogger("login");

export interface LoginRequest {
  username: string;
  /** Origin of the session server, e.g. https://meet.example.test */
  origin: string;
}

export interface LoginResult {
  token: string;
  /** Epoch ms; omitted when the server gives no hint. */
  expiresAt?: number;
}

export type LoginFlow = (request: LoginRequest) => Promise<LoginResult>;

export interface HttpLoginOptions {
  cookieName: string;
  timeoutMs?: number;
}

/**
 * Guest login against the session server: obtain a session cookie, then set
 * the display name on it so the participant shows up under its username.
 */
export function createHttpLoginFlow(options: HttpLoginOptions): LoginFlow {
  const timeoutMs = options.timeoutMs ?? 15_000;

  return async ({ username, origin }) => {
    log.debug(`requesting guest session for ${username} at ${origin}`);

    const guest = await request(
      `${origin}/api/v1/auth/guest?username=guest`,
      { method: "POST", redirect: "manual" },
      timeoutMs,
    );
    if (!guest.ok) {
      throw new CredentialError(`guest login for ${username} failed with HTTP ${guest.status}`);
    }

    const token = findCookie(guest.headers.getSetCookie(), options.cookieName);
    if (!token) {
      throw new CredentialError(`guest login for ${username} did not return a "${options.cookieName}" cookie`);
    }

    const named = await request(
      `${origin}/api/v1/auth/me/name`,
      {
        method: "PUT",
        headers: {
          "Content-Type": "application/json",
          Cookie: `${options.cookieName}=${token}`,
        },
        body: JSON.stringify({ name: username }),
      },
      timeoutMs,
    );
    if (!named.ok) {
      throw new CredentialError(`setting display name for ${username} failed with HTTP ${named.status}`);
    }

    log.info(`obtained session for ${username}`);
    return { token };
  };
}

async function request(url: string, init: RequestInit, timeoutMs: number): Promise<Response> {
  try {
    return await withTimeout(fetch(url, init), timeoutMs, `request to ${url}`);
  } catch (err) {
    if (err instanceof CredentialError) throw err;
    const message = err instanceof Error ? err.message : String(err);
    throw new UnreachableError(`cannot reach ${url}: ${message}`, { cause: err });
  }
}

/** Pick a cookie value out of raw Set-Cookie header lines. */
export function findCookie(setCookieLines: string[], name: string): string | undefined {
  for (const line of setCookieLines) {
    const [pair] = line.split(";");
    const eq = pair.indexOf("=");
    if (eq === -1) continue;
    if (pair.slice(0, eq).trim() === name) {
      return pair.slice(eq + 1).trim();
    }
  }
  return undefined;
}
