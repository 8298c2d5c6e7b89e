import fs from "fs/promises";
import path from "path";
import { z } from "zod";
import { CredentialError } from "../errors.js";
import { getLogger } from "../util/logger.js";
import type { LoginFlow } from "./login.js";

const log = getLogger("credentials");

/** Servers currently hand out year-long sessions; used when login gives no expiry. */
const DEFAULT_TTL_MS = 365 * 24 * 60 * 60 * 1000;

let writeCounter = 0;

export const CredentialRecordSchema = z.object({
  username: z.string().min(1),
  origin: z.string().min(1),
  token: z.string().min(1),
  issuedAt: z.number(),
  expiresAt: z.number(),
  valid: z.boolean(),
});

export type CredentialRecord = z.infer<typeof CredentialRecordSchema>;

export interface CredentialProvider {
  get(username: string, origin: string): Promise<string>;
  invalidate(username: string): Promise<void>;
}

export interface CredentialStoreOptions {
  dataDir: string;
  login: LoginFlow;
  ttlMs?: number;
  now?: () => number;
}

/**
 * Durable per-username session tokens. Concurrent get() calls for the same
 * username share one login flow; different usernames never wait on each other.
 */
export class CredentialStore implements CredentialProvider {
  private dir: string;
  private login: LoginFlow;
  private ttlMs: number;
  private now: () => number;
  private cache = new Map<string, CredentialRecord>();
  private inFlight = new Map<string, Promise<string>>();
  private loginCount = 0;

  constructor(options: CredentialStoreOptions) {
    this.dir = path.join(options.dataDir, "credentials");
    this.login = options.login;
    this.ttlMs = options.ttlMs ?? DEFAULT_TTL_MS;
    this.now = options.now ?? Date.now;
  }

  async get(username: string, origin: string): Promise<string> {
    const known = this.lookup(username, origin);
    if (known) return known;

    if (!this.cache.has(username)) {
      const stored = await this.readRecord(username);
      if (stored && !this.cache.has(username)) this.cache.set(username, stored);
    }

    // Another caller may have started (or finished) a refresh while we read from disk.
    const raced = this.lookup(username, origin);
    if (raced) return raced;

    const key = flightKey(username, origin);
    const refresh = this.refresh(username, origin).finally(() => {
      this.inFlight.delete(key);
    });
    this.inFlight.set(key, refresh);
    return refresh;
  }

  async invalidate(username: string): Promise<void> {
    const record = this.cache.get(username) ?? (await this.readRecord(username));
    if (!record) return;
    const invalid = { ...record, valid: false };
    this.cache.set(username, invalid);
    await this.writeRecord(invalid);
    log.info(`invalidated credential for ${username}`);
  }

  /** Number of login flows started since construction. */
  loginsPerformed(): number {
    return this.loginCount;
  }

  private lookup(username: string, origin: string): Promise<string> | undefined {
    const pending = this.inFlight.get(flightKey(username, origin));
    if (pending) return pending;
    const cached = this.cache.get(username);
    if (cached && this.isUsable(cached, origin)) return Promise.resolve(cached.token);
    return undefined;
  }

  private isUsable(record: CredentialRecord, origin: string): boolean {
    return record.valid && record.origin === origin && record.expiresAt > this.now();
  }

  /** Log in, retrying once, and persist the result before handing it out. */
  private async refresh(username: string, origin: string): Promise<string> {
    let lastError: unknown;
    for (let attempt = 1; attempt <= 2; attempt++) {
      this.loginCount++;
      try {
        const result = await this.login({ username, origin });
        const issuedAt = this.now();
        const record: CredentialRecord = {
          username,
          origin,
          token: result.token,
          issuedAt,
          expiresAt: result.expiresAt ?? issuedAt + this.ttlMs,
          valid: true,
        };
        await this.writeRecord(record);
        this.cache.set(username, record);
        return record.token;
      } catch (err) {
        lastError = err;
        const message = err instanceof Error ? err.message : String(err);
        log.warn(`login attempt ${attempt} for ${username} failed: ${message}`);
      }
    }
    const message = lastError instanceof Error ? lastError.message : String(lastError);
    throw new CredentialError(`could not obtain a session for ${username}: ${message}`, { cause: lastError });
  }

  private recordPath(username: string): string {
    return path.join(this.dir, `${encodeURIComponent(username)}.json`);
  }

  /** Missing, unreadable and corrupt records all read as absent. */
  private async readRecord(username: string): Promise<CredentialRecord | undefined> {
    let raw: string;
    try {
      raw = await fs.readFile(this.recordPath(username), "utf-8");
    } catch (err) {
      if (isNotFound(err)) return undefined;
      log.warn(`cannot read credential for ${username}, treating as absent: ${String(err)}`);
      return undefined;
    }

    const parsed = CredentialRecordSchema.safeParse(parseJson(raw));
    if (parsed.success && parsed.data.username === username) return parsed.data;
    log.warn(`corrupt credential record for ${username}, will log in again`);
    return undefined;
  }

  private async writeRecord(record: CredentialRecord): Promise<void> {
    await fs.mkdir(this.dir, { recursive: true });
    const target = this.recordPath(record.username);
    const tmp = `${target}.${process.pid}.${++writeCounter}.tmp`;
    await fs.writeFile(tmp, JSON.stringify(record, null, 2), "utf-8");
    await fs.rename(tmp, target);
  }
}

function isNotFound(err: unknown): boolean {
  return typeof err === "object" && err !== null && "code" in err && err.code === "ENOENT";
}

function parseJson(raw: string): unknown {
  try {
    return JSON.parse(raw);
  } catch (err) {
    log.debug(`credential record is not JSON: ${String(err)}`);
    return undefined;
  }
}

/** A login is shared only by callers asking for the same user on the same origin. */
function flightKey(username: string, origin: string): string {
  return `${username}@${origin}`;
}
