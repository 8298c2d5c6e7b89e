import fs from "fs/promises";
import os from "os";
import path from "path";
import { afterEach, describe, expect, it } from "vitest";
import { ValidationError } from "../../src/errors.js";
import { loadBatch, planBatch, validateBatch } from "../../src/orchestrate/batch.js";

const SESSION = "https://meet.example.test/room-1";

function violationsOf(input: unknown): string[] {
  try {
    validateBatch(input);
  } catch (err) {
    if (err instanceof ValidationError) return err.violations;
    throw err;
  }
  return [];
}

describe("validateBatch", () => {
  it("fills in defaults", () => {
    const spec = validateBatch({ sessionUrl: SESSION, workers: ["http://w1.test:7400"] });
    expect(spec).toMatchObject({
      strategy: "protocol",
      participants: [],
      defaultParticipants: 0,
      usernamePrefix: "sim",
      joinTimeoutSeconds: 60,
      holdSeconds: 0,
      batchTimeoutSeconds: 300,
      retry: { attempts: 3, baseDelayMs: 500, maxDelayMs: 5_000 },
    });
  });

  it("names a duplicate username", () => {
    expect(
      violationsOf({
        sessionUrl: SESSION,
        workers: ["http://w1.test:7400"],
        participants: [{ username: "alice" }, { username: "bob" }, { username: "alice" }],
      }),
    ).toEqual(['participants[2].username: duplicate username "alice" (also participants[0])']);
  });

  it("counts generated names as usernames", () => {
    expect(
      violationsOf({
        sessionUrl: SESSION,
        workers: ["local://a"],
        participants: [{ username: "sim-2" }, {}],
      }),
    ).toEqual(['participants[1].username: duplicate username "sim-2" (also participants[0])']);
  });

  it("reports every problem at once", () => {
    expect(
      violationsOf({
        sessionUrl: "nope",
        workers: [],
        participants: [{ username: "a", joinDelaySeconds: -1 }, { username: "a" }],
      }),
    ).toEqual([
      "sessionUrl: Invalid url",
      "workers: at least one worker is required",
      "participants.0.joinDelaySeconds: join delay must not be negative",
      'participants[1].username: duplicate username "a" (also participants[0])',
    ]);
  });

  it("refuses durations a timer cannot wait for", () => {
    expect(
      violationsOf({
        sessionUrl: SESSION,
        workers: ["local://a"],
        participants: [{ username: "a", joinDelaySeconds: 2_200_000 }],
        holdSeconds: Infinity,
        batchTimeoutSeconds: 3_000_000,
      }),
    ).toEqual([
      "participants.0.joinDelaySeconds: must be at most 2147483 seconds",
      "holdSeconds: must be at most 2147483 seconds",
      "batchTimeoutSeconds: must be at most 2147483 seconds",
    ]);
    const longest = validateBatch({ sessionUrl: SESSION, workers: ["local://a"], batchTimeoutSeconds: 2_147_483 });
    expect(longest.batchTimeoutSeconds).toBe(2_147_483);
  });

  it("rejects unknown keys and worker schemes", () => {
    expect(violationsOf({ sessionUrl: SESSION, workers: ["ftp://w1.test"], extra: 1 })).toEqual([
      "workers.0: worker endpoint must be http(s):// or local://",
      "(root): Unrecognized key(s) in object: 'extra'",
    ]);
  });
});

describe("planBatch", () => {
  it("assigns workers round-robin and merges media overrides", () => {
    const spec = validateBatch({
      sessionUrl: SESSION,
      workers: ["local://a", "local://b"],
      defaults: { videoEnabled: false },
      participants: [{ username: "alice", joinDelaySeconds: 1.5, initial: { audioEnabled: false } }, {}],
      defaultParticipants: 3,
      usernamePrefix: "load",
    });

    const plan = planBatch(spec);

    expect(plan.map((p) => [p.index, p.username, p.worker, p.joinDelayMs])).toEqual([
      [0, "alice", "local://a", 1500],
      [1, "load-2", "local://b", 0],
      [2, "load-3", "local://a", 0],
      [3, "load-4", "local://b", 0],
      [4, "load-5", "local://a", 0],
    ]);
    expect(plan[0].identity).toEqual({
      username: "alice",
      sessionUrl: SESSION,
      media: { videoEnabled: false, audioEnabled: false },
    });
    expect(plan[4].identity.media).toEqual({ videoEnabled: false });
  });

  it("spreads participants evenly over workers", () => {
    const spec = validateBatch({
      sessionUrl: SESSION,
      workers: ["local://a", "local://b", "local://c"],
      defaultParticipants: 10,
    });
    const perWorker = new Map<string, number>();
    for (const p of planBatch(spec)) perWorker.set(p.worker, (perWorker.get(p.worker) ?? 0) + 1);
    expect(Object.fromEntries(perWorker)).toEqual({ "local://a": 4, "local://b": 3, "local://c": 3 });
  });
});

describe("loadBatch", () => {
  let dir: string | undefined;

  afterEach(async () => {
    if (dir) await fs.rm(dir, { recursive: true, force: true });
    dir = undefined;
  });

  async function write(name: string, content: string): Promise<string> {
    dir ??= await fs.mkdtemp(path.join(os.tmpdir(), "confsim-batch-"));
    const file = path.join(dir, name);
    await fs.writeFile(file, content);
    return file;
  }

  it("reads a YAML batch", async () => {
    const file = await write(
      "batch.yaml",
      [
        `sessionUrl: ${SESSION}`,
        "workers:",
        "  - local://a",
        "strategy: surface",
        "holdSeconds: 30",
        "participants:",
        "  - username: alice",
        "    initial:",
        "      noiseSuppression: rnnoise",
        "",
      ].join("\n"),
    );

    const spec = await loadBatch(file);

    expect(spec.strategy).toBe("surface");
    expect(spec.holdSeconds).toBe(30);
    expect(spec.participants).toEqual([
      { username: "alice", joinDelaySeconds: 0, initial: { noiseSuppression: "rnnoise" } },
    ]);
  });

  it("reports a file that is not YAML", async () => {
    const file = await write("broken.yaml", "workers: [local://a\n");
    await expect(loadBatch(file)).rejects.toBeInstanceOf(ValidationError);
  });
});
