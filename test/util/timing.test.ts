import { describe, expect, it, vi } from "vitest";
import { TimeoutError } from "../../src/errors.js";
import { abortable, backoffDelay, retry, sleep, withTimeout } from "../../src/util/timing.js";

describe("sleep", () => {
  it("rejects with the abort reason", async () => {
    const controller = new AbortController();
    const pending = sleep(10_000, controller.signal);
    controller.abort(new Error("stop"));
    await expect(pending).rejects.toThrow("stop");
  });

  it("rejects at once on an aborted signal", async () => {
    const controller = new AbortController();
    controller.abort(new Error("already"));
    await expect(sleep(0, controller.signal)).rejects.toThrow("already");
  });
});

describe("withTimeout", () => {
  it("passes the value through", async () => {
    await expect(withTimeout(Promise.resolve(7), 1000, "op")).resolves.toBe(7);
  });

  it("names the operation on timeout", async () => {
    const never = new Promise<never>(() => {});
    const err = await withTimeout(never, 10, "join of alice").catch((e: unknown) => e);
    expect(err).toBeInstanceOf(TimeoutError);
    expect(err).toHaveProperty("message", "join of alice timed out after 10ms");
    expect(err).toHaveProperty("kind", "Timeout");
  });

  it("prefers the abort reason when the signal fires first", async () => {
    const controller = new AbortController();
    const never = new Promise<never>(() => {});
    const pending = withTimeout(never, 10_000, "op", controller.signal);
    controller.abort(new Error("cancelled"));
    await expect(pending).rejects.toThrow("cancelled");
  });
});

describe("backoffDelay", () => {
  it("grows exponentially and stays under the cap", () => {
    for (let i = 0; i < 20; i++) {
      const first = backoffDelay(0, 100, 10_000);
      expect(first).toBeGreaterThanOrEqual(100);
      expect(first).toBeLessThanOrEqual(120);
      const third = backoffDelay(2, 100, 10_000);
      expect(third).toBeGreaterThanOrEqual(400);
      expect(third).toBeLessThanOrEqual(480);
      expect(backoffDelay(10, 100, 1000)).toBe(1000);
    }
  });
});

describe("retry", () => {
  it("retries until success", async () => {
    const fn = vi.fn(async (attempt: number) => {
      if (attempt < 2) throw new Error(`fail ${attempt}`);
      return "ok";
    });
    const onRetry = vi.fn();
    await expect(retry(fn, { attempts: 3, baseDelayMs: 1, maxDelayMs: 2, onRetry })).resolves.toBe("ok");
    expect(fn).toHaveBeenCalledTimes(3);
    expect(onRetry).toHaveBeenCalledTimes(2);
    expect(onRetry.mock.calls[0][1]).toBe(1);
  });

  it("gives up after the last attempt with the last error", async () => {
    const fn = vi.fn(async (attempt: number): Promise<string> => {
      throw new Error(`fail ${attempt}`);
    });
    await expect(retry(fn, { attempts: 2, baseDelayMs: 1, maxDelayMs: 1 })).rejects.toThrow("fail 1");
    expect(fn).toHaveBeenCalledTimes(2);
  });

  it("stops at once when the error is not retryable", async () => {
    const fn = vi.fn(async (): Promise<string> => {
      throw new Error("fatal");
    });
    await expect(
      retry(fn, { attempts: 5, baseDelayMs: 1, maxDelayMs: 1, shouldRetry: () => false }),
    ).rejects.toThrow("fatal");
    expect(fn).toHaveBeenCalledTimes(1);
  });
});

describe("abortable", () => {
  it("stops waiting on abort while the work carries on", async () => {
    const controller = new AbortController();
    let finished = false;
    const work = sleep(30).then(() => {
      finished = true;
      return "done";
    });

    const waiting = abortable(work, controller.signal);
    controller.abort(new Error("stopped"));

    await expect(waiting).rejects.toThrow("stopped");
    expect(finished).toBe(false);
    await expect(work).resolves.toBe("done");
    expect(finished).toBe(true);
  });

  it("passes the result through when nothing aborts", async () => {
    await expect(abortable(Promise.resolve(7), new AbortController().signal)).resolves.toBe(7);
  });
});
