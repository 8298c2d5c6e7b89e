import { describe, expect, it } from "vitest";
import {
  ClosedError,
  InvalidStateError,
  UnreachableError,
  UnsupportedError,
} from "../../src/errors.js";
import { ParticipantActor } from "../../src/participant/actor.js";
import type { ParticipantEvent } from "../../src/participant/events.js";
import { parseIdentity } from "../../src/participant/types.js";
import {
  FakeCredentials,
  fakeStrategyFactory,
  stateChanges,
  waitForState,
  type FakeStrategyOptions,
} from "../helpers/fakes.js";

const SESSION = "https://meet.example.test/room-1";

function setup(
  options: { strategy?: FakeStrategyOptions; credentials?: FakeCredentials; closeGraceMs?: number } = {},
) {
  const { factory, created } = fakeStrategyFactory(options.strategy);
  const credentials = options.credentials ?? new FakeCredentials();
  const actor = new ParticipantActor({
    id: "p-test",
    identity: parseIdentity({ username: "alice", sessionUrl: SESSION }),
    strategy: "protocol",
    strategyFactory: factory,
    credentials,
    closeGraceMs: options.closeGraceMs,
  });
  const events: ParticipantEvent[] = [];
  actor.on("event", (event: ParticipantEvent) => events.push(event));
  return { actor, strategy: created[0], credentials, events };
}

async function activeActor(options: Parameters<typeof setup>[0] = {}) {
  const ctx = setup(options);
  ctx.actor.start();
  await ctx.actor.send({ kind: "join" });
  return ctx;
}

describe("ParticipantActor", () => {
  it("authenticates, joins and applies initial media", async () => {
    const { actor, strategy, credentials, events } = setup();
    const authenticated = waitForState(actor, "p-test", "authenticated");
    actor.start();
    await authenticated;

    const ack = await actor.send({ kind: "join" });

    expect(ack).toEqual({
      participantId: "p-test",
      command: "join",
      state: "active",
      media: { audio: true, video: true, screenshare: false, blur: false, noiseSuppression: "none" },
    });
    expect(stateChanges(events)).toEqual(["spawned->authenticated", "authenticated->joined", "joined->active"]);
    expect(credentials.gets).toEqual(["alice@https://meet.example.test"]);
    expect(strategy.calls).toEqual(["authenticate:test-token-1", "join", "applyInitialMedia"]);
  });

  it("numbers events strictly increasing", async () => {
    const { events } = await activeActor();
    const seqs = events.map((e) => e.seq);
    expect(seqs).toEqual([...seqs].sort((a, b) => a - b));
    expect(new Set(seqs).size).toBe(seqs.length);
    expect(seqs[0]).toBe(1);
  });

  it("queues a join sent before authentication finishes", async () => {
    const { actor } = setup({ strategy: { authDelayMs: 30 } });
    actor.start();
    expect(actor.getState()).toBe("spawned");

    const ack = await actor.send({ kind: "join" });
    expect(ack.state).toBe("active");
  });

  it("rejects a command that does not fit the state and stays put", async () => {
    const { actor } = setup();
    const authenticated = waitForState(actor, "p-test", "authenticated");
    actor.start();
    await authenticated;

    await expect(actor.send({ kind: "toggle-audio" })).rejects.toBeInstanceOf(InvalidStateError);
    expect(actor.getState()).toBe("authenticated");
  });

  it("refreshes the credential once when the token is refused", async () => {
    const { actor, credentials, strategy } = setup({ strategy: { rejectTokens: 1 } });
    const authenticated = waitForState(actor, "p-test", "authenticated");
    actor.start();
    await authenticated;

    expect(credentials.invalidated).toEqual(["alice"]);
    expect(strategy.calls).toEqual(["authenticate:test-token-1", "authenticate:test-token-2"]);
  });

  it("fails with CredentialError when the refreshed token is refused too", async () => {
    const { actor } = setup({ strategy: { rejectTokens: 2 } });
    const failed = waitForState(actor, "p-test", "failed");
    actor.start();
    await failed;

    expect(actor.snapshot().failure).toEqual({
      kind: "CredentialError",
      reason: "session token for alice rejected after refresh",
      lastState: "spawned",
      phase: "never authenticated",
      forced: false,
    });
  });

  it("fails without joining when no credential can be obtained", async () => {
    const credentials = new FakeCredentials({ failWith: "could not obtain a session for alice: login refused" });
    const { actor, strategy, events } = setup({ credentials });
    const failed = waitForState(actor, "p-test", "failed");
    actor.start();
    await failed;

    expect(actor.getState()).toBe("failed");
    expect(actor.snapshot().failure?.kind).toBe("CredentialError");
    expect(strategy.calls).toEqual(["terminate"]);
    expect(stateChanges(events)).toEqual(["spawned->failed"]);
    await expect(actor.send({ kind: "join" })).rejects.toBeInstanceOf(ClosedError);
  });

  it("closes an authenticated participant without ever joining", async () => {
    const { actor, strategy, events } = setup();
    const authenticated = waitForState(actor, "p-test", "authenticated");
    actor.start();
    await authenticated;

    const ack = await actor.close();

    expect(ack.state).toBe("closed");
    expect(stateChanges(events)).toEqual(["spawned->authenticated", "authenticated->closed"]);
    expect(strategy.calls).not.toContain("join");
    expect(strategy.calls).not.toContain("leave");
    expect(strategy.calls).toContain("dispose");
  });

  it("treats close as idempotent", async () => {
    const { actor, events } = await activeActor();

    const first = actor.close();
    const second = actor.close();
    expect(second).toBe(first);
    const ack = await first;

    expect(await actor.send({ kind: "close" })).toBe(ack);
    expect(ack).toMatchObject({ command: "close", state: "closed" });
    expect(stateChanges(events).filter((s) => s.endsWith("->closed"))).toEqual(["active->closed"]);
  });

  it("leaves before disposing when closing a joined participant", async () => {
    const { actor, strategy } = await activeActor();
    await actor.close();
    expect(strategy.calls.slice(-2)).toEqual(["leave", "dispose"]);
  });

  it("aborts an in-flight join on close", async () => {
    const { actor } = setup({ strategy: { joinDelayMs: 5_000 } });
    const authenticated = waitForState(actor, "p-test", "authenticated");
    actor.start();
    await authenticated;

    const join = actor.send({ kind: "join" }).catch((err: unknown) => err);
    const ack = await actor.close();

    expect(await join).toBeInstanceOf(ClosedError);
    expect(ack.state).toBe("closed");
  });

  it("rejects commands queued behind a close", async () => {
    const { actor } = await activeActor();
    const closing = actor.close();
    await expect(actor.send({ kind: "toggle-audio" })).rejects.toThrow("participant p-test is closing");
    await closing;
    await expect(actor.send({ kind: "toggle-audio" })).rejects.toThrow("participant p-test is closed");
  });

  it("terminates and fails when leave overruns the grace period", async () => {
    const { actor, strategy } = await activeActor({ strategy: { hangOnLeave: true }, closeGraceMs: 50 });

    const ack = await actor.close();

    expect(ack.state).toBe("failed");
    expect(actor.snapshot().failure).toEqual({
      kind: "Timeout",
      reason: "graceful close (forced termination) timed out after 50ms",
      lastState: "active",
      phase: "joined then disconnected",
      forced: true,
    });
    expect(strategy.calls).toContain("terminate");
  });

  it("fails when the session drops the participant", async () => {
    const { actor, strategy, events } = await activeActor();

    strategy.drop(new UnreachableError("signaling connection closed (1006)"));

    expect(actor.getState()).toBe("failed");
    expect(actor.snapshot().failure).toMatchObject({
      kind: "Unreachable",
      lastState: "active",
      phase: "joined then disconnected",
    });
    const last = events[events.length - 1];
    expect(last).toMatchObject({ type: "state-changed", from: "active", to: "failed" });
  });

  it("fails the participant when join fails", async () => {
    const { actor } = setup({ strategy: { joinError: new UnreachableError("backend went away") } });
    actor.start();

    await expect(actor.send({ kind: "join" })).rejects.toThrow("backend went away");
    expect(actor.snapshot().failure).toMatchObject({
      kind: "Unreachable",
      lastState: "authenticated",
      phase: "authenticated but never joined",
    });
  });

  it("applies media toggles and reports them", async () => {
    const { actor, events } = await activeActor();

    const ack = await actor.send({ kind: "toggle-audio" });

    expect(ack.media?.audio).toBe(false);
    expect(actor.snapshot().media.audio).toBe(false);
    const last = events[events.length - 1];
    expect(last).toMatchObject({ type: "media-changed", media: { audio: false, video: true } });
  });

  it("refuses blur on a strategy that cannot blur", async () => {
    const { actor } = await activeActor();
    await expect(actor.send({ kind: "toggle-blur" })).rejects.toBeInstanceOf(UnsupportedError);
    expect(actor.getState()).toBe("active");
  });

  it("sets noise suppression where supported", async () => {
    const { actor } = await activeActor({ strategy: { capabilities: ["noise-suppression"] } });
    const ack = await actor.send({ kind: "set-noise-suppression", level: "rnnoise" });
    expect(ack.media?.noiseSuppression).toBe("rnnoise");
  });

  it("changes resolution only where the strategy can", async () => {
    const able = await activeActor({ strategy: { capabilities: ["resolution"] } });
    const ack = await able.actor.send({ kind: "set-resolution", resolution: "720p" });
    expect(ack).toMatchObject({ command: "set-resolution", state: "active" });
    expect(able.strategy.calls.at(-1)).toBe("resolution:720p");

    const unable = await activeActor();
    await expect(unable.actor.send({ kind: "set-resolution", resolution: "720p" })).rejects.toThrow(
      "protocol participants cannot change resolution",
    );
  });

  it("leaves on request and accepts nothing afterwards", async () => {
    const { actor, events } = await activeActor();

    const ack = await actor.send({ kind: "leave" });

    expect(ack.state).toBe("closed");
    const last = events[events.length - 1];
    expect(last).toMatchObject({ type: "state-changed", to: "closed", reason: "left the session" });
    await expect(actor.send({ kind: "toggle-video" })).rejects.toBeInstanceOf(ClosedError);
    await expect(actor.close()).resolves.toMatchObject({ state: "closed", noop: true });
  });

  it("ends an event stream after the terminal state", async () => {
    const { actor } = setup();
    const stream = actor.events();
    actor.start();
    const closing = (async () => {
      await waitForState(actor, "p-test", "authenticated");
      await actor.close();
    })();

    const types: string[] = [];
    for await (const event of stream) {
      if (event.type === "state-changed") types.push(event.to);
    }
    await closing;
    expect(types).toEqual(["authenticated", "closed"]);
  });
});
