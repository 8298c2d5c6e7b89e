import type { FastifyInstance } from "fastify";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { ControlGateway } from "../../src/gateway/gateway.js";
import { buildServer } from "../../src/gateway/server.js";
import { FakeCredentials, fakeStrategyFactory, waitForState } from "../helpers/fakes.js";

const SESSION = "https://meet.example.test/room-1";

describe("gateway HTTP API", () => {
  let gateway: ControlGateway;
  let app: FastifyInstance;

  beforeEach(async () => {
    gateway = new ControlGateway({
      strategyFactory: fakeStrategyFactory().factory,
      credentials: new FakeCredentials(),
      closeGraceMs: 200,
    });
    app = await buildServer(gateway);
  });

  afterEach(async () => {
    await gateway.shutdown();
    await app.close();
  });

  async function spawn(username = "alice"): Promise<string> {
    const res = await app.inject({
      method: "POST",
      url: "/participants",
      payload: { identity: { username, sessionUrl: SESSION } },
    });
    expect(res.statusCode).toBe(201);
    const body: { id: string } = res.json();
    if (gateway.get(body.id).state !== "authenticated") await waitForState(gateway, body.id, "authenticated");
    return body.id;
  }

  it("reports health", async () => {
    const res = await app.inject({ method: "GET", url: "/healthz" });
    expect(res.statusCode).toBe(200);
    expect(res.json()).toEqual({ ok: true, participants: 0 });
  });

  it("spawns a participant and returns its snapshot", async () => {
    const res = await app.inject({
      method: "POST",
      url: "/participants",
      payload: { identity: { username: "alice", sessionUrl: SESSION }, strategy: "surface" },
    });

    expect(res.statusCode).toBe(201);
    expect(res.json()).toMatchObject({ username: "alice", strategy: "surface", state: "spawned" });
  });

  it("answers 422 for an invalid identity", async () => {
    const res = await app.inject({
      method: "POST",
      url: "/participants",
      payload: { identity: { username: "alice", sessionUrl: "not-a-url" } },
    });

    expect(res.statusCode).toBe(422);
    expect(res.json()).toEqual({
      error: {
        kind: "ValidationError",
        message: "invalid participant identity (1 violation):\n  - identity.sessionUrl: Invalid url",
      },
    });
  });

  it("answers 422 for an unknown strategy", async () => {
    const res = await app.inject({
      method: "POST",
      url: "/participants",
      payload: { identity: { username: "alice", sessionUrl: SESSION }, strategy: "hologram" },
    });
    expect(res.statusCode).toBe(422);
    expect(res.json()).toMatchObject({ error: { kind: "ValidationError" } });
  });

  it("answers 400 for a body that is not JSON", async () => {
    const res = await app.inject({
      method: "POST",
      url: "/participants",
      headers: { "content-type": "application/json" },
      payload: "{",
    });
    expect(res.statusCode).toBe(400);
    expect(res.json()).toMatchObject({ error: { kind: "ValidationError" } });
  });

  it("answers 404 for an unknown participant", async () => {
    const res = await app.inject({ method: "GET", url: "/participants/p-0" });
    expect(res.statusCode).toBe(404);
    expect(res.json()).toEqual({ error: { kind: "NotFound", message: "no participant p-0" } });
  });

  it("lists and fetches participants", async () => {
    const id = await spawn();

    const list = await app.inject({ method: "GET", url: "/participants" });
    const one = await app.inject({ method: "GET", url: `/participants/${id}` });

    expect(list.json()).toHaveLength(1);
    expect(one.json()).toMatchObject({ id, username: "alice", state: "authenticated" });
  });

  it("applies commands and acknowledges them", async () => {
    const id = await spawn();

    const res = await app.inject({ method: "POST", url: `/participants/${id}/commands`, payload: { kind: "join" } });

    expect(res.statusCode).toBe(200);
    expect(res.json()).toMatchObject({ participantId: id, command: "join", state: "active" });
  });

  it("answers 409 for a command the state does not allow", async () => {
    const id = await spawn();

    const res = await app.inject({
      method: "POST",
      url: `/participants/${id}/commands`,
      payload: { kind: "toggle-audio" },
    });

    expect(res.statusCode).toBe(409);
    expect(res.json()).toEqual({
      error: { kind: "InvalidState", message: 'command "toggle-audio" is not allowed in state "authenticated"' },
    });
  });

  it("answers 422 for an unknown command", async () => {
    const id = await spawn();
    const res = await app.inject({ method: "POST", url: `/participants/${id}/commands`, payload: { kind: "dance" } });
    expect(res.statusCode).toBe(422);
  });

  it("closes a participant on DELETE, twice without harm", async () => {
    const id = await spawn();

    const first = await app.inject({ method: "DELETE", url: `/participants/${id}` });
    const second = await app.inject({ method: "DELETE", url: `/participants/${id}` });

    expect(first.json()).toMatchObject({ participantId: id, command: "close", state: "closed" });
    expect(second.json()).toMatchObject({ state: "closed", noop: true });
  });
});
