import { describe, expect, it } from "vitest";
import { ClosedError, InvalidStateError } from "../../src/errors.js";
import {
  assertCommandAllowed,
  canTransition,
  failurePhase,
  isTerminal,
} from "../../src/participant/state-machine.js";

describe("state machine", () => {
  it("walks the happy path", () => {
    expect(canTransition("spawned", "authenticated")).toBe(true);
    expect(canTransition("authenticated", "joined")).toBe(true);
    expect(canTransition("joined", "active")).toBe(true);
    expect(canTransition("active", "closed")).toBe(true);
  });

  it("never skips authentication or leaves a terminal state", () => {
    expect(canTransition("spawned", "joined")).toBe(false);
    expect(canTransition("closed", "spawned")).toBe(false);
    expect(canTransition("failed", "closed")).toBe(false);
    expect(canTransition("active", "joined")).toBe(false);
  });

  it("allows failure and close from every live state", () => {
    for (const state of ["spawned", "authenticated", "joined", "active"] as const) {
      expect(canTransition(state, "failed")).toBe(true);
      expect(canTransition(state, "closed")).toBe(true);
    }
  });

  it("marks closed and failed as terminal", () => {
    expect(isTerminal("closed")).toBe(true);
    expect(isTerminal("failed")).toBe(true);
    expect(isTerminal("active")).toBe(false);
  });

  it("accepts join only once authenticated", () => {
    expect(() => assertCommandAllowed("authenticated", "join")).not.toThrow();
    expect(() => assertCommandAllowed("spawned", "join")).toThrow(InvalidStateError);
    expect(() => assertCommandAllowed("active", "join")).toThrow('command "join" is not allowed in state "active"');
  });

  it("accepts media commands only in a call", () => {
    expect(() => assertCommandAllowed("joined", "toggle-audio")).not.toThrow();
    expect(() => assertCommandAllowed("active", "set-noise-suppression")).not.toThrow();
    expect(() => assertCommandAllowed("authenticated", "toggle-video")).toThrow(InvalidStateError);
    expect(() => assertCommandAllowed("joined", "set-resolution")).not.toThrow();
    expect(() => assertCommandAllowed("spawned", "set-resolution")).toThrow(InvalidStateError);
  });

  it("rejects every command once terminal", () => {
    expect(() => assertCommandAllowed("closed", "close")).toThrow(ClosedError);
    expect(() => assertCommandAllowed("failed", "join")).toThrow("participant is failed; no further commands are accepted");
  });

  it("names the phase a failure happened in", () => {
    expect(failurePhase("spawned")).toBe("never authenticated");
    expect(failurePhase("authenticated")).toBe("authenticated but never joined");
    expect(failurePhase("active")).toBe("joined then disconnected");
  });
});
