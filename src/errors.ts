export type ErrorKind =
  | "CredentialError"
  | "InvalidState"
  | "Timeout"
  | "Unreachable"
  | "ValidationError"
  | "Internal"
  | "Closed"
  | "NotFound"
  | "Unsupported";

/** Base for every error the simulator raises on purpose. */
export class SimulatorError extends Error {
  readonly kind: ErrorKind;

  constructor(kind: ErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.kind = kind;
    this.name = kind;
  }

  toJSON(): { kind: ErrorKind; message: string } {
    return { kind: this.kind, message: this.message };
  }
}

/** Login flow failed, or the backend kept rejecting the token. */
export class CredentialError extends SimulatorError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("CredentialError", message, options);
  }
}

/**
 * The backend refused a token during authentication. Raised by strategies;
 * the actor invalidates the credential and tries once more before giving up.
 */
export class TokenRejectedError extends CredentialError {
  constructor(message: string) {
    super(message);
  }
}

export class InvalidStateError extends SimulatorError {
  readonly state: string;
  readonly command: string;

  constructor(command: string, state: string) {
    super("InvalidState", `command "${command}" is not allowed in state "${state}"`);
    this.state = state;
    this.command = command;
  }
}

export class ClosedError extends SimulatorError {
  constructor(message: string) {
    super("Closed", message);
  }
}

export class TimeoutError extends SimulatorError {
  constructor(operation: string, timeoutMs: number) {
    super("Timeout", `${operation} timed out after ${timeoutMs}ms`);
  }
}

export class UnreachableError extends SimulatorError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("Unreachable", message, options);
  }
}

export class ValidationError extends SimulatorError {
  readonly violations: string[];

  constructor(violations: string[], subject = "batch specification") {
    super(
      "ValidationError",
      `invalid ${subject} (${violations.length} violation${violations.length === 1 ? "" : "s"}):\n` +
        violations.map((v) => `  - ${v}`).join("\n"),
    );
    this.violations = violations;
  }
}

export class NotFoundError extends SimulatorError {
  constructor(message: string) {
    super("NotFound", message);
  }
}

export class UnsupportedError extends SimulatorError {
  constructor(message: string) {
    super("Unsupported", message);
  }
}

export class InternalError extends SimulatorError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("Internal", message, options);
  }
}

/** Normalize anything thrown into a SimulatorError; unknown values become Internal. */
export function toSimulatorError(err: unknown): SimulatorError {
  if (err instanceof SimulatorError) return err;
  if (err instanceof Error) return new InternalError(err.message, { cause: err });
  return new InternalError(String(err));
}

const STATUS_BY_KIND: Record<ErrorKind, number> = {
  CredentialError: 502,
  InvalidState: 409,
  Timeout: 504,
  Unreachable: 502,
  ValidationError: 422,
  Internal: 500,
  Closed: 409,
  NotFound: 404,
  Unsupported: 400,
};

export function httpStatusFor(kind: ErrorKind): number {
  return STATUS_BY_KIND[kind];
}

const KINDS = new Set<string>(Object.keys(STATUS_BY_KIND));

export function isErrorKind(value: unknown): value is ErrorKind {
  return typeof value === "string" && KINDS.has(value);
}

/** Rebuild a typed error from its wire form (`{ kind, message }`). */
export function errorFromWire(kind: ErrorKind, message: string): SimulatorError {
  return new SimulatorError(kind, message);
}

interface IssueLike {
  path: readonly (string | number)[];
  message: string;
}

/** Flatten schema issues into "path: message" violations. */
export function violationsFrom(issues: readonly IssueLike[], prefix = ""): string[] {
  return issues.map((issue) => {
    const at = [prefix, ...issue.path.map(String)].filter((part) => part.length > 0).join(".");
    return `${at || "(root)"}: ${issue.message}`;
  });
}
