import fs from "fs/promises";
import { parse as parseYAML } from "yaml";
import { ValidationError, violationsFrom } from "../errors.js";
import { getLogger } from "../util/logger.js";
import { BatchSpecSchema, type BatchSpec, type PlannedParticipant } from "./types.js";

const log = getLogger("batch");

const DEFAULT_PREFIX = "sim";
const MAX_PARTICIPANTS = 10_000;

/** Read a batch file (YAML, or JSON, which YAML accepts) and validate it. */
export async function loadBatch(filePath: string): Promise<BatchSpec> {
  const raw = await fs.readFile(filePath, "utf-8");
  let data: unknown;
  try {
    data = parseYAML(raw);
  } catch (err) {
    throw new ValidationError([`${filePath}: ${err instanceof Error ? err.message : String(err)}`]);
  }
  log.info(`loaded batch from ${filePath}`);
  return validateBatch(data);
}

/**
 * Check a batch as a whole. Every problem found is reported in one
 * ValidationError; nothing is dispatched from a batch that fails here.
 */
export function validateBatch(input: unknown): BatchSpec {
  const parsed = BatchSpecSchema.safeParse(input);
  const violations = parsed.success ? [] : violationsFrom(parsed.error.issues);
  violations.push(...duplicateUsernames(input));

  if (!parsed.success || violations.length > 0) {
    throw new ValidationError(violations);
  }
  return parsed.data;
}

/** Expand a valid batch into one entry per participant, assigned round-robin. */
export function planBatch(spec: BatchSpec): PlannedParticipant[] {
  const total = spec.participants.length + spec.defaultParticipants;
  const planned: PlannedParticipant[] = [];
  for (let index = 0; index < total; index++) {
    const override = spec.participants[index];
    const username = override?.username ?? defaultUsername(spec.usernamePrefix, index);
    planned.push({
      index,
      username,
      worker: spec.workers[index % spec.workers.length],
      joinDelayMs: Math.round((override?.joinDelaySeconds ?? 0) * 1000),
      identity: {
        username,
        sessionUrl: spec.sessionUrl,
        media: { ...spec.defaults, ...override?.initial },
      },
    });
  }
  return planned;
}

export function defaultUsername(prefix: string, index: number): string {
  return `${prefix}-${index + 1}`;
}

/**
 * Scan the raw input so duplicates are reported even when other fields are
 * malformed. Generated names take part too.
 */
function duplicateUsernames(input: unknown): string[] {
  if (!isRecord(input)) return [];
  const participants: unknown[] = Array.isArray(input.participants) ? input.participants : [];
  const prefix =
    typeof input.usernamePrefix === "string" && input.usernamePrefix.length > 0 ? input.usernamePrefix : DEFAULT_PREFIX;
  const extra =
    typeof input.defaultParticipants === "number" && Number.isInteger(input.defaultParticipants)
      ? Math.min(MAX_PARTICIPANTS, Math.max(0, input.defaultParticipants))
      : 0;

  const names: string[] = participants.map((entry, index) =>
    isRecord(entry) && typeof entry.username === "string" ? entry.username : defaultUsername(prefix, index),
  );
  for (let j = 0; j < extra; j++) names.push(defaultUsername(prefix, participants.length + j));

  const firstSeen = new Map<string, number>();
  const violations: string[] = [];
  names.forEach((name, index) => {
    const first = firstSeen.get(name);
    if (first === undefined) {
      firstSeen.set(name, index);
      return;
    }
    violations.push(`participants[${index}].username: duplicate username "${name}" (also participants[${first}])`);
  });
  return violations;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
