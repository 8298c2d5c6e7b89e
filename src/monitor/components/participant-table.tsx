import React from "react";
import { Box, Text } from "ink";
import type { ParticipantOutcome, PlannedParticipant } from "../../orchestrate/types.js";
import { pad } from "../../util/format.js";
import type { LiveParticipant } from "../app.js";

interface ParticipantTableProps {
  plan: readonly PlannedParticipant[];
  live: Map<number, LiveParticipant>;
  outcomes: ParticipantOutcome[];
}

const STATUS_COLORS: Record<string, string> = {
  pending: "gray",
  spawned: "yellow",
  authenticated: "yellow",
  joined: "green",
  active: "green",
  closed: "gray",
  failed: "red",
};

const OUTCOME_COLORS: Record<ParticipantOutcome["outcome"], string> = {
  joined: "green",
  failed: "red",
  "timed-out": "yellow",
};

/** Show at most this many rows; large batches get a trailing count. */
const MAX_ROWS = 30;

export function ParticipantTable({ plan, live, outcomes }: ParticipantTableProps) {
  const outcomeByIndex = new Map(outcomes.map((o) => [o.index, o]));
  const rows = plan.slice(0, MAX_ROWS);

  return (
    <Box flexDirection="column">
      <Box>
        <Text bold>
          {"  "}
          {pad("#", 5)}
          {pad("Username", 18)}
          {pad("Worker", 24)}
          {pad("Id", 8)}
          {pad("State", 15)}
          {pad("Outcome", 26)}
        </Text>
      </Box>
      <Text dimColor>{"  " + "─".repeat(96)}</Text>

      {rows.map((p) => {
        const current = live.get(p.index);
        const outcome = outcomeByIndex.get(p.index);
        const state = current?.state ?? "pending";
        const outcomeText = outcome ? `${outcome.outcome}${outcome.reason ? `: ${outcome.reason}` : ""}` : "";
        return (
          <Box key={p.index}>
            <Text>{"  "}</Text>
            <Text color="yellow">{pad(String(p.index + 1), 5)}</Text>
            <Text bold>{pad(p.username, 18)}</Text>
            <Text dimColor>{pad(p.worker, 24)}</Text>
            <Text>{pad(current?.participantId ?? "-", 8)}</Text>
            <Text color={STATUS_COLORS[state] ?? "white"}>{pad(state, 15)}</Text>
            <Text color={outcome ? OUTCOME_COLORS[outcome.outcome] : "white"}>{pad(outcomeText, 26)}</Text>
          </Box>
        );
      })}

      {plan.length > MAX_ROWS && (
        <Text dimColor>{`  ... and ${plan.length - MAX_ROWS} more`}</Text>
      )}
      {plan.length === 0 && (
        <Text dimColor>{"  No participants in this batch"}</Text>
      )}
    </Box>
  );
}
