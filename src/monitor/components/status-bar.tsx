import React from "react";
import { Box, Text } from "ink";
import type { BatchSpec, ParticipantOutcome } from "../../orchestrate/types.js";

interface StatusBarProps {
  spec: BatchSpec;
  planned: number;
  dispatched: number;
  outcomes: ParticipantOutcome[];
  elapsedMs: number;
  cancelled: boolean;
  tick: number;  // force re-render
}

export function StatusBar({ spec, planned, dispatched, outcomes, elapsedMs, cancelled }: StatusBarProps) {
  const count = (outcome: ParticipantOutcome["outcome"]) => outcomes.filter((o) => o.outcome === outcome).length;
  const done = outcomes.length === planned;
  const phase = cancelled ? "CANCELLED" : done ? "HOLDING" : "RUNNING";

  return (
    <Box flexDirection="row" justifyContent="space-between" width="100%">
      <Box>
        <Text bold color="cyan">SESSION </Text>
        <Text>{spec.sessionUrl}</Text>
        <Text> </Text>
        <Text bold color={cancelled ? "red" : done ? "yellow" : "green"}>
          [{phase} {formatElapsed(elapsedMs)}]
        </Text>
      </Box>
      <Box>
        <Text bold>Workers </Text>
        <Text>{spec.workers.length}</Text>
        <Text> </Text>
        <Text bold>Dispatched </Text>
        <Text>{dispatched}/{planned}</Text>
        <Text> </Text>
        <Text bold color="green">Joined </Text>
        <Text>{count("joined")}</Text>
        <Text> </Text>
        <Text bold color="red">Failed </Text>
        <Text>{count("failed")}</Text>
        <Text> </Text>
        <Text bold color="yellow">Timed out </Text>
        <Text>{count("timed-out")}</Text>
      </Box>
    </Box>
  );
}

function formatElapsed(ms: number): string {
  const seconds = Math.floor(ms / 1000);
  const m = Math.floor(seconds / 60);
  const s = seconds % 60;
  return `${m}:${String(s).padStart(2, "0")}`;
}
