import React from "react";
import { Box, Text } from "ink";
import type { ParticipantEvent } from "../../participant/events.js";
import { clockTime, formatEvent, pad } from "../../util/format.js";

interface EventLogProps {
  events: ParticipantEvent[];
  maxLines: number;
}

function colorFor(event: ParticipantEvent): string {
  switch (event.type) {
    case "state-changed":
      return event.to === "failed" ? "red" : event.to === "joined" ? "green" : "cyan";
    case "media-changed":
      return "white";
    case "log-line":
      return event.level === "error" ? "red" : event.level === "warn" ? "yellow" : "gray";
    case "error":
      return "red";
  }
}

export function EventLog({ events, maxLines }: EventLogProps) {
  const visible = events.slice(-maxLines);

  return (
    <Box flexDirection="column">
      <Text bold dimColor>Events</Text>
      {visible.map((event) => (
        <Text key={`${event.participantId}:${event.seq}`} color={colorFor(event)} wrap="truncate">
          {clockTime(event.timestamp)} {pad(event.username, 14)} {formatEvent(event)}
        </Text>
      ))}
      {visible.length === 0 && (
        <Text dimColor>  (no events yet)</Text>
      )}
    </Box>
  );
}
