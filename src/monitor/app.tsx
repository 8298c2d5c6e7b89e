import React, { useState, useEffect, useCallback } from "react";
import { render, Box, Text, useInput, useApp } from "ink";
import { StatusBar } from "./components/status-bar.js";
import { ParticipantTable } from "./components/participant-table.js";
import { EventLog } from "./components/event-log.js";
import type { Orchestrator } from "../orchestrate/orchestrator.js";
import type { BatchSpec, DispatchInfo, WorkerEvent } from "../orchestrate/types.js";
import type { ParticipantEvent } from "../participant/events.js";
import type { ParticipantState } from "../participant/types.js";

const MAX_EVENTS = 200;
const EVENT_LOG_LINES = 12;

export interface MonitorProps {
  orchestrator: Orchestrator;
  spec: BatchSpec;
  onShutdown: () => void;
}

/** What the table knows about a dispatched participant, keyed by batch index. */
export interface LiveParticipant {
  participantId: string;
  state: ParticipantState;
}

function Monitor({ orchestrator, spec, onShutdown }: MonitorProps) {
  const { exit } = useApp();
  const [events, setEvents] = useState<ParticipantEvent[]>([]);
  const [live, setLive] = useState<Map<number, LiveParticipant>>(new Map());
  const [showLogs, setShowLogs] = useState(false);
  const [tick, setTick] = useState(0);
  const [startedAt] = useState(() => Date.now());

  // Refresh timer: elapsed time and outcomes are read on every render
  useEffect(() => {
    const timer = setInterval(() => setTick((t) => t + 1), 1000);
    return () => clearInterval(timer);
  }, []);

  useEffect(() => {
    const indexById = new Map<string, number>();

    const onDispatch = (info: DispatchInfo) => {
      indexById.set(info.participantId, info.index);
      setLive((prev) => new Map(prev).set(info.index, { participantId: info.participantId, state: "spawned" }));
    };
    const onEvent = ({ event }: WorkerEvent) => {
      if (event.type === "state-changed") {
        const index = indexById.get(event.participantId);
        if (index !== undefined) {
          setLive((prev) => new Map(prev).set(index, { participantId: event.participantId, state: event.to }));
        }
      }
      setEvents((prev) => {
        const next = [...prev, event];
        return next.length > MAX_EVENTS ? next.slice(-MAX_EVENTS) : next;
      });
    };

    orchestrator.on("participant:dispatch", onDispatch);
    orchestrator.on("participant:event", onEvent);
    return () => {
      orchestrator.off("participant:dispatch", onDispatch);
      orchestrator.off("participant:event", onEvent);
    };
  }, [orchestrator]);

  useInput(useCallback((input: string) => {
    if (input === "l") {
      setShowLogs((v) => !v);
      return;
    }
    if (input === "q") {
      onShutdown();
      exit();
    }
  }, [onShutdown, exit]));

  const outcomes = orchestrator.getOutcomes();
  const visibleEvents = showLogs ? events : events.filter((e) => e.type !== "log-line");

  return (
    <Box flexDirection="column" width="100%">
      <Box borderStyle="single" borderColor="blue" paddingX={1}>
        <StatusBar
          spec={spec}
          planned={orchestrator.getPlan().length}
          dispatched={live.size}
          outcomes={outcomes}
          elapsedMs={Date.now() - startedAt}
          cancelled={orchestrator.isCancelled()}
          tick={tick}
        />
      </Box>

      <Box flexDirection="column" flexGrow={1} marginTop={1}>
        <ParticipantTable plan={orchestrator.getPlan()} live={live} outcomes={outcomes} />
      </Box>

      <Box marginTop={1}>
        <EventLog events={visibleEvents} maxLines={EVENT_LOG_LINES} />
      </Box>

      <Box marginTop={1}>
        <Text dimColor>
          [l] {showLogs ? "hide" : "show"} participant logs  [q] cancel batch
        </Text>
      </Box>
    </Box>
  );
}

/**
 * Start the monitor TUI. Returns a cleanup function.
 */
export function startMonitor(props: MonitorProps): () => void {
  const instance = render(<Monitor {...props} />);
  return () => {
    instance.unmount();
  };
}
