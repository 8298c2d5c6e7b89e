import fs from "fs/promises";
import path from "path";
import type { RuntimeConfig } from "../config.js";
import { replaceConsoleTransport, getLogger } from "../util/logger.js";
import { clockTime, formatEvent } from "../util/format.js";
import { createGateway } from "../worker.js";
import { loadBatch } from "./batch.js";
import { Orchestrator } from "./orchestrator.js";
import type { BatchSummary, DispatchInfo, OrchestrateConfig, ParticipantOutcome, WorkerEvent } from "./types.js";
import { HttpWorkerClient, LocalWorkerClient, type WorkerClient } from "./worker-client.js";

const log = getLogger("orchestrate");

/** http(s) endpoints are remote workers; local://<name> runs a gateway in this process. */
export function createWorkerClient(endpoint: string, runtime: RuntimeConfig): WorkerClient {
  if (endpoint.startsWith("local://")) {
    log.info(`starting in-process worker ${endpoint}`);
    return new LocalWorkerClient(endpoint, createGateway(runtime));
  }
  return new HttpWorkerClient(endpoint);
}

export async function runOrchestrate(config: OrchestrateConfig): Promise<BatchSummary> {
  const spec = await loadBatch(config.batchFile);
  const orchestrator = new Orchestrator(spec, {
    clientFor: (endpoint) => createWorkerClient(endpoint, config.runtime),
  });

  const shutdownHandler = (): void => {
    log.info("SIGINT, cancelling batch...");
    orchestrator.cancel();
  };
  process.on("SIGINT", shutdownHandler);
  process.on("SIGTERM", shutdownHandler);

  let cleanup = (): void => {};
  if (config.noTui) {
    runHeadless(orchestrator);
  } else {
    // The monitor owns the terminal, so winston goes to a file.
    replaceConsoleTransport(config.logFile);
    const { startMonitor } = await import("../monitor/app.js");
    cleanup = startMonitor({ orchestrator, spec, onShutdown: shutdownHandler });
  }

  let summary: BatchSummary;
  try {
    summary = await orchestrator.run();
  } finally {
    cleanup();
    process.off("SIGINT", shutdownHandler);
    process.off("SIGTERM", shutdownHandler);
  }

  for (const line of formatSummary(summary)) console.log(line);
  if (config.summaryFile) {
    await writeSummary(config.summaryFile, summary);
    console.log(`summary written to ${config.summaryFile}`);
  }
  return summary;
}

function runHeadless(orchestrator: Orchestrator): void {
  orchestrator.on("participant:dispatch", (info: DispatchInfo) => {
    console.log(`[${clockTime(Date.now())}] ${info.username}: dispatched to ${info.worker} as ${info.participantId}`);
  });
  orchestrator.on("participant:event", ({ event }: WorkerEvent) => {
    if (event.type === "log-line" && event.level === "debug") return;
    console.log(`[${clockTime(event.timestamp)}] ${event.username}: ${formatEvent(event)}`);
  });
  orchestrator.on("participant:outcome", (outcome: ParticipantOutcome) => {
    const reason = outcome.reason ? ` (${outcome.reason})` : "";
    console.log(`[${clockTime(Date.now())}] ${outcome.username}: ${outcome.outcome.toUpperCase()}${reason}`);
  });
}

export function formatSummary(summary: BatchSummary): string[] {
  const lines = [
    "",
    `Batch against ${summary.sessionUrl}${summary.cancelled ? " (cancelled)" : ""}`,
    `  joined ${summary.joined}/${summary.total}, failed ${summary.failed}, timed out ${summary.timedOut}`,
  ];
  for (const p of summary.participants) {
    if (p.outcome === "joined") continue;
    lines.push(`  ${p.username} on ${p.worker}: ${p.outcome}${p.reason ? ` (${p.reason})` : ""}`);
  }
  return lines;
}

export async function writeSummary(filePath: string, summary: BatchSummary): Promise<void> {
  await fs.mkdir(path.dirname(path.resolve(filePath)), { recursive: true });
  await fs.writeFile(filePath, JSON.stringify(summary, null, 2) + "\n", "utf-8");
}
