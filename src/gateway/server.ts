import Fastify, { type FastifyInstance } from "fastify";
import websocket from "@fastify/websocket";
import { z } from "zod";
import {
  SimulatorError,
  ValidationError,
  httpStatusFor,
  toSimulatorError,
  violationsFrom,
} from "../errors.js";
import type { ParticipantEvent } from "../participant/events.js";
import { ParticipantCommandSchema, StrategyKindSchema } from "../participant/types.js";
import type { EventStream } from "../util/event-stream.js";
import { getLogger } from "../util/logger.js";
import type { ControlGateway } from "./gateway.js";

const log = getLogger("api");

export const SpawnBodySchema = z.object({
  identity: z.unknown(),
  strategy: StrategyKindSchema.optional(),
});

const EventsQuerySchema = z.object({
  participantId: z.string().min(1).optional(),
});

interface IdParams {
  id: string;
}

/** Close code sent on the events socket when the participant does not exist. */
export const CLOSE_NOT_FOUND = 4404;

function parseBody<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, body: unknown, subject: string): T {
  const parsed = schema.safeParse(body ?? {});
  if (!parsed.success) throw new ValidationError(violationsFrom(parsed.error.issues), subject);
  return parsed.data;
}

/**
 * Remote face of a ControlGateway: REST for commands and snapshots, one
 * WebSocket per subscriber for events.
 */
export async function buildServer(gateway: ControlGateway): Promise<FastifyInstance> {
  const app = Fastify({ logger: false, bodyLimit: 1_000_000 });
  await app.register(websocket);

  app.addHook("onResponse", async (request, reply) => {
    log.debug(`${request.method} ${request.url} -> ${reply.statusCode}`);
  });

  app.setErrorHandler((error, request, reply) => {
    if (error instanceof SimulatorError) {
      const status = httpStatusFor(error.kind);
      if (status >= 500) log.warn(`${request.method} ${request.url}: ${error.message}`);
      return reply.code(status).send({ error: error.toJSON() });
    }
    // Fastify's own rejections (bad JSON, wrong content type) carry a 4xx status.
    if (typeof error.statusCode === "number" && error.statusCode < 500) {
      return reply.code(error.statusCode).send({ error: { kind: "ValidationError", message: error.message } });
    }
    const internal = toSimulatorError(error);
    log.error(`${request.method} ${request.url} failed: ${internal.message}`);
    return reply.code(500).send({ error: internal.toJSON() });
  });

  app.get("/healthz", async () => ({ ok: true, participants: gateway.list().length }));

  app.get("/participants", async () => gateway.list());

  app.post("/participants", async (request, reply) => {
    const body = parseBody(SpawnBodySchema, request.body, "spawn request");
    const snapshot = gateway.spawn({ identity: body.identity, strategy: body.strategy });
    return reply.code(201).send(snapshot);
  });

  app.get<{ Params: IdParams }>("/participants/:id", async (request) => gateway.get(request.params.id));

  app.post<{ Params: IdParams }>("/participants/:id/commands", async (request) => {
    const command = parseBody(ParticipantCommandSchema, request.body, "command");
    return gateway.send(request.params.id, command);
  });

  app.delete<{ Params: IdParams }>("/participants/:id", async (request) => gateway.close(request.params.id));

  app.get("/events", { websocket: true }, (socket, request) => {
    const query = EventsQuerySchema.safeParse(request.query);
    let events: EventStream<ParticipantEvent>;
    try {
      if (!query.success) throw new ValidationError(violationsFrom(query.error.issues), "events query");
      events = gateway.subscribe({ participantId: query.data.participantId });
    } catch (err) {
      const error = toSimulatorError(err);
      socket.send(JSON.stringify({ error: error.toJSON() }));
      socket.close(error.kind === "NotFound" ? CLOSE_NOT_FOUND : 4400, error.kind);
      return;
    }

    socket.on("close", () => events.end());

    const pump = async (): Promise<void> => {
      for await (const event of events) {
        if (socket.readyState !== socket.OPEN) break;
        socket.send(JSON.stringify(event));
      }
      if (socket.readyState === socket.OPEN) socket.close(1000, "stream ended");
    };
    pump().catch((err: unknown) => {
      log.warn(`event stream failed: ${toSimulatorError(err).message}`);
      socket.terminate();
    });
  });

  return app;
}
