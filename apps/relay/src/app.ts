import Fastify, { type FastifyInstance, type FastifyServerOptions } from "fastify";
import cors from "@fastify/cors";
import websocket from "@fastify/websocket";
import { ZodError } from "zod";
import type { PendingEventQueue } from "./lib/pending-events.js";
import type { MatchStore } from "./store/match-store.js";
import { healthRoutes } from "./routes/health.js";
import { matchRoutes } from "./routes/matches.js";
import { ConnectionHub, wsRoutes } from "./ws/handler.js";

export interface RelayDeps {
  store: MatchStore;
  queue: PendingEventQueue;
  maxPayloadBytes: number;
  corsOrigin?: string | boolean;
  logger?: FastifyServerOptions["logger"];
  /** Runs when the server closes, after the sockets are gone. */
  onClose?: () => Promise<void>;
}

/** The returned instance has already booted; call `listen` or `inject` on it. */

export async function buildApp(deps: RelayDeps): Promise<FastifyInstance> {
  const app = Fastify({
    logger: deps.logger ?? true,
    // Leave room for the JSON envelope so oversized payloads get our 413
    bodyLimit: deps.maxPayloadBytes + 64 * 1024,
  });

  await app.register(cors, {
    origin: deps.corsOrigin ?? true,
    credentials: true,
  });
  await app.register(websocket);

  app.setErrorHandler((error: Error & { validation?: unknown; statusCode?: number }, request, reply) => {
    if (error instanceof ZodError) {
      return reply.status(400).send({ error: "Validation error", details: error.issues });
    }
    if (error.validation) {
      return reply.status(400).send({ error: "Validation error", details: error.message });
    }

    const status = error.statusCode ?? 500;
    if (status >= 500) {
      request.log.error(error);
      return reply.status(status).send({ error: "Internal server error" });
    }
    request.log.warn({ status, message: error.message }, "request rejected");
    return reply.status(status).send({ error: error.message });
  });

  const hub = new ConnectionHub(deps.queue, app.log);

  await app.register(healthRoutes);
  await app.register(matchRoutes, { store: deps.store, hub, maxPayloadBytes: deps.maxPayloadBytes });
  await app.register(wsRoutes, { hub });

  const { onClose } = deps;
  if (onClose) app.addHook("onClose", onClose);

  return app;
}
