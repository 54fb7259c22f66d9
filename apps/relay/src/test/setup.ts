/**
 * Test setup for relay route tests: a booted app over in-memory stores,
 * ready for .inject() or a real listen on an ephemeral port.
 */

import type { FastifyInstance } from "fastify";
import { buildApp } from "../app.js";
import { MemoryPendingEventQueue } from "./memory-queue.js";
import { MemoryMatchStore } from "./memory-store.js";

export interface TestRelay {
  app: FastifyInstance;
  store: MemoryMatchStore;
  queue: MemoryPendingEventQueue;
}

export async function buildTestRelay(maxPayloadBytes = 1024): Promise<TestRelay> {
  const store = new MemoryMatchStore();
  const queue = new MemoryPendingEventQueue();
  const app = await buildApp({ store, queue, maxPayloadBytes, logger: false });
  return { app, store, queue };
}

export function asPlayer(playerId: string) {
  return { "x-player-id": playerId };
}
