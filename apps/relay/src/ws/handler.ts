import type { FastifyBaseLogger, FastifyInstance } from "fastify";
import type { WebSocket, RawData } from "ws";
import { relayClientEventSchema } from "@blockduel/shared/schemas";
import type { RelayServerEvent } from "@blockduel/shared/types";
import type { PendingEventQueue } from "../lib/pending-events.js";

// Close a socket that has sent nothing for this long
export const HEARTBEAT_TIMEOUT = 45_000;
const MAX_MESSAGE_LENGTH = 4096;
const MAX_PLAYER_ID_LENGTH = 200;

function send(ws: WebSocket, event: RelayServerEvent) {
  if (ws.readyState === ws.OPEN) {
    ws.send(JSON.stringify(event));
  }
}

/**
 * Live sockets per player. Events for a player with no open socket go to
 * the pending queue and are replayed on their next connection.
 */
export class ConnectionHub {
  private readonly connections = new Map<string, Set<WebSocket>>();
  private readonly heartbeatTimers = new Map<WebSocket, ReturnType<typeof setTimeout>>();

  constructor(
    private readonly queue: PendingEventQueue,
    private readonly log: FastifyBaseLogger,
  ) {}

  async sendToPlayer(playerId: string, event: RelayServerEvent): Promise<void> {
    let delivered = false;
    for (const ws of this.connections.get(playerId) ?? []) {
      if (ws.readyState === ws.OPEN) {
        ws.send(JSON.stringify(event));
        delivered = true;
      }
    }
    if (delivered) return;

    try {
      await this.queue.push(playerId, event);
    } catch (err) {
      this.log.error({ err, playerId, type: event.type }, "Failed to queue pending event");
    }
  }

  add(playerId: string, ws: WebSocket) {
    let sockets = this.connections.get(playerId);
    if (!sockets) {
      sockets = new Set();
      this.connections.set(playerId, sockets);
    }
    sockets.add(ws);
    this.resetHeartbeat(ws);
  }

  remove(playerId: string, ws: WebSocket) {
    this.clearHeartbeat(ws);
    const sockets = this.connections.get(playerId);
    if (!sockets) return;
    sockets.delete(ws);
    if (sockets.size === 0) this.connections.delete(playerId);
  }

  async deliverPending(playerId: string, ws: WebSocket) {
    const pending = await this.queue.list(playerId);
    if (pending.length === 0) return;
    for (const event of pending) send(ws, event);
    await this.queue.clear(playerId);
  }

  resetHeartbeat(ws: WebSocket) {
    const existing = this.heartbeatTimers.get(ws);
    if (existing) clearTimeout(existing);
    this.heartbeatTimers.set(
      ws,
      setTimeout(() => {
        ws.close(4408, "Heartbeat timeout");
      }, HEARTBEAT_TIMEOUT),
    );
  }

  private clearHeartbeat(ws: WebSocket) {
    const timer = this.heartbeatTimers.get(ws);
    if (timer) {
      clearTimeout(timer);
      this.heartbeatTimers.delete(ws);
    }
  }

  /** Close every socket, used on shutdown. */
  closeAll() {
    for (const [playerId, sockets] of this.connections) {
      for (const ws of sockets) {
        this.clearHeartbeat(ws);
        ws.close(1001, "Relay shutting down");
      }
      this.connections.delete(playerId);
    }
  }
}

export interface WsRoutesOptions {
  hub: ConnectionHub;
}

export async function wsRoutes(app: FastifyInstance, opts: WsRoutesOptions) {
  const { hub } = opts;

  app.get<{ Querystring: { playerId?: string } }>(
    "/ws",
    { websocket: true },
    async (socket, request) => {
      const playerId = request.query.playerId?.trim();
      if (!playerId || playerId.length > MAX_PLAYER_ID_LENGTH) {
        socket.close(4401, "Unauthorized");
        return;
      }

      hub.add(playerId, socket);
      app.log.info(`WS connected: player=${playerId}`);

      socket.on("message", (data: RawData) => {
        hub.resetHeartbeat(socket);
        const raw = data.toString();
        if (raw.length > MAX_MESSAGE_LENGTH) return;

        let json: unknown;
        try {
          json = JSON.parse(raw);
        } catch {
          app.log.debug({ playerId }, "ignoring non-JSON socket message");
          return;
        }
        const parsed = relayClientEventSchema.safeParse(json);
        if (parsed.success && parsed.data.type === "ping") {
          send(socket, { type: "pong" });
        }
      });

      socket.on("close", () => {
        hub.remove(playerId, socket);
        app.log.info(`WS disconnected: player=${playerId}`);
      });

      // Deliver anything that arrived while the player was offline
      try {
        await hub.deliverPending(playerId, socket);
      } catch (err) {
        app.log.error(err, "Failed to deliver pending events");
      }
    },
  );

  app.addHook("onClose", async () => {
    hub.closeAll();
  });
}
