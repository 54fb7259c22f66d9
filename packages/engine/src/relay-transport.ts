import WebSocket, { type RawData } from "ws";
import { z } from "zod";
import type { FindMatchResponse, MatchHandle } from "@blockduel/shared/types";
import {
  findMatchResponseSchema,
  matchHandleSchema,
  relayServerEventSchema,
} from "@blockduel/shared/schemas";
import { TransportFailure, toError } from "./errors.js";
import { createLogger, type Logger } from "./logger.js";
import type { LocalIdentity, MatchTransport, TransportListener } from "./transport.js";

const DEFAULT_RECONNECT_INTERVAL = 5_000;
const DEFAULT_PING_INTERVAL = 30_000;

export interface RelayTransportOptions {
  /** Base URL of the relay, e.g. http://localhost:3600 */
  serverUrl: string;
  identity: LocalIdentity;
  reconnectInterval?: number;
  pingInterval?: number;
  logger?: Logger;
}

const matchListSchema = z.array(matchHandleSchema);

/**
 * MatchTransport backed by the blockduel relay: HTTP for match operations,
 * a WebSocket for turn and match-end notifications.
 */
export class RelayTransport implements MatchTransport {
  private readonly serverUrl: string;
  private readonly identity: LocalIdentity;
  private readonly reconnectInterval: number;
  private readonly pingInterval: number;
  private readonly log: Logger;

  private ws: WebSocket | null = null;
  private pingTimer: ReturnType<typeof setInterval> | null = null;
  private reconnectTimer: ReturnType<typeof setTimeout> | null = null;
  private stopped = true;
  private listeners: TransportListener[] = [];

  constructor(options: RelayTransportOptions) {
    this.serverUrl = options.serverUrl.replace(/\/$/, "");
    this.identity = options.identity;
    this.reconnectInterval = options.reconnectInterval ?? DEFAULT_RECONNECT_INTERVAL;
    this.pingInterval = options.pingInterval ?? DEFAULT_PING_INTERVAL;
    this.log = options.logger ?? createLogger("relay-transport");
  }

  // ===== HTTP =====

  async findMatch(opponentId?: string): Promise<FindMatchResponse> {
    const body = {
      ...(opponentId ? { opponentId } : {}),
      ...(this.identity.displayName ? { displayName: this.identity.displayName } : {}),
    };
    return this.requestJson("POST", "/api/matches", findMatchResponseSchema, body);
  }

  async loadMatches(): Promise<MatchHandle[]> {
    return this.requestJson("GET", "/api/matches", matchListSchema);
  }

  async submitTurn(matchId: string, payload: string, nextParticipantId: string): Promise<void> {
    await this.request("POST", `/api/matches/${encodeURIComponent(matchId)}/turns`, {
      payload,
      nextParticipantId,
    });
  }

  async endMatch(matchId: string, payload: string): Promise<void> {
    await this.request("POST", `/api/matches/${encodeURIComponent(matchId)}/end`, { payload });
  }

  async quitMatch(matchId: string, payload: string | null): Promise<void> {
    await this.request(
      "POST",
      `/api/matches/${encodeURIComponent(matchId)}/quit`,
      payload === null ? {} : { payload },
    );
  }

  private async requestJson<T>(
    method: string,
    path: string,
    schema: z.ZodType<T>,
    body?: unknown,
  ): Promise<T> {
    const res = await this.request(method, path, body);
    let json: unknown;
    try {
      json = await res.json();
    } catch (err) {
      throw new TransportFailure(`Relay returned invalid JSON for ${path}: ${toError(err).message}`, res.status, false);
    }
    const parsed = schema.safeParse(json);
    if (!parsed.success) {
      throw new TransportFailure(`Relay response for ${path} has an unexpected shape`, res.status, false);
    }
    return parsed.data;
  }

  private async request(method: string, path: string, body?: unknown): Promise<Response> {
    const headers: Record<string, string> = { "x-player-id": this.identity.playerId };
    if (body !== undefined) headers["Content-Type"] = "application/json";

    let res: Response;
    try {
      res = await fetch(`${this.serverUrl}${path}`, {
        method,
        headers,
        body: body === undefined ? undefined : JSON.stringify(body),
      });
    } catch (err) {
      throw new TransportFailure(`Relay unreachable: ${toError(err).message}`);
    }

    if (!res.ok) {
      const errorBody: unknown = await res.json().catch(() => ({}));
      const message =
        typeof errorBody === "object" && errorBody !== null && "error" in errorBody && typeof errorBody.error === "string"
          ? errorBody.error
          : `Request failed (${res.status})`;
      throw new TransportFailure(message, res.status, res.status >= 500 || res.status === 429);
    }
    return res;
  }

  // ===== Events =====

  subscribe(listener: TransportListener): () => void {
    this.listeners.push(listener);
    if (this.stopped) {
      this.stopped = false;
      this.doConnect();
    }
    return () => {
      this.listeners = this.listeners.filter((l) => l !== listener);
      if (this.listeners.length === 0) this.disconnect();
    };
  }

  /** Close the event socket and stop reconnecting. */
  disconnect(): void {
    this.stopped = true;
    this.cleanup();
  }

  private cleanup(): void {
    if (this.pingTimer) {
      clearInterval(this.pingTimer);
      this.pingTimer = null;
    }
    if (this.reconnectTimer) {
      clearTimeout(this.reconnectTimer);
      this.reconnectTimer = null;
    }
    if (this.ws) {
      // Keep the error listener: closing a connecting socket emits one.
      this.ws.removeAllListeners("open");
      this.ws.removeAllListeners("message");
      this.ws.removeAllListeners("close");
      this.ws.close();
      this.ws = null;
    }
  }

  private scheduleReconnect(): void {
    if (this.stopped) return;
    this.reconnectTimer = setTimeout(() => {
      if (!this.stopped) this.doConnect();
    }, this.reconnectInterval);
  }

  private doConnect(): void {
    if (this.stopped) return;
    this.cleanup();

    const wsUrl = `${this.serverUrl.replace(/^http/, "ws")}/ws?playerId=${encodeURIComponent(this.identity.playerId)}`;
    const ws = new WebSocket(wsUrl);
    this.ws = ws;

    ws.on("open", () => {
      this.log.info({ playerId: this.identity.playerId }, "relay connected");
      this.pingTimer = setInterval(() => {
        if (ws.readyState === WebSocket.OPEN) ws.send(JSON.stringify({ type: "ping" }));
      }, this.pingInterval);
    });

    ws.on("message", (data: RawData) => this.handleMessage(data));

    ws.on("error", (err) => {
      this.log.warn({ err }, "relay socket error");
    });

    ws.on("close", () => {
      this.log.info("relay disconnected");
      this.cleanup();
      this.scheduleReconnect();
    });
  }

  private handleMessage(data: RawData): void {
    let json: unknown;
    try {
      json = JSON.parse(data.toString());
    } catch (err) {
      this.log.warn({ err }, "dropping malformed relay event");
      return;
    }
    const parsed = relayServerEventSchema.safeParse(json);
    if (!parsed.success) {
      this.log.warn({ issues: parsed.error.issues }, "dropping unknown relay event");
      return;
    }
    const event = parsed.data;
    if (event.type === "pong") return;
    for (const listener of this.listeners) {
      listener(event);
    }
  }
}
