import type { Redis } from "ioredis";
import type { RelayServerEvent } from "@blockduel/shared/types";
import { relayServerEventSchema } from "@blockduel/shared/schemas";

const KEY_PREFIX = "blockduel:pending_events:";
const MAX_EVENTS_PER_PLAYER = 500;

/** Events held for players who were offline when they were sent. */
export interface PendingEventQueue {
  push(playerId: string, event: RelayServerEvent): Promise<void>;
  list(playerId: string): Promise<RelayServerEvent[]>;
  clear(playerId: string): Promise<void>;
}

function key(playerId: string) {
  return `${KEY_PREFIX}${playerId}`;
}

export class RedisPendingEventQueue implements PendingEventQueue {
  constructor(
    private readonly redis: Redis,
    private readonly ttlSeconds: number,
  ) {}

  /**
   * Push an event to a player's pending queue.
   * Uses the enqueue time as score for ordering.
   */
  async push(playerId: string, event: RelayServerEvent) {
    const k = key(playerId);
    await this.redis.zadd(k, Date.now(), JSON.stringify(event));

    // Cap at MAX_EVENTS_PER_PLAYER (remove oldest)
    const count = await this.redis.zcard(k);
    if (count > MAX_EVENTS_PER_PLAYER) {
      await this.redis.zremrangebyrank(k, 0, count - MAX_EVENTS_PER_PLAYER - 1);
    }

    await this.redis.expire(k, this.ttlSeconds);
  }

  async list(playerId: string): Promise<RelayServerEvent[]> {
    const items = await this.redis.zrange(key(playerId), 0, -1);
    const events: RelayServerEvent[] = [];
    for (const item of items) {
      const parsed = relayServerEventSchema.safeParse(JSON.parse(item));
      if (parsed.success) events.push(parsed.data);
    }
    return events;
  }

  async clear(playerId: string) {
    await this.redis.del(key(playerId));
  }
}
