import type { RelayServerEvent } from "@blockduel/shared/types";
import type { PendingEventQueue } from "../lib/pending-events.js";

export class MemoryPendingEventQueue implements PendingEventQueue {
  readonly events = new Map<string, RelayServerEvent[]>();

  async push(playerId: string, event: RelayServerEvent): Promise<void> {
    const list = this.events.get(playerId) ?? [];
    list.push(event);
    this.events.set(playerId, list);
  }

  async list(playerId: string): Promise<RelayServerEvent[]> {
    return [...(this.events.get(playerId) ?? [])];
  }

  async clear(playerId: string): Promise<void> {
    this.events.delete(playerId);
  }
}
