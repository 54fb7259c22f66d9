import type { FindMatchResponse, MatchHandle, MatchStatus } from "@blockduel/shared/types";
import { TransportFailure } from "../errors.js";
import type {
  LocalIdentity,
  MatchTransport,
  TransportEvent,
  TransportListener,
} from "../transport.js";

interface RelayMatch {
  id: string;
  status: MatchStatus;
  participants: LocalIdentity[];
  currentParticipantId: string | null;
  payload: string | null;
  turnCount: number;
}

/**
 * In-process stand-in for the relay. Follows the same status rules and
 * queues events for players with no subscriber. Events are delivered on
 * a microtask, never inside the sending call.
 */
export class MemoryRelay {
  readonly matches = new Map<string, RelayMatch>();
  private readonly listeners = new Map<string, Set<TransportListener>>();
  private readonly pending = new Map<string, TransportEvent[]>();
  private nextId = 1;

  transportFor(identity: LocalIdentity): MemoryTransport {
    return new MemoryTransport(this, identity);
  }

  pendingFor(playerId: string): TransportEvent[] {
    return [...(this.pending.get(playerId) ?? [])];
  }

  /** Delivers an event as if the relay had pushed it. */
  push(playerId: string, event: TransportEvent): void {
    const listeners = this.listeners.get(playerId);
    if (!listeners || listeners.size === 0) {
      const queue = this.pending.get(playerId) ?? [];
      queue.push(event);
      this.pending.set(playerId, queue);
      return;
    }
    for (const listener of listeners) {
      queueMicrotask(() => listener(event));
    }
  }

  subscribe(playerId: string, listener: TransportListener): () => void {
    const set = this.listeners.get(playerId) ?? new Set<TransportListener>();
    set.add(listener);
    this.listeners.set(playerId, set);

    const queued = this.pending.get(playerId) ?? [];
    this.pending.delete(playerId);
    for (const event of queued) queueMicrotask(() => listener(event));

    return () => {
      set.delete(listener);
    };
  }

  findMatch(identity: LocalIdentity, opponentId?: string): FindMatchResponse {
    if (opponentId !== undefined) {
      const match = this.create([identity, { playerId: opponentId, displayName: null }]);
      this.push(opponentId, { type: "match_found", match: this.handle(match) });
      return { status: "matched", match: this.handle(match) };
    }

    const open = [...this.matches.values()].find(
      (m) => m.status === "open" && m.participants[0]?.playerId !== identity.playerId,
    );
    if (open) {
      open.participants.push(identity);
      open.status = "active";
      open.currentParticipantId = open.participants[0].playerId;
      this.push(open.participants[0].playerId, { type: "match_found", match: this.handle(open) });
      return { status: "matched", match: this.handle(open) };
    }
    return { status: "queued", match: this.handle(this.create([identity])) };
  }

  loadMatches(playerId: string): MatchHandle[] {
    return [...this.matches.values()]
      .filter((m) => m.status !== "ended" && m.participants.some((p) => p.playerId === playerId))
      .map((m) => this.handle(m));
  }

  submitTurn(playerId: string, matchId: string, payload: string, nextParticipantId: string): void {
    const match = this.requireParticipant(matchId, playerId);
    if (match.status !== "active") throw new TransportFailure("Match is not active", 409, false);
    if (match.currentParticipantId !== playerId) throw new TransportFailure("Not your turn", 409, false);
    const next = this.other(match, playerId);
    if (next !== nextParticipantId) {
      throw new TransportFailure("nextParticipantId must be the other participant", 400, false);
    }
    match.payload = payload;
    match.currentParticipantId = next;
    match.turnCount += 1;
    this.push(next, { type: "turn_received", matchId, payload, fromPlayerId: playerId });
  }

  endMatch(playerId: string, matchId: string, payload: string): void {
    const match = this.requireParticipant(matchId, playerId);
    this.close(match, payload);
    const other = this.other(match, playerId);
    if (other) this.push(other, { type: "match_ended", matchId, payload, fromPlayerId: playerId });
  }

  quitMatch(playerId: string, matchId: string, payload: string | null): void {
    const match = this.requireParticipant(matchId, playerId);
    this.close(match, payload);
    const other = this.other(match, playerId);
    if (other) this.push(other, { type: "participant_quit", matchId, playerId, payload });
  }

  private create(participants: LocalIdentity[]): RelayMatch {
    const match: RelayMatch = {
      id: `match-${this.nextId++}`,
      status: participants.length === 2 ? "active" : "open",
      participants,
      currentParticipantId: participants.length === 2 ? participants[0].playerId : null,
      payload: null,
      turnCount: 0,
    };
    this.matches.set(match.id, match);
    return match;
  }

  private close(match: RelayMatch, payload: string | null): void {
    if (match.status === "ended") throw new TransportFailure("Match already ended", 409, false);
    match.status = "ended";
    match.currentParticipantId = null;
    if (payload !== null) match.payload = payload;
  }

  private requireParticipant(matchId: string, playerId: string): RelayMatch {
    const match = this.matches.get(matchId);
    if (!match) throw new TransportFailure("Match not found", 404, false);
    if (!match.participants.some((p) => p.playerId === playerId)) {
      throw new TransportFailure("Not a participant in this match", 403, false);
    }
    return match;
  }

  private other(match: RelayMatch, playerId: string): string | null {
    return match.participants.find((p) => p.playerId !== playerId)?.playerId ?? null;
  }

  private handle(match: RelayMatch): MatchHandle {
    const at = "2026-01-01T00:00:00.000Z";
    return {
      matchId: match.id,
      status: match.status,
      participants: match.participants.map((p) => ({ ...p })),
      currentParticipantId: match.currentParticipantId,
      payload: match.payload,
      turnCount: match.turnCount,
      createdAt: at,
      updatedAt: at,
    };
  }
}

/** One player's view of a MemoryRelay. `failNext` makes upcoming calls reject. */
export class MemoryTransport implements MatchTransport {
  private readonly failures: Error[] = [];
  readonly calls: string[] = [];

  constructor(
    private readonly relay: MemoryRelay,
    readonly identity: LocalIdentity,
  ) {}

  failNext(...errors: Error[]): void {
    this.failures.push(...errors);
  }

  async findMatch(opponentId?: string): Promise<FindMatchResponse> {
    this.before("findMatch");
    return this.relay.findMatch(this.identity, opponentId);
  }

  async loadMatches(): Promise<MatchHandle[]> {
    this.before("loadMatches");
    return this.relay.loadMatches(this.identity.playerId);
  }

  async submitTurn(matchId: string, payload: string, nextParticipantId: string): Promise<void> {
    this.before("submitTurn");
    this.relay.submitTurn(this.identity.playerId, matchId, payload, nextParticipantId);
  }

  async endMatch(matchId: string, payload: string): Promise<void> {
    this.before("endMatch");
    this.relay.endMatch(this.identity.playerId, matchId, payload);
  }

  async quitMatch(matchId: string, payload: string | null): Promise<void> {
    this.before("quitMatch");
    this.relay.quitMatch(this.identity.playerId, matchId, payload);
  }

  subscribe(listener: TransportListener): () => void {
    return this.relay.subscribe(this.identity.playerId, listener);
  }

  private before(call: string): void {
    this.calls.push(call);
    const failure = this.failures.shift();
    if (failure) throw failure;
  }
}
