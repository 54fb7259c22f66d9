import { randomUUID } from "node:crypto";
import type {
  CreateMatchInput,
  MatchStore,
  RecordTurnInput,
  StoredMatch,
} from "../store/match-store.js";

/** In-process MatchStore with the same conditional-write rules as the Postgres one. */
export class MemoryMatchStore implements MatchStore {
  readonly matches = new Map<string, StoredMatch>();
  private tick = 0;

  // Strictly increasing timestamps keep ordering deterministic in tests
  private now(): Date {
    this.tick += 1;
    return new Date(Date.UTC(2026, 0, 1, 0, 0, this.tick));
  }

  async create(input: CreateMatchInput): Promise<StoredMatch> {
    const invited = input.playerTwoId !== undefined;
    const at = this.now();
    const match: StoredMatch = {
      id: randomUUID(),
      status: invited ? "active" : "open",
      playerOneId: input.playerOneId,
      playerOneName: input.playerOneName,
      playerTwoId: input.playerTwoId ?? null,
      playerTwoName: input.playerTwoName ?? null,
      currentParticipantId: invited ? input.playerOneId : null,
      payload: null,
      turnCount: 0,
      createdAt: at,
      updatedAt: at,
    };
    this.matches.set(match.id, match);
    return { ...match };
  }

  async findById(id: string): Promise<StoredMatch | null> {
    const match = this.matches.get(id);
    return match ? { ...match } : null;
  }

  async findOpenMatch(playerId: string): Promise<StoredMatch | null> {
    const open = [...this.matches.values()]
      .filter((m) => m.status === "open" && m.playerOneId !== playerId)
      .sort((a, b) => a.createdAt.getTime() - b.createdAt.getTime());
    return open[0] ? { ...open[0] } : null;
  }

  async join(id: string, playerId: string, displayName: string | null): Promise<StoredMatch | null> {
    const match = this.matches.get(id);
    if (!match || match.status !== "open") return null;
    return this.update(match, {
      playerTwoId: playerId,
      playerTwoName: displayName,
      status: "active",
      currentParticipantId: match.playerOneId,
    });
  }

  async listActiveFor(playerId: string): Promise<StoredMatch[]> {
    return [...this.matches.values()]
      .filter(
        (m) => m.status !== "ended" && (m.playerOneId === playerId || m.playerTwoId === playerId),
      )
      .sort((a, b) => b.updatedAt.getTime() - a.updatedAt.getTime())
      .map((m) => ({ ...m }));
  }

  async recordTurn(id: string, input: RecordTurnInput): Promise<StoredMatch | null> {
    const match = this.matches.get(id);
    if (!match || match.status !== "active" || match.currentParticipantId !== input.expectedCurrentId) {
      return null;
    }
    return this.update(match, {
      payload: input.payload,
      currentParticipantId: input.nextParticipantId,
      turnCount: match.turnCount + 1,
    });
  }

  async close(id: string, payload: string | null): Promise<StoredMatch | null> {
    const match = this.matches.get(id);
    if (!match || match.status === "ended") return null;
    return this.update(match, {
      status: "ended",
      currentParticipantId: null,
      ...(payload !== null ? { payload } : {}),
    });
  }

  private update(match: StoredMatch, changes: Partial<StoredMatch>): StoredMatch {
    const next = { ...match, ...changes, updatedAt: this.now() };
    this.matches.set(next.id, next);
    return { ...next };
  }
}
