import { and, asc, desc, eq, ne, or, sql } from "drizzle-orm";
import type { MatchHandle, MatchParticipant, MatchStatus } from "@blockduel/shared/types";
import type { Database } from "../db/index.js";
import { matches } from "../db/schema.js";

export interface StoredMatch {
  id: string;
  status: MatchStatus;
  playerOneId: string;
  playerOneName: string | null;
  playerTwoId: string | null;
  playerTwoName: string | null;
  currentParticipantId: string | null;
  payload: string | null;
  turnCount: number;
  createdAt: Date;
  updatedAt: Date;
}

export interface CreateMatchInput {
  playerOneId: string;
  playerOneName: string | null;
  playerTwoId?: string;
  playerTwoName?: string | null;
}

export interface RecordTurnInput {
  payload: string;
  /** Only applied while this player holds the turn. */
  expectedCurrentId: string;
  nextParticipantId: string;
}

/**
 * Persistence for relay matches. Conditional writes return null when the
 * match was not in the expected state, so concurrent requests cannot both win.
 */
export interface MatchStore {
  create(input: CreateMatchInput): Promise<StoredMatch>;
  findById(id: string): Promise<StoredMatch | null>;
  /** Oldest open match not created by `playerId`. */
  findOpenMatch(playerId: string): Promise<StoredMatch | null>;
  join(id: string, playerId: string, displayName: string | null): Promise<StoredMatch | null>;
  listActiveFor(playerId: string): Promise<StoredMatch[]>;
  recordTurn(id: string, input: RecordTurnInput): Promise<StoredMatch | null>;
  close(id: string, payload: string | null): Promise<StoredMatch | null>;
}

// ===== Helpers =====

export function participantsOf(match: StoredMatch): MatchParticipant[] {
  const participants: MatchParticipant[] = [
    { playerId: match.playerOneId, displayName: match.playerOneName },
  ];
  if (match.playerTwoId) {
    participants.push({ playerId: match.playerTwoId, displayName: match.playerTwoName });
  }
  return participants;
}

export function isMatchParticipant(match: StoredMatch, playerId: string): boolean {
  return match.playerOneId === playerId || match.playerTwoId === playerId;
}

export function otherParticipant(match: StoredMatch, playerId: string): string | null {
  if (match.playerOneId === playerId) return match.playerTwoId;
  if (match.playerTwoId === playerId) return match.playerOneId;
  return null;
}

export function toHandle(match: StoredMatch): MatchHandle {
  return {
    matchId: match.id,
    status: match.status,
    participants: participantsOf(match),
    currentParticipantId: match.currentParticipantId,
    payload: match.payload,
    turnCount: match.turnCount,
    createdAt: match.createdAt.toISOString(),
    updatedAt: match.updatedAt.toISOString(),
  };
}

// ===== Postgres =====

export class DrizzleMatchStore implements MatchStore {
  constructor(private readonly db: Database) {}

  async create(input: CreateMatchInput): Promise<StoredMatch> {
    const invited = input.playerTwoId !== undefined;
    const [row] = await this.db
      .insert(matches)
      .values({
        playerOneId: input.playerOneId,
        playerOneName: input.playerOneName,
        playerTwoId: input.playerTwoId ?? null,
        playerTwoName: input.playerTwoName ?? null,
        status: invited ? "active" : "open",
        currentParticipantId: invited ? input.playerOneId : null,
      })
      .returning();
    return row;
  }

  async findById(id: string): Promise<StoredMatch | null> {
    const [row] = await this.db.select().from(matches).where(eq(matches.id, id)).limit(1);
    return row ?? null;
  }

  async findOpenMatch(playerId: string): Promise<StoredMatch | null> {
    const [row] = await this.db
      .select()
      .from(matches)
      .where(and(eq(matches.status, "open"), ne(matches.playerOneId, playerId)))
      .orderBy(asc(matches.createdAt))
      .limit(1);
    return row ?? null;
  }

  async join(id: string, playerId: string, displayName: string | null): Promise<StoredMatch | null> {
    const [row] = await this.db
      .update(matches)
      .set({
        playerTwoId: playerId,
        playerTwoName: displayName,
        status: "active",
        currentParticipantId: sql`${matches.playerOneId}`,
        updatedAt: new Date(),
      })
      .where(and(eq(matches.id, id), eq(matches.status, "open")))
      .returning();
    return row ?? null;
  }

  async listActiveFor(playerId: string): Promise<StoredMatch[]> {
    return this.db
      .select()
      .from(matches)
      .where(
        and(
          ne(matches.status, "ended"),
          or(eq(matches.playerOneId, playerId), eq(matches.playerTwoId, playerId))
        )
      )
      .orderBy(desc(matches.updatedAt));
  }

  async recordTurn(id: string, input: RecordTurnInput): Promise<StoredMatch | null> {
    const [row] = await this.db
      .update(matches)
      .set({
        payload: input.payload,
        currentParticipantId: input.nextParticipantId,
        turnCount: sql`${matches.turnCount} + 1`,
        updatedAt: new Date(),
      })
      .where(
        and(
          eq(matches.id, id),
          eq(matches.status, "active"),
          eq(matches.currentParticipantId, input.expectedCurrentId)
        )
      )
      .returning();
    return row ?? null;
  }

  async close(id: string, payload: string | null): Promise<StoredMatch | null> {
    const [row] = await this.db
      .update(matches)
      .set({
        status: "ended",
        currentParticipantId: null,
        ...(payload !== null ? { payload } : {}),
        updatedAt: new Date(),
      })
      .where(and(eq(matches.id, id), ne(matches.status, "ended")))
      .returning();
    return row ?? null;
  }
}
