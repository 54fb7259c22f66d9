import type { ColorName, Grid, MatchRecord, Move, PlayerState } from "@blockduel/shared/types";
import { BOARD_SIZE } from "@blockduel/shared/types";
import { canPlace, createBoard, playPiece } from "../board.js";
import { createInitial, type CreateMatchOptions, type TurnSubmission } from "../match-state.js";
import { playerById } from "../players.js";

export const T0 = new Date("2026-01-05T12:00:00.000Z");
export const HOUR = 60 * 60 * 1000;
export const DAY = 24 * HOUR;

export function at(offsetMs: number): Date {
  return new Date(T0.getTime() + offsetMs);
}

/** alice (turn holder) vs bob, seed 12345, uniform pieces, started at T0. */
export function newMatch(overrides: Partial<CreateMatchOptions> = {}): MatchRecord {
  return createInitial({
    matchId: "match-1",
    player1: { playerId: "alice", displayName: "Alice" },
    player2: { playerId: "bob", displayName: "Bob" },
    seed: 12345n,
    mode: { kind: "uniform" },
    now: T0,
    ...overrides,
  });
}

export function withPlayers(
  record: MatchRecord,
  first: Partial<PlayerState>,
  second: Partial<PlayerState> = {},
): MatchRecord {
  return {
    ...record,
    players: [
      { ...record.players[0], ...first },
      { ...record.players[1], ...second },
    ],
  };
}

export function fullBoard(color: ColorName = "teal"): Grid {
  return Array.from({ length: BOARD_SIZE }, () => Array.from({ length: BOARD_SIZE }, () => color));
}

/**
 * The turn holder places the first `count` pending pieces, each at the
 * first origin where it fits, scanning rows then columns.
 */
export function playTurn(record: MatchRecord, count = 1, when: Date = T0): TurnSubmission {
  const holder = playerById(record, record.turnHolderId);
  let board = holder ? holder.board.map((row) => [...row]) : createBoard();
  const moves: Move[] = [];

  for (const piece of record.pendingPieces.slice(0, count)) {
    let placed = false;
    for (let row = 0; row < BOARD_SIZE && !placed; row++) {
      for (let column = 0; column < BOARD_SIZE && !placed; column++) {
        if (!canPlace(board, piece, { row, column })) continue;
        const placement = playPiece(board, piece, { row, column }, when);
        if (placement) {
          board = placement.board;
          moves.push(placement.move);
          placed = true;
        }
      }
    }
    if (!placed) throw new Error(`${piece.shape} does not fit`);
  }
  return { playerId: record.turnHolderId, moves, board };
}
