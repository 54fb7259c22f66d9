/**
 * Match state model: construction, functional turn application, structural
 * validation and finalization of MatchRecord values.
 *
 * Every operation returns a new record. Inputs are never mutated, so a
 * rejected turn leaves the caller holding the record it started with.
 */

import type {
  Grid,
  MatchRecord,
  Move,
  PlayerState,
  SelectionMode,
} from "@blockduel/shared/types";
import { BOARD_SIZE, MATCH_FORMAT_VERSION } from "@blockduel/shared/types";
import {
  cloneBoard,
  createBoard,
  isBoardLocked,
  isInBounds,
  isWellFormedBoard,
  referencePlacementRules,
  type PlacementRules,
} from "./board.js";
import { DEFAULT_MATCH_CONFIG, type MatchConfig } from "./config.js";
import { CorruptRecord, TurnRejected } from "./errors.js";
import { PIECES_PER_TURN, generatePieces, pieceEquals } from "./piece-generator.js";
import { isParticipant, opponentOf } from "./players.js";
import { formatSeed, parseSeed, randomSeed } from "./random.js";
import { resolveMatch, type MatchEnd } from "./scoring.js";

// ===== Types =====

export interface PlayerSeat {
  playerId: string;
  displayName?: string | null;
}

export interface CreateMatchOptions {
  matchId: string;
  player1: PlayerSeat;
  player2: PlayerSeat;
  mode?: SelectionMode;
  seed?: bigint;
  now?: Date;
}

export interface TurnSubmission {
  playerId: string;
  /** One to three placements, in the order they were made. */
  moves: Move[];
  /** Submitter's board after all moves and line clears. */
  board: Grid;
}

export interface ApplyTurnOptions {
  seed?: bigint;
  now?: Date;
  rules?: PlacementRules;
}

export interface FinalizeOptions {
  config?: MatchConfig;
  now?: Date;
}

export interface ValidationResult {
  valid: boolean;
  issues: string[];
}

// ===== Construction =====

function newPlayer(seat: PlayerSeat): PlayerState {
  return {
    playerId: seat.playerId,
    displayName: seat.displayName ?? null,
    score: 0,
    board: createBoard(),
    isBoardLocked: false,
    moveHistory: [],
  };
}

export function createInitial(options: CreateMatchOptions): MatchRecord {
  const seed = options.seed ?? randomSeed();
  const mode = options.mode ?? DEFAULT_MATCH_CONFIG.selectionMode;
  const now = (options.now ?? new Date()).toISOString();

  const record: MatchRecord = {
    formatVersion: MATCH_FORMAT_VERSION,
    matchId: options.matchId,
    players: [newPlayer(options.player1), newPlayer(options.player2)],
    turnHolderId: options.player1.playerId,
    turnNumber: 1,
    randomSeed: formatSeed(seed),
    selectionMode: mode,
    pendingPieces: generatePieces(seed, 1, mode),
    startedAt: now,
    lastUpdatedAt: now,
    ended: false,
    winnerId: null,
    endReason: null,
    endedBy: null,
    endedAt: null,
    syncIncidents: [],
  };

  const { valid, issues } = validate(record);
  if (!valid) {
    throw new CorruptRecord("Cannot create match", issues);
  }
  return record;
}

// ===== Turns =====

function checkMoves(current: MatchRecord, moves: Move[]): void {
  if (moves.length === 0 || moves.length > PIECES_PER_TURN) {
    throw new TurnRejected("invalid_move", `A turn places 1 to ${PIECES_PER_TURN} pieces, got ${moves.length}`);
  }

  const remaining = [...current.pendingPieces];
  for (const move of moves) {
    const index = remaining.findIndex((piece) => pieceEquals(piece, move.piece));
    if (index === -1) {
      throw new TurnRejected(
        "piece_not_pending",
        `${move.piece.color} ${move.piece.shape} is not a pending piece for turn ${current.turnNumber}`,
      );
    }
    remaining.splice(index, 1);

    const covered = move.piece.cells.map((cell) => ({
      row: move.origin.row + cell.row,
      column: move.origin.column + cell.column,
    }));
    if (!isInBounds(move.origin) || !covered.every(isInBounds)) {
      throw new TurnRejected(
        "out_of_bounds",
        `${move.piece.shape} at (${move.origin.row}, ${move.origin.column}) leaves the ${BOARD_SIZE}x${BOARD_SIZE} board`,
      );
    }

    if (!Number.isInteger(move.scoreDelta) || move.scoreDelta < 0) {
      throw new TurnRejected("invalid_move", `scoreDelta must be a non-negative integer, got ${move.scoreDelta}`);
    }
    if (!Number.isInteger(move.linesCleared) || move.linesCleared < 0) {
      throw new TurnRejected("invalid_move", `linesCleared must be a non-negative integer, got ${move.linesCleared}`);
    }
  }
}

function laterOf(a: string, b: string): string {
  return Date.parse(b) > Date.parse(a) ? b : a;
}

/**
 * Applies one player's turn and advances the match to the next turn with a
 * freshly drawn seed. Throws TurnRejected without touching `current` when a
 * precondition fails.
 */
export function applyTurn(
  current: MatchRecord,
  submission: TurnSubmission,
  options: ApplyTurnOptions = {},
): MatchRecord {
  if (current.ended) {
    throw new TurnRejected("match_ended", `Match ${current.matchId} has already ended`);
  }
  if (submission.playerId !== current.turnHolderId) {
    throw new TurnRejected(
      "not_turn_holder",
      `It is ${current.turnHolderId}'s turn, not ${submission.playerId}'s`,
    );
  }
  checkMoves(current, submission.moves);
  if (!isWellFormedBoard(submission.board)) {
    throw new TurnRejected("invalid_board", `Submitted board must be ${BOARD_SIZE}x${BOARD_SIZE} palette cells`);
  }

  const rules = options.rules ?? referencePlacementRules;
  const seed = options.seed ?? randomSeed();
  const turnNumber = current.turnNumber + 1;
  const pendingPieces = generatePieces(seed, turnNumber, current.selectionMode);
  const gained = submission.moves.reduce((sum, move) => sum + move.scoreDelta, 0);

  const players = current.players.map((player): PlayerState => {
    const mine = player.playerId === submission.playerId;
    const board = mine ? cloneBoard(submission.board) : player.board;
    return {
      ...player,
      score: mine ? player.score + gained : player.score,
      board,
      moveHistory: mine
        ? [...player.moveHistory, ...submission.moves.map(cloneMove)]
        : player.moveHistory,
      // Both boards are probed against the newly dealt pieces, so the
      // submitter's board counts as locked when none of them fits it, even
      // though the opponent plays them. Once locked, a player stays locked.
      isBoardLocked: player.isBoardLocked || isBoardLocked(board, pendingPieces, rules),
    };
  });

  return {
    ...current,
    players: [players[0], players[1]],
    turnHolderId: opponentOf(current, submission.playerId),
    turnNumber,
    randomSeed: formatSeed(seed),
    pendingPieces,
    lastUpdatedAt: laterOf(current.lastUpdatedAt, (options.now ?? new Date()).toISOString()),
  };
}

function cloneMove(move: Move): Move {
  return {
    piece: { ...move.piece, cells: move.piece.cells.map((c) => ({ ...c })) },
    origin: { ...move.origin },
    scoreDelta: move.scoreDelta,
    linesCleared: move.linesCleared,
    timestamp: move.timestamp,
  };
}

// ===== Validation =====

export function validate(record: MatchRecord): ValidationResult {
  const issues: string[] = [];

  if (record.formatVersion !== MATCH_FORMAT_VERSION) {
    issues.push(`formatVersion ${record.formatVersion} is not supported (expected ${MATCH_FORMAT_VERSION})`);
  }
  if (record.matchId.length === 0) issues.push("matchId is empty");

  record.players.forEach((player, i) => {
    if (player.playerId.length === 0) issues.push(`players[${i}].playerId is empty`);
    if (player.board.length !== BOARD_SIZE) {
      issues.push(`players[${i}].board has ${player.board.length} rows, expected ${BOARD_SIZE}`);
    }
    player.board.forEach((row, r) => {
      if (row.length !== BOARD_SIZE) {
        issues.push(`players[${i}].board row ${r} has ${row.length} columns, expected ${BOARD_SIZE}`);
      }
    });
    if (player.score < 0) issues.push(`players[${i}].score is negative`);
  });

  const [first, second] = record.players;
  if (first.playerId.length > 0 && first.playerId === second.playerId) {
    issues.push("players must have distinct ids");
  }
  if (!isParticipant(record, record.turnHolderId)) {
    issues.push(`turnHolderId ${record.turnHolderId} is not a participant`);
  }
  if (record.turnNumber < 1) issues.push("turnNumber must be at least 1");
  if (record.pendingPieces.length !== PIECES_PER_TURN) {
    issues.push(`pendingPieces has ${record.pendingPieces.length} pieces, expected ${PIECES_PER_TURN}`);
  }
  if (Date.parse(record.lastUpdatedAt) < Date.parse(record.startedAt)) {
    issues.push("lastUpdatedAt precedes startedAt");
  }

  if (record.ended) {
    if (record.endReason === null) issues.push("ended match has no endReason");
    if (record.endedAt === null) issues.push("ended match has no endedAt");
  } else if (record.winnerId !== null || record.endReason !== null || record.endedAt !== null) {
    issues.push("active match carries terminal fields");
  }
  if (record.winnerId !== null && !isParticipant(record, record.winnerId)) {
    issues.push(`winnerId ${record.winnerId} is not a participant`);
  }

  return { valid: issues.length === 0, issues };
}

// ===== End of match =====

/** The end condition a record has reached on its own, if any. */
export function detectTerminal(
  record: MatchRecord,
  config: MatchConfig = DEFAULT_MATCH_CONFIG,
): MatchEnd | null {
  if (record.ended) return null;
  const [a, b] = record.players;
  if (a.isBoardLocked || b.isBoardLocked) return { reason: "lockout" };
  if (
    config.scoreLeadThreshold !== null &&
    Math.abs(a.score - b.score) >= config.scoreLeadThreshold
  ) {
    return { reason: "scoreLead" };
  }
  return null;
}

/**
 * Ends the match. An already-ended record is returned as is, so repeated
 * calls from retries or both clients converge on one terminal state.
 */
export function finalize(
  record: MatchRecord,
  end: MatchEnd,
  options: FinalizeOptions = {},
): MatchRecord {
  if (record.ended) return record;

  const config = options.config ?? DEFAULT_MATCH_CONFIG;
  const at = options.now ?? new Date();
  const resolution = resolveMatch(record, end, config, at);
  const endedAt = laterOf(record.lastUpdatedAt, at.toISOString());

  return {
    ...record,
    players: [
      { ...record.players[0], score: resolution.finalScores[0] },
      { ...record.players[1], score: resolution.finalScores[1] },
    ],
    ended: true,
    winnerId: resolution.winnerId,
    endReason: resolution.endReason,
    endedBy: resolution.endedBy,
    endedAt,
    lastUpdatedAt: endedAt,
  };
}

/** True when two ended records agree on winner, reason, who ended it and the final scores. */
export function sameOutcome(a: MatchRecord, b: MatchRecord): boolean {
  return (
    a.ended &&
    b.ended &&
    a.matchId === b.matchId &&
    a.winnerId === b.winnerId &&
    a.endReason === b.endReason &&
    a.endedBy === b.endedBy &&
    a.players.every(
      (player, i) => player.playerId === b.players[i].playerId && player.score === b.players[i].score,
    )
  );
}

export function currentSeed(record: MatchRecord): bigint {
  return parseSeed(record.randomSeed);
}
