import type { MatchRecord, PieceDescriptor } from "@blockduel/shared/types";
import { TurnRejected } from "./errors.js";
import { createLogger } from "./logger.js";
import { validate } from "./match-state.js";
import { generatePieces, piecesEqual } from "./piece-generator.js";
import { formatSeed, parseSeed, randomSeed, seedFromString } from "./random.js";

const log = createLogger("sync");

export type ResyncOutcome =
  | { kind: "alreadySynced"; pieces: PieceDescriptor[] }
  /** Local copy was stale; the authoritative record regenerates cleanly. */
  | { kind: "regenerated"; pieces: PieceDescriptor[] }
  /** The opponent saw different pieces. The side holding the turn must reseed. */
  | { kind: "newSeedRequired"; pieces: PieceDescriptor[]; reason: string }
  /** No usable record. Locally seeded pieces so play can continue. */
  | { kind: "emergency"; pieces: PieceDescriptor[]; seed: bigint };

export interface ResyncInput {
  playerId: string;
  localPieces: readonly PieceDescriptor[];
  /** Latest authoritative record, or null when none could be decoded. */
  record: MatchRecord | null;
  /** What the other device stored as pending in its last payload. */
  reportedPieces?: readonly PieceDescriptor[];
}

export type RecoveryAction = "continueWithLastState" | "requestFullResync";

export function regeneratePieces(record: MatchRecord): PieceDescriptor[] {
  return generatePieces(parseSeed(record.randomSeed), record.turnNumber, record.selectionMode);
}

/** True when `localPieces` is exactly what the record's seed produces, in order. */
export function validateSync(localPieces: readonly PieceDescriptor[], record: MatchRecord): boolean {
  return piecesEqual(localPieces, regeneratePieces(record));
}

/** Pieces derived from the player's own id, used when no record is available. */
export function emergencyPieces(playerId: string): { seed: bigint; pieces: PieceDescriptor[] } {
  const seed = seedFromString(playerId);
  return { seed, pieces: generatePieces(seed, 1, { kind: "uniform" }) };
}

export function resync(input: ResyncInput): ResyncOutcome {
  const { record } = input;

  if (record === null || !validate(record).valid) {
    const { seed, pieces } = emergencyPieces(input.playerId);
    log.warn({ playerId: input.playerId }, "no valid match record, using emergency piece set");
    return { kind: "emergency", pieces, seed };
  }

  const expected = regeneratePieces(record);
  const reported = input.reportedPieces ?? record.pendingPieces;

  if (!piecesEqual(reported, expected)) {
    const reason = `turn ${record.turnNumber}: opponent pieces differ from seed ${record.randomSeed}`;
    log.warn({ matchId: record.matchId, turnNumber: record.turnNumber }, "opponent desync, new seed required");
    return { kind: "newSeedRequired", pieces: expected, reason };
  }

  if (piecesEqual(input.localPieces, expected)) {
    return { kind: "alreadySynced", pieces: expected };
  }

  log.info({ matchId: record.matchId, turnNumber: record.turnNumber }, "local pieces regenerated from record");
  return { kind: "regenerated", pieces: expected };
}

export interface ReseedOptions {
  seed?: bigint;
  now?: Date;
  reason?: string;
}

/**
 * Replaces the seed for the current turn and logs the incident in the
 * record. Only the turn holder may do this. Earlier turns and history are
 * left untouched.
 */
export function reseed(record: MatchRecord, byPlayerId: string, options: ReseedOptions = {}): MatchRecord {
  if (record.ended) {
    throw new TurnRejected("match_ended", `Match ${record.matchId} has already ended`);
  }
  if (byPlayerId !== record.turnHolderId) {
    throw new TurnRejected("not_turn_holder", `Only ${record.turnHolderId} may reseed turn ${record.turnNumber}`);
  }

  const seed = options.seed ?? randomSeed();
  const at = (options.now ?? new Date()).toISOString();
  log.warn({ matchId: record.matchId, turnNumber: record.turnNumber, by: byPlayerId }, "reseeding current turn");

  return {
    ...record,
    randomSeed: formatSeed(seed),
    pendingPieces: generatePieces(seed, record.turnNumber, record.selectionMode),
    lastUpdatedAt: Date.parse(at) > Date.parse(record.lastUpdatedAt) ? at : record.lastUpdatedAt,
    syncIncidents: [
      ...record.syncIncidents,
      {
        turnNumber: record.turnNumber,
        reportedBy: byPlayerId,
        reason: options.reason ?? "piece desync",
        previousSeed: record.randomSeed,
        at,
      },
    ],
  };
}

/**
 * What to do after a reconnect, given the record held locally and the one
 * the relay returned.
 */
export function recoveryActionFor(local: MatchRecord, remote: MatchRecord): RecoveryAction {
  if (local.matchId !== remote.matchId) return "requestFullResync";
  if (local.turnNumber !== remote.turnNumber) return "requestFullResync";
  if (local.randomSeed !== remote.randomSeed) return "requestFullResync";
  return validateSync(local.pendingPieces, remote) ? "continueWithLastState" : "requestFullResync";
}
