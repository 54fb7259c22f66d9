import type { EndReason, MatchRecord } from "@blockduel/shared/types";
import type { MatchConfig } from "./config.js";
import { CorruptRecord, TurnRejected } from "./errors.js";
import { playerIndex } from "./players.js";

export type MatchEnd =
  | { reason: "lockout" }
  | { reason: "scoreLead" }
  | { reason: "resignation"; playerId: string }
  | { reason: "disconnect"; playerId: string }
  | { reason: "timeout" };

export type AdjustmentKind =
  | "winBonus"
  | "resignationPenalty"
  | "disconnectPenalty"
  | "timeoutPenalty";

export interface ScoreAdjustment {
  playerId: string;
  kind: AdjustmentKind;
  /** Signed change actually applied after the zero floor. */
  amount: number;
}

export interface Resolution {
  endReason: EndReason;
  winnerId: string | null;
  endedBy: string | null;
  /** In player order. */
  finalScores: [number, number];
  adjustments: ScoreAdjustment[];
}

// ===== Rule helpers =====

export function winBonus(score: number, config: MatchConfig): number {
  return Math.max(config.winBonusMin, Math.floor(score / config.winBonusDivisor));
}

export function resignationPenalty(score: number, config: MatchConfig): number {
  return Math.max(
    config.resignationPenaltyMin,
    Math.floor((score * config.resignationPenaltyPercent) / 100),
  );
}

/** Larger when more of the match clock was left, since less of the abandoned board was played. */
export function disconnectPenalty(remainingMs: number, config: MatchConfig): number {
  const fraction = Math.max(0, remainingMs) / config.maxMatchDurationMs;
  if (fraction > 0.8) return config.disconnectPenalties.early;
  if (fraction > 0.2) return config.disconnectPenalties.mid;
  return config.disconnectPenalties.late;
}

export function remainingMatchTime(record: MatchRecord, at: Date, config: MatchConfig): number {
  const deadline = Date.parse(record.startedAt) + config.maxMatchDurationMs;
  return Math.max(0, deadline - at.getTime());
}

// ===== Resolver =====

/**
 * Decides the winner and score adjustments for a match ending with `end`
 * at time `at`. Depends only on its arguments, so both clients reach the
 * same result from the same record.
 */
export function resolveMatch(
  record: MatchRecord,
  end: MatchEnd,
  config: MatchConfig,
  at: Date,
): Resolution {
  const scores: [number, number] = [record.players[0].score, record.players[1].score];
  const ids: [string, string] = [record.players[0].playerId, record.players[1].playerId];
  const adjustments: ScoreAdjustment[] = [];

  const penalize = (index: 0 | 1, kind: AdjustmentKind, penalty: number) => {
    const applied = Math.min(penalty, scores[index]);
    scores[index] -= applied;
    adjustments.push({ playerId: ids[index], kind, amount: -applied });
  };

  const reward = (index: 0 | 1) => {
    const bonus = winBonus(scores[index], config);
    scores[index] += bonus;
    adjustments.push({ playerId: ids[index], kind: "winBonus", amount: bonus });
  };

  const higherScore = (): 0 | 1 => {
    if (scores[0] !== scores[1]) return scores[0] > scores[1] ? 0 : 1;
    // Equal scores: the player holding the turn takes it.
    return record.turnHolderId === ids[0] ? 0 : 1;
  };

  switch (end.reason) {
    case "lockout": {
      const [a, b] = record.players;
      let winner: 0 | 1;
      if (a.isBoardLocked && b.isBoardLocked) winner = higherScore();
      else if (a.isBoardLocked) winner = 1;
      else if (b.isBoardLocked) winner = 0;
      else throw new CorruptRecord("Lock-out declared but neither board is locked");
      reward(winner);
      return { endReason: "lockout", winnerId: ids[winner], endedBy: null, finalScores: scores, adjustments };
    }

    case "scoreLead": {
      const winner = higherScore();
      reward(winner);
      return { endReason: "scoreLead", winnerId: ids[winner], endedBy: null, finalScores: scores, adjustments };
    }

    case "resignation":
    case "disconnect": {
      const loser = playerIndex(record, end.playerId);
      if (loser === -1) {
        throw new TurnRejected("unknown_player", `${end.playerId} is not in match ${record.matchId}`);
      }
      const penalty =
        end.reason === "resignation"
          ? resignationPenalty(scores[loser], config)
          : disconnectPenalty(remainingMatchTime(record, at, config), config);
      penalize(loser, end.reason === "resignation" ? "resignationPenalty" : "disconnectPenalty", penalty);
      return {
        endReason: end.reason,
        winnerId: ids[loser === 0 ? 1 : 0],
        endedBy: end.playerId,
        finalScores: scores,
        adjustments,
      };
    }

    case "timeout": {
      // Neither board can be proven current, so both sides pay.
      penalize(0, "timeoutPenalty", config.timeoutPenalty);
      penalize(1, "timeoutPenalty", config.timeoutPenalty);
      return { endReason: "timeout", winnerId: null, endedBy: null, finalScores: scores, adjustments };
    }
  }
}
