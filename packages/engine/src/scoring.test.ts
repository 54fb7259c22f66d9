import { describe, it, expect } from "vitest";
import { DEFAULT_MATCH_CONFIG as config, resolveMatchConfig } from "./config.js";
import { CorruptRecord, TurnRejected } from "./errors.js";
import {
  disconnectPenalty,
  remainingMatchTime,
  resignationPenalty,
  resolveMatch,
  winBonus,
} from "./scoring.js";
import { DAY, HOUR, at, newMatch, withPlayers } from "./test-utils/fixtures.js";

describe("rule helpers", () => {
  it("gives a win bonus of a twentieth of the score, at least 10", () => {
    expect(winBonus(0, config)).toBe(10);
    expect(winBonus(219, config)).toBe(10);
    expect(winBonus(6000, config)).toBe(300);
  });

  it("charges resignations 10% of the score, at least 50", () => {
    expect(resignationPenalty(120, config)).toBe(50);
    expect(resignationPenalty(1234, config)).toBe(123);
  });

  it("charges more for leaving early", () => {
    expect(disconnectPenalty(6 * DAY, config)).toBe(200);
    expect(disconnectPenalty(4 * DAY, config)).toBe(100);
    expect(disconnectPenalty(DAY, config)).toBe(50);
    expect(disconnectPenalty(-HOUR, config)).toBe(50);
  });

  it("measures remaining time against the match ceiling", () => {
    expect(remainingMatchTime(newMatch(), at(DAY), config)).toBe(6 * DAY);
    expect(remainingMatchTime(newMatch(), at(8 * DAY), config)).toBe(0);
  });
});

describe("resolveMatch", () => {
  it("hands the win to the opponent of a resigning player", () => {
    const record = withPlayers(newMatch(), { score: 120 }, { score: 80 });
    const resolution = resolveMatch(record, { reason: "resignation", playerId: "alice" }, config, at(HOUR));

    expect(resolution).toEqual({
      endReason: "resignation",
      winnerId: "bob",
      endedBy: "alice",
      finalScores: [70, 80],
      adjustments: [{ playerId: "alice", kind: "resignationPenalty", amount: -50 }],
    });
  });

  it("never takes a score below zero", () => {
    const record = withPlayers(newMatch(), {}, { score: 30 });
    const resolution = resolveMatch(record, { reason: "resignation", playerId: "bob" }, config, at(HOUR));
    expect(resolution.finalScores).toEqual([0, 0]);
    expect(resolution.adjustments).toEqual([{ playerId: "bob", kind: "resignationPenalty", amount: -30 }]);
    expect(resolution.winnerId).toBe("alice");
  });

  it("gives an equal double lock-out to the turn holder", () => {
    const record = {
      ...withPlayers(newMatch(), { score: 100, isBoardLocked: true }, { score: 100, isBoardLocked: true }),
      turnHolderId: "bob",
    };
    const resolution = resolveMatch(record, { reason: "lockout" }, config, at(HOUR));
    expect(resolution.winnerId).toBe("bob");
    expect(resolution.finalScores).toEqual([100, 110]);
  });

  it("gives a double lock-out to the higher score", () => {
    const record = withPlayers(
      newMatch(),
      { score: 300, isBoardLocked: true },
      { score: 100, isBoardLocked: true },
    );
    const resolution = resolveMatch(record, { reason: "lockout" }, config, at(HOUR));
    expect(resolution.winnerId).toBe("alice");
    expect(resolution.finalScores).toEqual([315, 100]);
    expect(resolution.adjustments).toEqual([{ playerId: "alice", kind: "winBonus", amount: 15 }]);
  });

  it("gives a single lock-out to the other player", () => {
    const record = withPlayers(newMatch(), { score: 900 }, { isBoardLocked: true });
    const resolution = resolveMatch(record, { reason: "lockout" }, config, at(HOUR));
    expect(resolution.winnerId).toBe("alice");
    expect(resolution.finalScores).toEqual([945, 0]);
  });

  it("refuses a lock-out when neither board is locked", () => {
    expect(() => resolveMatch(newMatch(), { reason: "lockout" }, config, at(HOUR))).toThrow(CorruptRecord);
  });

  it("gives a score lead to the leader", () => {
    const record = withPlayers(newMatch(), { score: 500 }, { score: 6000 });
    const resolution = resolveMatch(record, { reason: "scoreLead" }, config, at(HOUR));
    expect(resolution.winnerId).toBe("bob");
    expect(resolution.finalScores).toEqual([500, 6300]);
  });

  it("scales the disconnect penalty with the time left", () => {
    const record = withPlayers(newMatch(), { score: 400 }, { score: 500 });
    const early = resolveMatch(record, { reason: "disconnect", playerId: "bob" }, config, at(DAY));
    expect(early.finalScores).toEqual([400, 300]);
    expect(early.winnerId).toBe("alice");
    expect(early.endedBy).toBe("bob");

    const mid = resolveMatch(record, { reason: "disconnect", playerId: "bob" }, config, at(3 * DAY));
    expect(mid.finalScores).toEqual([400, 400]);

    const late = resolveMatch(record, { reason: "disconnect", playerId: "bob" }, config, at(6.5 * DAY));
    expect(late.finalScores).toEqual([400, 450]);
  });

  it("charges both players on a timeout and names no winner", () => {
    const record = withPlayers(newMatch(), { score: 120 }, { score: 30 });
    const resolution = resolveMatch(record, { reason: "timeout" }, config, at(3 * DAY));
    expect(resolution).toEqual({
      endReason: "timeout",
      winnerId: null,
      endedBy: null,
      finalScores: [70, 0],
      adjustments: [
        { playerId: "alice", kind: "timeoutPenalty", amount: -50 },
        { playerId: "bob", kind: "timeoutPenalty", amount: -30 },
      ],
    });
  });

  it("rejects a resignation from someone outside the match", () => {
    expect(() =>
      resolveMatch(newMatch(), { reason: "resignation", playerId: "zed" }, config, at(HOUR)),
    ).toThrow(TurnRejected);
  });

  it("follows the configured amounts", () => {
    const custom = resolveMatchConfig({ resignationPenaltyMin: 0, resignationPenaltyPercent: 50 });
    const record = withPlayers(newMatch(), { score: 120 });
    const resolution = resolveMatch(record, { reason: "resignation", playerId: "alice" }, custom, at(HOUR));
    expect(resolution.finalScores).toEqual([60, 0]);
  });
});

describe("resolveMatchConfig", () => {
  it("fills in defaults", () => {
    expect(config.softTurnTimeoutMs).toBe(DAY);
    expect(config.hardTurnTimeoutMs).toBe(3 * DAY);
    expect(config.maxMatchDurationMs).toBe(7 * DAY);
    expect(config.selectionMode).toEqual({ kind: "strategic" });
  });

  it("rejects a hard limit shorter than the soft one", () => {
    expect(() => resolveMatchConfig({ softTurnTimeoutMs: 2 * DAY, hardTurnTimeoutMs: DAY })).toThrow(
      "hardTurnTimeoutMs must not be shorter than softTurnTimeoutMs",
    );
  });
});
