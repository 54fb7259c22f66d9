import { describe, it, expect } from "vitest";
import { TurnRejected } from "./errors.js";
import { applyTurn, finalize, validate } from "./match-state.js";
import { generatePieces } from "./piece-generator.js";
import {
  emergencyPieces,
  recoveryActionFor,
  regeneratePieces,
  reseed,
  resync,
  validateSync,
} from "./sync.js";
import { DAY, HOUR, T0, at, newMatch, playTurn } from "./test-utils/fixtures.js";

describe("validateSync", () => {
  it("accepts the pieces the seed produces, in order", () => {
    const record = newMatch();
    expect(regeneratePieces(record)).toEqual(record.pendingPieces);
    expect(validateSync(record.pendingPieces, record)).toBe(true);

    const [a, b, c] = record.pendingPieces;
    expect(validateSync([b, a, c], record)).toBe(false);
    expect(validateSync([a, b], record)).toBe(false);
  });

  it("holds after every applied turn", () => {
    let record = newMatch();
    for (let i = 0; i < 5; i++) {
      record = applyTurn(record, playTurn(record), { seed: BigInt(1000 + i), now: T0 });
      expect(validateSync(record.pendingPieces, record)).toBe(true);
    }
  });
});

describe("emergencyPieces", () => {
  it("derives pieces from the player id", () => {
    const { seed, pieces } = emergencyPieces("alice");
    expect(seed).toBe(5803779529149266183n);
    expect(pieces.map((p) => `${p.shape}/${p.color}`)).toEqual([
      "lShapeReversed/green",
      "tShapeDown/blue",
      "stick5Vert/yellow",
    ]);
  });
});

describe("resync", () => {
  it("falls back to emergency pieces without a record", () => {
    const outcome = resync({ playerId: "alice", localPieces: [], record: null });
    expect(outcome).toEqual({ kind: "emergency", ...emergencyPieces("alice") });
  });

  it("falls back to emergency pieces for an invalid record", () => {
    const outcome = resync({ playerId: "bob", localPieces: [], record: { ...newMatch(), turnNumber: 0 } });
    expect(outcome.kind).toBe("emergency");
  });

  it("reports an up-to-date device as synced", () => {
    const record = newMatch();
    const outcome = resync({ playerId: "bob", localPieces: record.pendingPieces, record });
    expect(outcome).toEqual({ kind: "alreadySynced", pieces: record.pendingPieces });
  });

  it("regenerates stale local pieces from the record", () => {
    const record = newMatch();
    const stale = generatePieces(1n, 1, { kind: "uniform" });
    const outcome = resync({ playerId: "bob", localPieces: stale, record });
    expect(outcome).toEqual({ kind: "regenerated", pieces: record.pendingPieces });
  });

  it("asks for a new seed when the opponent saw different pieces", () => {
    const record = newMatch();
    const [a, b, c] = record.pendingPieces;
    const outcome = resync({
      playerId: "alice",
      localPieces: record.pendingPieces,
      record,
      reportedPieces: [c, b, a],
    });
    expect(outcome).toEqual({
      kind: "newSeedRequired",
      pieces: record.pendingPieces,
      reason: "turn 1: opponent pieces differ from seed 12345",
    });
  });
});

describe("reseed", () => {
  it("replaces the seed for the current turn and logs the incident", () => {
    const record = newMatch();
    const next = reseed(record, "alice", { seed: 555n, now: at(HOUR) });

    expect(next.turnNumber).toBe(1);
    expect(next.randomSeed).toBe("555");
    expect(next.pendingPieces).toEqual(generatePieces(555n, 1, { kind: "uniform" }));
    expect(next.lastUpdatedAt).toBe("2026-01-05T13:00:00.000Z");
    expect(next.syncIncidents).toEqual([
      {
        turnNumber: 1,
        reportedBy: "alice",
        reason: "piece desync",
        previousSeed: "12345",
        at: "2026-01-05T13:00:00.000Z",
      },
    ]);
    expect(validate(next).valid).toBe(true);
    expect(validateSync(next.pendingPieces, next)).toBe(true);
  });

  it("is reserved for the turn holder of a live match", () => {
    expect(() => reseed(newMatch(), "bob", { seed: 1n })).toThrow(TurnRejected);
    const ended = finalize(newMatch(), { reason: "timeout" }, { now: at(DAY) });
    expect(() => reseed(ended, "alice", { seed: 1n })).toThrow(/already ended/);
  });
});

describe("recoveryActionFor", () => {
  it("continues when both sides agree", () => {
    const record = newMatch();
    expect(recoveryActionFor(record, { ...record })).toBe("continueWithLastState");
  });

  it("asks for a full resync on any disagreement", () => {
    const record = newMatch();
    const advanced = applyTurn(record, playTurn(record), { seed: 3n, now: T0 });
    expect(recoveryActionFor(record, advanced)).toBe("requestFullResync");
    expect(recoveryActionFor(record, { ...record, matchId: "match-2" })).toBe("requestFullResync");
    expect(recoveryActionFor(record, reseed(record, "alice", { seed: 9n, now: T0 }))).toBe("requestFullResync");

    const [a, b, c] = record.pendingPieces;
    expect(recoveryActionFor({ ...record, pendingPieces: [c, b, a] }, record)).toBe("requestFullResync");
  });
});
