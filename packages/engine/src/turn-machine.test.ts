import { describe, it, expect } from "vitest";
import { resolveMatchConfig } from "./config.js";
import { TurnRejected } from "./errors.js";
import { applyTurn, finalize } from "./match-state.js";
import { reseed } from "./sync.js";
import { DAY, HOUR, T0, at, newMatch, playTurn } from "./test-utils/fixtures.js";
import { TurnMachine, checkTurnTimeout, turnDeadlines, type TransitionEvent } from "./turn-machine.js";

const config = resolveMatchConfig();

function advance(record = newMatch()) {
  return applyTurn(record, playTurn(record), { seed: 42n, now: at(HOUR) });
}

describe("TurnMachine", () => {
  it("derives its state from the record", () => {
    const record = newMatch();
    expect(TurnMachine.fromRecord(record, "alice").state).toBe("myTurn");
    expect(TurnMachine.fromRecord(record, "bob").state).toBe("waitingForOpponent");
    const ended = finalize(record, { reason: "timeout" }, { now: at(DAY) });
    expect(TurnMachine.fromRecord(ended, "bob").state).toBe("ended");
  });

  it("runs a submit through to waiting", () => {
    const machine = TurnMachine.fromRecord(newMatch(), "alice");
    const events: TransitionEvent[] = [];
    machine.on("transition", (e) => events.push(e));

    const snapshot = machine.beginSubmit();
    expect(machine.state).toBe("submittingTurn");
    const next = advance(snapshot);
    machine.acknowledge(next);

    expect(machine.state).toBe("waitingForOpponent");
    expect(machine.record).toBe(next);
    expect(events.map((e) => [e.from, e.to])).toEqual([
      ["myTurn", "submittingTurn"],
      ["submittingTurn", "waitingForOpponent"],
    ]);
  });

  it("allows one submission at a time", () => {
    const machine = TurnMachine.fromRecord(newMatch(), "alice");
    machine.beginSubmit();
    expect(() => machine.beginSubmit()).toThrow(TurnRejected);
    try {
      machine.beginSubmit();
    } catch (err) {
      expect(err instanceof TurnRejected && err.reason).toBe("submission_in_flight");
    }
  });

  it("refuses to submit out of turn", () => {
    const machine = TurnMachine.fromRecord(newMatch(), "bob");
    expect(() => machine.beginSubmit()).toThrow("Cannot submit while waitingForOpponent");
  });

  it("restores the snapshot when a submit fails", () => {
    const record = newMatch();
    const machine = TurnMachine.fromRecord(record, "alice");
    const snapshot = machine.beginSubmit();
    machine.fail(snapshot);
    expect(machine.state).toBe("myTurn");
    expect(machine.record).toBe(record);
  });

  it("takes newer records and drops stale ones", () => {
    const record = newMatch();
    const machine = TurnMachine.fromRecord(record, "bob");
    const next = advance(record);

    expect(machine.receive(next)).toBe(true);
    expect(machine.state).toBe("myTurn");
    expect(machine.receive(record)).toBe(false);
    expect(machine.receive(next)).toBe(false);
    expect(machine.receive({ ...advance(next), matchId: "other" })).toBe(false);
    expect(machine.record).toBe(next);
  });

  it("holds incoming turns while submitting, but not a final record", () => {
    const record = newMatch();
    const machine = TurnMachine.fromRecord(record, "alice");
    machine.beginSubmit();
    expect(machine.receive({ ...advance(record), turnNumber: 5 })).toBe(false);

    const final = finalize(record, { reason: "resignation", playerId: "bob" }, { now: at(HOUR) });
    expect(machine.receive(final)).toBe(true);
    expect(machine.state).toBe("ended");
    expect(machine.receive(advance(record))).toBe(false);
  });

  it("amends the current turn after a reseed", () => {
    const record = newMatch();
    const machine = TurnMachine.fromRecord(record, "alice");
    const reseeded = reseed(record, "alice", { seed: 8n, now: T0 });
    machine.amend(reseeded);
    expect(machine.record).toBe(reseeded);
    expect(machine.state).toBe("myTurn");
    expect(() => machine.amend(advance(record))).toThrow(TurnRejected);
  });

  it("stops notifying after unsubscribe", () => {
    const machine = TurnMachine.fromRecord(newMatch(), "alice");
    let calls = 0;
    const off = machine.on("transition", () => calls++);
    machine.beginSubmit();
    off();
    machine.end(finalize(newMatch(), { reason: "timeout" }, { now: at(DAY) }));
    expect(calls).toBe(1);
    expect(machine.state).toBe("ended");
  });

  it("keeps the first final record", () => {
    const machine = TurnMachine.fromRecord(newMatch(), "alice");
    const resigned = finalize(newMatch(), { reason: "resignation", playerId: "alice" }, { now: at(HOUR) });
    const timedOut = finalize(newMatch(), { reason: "timeout" }, { now: at(DAY) });
    const events: TransitionEvent[] = [];
    machine.on("transition", (e) => events.push(e));

    expect(machine.end(resigned)).toBe(true);
    expect(machine.end(timedOut)).toBe(false);
    expect(machine.record).toBe(resigned);
    expect(events).toHaveLength(1);
  });
});

describe("turn timeouts", () => {
  it("measures soft and hard limits from the last update", () => {
    const record = newMatch();
    expect(turnDeadlines(record, config)).toEqual({
      softAt: T0.getTime() + DAY,
      hardAt: T0.getTime() + 3 * DAY,
      hardCeiling: "turn",
    });
    expect(checkTurnTimeout(record, at(DAY - 1), config)).toBe("ok");
    expect(checkTurnTimeout(record, at(DAY), config)).toBe("soft");
    expect(checkTurnTimeout(record, at(3 * DAY), config)).toBe("hard");
  });

  it("caps the hard limit at the match duration", () => {
    const record = { ...newMatch(), lastUpdatedAt: at(6 * DAY).toISOString() };
    expect(turnDeadlines(record, config)).toEqual({
      softAt: T0.getTime() + 7 * DAY,
      hardAt: T0.getTime() + 7 * DAY,
      hardCeiling: "match",
    });
  });

  it("never times out an ended match", () => {
    const ended = finalize(newMatch(), { reason: "timeout" }, { now: at(DAY) });
    expect(checkTurnTimeout(ended, at(30 * DAY), config)).toBe("ok");
  });
});
