import type { MatchRecord } from "@blockduel/shared/types";
import type { MatchConfig } from "./config.js";
import { TurnRejected } from "./errors.js";

// ===== Types =====

export type TurnState = "waitingForOpponent" | "myTurn" | "submittingTurn" | "ended";

export interface TransitionEvent {
  from: TurnState;
  to: TurnState;
  record: MatchRecord;
}

export type TransitionListener = (event: TransitionEvent) => void;

export type TimeoutStatus = "ok" | "soft" | "hard";

export interface TurnDeadlines {
  softAt: number;
  hardAt: number;
  /** Which ceiling `hardAt` comes from. */
  hardCeiling: "turn" | "match";
}

// ===== State Machine =====

/**
 * Whose turn it is for one match on this device, plus the submission
 * lifecycle. `submittingTurn` doubles as the per-match submit mutex.
 */
export class TurnMachine {
  private current: MatchRecord;
  private phase: TurnState;
  private listeners: TransitionListener[] = [];

  constructor(
    readonly localPlayerId: string,
    record: MatchRecord,
  ) {
    this.current = record;
    this.phase = this.derive(record);
  }

  static fromRecord(record: MatchRecord, localPlayerId: string): TurnMachine {
    return new TurnMachine(localPlayerId, record);
  }

  get state(): TurnState {
    return this.phase;
  }

  get record(): MatchRecord {
    return this.current;
  }

  on(_event: "transition", listener: TransitionListener): () => void {
    this.listeners.push(listener);
    return () => {
      this.listeners = this.listeners.filter((l) => l !== listener);
    };
  }

  /** MyTurn → SubmittingTurn. Returns the snapshot to restore if the submit fails. */
  beginSubmit(): MatchRecord {
    if (this.phase === "submittingTurn") {
      throw new TurnRejected("submission_in_flight", `A turn for ${this.current.matchId} is already being submitted`);
    }
    if (this.phase !== "myTurn") {
      throw new TurnRejected("not_my_turn", `Cannot submit while ${this.phase}`);
    }
    const snapshot = this.current;
    this.transition("submittingTurn", snapshot);
    return snapshot;
  }

  /** SubmittingTurn → WaitingForOpponent (or Ended) once the transport accepted `next`. */
  acknowledge(next: MatchRecord): void {
    this.expect("submittingTurn");
    this.transition(this.derive(next), next);
  }

  /** SubmittingTurn → MyTurn with the pre-submission record restored. */
  fail(snapshot: MatchRecord): void {
    this.expect("submittingTurn");
    this.transition("myTurn", snapshot);
  }

  /**
   * Adopts a record delivered by the opponent. Stale or out-of-order
   * records are dropped; terminal ones are always taken.
   */
  receive(next: MatchRecord): boolean {
    if (this.phase === "ended" || next.matchId !== this.current.matchId) return false;
    if (next.ended) {
      this.transition("ended", next);
      return true;
    }
    if (this.phase === "submittingTurn") return false;
    if (next.turnNumber <= this.current.turnNumber) return false;
    this.transition(this.derive(next), next);
    return true;
  }

  /** Replaces the record for the current turn, e.g. after a reseed. */
  amend(next: MatchRecord): void {
    if (next.matchId !== this.current.matchId || next.turnNumber !== this.current.turnNumber) {
      throw new TurnRejected("invalid_move", "An amended record must keep the match and turn number");
    }
    if (this.phase === "ended" || this.phase === "submittingTurn") {
      throw new TurnRejected("not_my_turn", `Cannot amend while ${this.phase}`);
    }
    this.transition(this.derive(next), next);
  }

  /**
   * Any state → Ended. The first terminal record is kept: returns false and
   * changes nothing once the machine has ended.
   */
  end(final: MatchRecord): boolean {
    if (this.phase === "ended") return false;
    this.transition("ended", final);
    return true;
  }

  private derive(record: MatchRecord): TurnState {
    if (record.ended) return "ended";
    return record.turnHolderId === this.localPlayerId ? "myTurn" : "waitingForOpponent";
  }

  private expect(state: TurnState): void {
    if (this.phase !== state) {
      throw new TurnRejected("not_my_turn", `Expected ${state}, machine is ${this.phase}`);
    }
  }

  private transition(to: TurnState, record: MatchRecord): void {
    const from = this.phase;
    this.phase = to;
    this.current = record;
    for (const listener of this.listeners) {
      listener({ from, to, record });
    }
  }
}

// ===== Timeouts =====

export function turnDeadlines(record: MatchRecord, config: MatchConfig): TurnDeadlines {
  const turnStart = Date.parse(record.lastUpdatedAt);
  const turnCeiling = turnStart + config.hardTurnTimeoutMs;
  const matchCeiling = Date.parse(record.startedAt) + config.maxMatchDurationMs;
  return {
    softAt: turnStart + config.softTurnTimeoutMs,
    hardAt: Math.min(turnCeiling, matchCeiling),
    hardCeiling: matchCeiling < turnCeiling ? "match" : "turn",
  };
}

export function checkTurnTimeout(record: MatchRecord, now: Date, config: MatchConfig): TimeoutStatus {
  if (record.ended) return "ok";
  const { softAt, hardAt } = turnDeadlines(record, config);
  const t = now.getTime();
  if (t >= hardAt) return "hard";
  if (t >= softAt) return "soft";
  return "ok";
}
