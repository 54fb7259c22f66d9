/**
 * Match Coordinator
 *
 * Drives every match of one local player against a MatchTransport: creates
 * the first record, applies and submits local turns, adopts incoming ones,
 * runs resync and ends matches on lock-out, resignation, disconnect or
 * timeout.
 *
 * Sub-components get only what they need: the turn machine holds a record,
 * the sync functions take records and pieces. Nothing holds a reference back
 * to the coordinator.
 */

import type {
  Grid,
  MatchHandle,
  MatchRecord,
  Move,
  PieceDescriptor,
} from "@blockduel/shared/types";
import { referencePlacementRules, type BoardBridge, type PlacementRules } from "./board.js";
import { decodeRecord, encodeRecord } from "./codec.js";
import { resolveMatchConfig, type MatchConfig, type MatchConfigInput } from "./config.js";
import {
  CorruptRecord,
  DesyncDetected,
  MatchError,
  MatchTimeout,
  TransportFailure,
  TurnRejected,
  toError,
} from "./errors.js";
import { createLogger, type Logger } from "./logger.js";
import { applyTurn, createInitial, detectTerminal, finalize, sameOutcome } from "./match-state.js";
import { isParticipant, opponentOf, playerById } from "./players.js";
import { randomSeed } from "./random.js";
import type { MatchEnd } from "./scoring.js";
import {
  emergencyPieces,
  recoveryActionFor,
  regeneratePieces,
  reseed,
  resync,
  validateSync,
} from "./sync.js";
import type { LocalIdentity, MatchTransport, TransportEvent } from "./transport.js";
import { TurnMachine, turnDeadlines, type TurnState } from "./turn-machine.js";

// Node clamps longer setTimeout delays to 1ms.
const MAX_TIMER_DELAY = 2_147_483_647;

// ===== Types =====

export interface CoordinatorOptions {
  transport: MatchTransport;
  identity: LocalIdentity;
  config?: MatchConfigInput;
  bridge?: BoardBridge;
  rules?: PlacementRules;
  clock?: () => Date;
  seedSource?: () => bigint;
  logger?: Logger;
}

export type SessionState = TurnState | "awaitingOpponent" | "awaitingFirstTurn" | "blocked";

export interface SessionSnapshot {
  matchId: string;
  state: SessionState;
  record: MatchRecord | null;
  /** Pieces to show the local player, in generation order. */
  pieces: PieceDescriptor[];
  opponentId: string | null;
  error: CorruptRecord | null;
}

interface MatchSession {
  matchId: string;
  handle: MatchHandle | null;
  machine: TurnMachine | null;
  pieces: PieceDescriptor[];
  blocked: CorruptRecord | null;
  opponentGone: boolean;
  ending: boolean;
  softNotified: boolean;
  softTimer: ReturnType<typeof setTimeout> | null;
  hardTimer: ReturnType<typeof setTimeout> | null;
}

type Listener<T extends unknown[]> = (...args: T) => void;

class ListenerSet<T extends unknown[]> {
  private items: Listener<T>[] = [];

  add(listener: Listener<T>): () => void {
    this.items.push(listener);
    return () => {
      this.items = this.items.filter((l) => l !== listener);
    };
  }

  emit(...args: T): void {
    for (const listener of this.items) listener(...args);
  }
}

// ===== Coordinator =====

export class MatchCoordinator {
  private readonly transport: MatchTransport;
  private readonly identity: LocalIdentity;
  private readonly config: MatchConfig;
  private readonly bridge: BoardBridge | null;
  private readonly rules: PlacementRules;
  private readonly clock: () => Date;
  private readonly seedSource: () => bigint;
  private readonly log: Logger;

  private sessions = new Map<string, MatchSession>();
  private unsubscribe: (() => void) | null = null;

  private readonly stateListeners = new ListenerSet<[SessionSnapshot]>();
  private readonly endedListeners = new ListenerSet<[MatchRecord]>();
  private readonly errorListeners = new ListenerSet<[Error, string | null]>();
  private readonly softTimeoutListeners = new ListenerSet<[string, string]>();

  constructor(options: CoordinatorOptions) {
    this.transport = options.transport;
    this.identity = options.identity;
    this.config = resolveMatchConfig(options.config);
    this.bridge = options.bridge ?? null;
    this.rules = options.rules ?? referencePlacementRules;
    this.clock = options.clock ?? (() => new Date());
    this.seedSource = options.seedSource ?? randomSeed;
    this.log = options.logger ?? createLogger("coordinator");
  }

  get playerId(): string {
    return this.identity.playerId;
  }

  // ----- Listeners -----

  onState(listener: Listener<[SessionSnapshot]>): () => void {
    return this.stateListeners.add(listener);
  }

  onEnded(listener: Listener<[MatchRecord]>): () => void {
    return this.endedListeners.add(listener);
  }

  onError(listener: Listener<[Error, string | null]>): () => void {
    return this.errorListeners.add(listener);
  }

  /** Fires once per turn when the soft turn limit passes. Arguments: matchId, turn holder. */
  onSoftTimeout(listener: Listener<[string, string]>): () => void {
    return this.softTimeoutListeners.add(listener);
  }

  // ----- Lifecycle -----

  /** Subscribe to transport events. Queued events are delivered by the transport. */
  connect(): void {
    if (this.unsubscribe) return;
    this.unsubscribe = this.transport.subscribe((event) => this.dispatch(event));
  }

  dispose(): void {
    this.unsubscribe?.();
    this.unsubscribe = null;
    for (const session of this.sessions.values()) this.clearTimers(session);
  }

  getSession(matchId: string): SessionSnapshot | null {
    const session = this.sessions.get(matchId);
    return session ? this.snapshot(session) : null;
  }

  listSessions(): SessionSnapshot[] {
    return [...this.sessions.values()].map((s) => this.snapshot(s));
  }

  // ===== Player operations =====

  /** Invite `opponentId`, or join or open an automatch. */
  async startMatch(opponentId?: string): Promise<SessionSnapshot> {
    if (opponentId === this.playerId) {
      throw new TurnRejected("invalid_move", "Cannot start a match against yourself");
    }
    const result = await this.transport.findMatch(opponentId);
    this.log.info({ matchId: result.match.matchId, status: result.status }, "match handle obtained");
    return this.adoptHandle(result.match);
  }

  /** Loads every active match for the local player. Corrupt payloads come back blocked. */
  async loadMatches(): Promise<SessionSnapshot[]> {
    const handles = await this.transport.loadMatches();
    return handles.map((handle) => this.adoptHandle(handle));
  }

  /**
   * Applies the local player's turn and hands the new record to the
   * transport. On failure the pre-submission record is restored and the
   * error rethrown.
   */
  async submitTurn(matchId: string, moves: Move[], board?: Grid): Promise<SessionSnapshot> {
    const session = this.requireSession(matchId);
    const machine = this.requireMachine(session);
    if (session.ending) {
      throw new TurnRejected("submission_in_flight", `Match ${matchId} is being ended`);
    }
    if (machine.state === "myTurn") this.ensureLocalSync(session, machine);

    const snapshot = machine.beginSubmit();
    try {
      const finalBoard = board ?? this.bridge?.captureBoard();
      if (!finalBoard) {
        throw new TurnRejected("invalid_board", "No board given and no engine bridge configured");
      }

      const next = applyTurn(
        snapshot,
        { playerId: this.playerId, moves, board: finalBoard },
        { seed: this.seedSource(), now: this.clock(), rules: this.rules },
      );

      const terminal = detectTerminal(next, this.config);
      const outgoing = terminal
        ? finalize(next, terminal, { config: this.config, now: this.clock() })
        : next;

      if (outgoing.ended) {
        await this.withRetries(matchId, () => this.transport.endMatch(matchId, encodeRecord(outgoing)));
      } else {
        await this.withRetries(matchId, () =>
          this.transport.submitTurn(matchId, encodeRecord(outgoing), opponentOf(outgoing, this.playerId)),
        );
      }

      // An opponent's terminal record may have landed while we were waiting.
      if (machine.state !== "submittingTurn") return this.snapshot(session);

      session.pieces = outgoing.pendingPieces;
      session.softNotified = false;
      machine.acknowledge(outgoing);
      this.log.info({ matchId, turnNumber: outgoing.turnNumber, ended: outgoing.ended }, "turn submitted");
      this.afterChange(session);
      return this.snapshot(session);
    } catch (err) {
      if (machine.state === "submittingTurn") {
        machine.fail(snapshot);
        // Re-arms a hard limit that passed while the submit was in flight.
        this.afterChange(session);
      }
      const error = toError(err);
      this.reportError(error, matchId);
      throw error;
    }
  }

  /** Adopts a record delivered by the opponent. */
  handleIncomingTurn(matchId: string, payload: string): SessionSnapshot {
    const decoded = this.decodeFor(matchId, payload);
    if (!decoded) return this.snapshot(this.requireSession(matchId));

    let record = decoded;
    const session = this.sessionFor(matchId);
    if (record.ended) return this.adoptFinal(session, record);

    const existing = session.machine;
    if (existing && this.isCurrentTurnCopy(existing, record)) {
      // Typically the relay's copy of the turn we hold, seen again after a reconnect.
      if (recoveryActionFor(existing.record, record) === "continueWithLastState") {
        this.log.debug({ matchId, turnNumber: record.turnNumber }, "record matches local turn");
        return this.snapshot(session);
      }
      this.log.warn({ matchId, turnNumber: record.turnNumber }, "relay record differs from local turn, resyncing");
      existing.amend(record);
    } else if (existing) {
      if (!existing.receive(record)) {
        this.log.debug({ matchId, turnNumber: record.turnNumber }, "ignoring stale turn");
        return this.snapshot(session);
      }
    } else {
      session.machine = this.createMachine(session, record);
    }
    session.blocked = null;
    session.softNotified = false;
    const machine = this.requireMachine(session);

    if (!validateSync(record.pendingPieces, record)) {
      this.reportError(new DesyncDetected(matchId, record.turnNumber), matchId);
      const outcome = resync({
        playerId: this.playerId,
        localPieces: session.pieces,
        record,
        reportedPieces: record.pendingPieces,
      });
      if (outcome.kind === "newSeedRequired" && record.turnHolderId === this.playerId) {
        record = reseed(record, this.playerId, {
          seed: this.seedSource(),
          now: this.clock(),
          reason: outcome.reason,
        });
        machine.amend(record);
      }
    }

    session.pieces = regeneratePieces(record);
    if (machine.state === "myTurn") {
      const mine = playerById(record, this.playerId);
      if (mine && this.bridge) this.bridge.restoreBoard(mine.board.map((row) => [...row]));
    }

    const terminal = detectTerminal(record, this.config);
    if (terminal && machine.state === "myTurn") {
      this.finishLocally(session, terminal, this.clock());
    } else {
      this.afterChange(session);
    }
    return this.snapshot(session);
  }

  /** Adopts the final record sent by the opponent. */
  handleMatchEnded(matchId: string, payload: string): SessionSnapshot {
    const record = this.decodeFor(matchId, payload);
    const session = this.sessionFor(matchId);
    if (!record) return this.snapshot(session);

    if (!record.ended) {
      this.block(session, new CorruptRecord("Final record is not marked as ended"));
      return this.snapshot(session);
    }
    return this.adoptFinal(session, record);
  }

  /** The opponent left without sending a final record. */
  opponentLeft(matchId: string): SessionSnapshot {
    const session = this.sessionFor(matchId);
    session.opponentGone = true;
    this.log.warn({ matchId }, "opponent left, awaiting hard timeout");
    this.afterChange(session);
    return this.snapshot(session);
  }

  /** Ends the match for `end` and delivers the final record. */
  async endMatch(matchId: string, end: MatchEnd): Promise<MatchRecord> {
    const session = this.requireSession(matchId);
    const machine = this.requireMachine(session);
    if (machine.state === "ended") return machine.record;
    if (machine.state === "submittingTurn" || session.ending) {
      throw new TurnRejected("submission_in_flight", `Match ${matchId} has a submission in flight`);
    }

    const final = finalize(machine.record, end, { config: this.config, now: this.clock() });
    session.ending = true;
    try {
      await this.withRetries(matchId, () =>
        end.reason === "resignation"
          ? this.transport.quitMatch(matchId, encodeRecord(final))
          : this.transport.endMatch(matchId, encodeRecord(final)),
      );
    } catch (err) {
      session.ending = false;
      this.afterChange(session);
      const error = toError(err);
      this.reportError(error, matchId);
      throw error;
    }
    session.ending = false;

    if (!machine.end(final) && !sameOutcome(machine.record, final)) {
      this.reportDispute(session.matchId, machine.record, final);
    }
    this.afterChange(session);
    return machine.record;
  }

  /** The local player gives up. */
  async resign(matchId: string): Promise<MatchRecord> {
    return this.endMatch(matchId, { reason: "resignation", playerId: this.playerId });
  }

  /**
   * Takes a final record from the other side. A match that already ended
   * here keeps its result; a different one is reported, never adopted.
   */
  private adoptFinal(session: MatchSession, record: MatchRecord): SessionSnapshot {
    session.blocked = null;
    const machine = session.machine;
    if (!machine) {
      session.machine = this.createMachine(session, record);
    } else if (!machine.end(record) && !sameOutcome(machine.record, record)) {
      this.reportDispute(session.matchId, machine.record, record);
    }
    this.afterChange(session);
    return this.snapshot(session);
  }

  private reportDispute(matchId: string, local: MatchRecord, received: MatchRecord): void {
    const error = new CorruptRecord("Final record disagrees with the local result", [
      `local ${describeOutcome(local)}`,
      `received ${describeOutcome(received)}`,
    ]);
    this.log.error({ matchId, issues: error.issues }, "disputed match result");
    this.reportError(error, matchId);
  }

  /** An unended record for the turn this device is currently on. */
  private isCurrentTurnCopy(machine: TurnMachine, record: MatchRecord): boolean {
    return (
      (machine.state === "myTurn" || machine.state === "waitingForOpponent") &&
      record.turnNumber === machine.record.turnNumber
    );
  }

  // ===== Transport events =====

  private dispatch(event: TransportEvent): void {
    switch (event.type) {
      case "match_found":
        this.adoptHandle(event.match);
        return;
      case "turn_received":
        this.handleIncomingTurn(event.matchId, event.payload);
        return;
      case "match_ended":
        this.handleMatchEnded(event.matchId, event.payload);
        return;
      case "participant_quit":
        if (event.playerId === this.playerId) return;
        if (event.payload !== null) this.handleMatchEnded(event.matchId, event.payload);
        else this.opponentLeft(event.matchId);
        return;
    }
  }

  // ===== Sessions =====

  private adoptHandle(handle: MatchHandle): SessionSnapshot {
    const session = this.sessionFor(handle.matchId);
    session.handle = handle;

    if (handle.payload !== null) {
      return handle.status === "ended"
        ? this.handleMatchEnded(handle.matchId, handle.payload)
        : this.handleIncomingTurn(handle.matchId, handle.payload);
    }

    const [first, second] = handle.participants;
    if (!session.machine && first && second && first.playerId === this.playerId) {
      // First participant owns turn one and creates the record.
      const record = createInitial({
        matchId: handle.matchId,
        player1: { playerId: first.playerId, displayName: this.identity.displayName ?? first.displayName },
        player2: second,
        seed: this.seedSource(),
        mode: this.config.selectionMode,
        now: this.clock(),
      });
      session.machine = this.createMachine(session, record);
      session.pieces = record.pendingPieces;
      this.log.info({ matchId: handle.matchId }, "created initial match record");
    }
    this.afterChange(session);
    return this.snapshot(session);
  }

  private sessionFor(matchId: string): MatchSession {
    let session = this.sessions.get(matchId);
    if (!session) {
      session = {
        matchId,
        handle: null,
        machine: null,
        pieces: [],
        blocked: null,
        opponentGone: false,
        ending: false,
        softNotified: false,
        softTimer: null,
        hardTimer: null,
      };
      this.sessions.set(matchId, session);
    }
    return session;
  }

  private requireSession(matchId: string): MatchSession {
    const session = this.sessions.get(matchId);
    if (!session) throw new TurnRejected("unknown_match", `No session for match ${matchId}`);
    return session;
  }

  private requireMachine(session: MatchSession): TurnMachine {
    if (session.blocked) throw session.blocked;
    if (!session.machine) {
      throw new TurnRejected("not_my_turn", `Match ${session.matchId} has no record yet`);
    }
    return session.machine;
  }

  private createMachine(session: MatchSession, record: MatchRecord): TurnMachine {
    const machine = TurnMachine.fromRecord(record, this.playerId);
    machine.on("transition", ({ from, to, record: next }) => {
      this.log.debug({ matchId: session.matchId, from, to, turnNumber: next.turnNumber }, "turn state");
      if (to === "ended" && from !== "ended") {
        this.clearTimers(session);
        this.endedListeners.emit(next);
      }
      this.stateListeners.emit(this.snapshot(session));
    });
    if (record.ended) this.endedListeners.emit(record);
    return machine;
  }

  private snapshot(session: MatchSession): SessionSnapshot {
    const record = session.machine?.record ?? null;
    let state: SessionState;
    if (session.blocked) state = "blocked";
    else if (session.machine) state = session.machine.state;
    else if ((session.handle?.participants.length ?? 0) < 2) state = "awaitingOpponent";
    else state = "awaitingFirstTurn";

    let opponentId: string | null = null;
    if (record) opponentId = opponentOf(record, this.playerId);
    else {
      const other = session.handle?.participants.find((p) => p.playerId !== this.playerId);
      opponentId = other?.playerId ?? null;
    }

    return {
      matchId: session.matchId,
      state,
      record,
      pieces: session.pieces,
      opponentId,
      error: session.blocked,
    };
  }

  // ===== Decoding and sync =====

  private decodeFor(matchId: string, payload: string): MatchRecord | null {
    const session = this.sessionFor(matchId);
    const result = decodeRecord(payload);
    if (!result.ok) {
      this.block(session, result.error);
      return null;
    }
    for (const warning of result.warnings) {
      this.log.warn({ matchId, field: warning.field, detail: warning.detail }, "decoded with default");
    }
    const record = result.record;
    if (record.matchId !== matchId) {
      this.block(session, new CorruptRecord(`Payload belongs to match ${record.matchId}`));
      return null;
    }
    if (!isParticipant(record, this.playerId)) {
      this.block(session, new CorruptRecord(`${this.playerId} is not a participant`));
      return null;
    }
    return record;
  }

  private block(session: MatchSession, error: CorruptRecord): void {
    session.blocked = error;
    // Keep something on screen until a valid record shows up.
    if (!session.machine) session.pieces = emergencyPieces(this.playerId).pieces;
    this.log.error({ matchId: session.matchId, issues: error.issues }, "match blocked on corrupt record");
    this.reportError(error, session.matchId);
    this.stateListeners.emit(this.snapshot(session));
  }

  /** Brings locally displayed pieces in line with the record before a submit. */
  private ensureLocalSync(session: MatchSession, machine: TurnMachine): void {
    const record = machine.record;
    if (validateSync(session.pieces, record)) return;

    const outcome = resync({ playerId: this.playerId, localPieces: session.pieces, record });
    if (outcome.kind === "newSeedRequired") {
      const next = reseed(record, this.playerId, {
        seed: this.seedSource(),
        now: this.clock(),
        reason: outcome.reason,
      });
      machine.amend(next);
      session.pieces = next.pendingPieces;
      return;
    }
    session.pieces = outcome.pieces;
  }

  // ===== Ending =====

  /** Ends the match locally and publishes the result in the background. */
  private finishLocally(session: MatchSession, end: MatchEnd, at: Date): void {
    const machine = this.requireMachine(session);
    const final = finalize(machine.record, end, { config: this.config, now: at });
    machine.end(final);
    this.publishEnd(session.matchId, final);
  }

  private publishEnd(matchId: string, final: MatchRecord): void {
    this.withRetries(matchId, () => this.transport.endMatch(matchId, encodeRecord(final))).catch((err) => {
      // The other side may already have closed the match.
      if (err instanceof TransportFailure && err.status === 409) {
        this.log.info({ matchId }, "match already closed on relay");
        return;
      }
      this.reportError(toError(err), matchId);
    });
  }

  private async withRetries(matchId: string, op: () => Promise<void>): Promise<void> {
    for (let attempt = 0; ; attempt++) {
      try {
        await op();
        return;
      } catch (err) {
        const failure =
          err instanceof MatchError ? err : new TransportFailure(toError(err).message, null, false);
        if (!failure.retryable || attempt >= this.config.submitRetries) throw failure;
        this.log.warn({ matchId, attempt: attempt + 1, err: failure.message }, "transport failed, retrying");
        await new Promise((resolve) => setTimeout(resolve, this.config.submitRetryDelayMs));
      }
    }
  }

  private reportError(error: Error, matchId: string | null): void {
    this.errorListeners.emit(error, matchId);
  }

  // ===== Timers =====

  private afterChange(session: MatchSession): void {
    this.armTimers(session);
    this.stateListeners.emit(this.snapshot(session));
  }

  private clearTimers(session: MatchSession): void {
    if (session.softTimer) clearTimeout(session.softTimer);
    if (session.hardTimer) clearTimeout(session.hardTimer);
    session.softTimer = null;
    session.hardTimer = null;
  }

  private armTimers(session: MatchSession): void {
    this.clearTimers(session);
    const machine = session.machine;
    if (!machine || machine.state === "ended" || session.blocked) return;

    const { softAt, hardAt } = turnDeadlines(machine.record, this.config);
    const now = this.clock().getTime();

    if (!session.softNotified) {
      session.softTimer = setTimeout(() => {
        session.softTimer = null;
        this.handleSoftTimeout(session);
      }, Math.min(Math.max(0, softAt - now), MAX_TIMER_DELAY));
    }
    session.hardTimer = setTimeout(() => {
      session.hardTimer = null;
      this.onHardTimeout(session);
    }, Math.min(Math.max(0, hardAt - now), MAX_TIMER_DELAY));
  }

  private handleSoftTimeout(session: MatchSession): void {
    const machine = session.machine;
    if (!machine || machine.state === "ended") return;
    const { softAt } = turnDeadlines(machine.record, this.config);
    if (this.clock().getTime() < softAt) {
      this.armTimers(session);
      return;
    }
    session.softNotified = true;
    this.log.info({ matchId: session.matchId, turnHolderId: machine.record.turnHolderId }, "soft turn limit passed");
    this.softTimeoutListeners.emit(session.matchId, machine.record.turnHolderId);
  }

  private onHardTimeout(session: MatchSession): void {
    const machine = session.machine;
    if (!machine || machine.state === "ended") return;
    const { hardAt, hardCeiling } = turnDeadlines(machine.record, this.config);
    if (this.clock().getTime() < hardAt) {
      this.armTimers(session);
      return;
    }
    // An in-flight submit or end is left alone; its outcome decides what happens next.
    if (machine.state === "submittingTurn" || session.ending) return;

    const record = machine.record;
    const end: MatchEnd = session.opponentGone
      ? { reason: "disconnect", playerId: opponentOf(record, this.playerId) }
      : { reason: "timeout" };
    this.log.warn({ matchId: session.matchId, reason: end.reason, ceiling: hardCeiling }, "hard ceiling reached");
    this.reportError(new MatchTimeout(session.matchId, hardCeiling), session.matchId);
    // Both devices end at the deadline itself so they compute the same record.
    this.finishLocally(session, end, new Date(hardAt));
  }
}

function describeOutcome(record: MatchRecord): string {
  return `${record.endReason ?? "no reason"} won by ${record.winnerId ?? "nobody"}`;
}
