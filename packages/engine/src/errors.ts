export type MatchErrorKind =
  | "turn_rejected"
  | "desync_detected"
  | "transport_failure"
  | "corrupt_record"
  | "timeout";

export class MatchError extends Error {
  constructor(
    public readonly kind: MatchErrorKind,
    message: string,
    public readonly retryable = false,
  ) {
    super(message);
    this.name = new.target.name;
  }
}

export type TurnRejectedReason =
  | "not_turn_holder"
  | "piece_not_pending"
  | "out_of_bounds"
  | "invalid_board"
  | "invalid_move"
  | "match_ended"
  | "submission_in_flight"
  | "not_my_turn"
  | "unknown_match"
  | "unknown_player";

/** Precondition violation. The record it was checked against is still current. */
export class TurnRejected extends MatchError {
  constructor(
    public readonly reason: TurnRejectedReason,
    message: string,
  ) {
    super("turn_rejected", message);
  }
}

export class DesyncDetected extends MatchError {
  constructor(
    public readonly matchId: string,
    public readonly turnNumber: number,
    message = "Pending pieces do not regenerate from the record seed",
  ) {
    super("desync_detected", message);
  }
}

export class TransportFailure extends MatchError {
  constructor(
    message: string,
    public readonly status: number | null = null,
    retryable = true,
  ) {
    super("transport_failure", message, retryable);
  }
}

/** Decode or validation failure. The match cannot continue until a valid record arrives. */
export class CorruptRecord extends MatchError {
  constructor(
    message: string,
    public readonly issues: string[] = [],
  ) {
    super("corrupt_record", issues.length > 0 ? `${message}: ${issues.join("; ")}` : message);
  }
}

export class MatchTimeout extends MatchError {
  constructor(
    public readonly matchId: string,
    public readonly ceiling: "turn" | "match",
  ) {
    super("timeout", `Match ${matchId} exceeded the ${ceiling} time ceiling`);
  }
}

export function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}
