import type { FindMatchResponse, MatchHandle } from "@blockduel/shared/types";

export type TransportEvent =
  | { type: "match_found"; match: MatchHandle }
  | { type: "turn_received"; matchId: string; payload: string; fromPlayerId: string }
  | { type: "match_ended"; matchId: string; payload: string; fromPlayerId: string }
  | { type: "participant_quit"; matchId: string; playerId: string; payload: string | null };

export type TransportListener = (event: TransportEvent) => void;

/**
 * Store-and-forward turn exchange between the two devices of a match.
 * Payloads are encoded MatchRecords and are opaque to the transport.
 * Implementations reject with TransportFailure.
 */
export interface MatchTransport {
  /** Invite `opponentId`, or join or open an automatch when omitted. */
  findMatch(opponentId?: string): Promise<FindMatchResponse>;
  loadMatches(): Promise<MatchHandle[]>;
  submitTurn(matchId: string, payload: string, nextParticipantId: string): Promise<void>;
  endMatch(matchId: string, payload: string): Promise<void>;
  quitMatch(matchId: string, payload: string | null): Promise<void>;
  /** Also delivers events queued while this client was offline. */
  subscribe(listener: TransportListener): () => void;
}

/** Stable identity from the host's identity provider. */
export interface LocalIdentity {
  playerId: string;
  displayName: string | null;
}
