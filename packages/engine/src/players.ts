import type { MatchRecord, PlayerState } from "@blockduel/shared/types";

export function playerIndex(record: MatchRecord, playerId: string): 0 | 1 | -1 {
  if (record.players[0].playerId === playerId) return 0;
  if (record.players[1].playerId === playerId) return 1;
  return -1;
}

export function isParticipant(record: MatchRecord, playerId: string): boolean {
  return playerIndex(record, playerId) !== -1;
}

export function playerById(record: MatchRecord, playerId: string): PlayerState | undefined {
  return record.players.find((p) => p.playerId === playerId);
}

/** The other participant's id. Callers pass a known participant. */
export function opponentOf(record: MatchRecord, playerId: string): string {
  const [first, second] = record.players;
  return first.playerId === playerId ? second.playerId : first.playerId;
}
