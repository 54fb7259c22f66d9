import type { MatchRecord, PlayerState } from "@blockduel/shared/types";
import { MATCH_FORMAT_VERSION } from "@blockduel/shared/types";
import { matchRecordSchema, type MatchRecordWire } from "@blockduel/shared/schemas";
import { DEFAULT_MATCH_CONFIG } from "./config.js";
import { CorruptRecord } from "./errors.js";
import { validate } from "./match-state.js";

export interface DecodeWarning {
  kind: "usedDefault";
  field: string;
  detail: string;
}

export type DecodeResult =
  | { ok: true; record: MatchRecord; warnings: DecodeWarning[] }
  | { ok: false; error: CorruptRecord };

const encoder = new TextEncoder();

export function encodeRecord(record: MatchRecord): string {
  return JSON.stringify(record);
}

export function encodeRecordBytes(record: MatchRecord): Uint8Array {
  return encoder.encode(encodeRecord(record));
}

function fail(message: string, issues: string[] = []): DecodeResult {
  return { ok: false, error: new CorruptRecord(message, issues) };
}

function toPlayer(
  wire: MatchRecordWire["players"][number],
  index: number,
  warnings: DecodeWarning[],
): PlayerState {
  if (wire.displayName === undefined) {
    warnings.push({
      kind: "usedDefault",
      field: `players[${index}].displayName`,
      detail: "missing, using null",
    });
  }
  return {
    playerId: wire.playerId,
    displayName: wire.displayName ?? null,
    score: wire.score,
    board: wire.board,
    isBoardLocked: wire.isBoardLocked,
    moveHistory: wire.moveHistory,
  };
}

/**
 * Decodes a serialized MatchRecord. Unknown versions, schema violations and
 * failed structural validation all come back as CorruptRecord; nothing is
 * guessed. Optional fields that were absent are filled in and listed in
 * `warnings`.
 */
export function decodeRecord(payload: string | Uint8Array): DecodeResult {
  let text: string;
  try {
    text = typeof payload === "string" ? payload : new TextDecoder("utf-8", { fatal: true }).decode(payload);
  } catch {
    return fail("Payload is not valid UTF-8");
  }

  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch {
    return fail("Payload is not valid JSON");
  }

  if (typeof raw !== "object" || raw === null || !("formatVersion" in raw)) {
    return fail("Payload has no formatVersion");
  }
  if (raw.formatVersion !== MATCH_FORMAT_VERSION) {
    return fail(`Unsupported formatVersion ${String(raw.formatVersion)}`, [
      `expected ${MATCH_FORMAT_VERSION}`,
    ]);
  }

  const parsed = matchRecordSchema.safeParse(raw);
  if (!parsed.success) {
    return fail(
      "Payload does not match the MatchRecord schema",
      parsed.error.issues.map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`),
    );
  }

  const wire = parsed.data;
  const warnings: DecodeWarning[] = [];

  if (wire.selectionMode === undefined) {
    warnings.push({
      kind: "usedDefault",
      field: "selectionMode",
      detail: `missing, using ${DEFAULT_MATCH_CONFIG.selectionMode.kind}`,
    });
  }
  if (wire.syncIncidents === undefined) {
    warnings.push({ kind: "usedDefault", field: "syncIncidents", detail: "missing, using []" });
  }

  const record: MatchRecord = {
    formatVersion: wire.formatVersion,
    matchId: wire.matchId,
    players: [toPlayer(wire.players[0], 0, warnings), toPlayer(wire.players[1], 1, warnings)],
    turnHolderId: wire.turnHolderId,
    turnNumber: wire.turnNumber,
    randomSeed: wire.randomSeed,
    selectionMode: wire.selectionMode ?? DEFAULT_MATCH_CONFIG.selectionMode,
    pendingPieces: wire.pendingPieces,
    startedAt: wire.startedAt,
    lastUpdatedAt: wire.lastUpdatedAt,
    ended: wire.ended,
    winnerId: wire.winnerId,
    endReason: wire.endReason,
    endedBy: wire.endedBy,
    endedAt: wire.endedAt,
    syncIncidents: wire.syncIncidents ?? [],
  };

  const { valid, issues } = validate(record);
  if (!valid) return fail("MatchRecord failed validation", issues);

  return { ok: true, record, warnings };
}
