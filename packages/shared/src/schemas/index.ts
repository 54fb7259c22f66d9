import { z } from "zod";
import { BOARD_SIZE, COLOR_NAMES, SHAPE_IDS } from "../types/index.js";

export const MAX_SEED = 18446744073709551615n;

// ===== Pieces =====
export const colorNameSchema = z.enum(COLOR_NAMES);

export const shapeIdSchema = z.enum(SHAPE_IDS);

export const cellPositionSchema = z.object({
  row: z.number().int(),
  column: z.number().int(),
});

export const pieceDescriptorSchema = z.object({
  shape: shapeIdSchema,
  color: colorNameSchema,
  cells: z.array(cellPositionSchema).min(1).max(9),
});

export const selectionModeSchema = z.discriminatedUnion("kind", [
  z.object({ kind: z.literal("uniform") }),
  z.object({ kind: z.literal("strategic") }),
  z.object({ kind: z.literal("skewed"), difficulty: z.number().int().min(0).max(10) }),
]);

// ===== Board =====
export const cellSchema = colorNameSchema.nullable();

export const gridSchema = z
  .array(z.array(cellSchema).length(BOARD_SIZE))
  .length(BOARD_SIZE);

// ===== Match Record =====
export const seedSchema = z
  .string()
  .regex(/^\d{1,20}$/, "Seed must be an unsigned decimal integer")
  .refine((s) => BigInt(s) <= MAX_SEED, "Seed must fit in 64 bits");

const isoTimestampSchema = z.string().datetime({ offset: true });

export const moveSchema = z.object({
  piece: pieceDescriptorSchema,
  origin: cellPositionSchema,
  scoreDelta: z.number().int().nonnegative(),
  linesCleared: z.number().int().nonnegative(),
  timestamp: isoTimestampSchema,
});

export const endReasonSchema = z.enum([
  "lockout",
  "resignation",
  "disconnect",
  "timeout",
  "scoreLead",
]);

export const syncIncidentSchema = z.object({
  turnNumber: z.number().int().positive(),
  reportedBy: z.string().min(1),
  reason: z.string(),
  previousSeed: seedSchema,
  at: isoTimestampSchema,
});

/**
 * Wire shape of a player. `displayName` may be missing from older
 * payloads; the codec reports the default it substitutes.
 */
export const playerStateSchema = z.object({
  playerId: z.string().min(1),
  displayName: z.string().nullable().optional(),
  score: z.number().int(),
  board: z.array(z.array(cellSchema)),
  isBoardLocked: z.boolean(),
  moveHistory: z.array(moveSchema),
});

/**
 * Wire shape of a MatchRecord. Sizes that `validate` reports as named
 * issues (board dimensions, piece count, score sign) are left loose here.
 */
export const matchRecordSchema = z.object({
  formatVersion: z.string(),
  matchId: z.string(),
  players: z.tuple([playerStateSchema, playerStateSchema]),
  turnHolderId: z.string(),
  turnNumber: z.number().int(),
  randomSeed: seedSchema,
  selectionMode: selectionModeSchema.optional(),
  pendingPieces: z.array(pieceDescriptorSchema),
  startedAt: isoTimestampSchema,
  lastUpdatedAt: isoTimestampSchema,
  ended: z.boolean(),
  winnerId: z.string().nullable(),
  endReason: endReasonSchema.nullable(),
  endedBy: z.string().nullable(),
  endedAt: isoTimestampSchema.nullable(),
  syncIncidents: z.array(syncIncidentSchema).optional(),
});

export type MatchRecordWire = z.infer<typeof matchRecordSchema>;

// ===== Relay API =====
export const findMatchSchema = z.object({
  opponentId: z.string().min(1).max(200).optional(),
  displayName: z.string().max(100).optional(),
});

export const submitTurnSchema = z.object({
  payload: z.string().min(1),
  nextParticipantId: z.string().min(1),
});

export const endMatchSchema = z.object({
  payload: z.string().min(1),
});

export const quitMatchSchema = z.object({
  payload: z.string().min(1).optional(),
});

// ===== Relay WebSocket =====
export const relayClientEventSchema = z.discriminatedUnion("type", [
  z.object({ type: z.literal("ping") }),
]);

export const matchHandleSchema = z.object({
  matchId: z.string(),
  status: z.enum(["open", "active", "ended"]),
  participants: z.array(
    z.object({ playerId: z.string(), displayName: z.string().nullable() })
  ),
  currentParticipantId: z.string().nullable(),
  payload: z.string().nullable(),
  turnCount: z.number().int().nonnegative(),
  createdAt: z.string(),
  updatedAt: z.string(),
});

export const relayServerEventSchema = z.discriminatedUnion("type", [
  z.object({ type: z.literal("match_found"), match: matchHandleSchema }),
  z.object({
    type: z.literal("turn_received"),
    matchId: z.string(),
    payload: z.string(),
    fromPlayerId: z.string(),
  }),
  z.object({
    type: z.literal("match_ended"),
    matchId: z.string(),
    payload: z.string(),
    fromPlayerId: z.string(),
  }),
  z.object({
    type: z.literal("participant_quit"),
    matchId: z.string(),
    playerId: z.string(),
    payload: z.string().nullable(),
  }),
  z.object({ type: z.literal("pong") }),
]);

export const findMatchResponseSchema = z.discriminatedUnion("status", [
  z.object({ status: z.literal("queued"), match: matchHandleSchema }),
  z.object({ status: z.literal("matched"), match: matchHandleSchema }),
]);
