import { z } from "zod";
import { selectionModeSchema } from "@blockduel/shared/schemas";

const HOUR = 60 * 60 * 1000;
const DAY = 24 * HOUR;

export const matchConfigSchema = z.object({
  selectionMode: selectionModeSchema.default({ kind: "strategic" }),
  // Turn timing. Turns may stay pending for days between devices.
  softTurnTimeoutMs: z.number().int().positive().default(DAY),
  hardTurnTimeoutMs: z.number().int().positive().default(3 * DAY),
  maxMatchDurationMs: z.number().int().positive().default(7 * DAY),
  // End conditions
  scoreLeadThreshold: z.number().int().positive().nullable().default(5000),
  // Scoring adjustments
  winBonusMin: z.number().int().nonnegative().default(10),
  winBonusDivisor: z.number().int().positive().default(20),
  resignationPenaltyMin: z.number().int().nonnegative().default(50),
  resignationPenaltyPercent: z.number().int().min(0).max(100).default(10),
  timeoutPenalty: z.number().int().nonnegative().default(50),
  disconnectPenalties: z
    .object({
      early: z.number().int().nonnegative(),
      mid: z.number().int().nonnegative(),
      late: z.number().int().nonnegative(),
    })
    .default({ early: 200, mid: 100, late: 50 }),
  // Transport
  submitRetries: z.number().int().min(0).max(10).default(3),
  submitRetryDelayMs: z.number().int().nonnegative().default(2000),
})
  .refine((c) => c.hardTurnTimeoutMs >= c.softTurnTimeoutMs, {
    message: "hardTurnTimeoutMs must not be shorter than softTurnTimeoutMs",
    path: ["hardTurnTimeoutMs"],
  });

export type MatchConfig = z.infer<typeof matchConfigSchema>;
export type MatchConfigInput = z.input<typeof matchConfigSchema>;

export function resolveMatchConfig(input: MatchConfigInput = {}): MatchConfig {
  return matchConfigSchema.parse(input);
}

export const DEFAULT_MATCH_CONFIG: MatchConfig = resolveMatchConfig();
