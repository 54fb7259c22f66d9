import "dotenv/config";
import { z } from "zod";

const envSchema = z.object({
  PORT: z.coerce.number().default(3600),
  HOST: z.string().default("0.0.0.0"),
  DATABASE_URL: z.string(),
  REDIS_URL: z.string(),
  CORS_ORIGIN: z.string().default("http://localhost:3000"),
  // Encoded MatchRecords are small; anything larger is not a match payload.
  MAX_PAYLOAD_BYTES: z.coerce.number().int().positive().default(1024 * 1024),
  PENDING_EVENT_TTL_SECONDS: z.coerce.number().int().positive().default(7 * 24 * 60 * 60),
});

export type Env = z.infer<typeof envSchema>;

export const env = envSchema.parse(process.env);
