import {
  pgTable,
  uuid,
  text,
  timestamp,
  integer,
  pgEnum,
  index,
} from "drizzle-orm/pg-core";

// ===== Matches =====

export const matchStatusEnum = pgEnum("match_status", ["open", "active", "ended"]);

export const matches = pgTable(
  "matches",
  {
    id: uuid("id").primaryKey().defaultRandom(),
    status: matchStatusEnum("status").notNull().default("open"),
    playerOneId: text("player_one_id").notNull(),
    playerOneName: text("player_one_name"),
    playerTwoId: text("player_two_id"),
    playerTwoName: text("player_two_name"),
    currentParticipantId: text("current_participant_id"),
    // Encoded MatchRecord, opaque to the relay
    payload: text("payload"),
    turnCount: integer("turn_count").notNull().default(0),
    createdAt: timestamp("created_at").notNull().defaultNow(),
    updatedAt: timestamp("updated_at").notNull().defaultNow(),
  },
  (table) => [
    index("matches_status_idx").on(table.status),
    index("matches_player_one_idx").on(table.playerOneId),
    index("matches_player_two_idx").on(table.playerTwoId),
  ]
);

export type MatchRow = typeof matches.$inferSelect;
