/**
 * Drizzle table definitions. Must match migrations/0001_init.sql.
 */

import { sql } from "drizzle-orm";
import {
  bigserial,
  boolean,
  check,
  index,
  integer,
  pgTable,
  text,
  timestamp,
  uuid,
} from "drizzle-orm/pg-core";

export const poolEntries = pgTable(
  "pool_entries",
  {
    id: uuid("id").primaryKey().defaultRandom(),
    code: text("code").notNull().unique(),
    tierValue: text("tier_value").notNull(), // canonical decimal string
    claimed: boolean("claimed").notNull().default(false),
    claimedBy: text("claimed_by"),
    claimedAt: timestamp("claimed_at", { withTimezone: true }),
    source: text("source", { enum: ["manual", "minted"] }).notNull(),
    createdAt: timestamp("created_at", { withTimezone: true }).notNull().defaultNow(),
  },
  (t) => [index("pool_entries_tier_claimed_idx").on(t.tierValue, t.claimed, t.createdAt)],
);

export const claimRecords = pgTable(
  "claim_records",
  {
    id: bigserial("id", { mode: "number" }).primaryKey(),
    userId: text("user_id").notNull(),
    username: text("username").notNull(),
    code: text("code").notNull(),
    tierValue: text("tier_value").notNull(),
    claimedAt: timestamp("claimed_at", { withTimezone: true }).notNull(),
    cooldownExpiresAt: timestamp("cooldown_expires_at", { withTimezone: true }).notNull(),
    autoRedeemed: boolean("auto_redeemed").notNull().default(false),
  },
  (t) => [index("claim_records_user_claimed_idx").on(t.userId, t.claimedAt)],
);

/** One JSON-encoded value per policy key. */
export const policySettings = pgTable("policy_settings", {
  key: text("key").primaryKey(),
  value: text("value").notNull(),
  version: integer("version").notNull(),
});

export const tierStock = pgTable(
  "tier_stock",
  {
    tierValue: text("tier_value").primaryKey(),
    remaining: integer("remaining").notNull(),
    version: integer("version").notNull(),
  },
  (t) => [check("tier_stock_remaining_nonneg", sql`${t.remaining} >= 0`)],
);

export type PoolEntryRow = typeof poolEntries.$inferSelect;
export type ClaimRecordRow = typeof claimRecords.$inferSelect;
