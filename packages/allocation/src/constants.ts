/**
 * Allocation constants.
 *
 * DEFAULT_* values apply when the policy store has no entry for a key.
 * The rest are fixed rules of the engine.
 */

// ── Policy defaults ────────────────────────────────────────────────
export const DEFAULT_COOLDOWN_MINUTES = 480; // 8h
export const DEFAULT_CLAIMS_PER_WINDOW = 1;
export const DEFAULT_TIER_WEIGHT = 1; // tiers present in stock/inventory but never weighted
export const DEFAULT_ALLOCATION_MODE = "local-first" as const;
export const DEFAULT_PROBABILITY_MODE = "weight-only" as const;
export const DEFAULT_AUTO_REDEEM = false;

// ── Engine rules ───────────────────────────────────────────────────
/** History lookback = factor × current cooldown. Wide enough after a cooldown cut. */
export const COOLDOWN_LOOKBACK_FACTOR = 2;
/** Redraws after a lost stock/inventory race before reporting exhaustion. */
export const MAX_DRAW_ATTEMPTS = 3;
/** Claim history entries surfaced to the user. */
export const HISTORY_LIMIT = 10;

export const MAX_COOLDOWN_MINUTES = 366 * 24 * 60;
export const MAX_CLAIMS_PER_WINDOW = 1_000;
/** tier_stock.remaining is a Postgres integer. */
export const MAX_TIER_STOCK = 2_147_483_647;
/** Max fractional digits on a tier value (quota math stays exact). */
export const MAX_TIER_DECIMALS = 6;
