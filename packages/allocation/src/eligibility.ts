/**
 * Eligibility: may this user claim right now?
 *
 * A claim record stays active until the earlier of:
 *   (i)  claimedAt + cooldownMinutes of the policy in force now
 *   (ii) cooldownExpiresAt stored on the record when it was written
 *
 * So shortening the cooldown frees users at once, while lengthening it
 * never extends a cooldown someone already started under the old value.
 *
 * remaining = max(0, claimsPerWindow − active)
 */

import { COOLDOWN_LOOKBACK_FACTOR } from "./constants.js";
import type { Policy } from "./policy.js";
import { addMinutes, secondsUntil } from "./time.js";

export interface ClaimHistoryEntry {
  claimedAt: Date;
  cooldownExpiresAt: Date;
}

export interface Eligibility {
  canClaim: boolean;
  remaining: number;
  activeClaims: number;
  /** Earliest expiry among active claims, when no claims remain. */
  cooldownEndsAt: Date | null;
}

export type BlockReason = "cooling-down" | "pool-exhausted";

export interface ClaimAssessment extends Eligibility {
  poolAvailable: boolean;
  blockedBy: BlockReason | null;
  cooldownSecondsRemaining: number;
}

type WindowPolicy = Pick<Policy, "cooldownMinutes" | "claimsPerWindow">;

/** Oldest claimedAt that can still be active under the current cooldown. */
export function lookbackStart(now: Date, cooldownMinutes: number): Date {
  return addMinutes(now, -COOLDOWN_LOOKBACK_FACTOR * cooldownMinutes);
}

export function effectiveExpiry(record: ClaimHistoryEntry, cooldownMinutes: number): Date {
  const underCurrent = addMinutes(record.claimedAt, cooldownMinutes).getTime();
  const locked = record.cooldownExpiresAt.getTime();
  return new Date(Math.min(underCurrent, locked));
}

export function evaluateEligibility(input: {
  now: Date;
  policy: WindowPolicy;
  history: readonly ClaimHistoryEntry[];
}): Eligibility {
  const { now, policy, history } = input;
  const since = lookbackStart(now, policy.cooldownMinutes).getTime();

  let active = 0;
  let earliest: number | null = null;
  for (const record of history) {
    if (record.claimedAt.getTime() < since) continue;
    const expiry = effectiveExpiry(record, policy.cooldownMinutes).getTime();
    if (now.getTime() >= expiry) continue;
    active++;
    if (earliest === null || expiry < earliest) earliest = expiry;
  }

  const remaining = Math.max(0, policy.claimsPerWindow - active);
  const canClaim = remaining > 0;

  return {
    canClaim,
    remaining,
    activeClaims: active,
    cooldownEndsAt: !canClaim && earliest !== null ? new Date(earliest) : null,
  };
}

/**
 * Combine the per-user verdict with pool availability.
 * A cooling-down user is reported as such even when the pool is also empty.
 */
export function assessClaim(input: {
  now: Date;
  policy: WindowPolicy;
  history: readonly ClaimHistoryEntry[];
  totalStock: number;
}): ClaimAssessment {
  const eligibility = evaluateEligibility(input);
  const poolAvailable = input.totalStock > 0;

  const blockedBy: BlockReason | null = !eligibility.canClaim
    ? "cooling-down"
    : !poolAvailable
      ? "pool-exhausted"
      : null;

  return {
    ...eligibility,
    canClaim: blockedBy === null,
    poolAvailable,
    blockedBy,
    cooldownSecondsRemaining: eligibility.cooldownEndsAt
      ? secondsUntil(input.now, eligibility.cooldownEndsAt)
      : 0,
  };
}
