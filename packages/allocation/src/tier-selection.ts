/**
 * Tier selection: stock-aware weighted draw.
 *
 * effectiveStock(t) = max(local unclaimed, virtual)   local-first
 *                   = virtual                          mint-only
 *
 * selectionWeight(t) = w                     weight-only
 *                    = w × effectiveStock    weight-times-stock
 *
 * A tier with effectiveStock ≤ 0 (or weight ≤ 0) is out of the draw.
 * Read-only: the draw never mutates policy or counts.
 */

import { DEFAULT_TIER_WEIGHT } from "./constants.js";
import type { Policy } from "./policy.js";
import { mathRandom, type RandomSource } from "./rng.js";
import { compareTierValues, type TierValue } from "./tier.js";

/** Unclaimed local pool entries per tier. */
export type LocalCounts = Readonly<Record<TierValue, number>>;

export interface TierAvailability {
  tier: TierValue;
  weight: number;
  virtualStock: number;
  localStock: number;
  effectiveStock: number;
  selectionWeight: number;
}

type DrawPolicy = Pick<Policy, "tierWeights" | "tierStock" | "allocationMode" | "probabilityMode">;

export function tierAvailability(policy: DrawPolicy, local: LocalCounts): TierAvailability[] {
  const localFirst = policy.allocationMode === "local-first";

  const tiers = new Set<TierValue>([
    ...Object.keys(policy.tierWeights),
    ...Object.keys(policy.tierStock),
    ...(localFirst ? Object.keys(local) : []),
  ]);

  return [...tiers].sort(compareTierValues).map((tier) => {
    const weight = policy.tierWeights[tier] ?? DEFAULT_TIER_WEIGHT;
    const virtualStock = Math.max(0, policy.tierStock[tier] ?? 0);
    const localStock = localFirst ? Math.max(0, local[tier] ?? 0) : 0;
    const effectiveStock = localFirst ? Math.max(localStock, virtualStock) : virtualStock;

    let selectionWeight = 0;
    if (effectiveStock > 0 && weight > 0) {
      selectionWeight = policy.probabilityMode === "weight-only" ? weight : weight * effectiveStock;
    }

    return { tier, weight, virtualStock, localStock, effectiveStock, selectionWeight };
  });
}

/** Units awardable right now across every drawable tier. */
export function totalEffectiveStock(availability: readonly TierAvailability[]): number {
  return availability
    .filter((t) => t.selectionWeight > 0)
    .reduce((sum, t) => sum + t.effectiveStock, 0);
}

/**
 * Draw one tier. Returns null when no tier can be fulfilled.
 */
export function drawTier(
  policy: DrawPolicy,
  local: LocalCounts,
  random: RandomSource = mathRandom,
): TierValue | null {
  const candidates = tierAvailability(policy, local).filter((t) => t.selectionWeight > 0);
  if (candidates.length === 0) return null;

  const total = candidates.reduce((sum, t) => sum + t.selectionWeight, 0);
  let roll = random.next() * total;
  for (const candidate of candidates) {
    roll -= candidate.selectionWeight;
    if (roll < 0) return candidate.tier;
  }
  // float residue when roll lands on the upper edge
  return candidates[candidates.length - 1]?.tier ?? null;
}
