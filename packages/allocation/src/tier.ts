/**
 * Tier values: exact decimal denominations.
 *
 * A tier value is carried as its canonical decimal string everywhere it is
 * used as a key (policy maps, ledger columns, wire). Binary floats never
 * touch a lookup: "0.1" and "0.10" are the same tier, 0.1 + 0.2 is not.
 */

import { MAX_TIER_DECIMALS } from "./constants.js";

export type TierValue = string;

const DECIMAL = /^(\d+)(?:\.(\d+))?$/;

/**
 * Canonicalize a tier value: strip leading integer zeros and trailing
 * fraction zeros. Returns null for anything that is not a positive decimal
 * with at most MAX_TIER_DECIMALS fractional digits.
 */
export function parseTierValue(input: string | number): TierValue | null {
  let raw: string;
  if (typeof input === "number") {
    if (!Number.isFinite(input) || input <= 0) return null;
    raw = String(input);
    if (raw.includes("e") || raw.includes("E")) return null;
  } else {
    raw = input.trim();
  }

  const match = DECIMAL.exec(raw);
  if (!match) return null;

  const intPart = (match[1] ?? "0").replace(/^0+(?=\d)/, "");
  const fracPart = (match[2] ?? "").replace(/0+$/, "");
  if (fracPart.length > MAX_TIER_DECIMALS) return null;
  if (/^0+$/.test(intPart) && fracPart.length === 0) return null;

  return fracPart.length > 0 ? `${intPart}.${fracPart}` : intPart;
}

function splitScaled(tier: TierValue): { units: bigint; scale: number } {
  const [intPart = "0", fracPart = ""] = tier.split(".");
  return {
    units: BigInt(intPart + fracPart),
    scale: fracPart.length,
  };
}

/** Numeric ordering of canonical tier values (ascending). */
export function compareTierValues(a: TierValue, b: TierValue): number {
  const x = splitScaled(a);
  const y = splitScaled(b);
  const scale = Math.max(x.scale, y.scale);
  const left = x.units * 10n ** BigInt(scale - x.scale);
  const right = y.units * 10n ** BigInt(scale - y.scale);
  return left < right ? -1 : left > right ? 1 : 0;
}

/**
 * Exact `tier × perUnit`, floored to an integer.
 * Used to turn a denomination into the ledger's integer quota.
 */
export function tierToUnits(tier: TierValue, perUnit: number): bigint {
  if (!Number.isSafeInteger(perUnit) || perUnit < 0) {
    throw new Error(`tierToUnits: perUnit must be a non-negative safe integer, got ${perUnit}`);
  }
  const { units, scale } = splitScaled(tier);
  return (units * BigInt(perUnit)) / 10n ** BigInt(scale);
}
