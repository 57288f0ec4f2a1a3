/**
 * Allocation policy: decoded snapshot, store encoding, admin patches.
 *
 * The policy store holds one JSON-encoded value per key plus a tier stock
 * counter per tier. A decision always runs against one decoded snapshot;
 * nothing re-reads the store mid-evaluation.
 */

import { Type, type Static, type TSchema } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";
import {
  AllocationModeV1,
  ClaimsPerWindowV1,
  CooldownMinutesV1,
  PolicyPatchV1,
  ProbabilityModeV1,
  TierWeightsV1,
  type PolicyV1,
} from "./schemas/policy.js";
import {
  DEFAULT_ALLOCATION_MODE,
  DEFAULT_AUTO_REDEEM,
  DEFAULT_CLAIMS_PER_WINDOW,
  DEFAULT_COOLDOWN_MINUTES,
  DEFAULT_PROBABILITY_MODE,
} from "./constants.js";
import { parseTierValue, type TierValue } from "./tier.js";

// ── Types ──────────────────────────────────────────────────────────

export type AllocationMode = Static<typeof AllocationModeV1>;
export type ProbabilityMode = Static<typeof ProbabilityModeV1>;
export type PolicyPatch = PolicyPatchV1;

export interface Policy {
  readonly version: number;
  readonly cooldownMinutes: number;
  readonly claimsPerWindow: number;
  readonly tierWeights: Readonly<Record<TierValue, number>>;
  readonly tierStock: Readonly<Record<TierValue, number>>;
  readonly allocationMode: AllocationMode;
  readonly probabilityMode: ProbabilityMode;
  readonly autoRedeem: boolean;
}

/** Typed value behind each policy store key. */
export interface PolicyValues {
  cooldown_minutes: number;
  claims_per_window: number;
  tier_weights: Record<TierValue, number>;
  tier_stock: Record<TierValue, number>;
  allocation_mode: AllocationMode;
  probability_mode: ProbabilityMode;
  auto_redeem: boolean;
}

export type PolicyKey = keyof PolicyValues;

/** Keys kept as settings rows. tier_stock lives in per-tier counter rows. */
export type SettingKey = Exclude<PolicyKey, "tier_stock">;

export const POLICY_KEYS: readonly PolicyKey[] = [
  "cooldown_minutes",
  "claims_per_window",
  "tier_weights",
  "tier_stock",
  "allocation_mode",
  "probability_mode",
  "auto_redeem",
];

export function isPolicyKey(key: string): key is PolicyKey {
  return POLICY_KEYS.some((k) => k === key);
}

export const DEFAULT_POLICY: Policy = {
  version: 0,
  cooldownMinutes: DEFAULT_COOLDOWN_MINUTES,
  claimsPerWindow: DEFAULT_CLAIMS_PER_WINDOW,
  tierWeights: {},
  tierStock: {},
  allocationMode: DEFAULT_ALLOCATION_MODE,
  probabilityMode: DEFAULT_PROBABILITY_MODE,
  autoRedeem: DEFAULT_AUTO_REDEEM,
};

/** Raw rows as read from the store in one consistent read. */
export interface PolicyRows {
  version: number;
  settings: Readonly<Record<string, string>>;
  stock: Readonly<Record<string, number>>;
}

export interface DecodedPolicy {
  policy: Policy;
  /** Keys whose stored value failed validation and fell back to the default. */
  invalidKeys: string[];
}

/** Settings rows + stock counters to write for one admin update. */
export interface PolicyWrite {
  settings: Partial<Record<SettingKey, string>>;
  stock: Record<TierValue, number>;
}

// ── Decode ─────────────────────────────────────────────────────────

const AutoRedeemV1 = Type.Boolean();

function decodeSetting<T extends TSchema>(
  key: SettingKey,
  schema: T,
  raw: string | undefined,
  fallback: Static<T>,
  invalidKeys: string[],
): Static<T> {
  if (raw === undefined) return fallback;
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    invalidKeys.push(key);
    return fallback;
  }
  if (!Value.Check(schema, parsed)) {
    invalidKeys.push(key);
    return fallback;
  }
  return parsed;
}

function canonicalTierMap(
  map: Readonly<Record<string, number>>,
  label: string,
  invalidKeys: string[],
): Record<TierValue, number> {
  const out: Record<TierValue, number> = {};
  for (const [key, value] of Object.entries(map)) {
    const tier = parseTierValue(key);
    if (tier === null) {
      invalidKeys.push(`${label}[${key}]`);
      continue;
    }
    out[tier] = value;
  }
  return out;
}

export function decodePolicy(rows: PolicyRows): DecodedPolicy {
  const invalidKeys: string[] = [];
  const s = rows.settings;

  const weights = decodeSetting("tier_weights", TierWeightsV1, s.tier_weights, {}, invalidKeys);

  const stock: Record<string, number> = {};
  for (const [tier, remaining] of Object.entries(rows.stock)) {
    if (Number.isSafeInteger(remaining) && remaining >= 0) {
      stock[tier] = remaining;
    } else {
      invalidKeys.push(`tier_stock[${tier}]`);
    }
  }

  const policy: Policy = {
    version: rows.version,
    cooldownMinutes: decodeSetting(
      "cooldown_minutes", CooldownMinutesV1, s.cooldown_minutes,
      DEFAULT_POLICY.cooldownMinutes, invalidKeys,
    ),
    claimsPerWindow: decodeSetting(
      "claims_per_window", ClaimsPerWindowV1, s.claims_per_window,
      DEFAULT_POLICY.claimsPerWindow, invalidKeys,
    ),
    tierWeights: canonicalTierMap(weights, "tier_weights", invalidKeys),
    tierStock: canonicalTierMap(stock, "tier_stock", invalidKeys),
    allocationMode: decodeSetting(
      "allocation_mode", AllocationModeV1, s.allocation_mode,
      DEFAULT_POLICY.allocationMode, invalidKeys,
    ),
    probabilityMode: decodeSetting(
      "probability_mode", ProbabilityModeV1, s.probability_mode,
      DEFAULT_POLICY.probabilityMode, invalidKeys,
    ),
    autoRedeem: decodeSetting(
      "auto_redeem", AutoRedeemV1, s.auto_redeem,
      DEFAULT_POLICY.autoRedeem, invalidKeys,
    ),
  };

  return { policy, invalidKeys };
}

/** Read one key's typed value off a decoded policy. */
export function policyValue<K extends PolicyKey>(policy: Policy, key: K): PolicyValues[K] {
  const values: PolicyValues = {
    cooldown_minutes: policy.cooldownMinutes,
    claims_per_window: policy.claimsPerWindow,
    tier_weights: { ...policy.tierWeights },
    tier_stock: { ...policy.tierStock },
    allocation_mode: policy.allocationMode,
    probability_mode: policy.probabilityMode,
    auto_redeem: policy.autoRedeem,
  };
  return values[key];
}

// ── Validate + encode admin patches ────────────────────────────────

function normalizeTierKeys(
  map: Readonly<Record<string, number>>,
  field: string,
): { ok: true; map: Record<TierValue, number> } | { ok: false; error: string } {
  const out: Record<TierValue, number> = {};
  for (const [key, value] of Object.entries(map)) {
    const tier = parseTierValue(key);
    if (tier === null) {
      return { ok: false, error: `${field}: invalid tier value "${key}"` };
    }
    if (tier in out) {
      return { ok: false, error: `${field}: tier "${key}" given twice (as ${tier})` };
    }
    out[tier] = value;
  }
  return { ok: true, map: out };
}

/**
 * Validate an admin policy update. Tier keys come back canonicalized.
 */
export function validatePolicyPatch(
  input: unknown,
): { valid: true; patch: PolicyPatch } | { valid: false; error: string } {
  if (!Value.Check(PolicyPatchV1, input)) {
    const first = Value.Errors(PolicyPatchV1, input).First();
    const path = first?.path ? first.path.slice(1).replace(/\//g, ".") : "policy";
    return { valid: false, error: `${path}: ${first?.message ?? "invalid policy"}` };
  }

  const patch: PolicyPatch = { ...input };
  if (Object.keys(patch).length === 0) {
    return { valid: false, error: "policy: no fields to update" };
  }

  if (input.tier_weights) {
    const res = normalizeTierKeys(input.tier_weights, "tier_weights");
    if (!res.ok) return { valid: false, error: res.error };
    patch.tier_weights = res.map;
  }
  if (input.tier_stock) {
    const res = normalizeTierKeys(input.tier_stock, "tier_stock");
    if (!res.ok) return { valid: false, error: res.error };
    patch.tier_stock = res.map;
  }

  return { valid: true, patch };
}

/**
 * Turn a validated patch into store writes. Tier weights merge per tier
 * into the current map; stock counters are upserted per tier.
 */
export function encodePolicyPatch(current: Policy, patch: PolicyPatch): PolicyWrite {
  const settings: Partial<Record<SettingKey, string>> = {};

  if (patch.cooldown_minutes !== undefined) {
    settings.cooldown_minutes = JSON.stringify(patch.cooldown_minutes);
  }
  if (patch.claims_per_window !== undefined) {
    settings.claims_per_window = JSON.stringify(patch.claims_per_window);
  }
  if (patch.tier_weights !== undefined) {
    settings.tier_weights = JSON.stringify({ ...current.tierWeights, ...patch.tier_weights });
  }
  if (patch.allocation_mode !== undefined) {
    settings.allocation_mode = JSON.stringify(patch.allocation_mode);
  }
  if (patch.probability_mode !== undefined) {
    settings.probability_mode = JSON.stringify(patch.probability_mode);
  }
  if (patch.auto_redeem !== undefined) {
    settings.auto_redeem = JSON.stringify(patch.auto_redeem);
  }

  return { settings, stock: { ...(patch.tier_stock ?? {}) } };
}

export function policyToWire(policy: Policy): PolicyV1 {
  return {
    version: policy.version,
    cooldown_minutes: policy.cooldownMinutes,
    claims_per_window: policy.claimsPerWindow,
    tier_weights: { ...policy.tierWeights },
    tier_stock: { ...policy.tierStock },
    allocation_mode: policy.allocationMode,
    probability_mode: policy.probabilityMode,
    auto_redeem: policy.autoRedeem,
  };
}
