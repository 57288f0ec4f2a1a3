import { describe, it, expect } from "vitest";
import { MAX_TIER_STOCK } from "../../src/constants.js";
import {
  DEFAULT_POLICY,
  decodePolicy,
  encodePolicyPatch,
  isPolicyKey,
  policyToWire,
  policyValue,
  validatePolicyPatch,
  type Policy,
} from "../../src/policy.js";

// ── Decode ─────────────────────────────────────────────────────────

describe("decodePolicy", () => {
  it("falls back to defaults on an empty store", () => {
    const { policy, invalidKeys } = decodePolicy({ version: 0, settings: {}, stock: {} });
    expect(policy).toEqual(DEFAULT_POLICY);
    expect(invalidKeys).toEqual([]);
  });

  it("decodes stored JSON values and canonicalizes tier keys", () => {
    const { policy, invalidKeys } = decodePolicy({
      version: 7,
      settings: {
        cooldown_minutes: "60",
        claims_per_window: "2",
        tier_weights: '{"1":50,"100.0":1}',
        allocation_mode: '"mint-only"',
        probability_mode: '"weight-times-stock"',
        auto_redeem: "true",
      },
      stock: { "100": 3 },
    });

    expect(invalidKeys).toEqual([]);
    expect(policy).toEqual({
      version: 7,
      cooldownMinutes: 60,
      claimsPerWindow: 2,
      tierWeights: { "1": 50, "100": 1 },
      tierStock: { "100": 3 },
      allocationMode: "mint-only",
      probabilityMode: "weight-times-stock",
      autoRedeem: true,
    });
  });

  it("reports bad values and uses the default for each", () => {
    const { policy, invalidKeys } = decodePolicy({
      version: 1,
      settings: {
        cooldown_minutes: "0",
        tier_weights: "not json",
        allocation_mode: '"round-robin"',
      },
      stock: { "5": -2, abc: 4 },
    });

    expect(policy.cooldownMinutes).toBe(480);
    expect(policy.tierWeights).toEqual({});
    expect(policy.allocationMode).toBe("local-first");
    expect(policy.tierStock).toEqual({});
    expect(invalidKeys).toEqual([
      "tier_weights",
      "tier_stock[5]",
      "cooldown_minutes",
      "tier_stock[abc]",
      "allocation_mode",
    ]);
  });
});

describe("policyValue", () => {
  it("reads typed values by store key", () => {
    expect(policyValue(DEFAULT_POLICY, "cooldown_minutes")).toBe(480);
    expect(policyValue(DEFAULT_POLICY, "allocation_mode")).toBe("local-first");
    expect(policyValue(DEFAULT_POLICY, "tier_weights")).toEqual({});
  });

  it("isPolicyKey knows every store key", () => {
    expect(isPolicyKey("tier_stock")).toBe(true);
    expect(isPolicyKey("tierStock")).toBe(false);
  });
});

// ── Validate ───────────────────────────────────────────────────────

describe("validatePolicyPatch", () => {
  it("accepts a partial update", () => {
    expect(validatePolicyPatch({ cooldown_minutes: 60 })).toEqual({
      valid: true,
      patch: { cooldown_minutes: 60 },
    });
  });

  it("rejects negative weights with the field path", () => {
    const res = validatePolicyPatch({ tier_weights: { "1": -1 } });
    expect(res.valid).toBe(false);
    if (!res.valid) expect(res.error).toMatch(/^tier_weights/);
  });

  it("rejects a stock count beyond the integer column range", () => {
    expect(validatePolicyPatch({ tier_stock: { "1": MAX_TIER_STOCK } }).valid).toBe(true);
    const res = validatePolicyPatch({ tier_stock: { "1": 3_000_000_000 } });
    expect(res.valid).toBe(false);
    if (!res.valid) expect(res.error).toMatch(/^tier_stock/);
  });

  it("rejects a fractional claims_per_window", () => {
    expect(validatePolicyPatch({ claims_per_window: 1.5 }).valid).toBe(false);
  });

  it("rejects unknown fields", () => {
    expect(validatePolicyPatch({ foo: 1 }).valid).toBe(false);
  });

  it("rejects non-object input", () => {
    expect(validatePolicyPatch("cooldown_minutes=5").valid).toBe(false);
    expect(validatePolicyPatch(null).valid).toBe(false);
  });

  it("rejects an empty patch", () => {
    expect(validatePolicyPatch({})).toEqual({
      valid: false,
      error: "policy: no fields to update",
    });
  });

  it("canonicalizes tier keys", () => {
    const res = validatePolicyPatch({ tier_weights: { "01.0": 5 }, tier_stock: { "2.50": 4 } });
    expect(res).toEqual({
      valid: true,
      patch: { tier_weights: { "1": 5 }, tier_stock: { "2.5": 4 } },
    });
  });

  it("rejects a tier given twice under different spellings", () => {
    const res = validatePolicyPatch({ tier_weights: { "1": 1, "1.0": 2 } });
    expect(res.valid).toBe(false);
    if (!res.valid) expect(res.error).toContain("given twice");
  });

  it("rejects a non-decimal tier key", () => {
    const res = validatePolicyPatch({ tier_stock: { gold: 1 } });
    expect(res).toEqual({ valid: false, error: 'tier_stock: invalid tier value "gold"' });
  });
});

// ── Encode ─────────────────────────────────────────────────────────

describe("encodePolicyPatch", () => {
  const current: Policy = { ...DEFAULT_POLICY, tierWeights: { "1": 50 } };

  it("merges tier weights per tier and JSON-encodes settings", () => {
    const write = encodePolicyPatch(current, { tier_weights: { "5": 2 }, cooldown_minutes: 60 });
    expect(write).toEqual({
      settings: { cooldown_minutes: "60", tier_weights: '{"1":50,"5":2}' },
      stock: {},
    });
  });

  it("overrides an existing weight, including to zero", () => {
    const write = encodePolicyPatch(current, { tier_weights: { "1": 0 } });
    expect(write.settings.tier_weights).toBe('{"1":0}');
  });

  it("passes stock counters through as upserts", () => {
    const write = encodePolicyPatch(current, { tier_stock: { "100": 3 }, auto_redeem: true });
    expect(write).toEqual({ settings: { auto_redeem: "true" }, stock: { "100": 3 } });
  });

  it("round-trips through decode", () => {
    const write = encodePolicyPatch(DEFAULT_POLICY, {
      allocation_mode: "mint-only",
      tier_weights: { "10": 3 },
      tier_stock: { "10": 8 },
    });
    const { policy } = decodePolicy({ version: 2, settings: write.settings, stock: write.stock });
    expect(policyToWire(policy)).toEqual({
      version: 2,
      cooldown_minutes: 480,
      claims_per_window: 1,
      tier_weights: { "10": 3 },
      tier_stock: { "10": 8 },
      allocation_mode: "mint-only",
      probability_mode: "weight-only",
      auto_redeem: false,
    });
  });
});
