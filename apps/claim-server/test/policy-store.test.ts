import { describe, it, expect } from "vitest";
import { DEFAULT_POLICY } from "@codedrop/allocation";
import { PolicyStore } from "../src/services/policy-store.js";
import { MemoryLedgerStore } from "../src/store/memory-store.js";
import { silentLogger } from "./helpers.js";

function setup() {
  const store = new MemoryLedgerStore();
  const log = silentLogger();
  return { store, log, policies: new PolicyStore(store, log) };
}

describe("PolicyStore", () => {
  it("serves defaults before anything is written", async () => {
    const { policies } = setup();
    expect(await policies.snapshot()).toEqual(DEFAULT_POLICY);
    expect(await policies.get("cooldown_minutes")).toBe(480);
  });

  it("applies a partial update and bumps the version", async () => {
    const { policies, log } = setup();
    const res = await policies.update({ cooldown_minutes: 60, tier_stock: { "2.50": 4 } });

    expect(res.ok).toBe(true);
    const policy = await policies.snapshot();
    expect(policy).toMatchObject({
      version: 1,
      cooldownMinutes: 60,
      claimsPerWindow: 1,
      tierStock: { "2.5": 4 },
    });
    expect(log.info).toHaveBeenCalledWith(
      { version: 1, fields: ["cooldown_minutes", "tier_stock"] },
      "policy updated",
    );
  });

  it("merges tier weights per tier across updates", async () => {
    const { policies } = setup();
    await policies.update({ tier_weights: { "1": 50, "5": 10 } });
    await policies.update({ tier_weights: { "5": 0, "100": 1 } });

    expect((await policies.snapshot()).tierWeights).toEqual({ "1": 50, "5": 0, "100": 1 });
  });

  it("sets one key", async () => {
    const { policies } = setup();
    await policies.set("allocation_mode", "mint-only");
    expect(await policies.get("allocation_mode")).toBe("mint-only");
  });

  it("rejects invalid input without writing", async () => {
    const { policies, store } = setup();
    const res = await policies.update({ cooldown_minutes: 0 });

    expect(res.ok).toBe(false);
    expect(!res.ok && res.failure.kind).toBe("config-invalid");
    expect(store.dump().policyVersion).toBe(0);
  });

  it("falls back to the default for a corrupt stored value and warns", async () => {
    const { policies, store, log } = setup();
    await store.transaction((tx) =>
      tx.writePolicy({ settings: { cooldown_minutes: "\"soon\"", auto_redeem: "true" }, stock: {} }),
    );

    const policy = await policies.snapshot();
    expect(policy.cooldownMinutes).toBe(480);
    expect(policy.autoRedeem).toBe(true);
    expect(log.warn).toHaveBeenCalledWith(
      { invalidKeys: ["cooldown_minutes"], version: 1 },
      "policy store holds invalid values, defaults applied",
    );
  });
});
