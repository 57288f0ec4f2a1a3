import { describe, it, expect } from "vitest";
import { MemoryLedgerStore } from "../src/store/memory-store.js";
import { T0 } from "./helpers.js";

const LATER = new Date("2025-01-01T01:00:00.000Z");

async function seeded() {
  const store = new MemoryLedgerStore();
  await store.insertEntries(
    [
      { code: "C2", tierValue: "10", source: "manual" },
      { code: "C1", tierValue: "10", source: "manual" },
      { code: "X1", tierValue: "0.5", source: "manual" },
    ],
    T0,
  );
  await store.insertEntries([{ code: "M1", tierValue: "10", source: "minted", claimedBy: "user-1" }], LATER);
  return store;
}

describe("insertEntries", () => {
  it("skips codes already stored", async () => {
    const store = await seeded();
    const result = await store.insertEntries(
      [
        { code: "C1", tierValue: "10", source: "manual" },
        { code: "NEW", tierValue: "10", source: "manual" },
      ],
      LATER,
    );
    expect(result).toEqual({ inserted: 1, skipped: ["C1"] });
  });

  it("marks entries inserted with a claimer as claimed", async () => {
    const store = await seeded();
    const minted = store.dump().entries.find((e) => e.code === "M1");
    expect(minted).toMatchObject({ claimed: true, claimedBy: "user-1", claimedAt: LATER, source: "minted" });
  });
});

describe("transactions", () => {
  it("takes unclaimed entries oldest first, then by code", async () => {
    const store = await seeded();
    const taken = await store.transaction(async (tx) => [
      await tx.takeUnclaimed("10", "user-2", LATER),
      await tx.takeUnclaimed("10", "user-3", LATER),
      await tx.takeUnclaimed("10", "user-4", LATER),
    ]);
    expect(taken.map((e) => e?.code ?? null)).toEqual(["C1", "C2", null]);
  });

  it("reverts every write when the callback throws", async () => {
    const store = await seeded();
    const before = store.dump();

    await expect(
      store.transaction(async (tx) => {
        await tx.takeUnclaimed("10", "user-2", LATER);
        await tx.insertEntries([{ code: "TMP", tierValue: "1", source: "manual" }], LATER);
        await tx.appendClaim({
          userId: "user-2",
          username: "u2",
          code: "C1",
          tierValue: "10",
          claimedAt: LATER,
          cooldownExpiresAt: LATER,
          autoRedeemed: false,
        });
        await tx.writePolicy({ settings: { cooldown_minutes: "5" }, stock: { "10": 4 } });
        throw new Error("boom");
      }),
    ).rejects.toThrow("boom");

    expect(store.dump()).toEqual(before);
  });

  it("numbers claim records from 1 and reuses an id after rollback", async () => {
    const store = new MemoryLedgerStore();
    const record = {
      userId: "user-1",
      username: "u1",
      code: "A",
      tierValue: "1",
      claimedAt: T0,
      cooldownExpiresAt: LATER,
      autoRedeemed: false,
    };
    await expect(
      store.transaction(async (tx) => {
        await tx.appendClaim(record);
        throw new Error("abort");
      }),
    ).rejects.toThrow("abort");
    const stored = await store.transaction((tx) => tx.appendClaim(record));
    expect(stored.id).toBe(1);
  });

  it("bumps the policy version on every write", async () => {
    const store = new MemoryLedgerStore();
    const v1 = await store.transaction((tx) => tx.writePolicy({ settings: { auto_redeem: "true" }, stock: {} }));
    const v2 = await store.transaction((tx) => tx.writePolicy({ settings: {}, stock: { "5": 2 } }));

    expect([v1, v2]).toEqual([1, 2]);
    expect(await store.snapshotPolicyRows()).toEqual({
      version: 2,
      settings: { auto_redeem: "true" },
      stock: { "5": 2 },
    });
  });
});

describe("stock", () => {
  it("reserves only while units remain", async () => {
    const store = new MemoryLedgerStore();
    await store.transaction((tx) => tx.writePolicy({ settings: {}, stock: { "5": 1 } }));

    expect(await store.reserveStock("5")).toBe(true);
    expect(await store.reserveStock("5")).toBe(false);
    expect(await store.reserveStock("7")).toBe(false);

    await store.releaseStock("5");
    expect(store.dump().stock).toEqual({ "5": 1 });
  });
});

describe("listing + deletion", () => {
  it("filters and paginates in creation order", async () => {
    const store = await seeded();
    const page1 = await store.listEntries({ tierValue: "10" }, { page: 1, pageSize: 2 });
    const page2 = await store.listEntries({ tierValue: "10" }, { page: 2, pageSize: 2 });

    expect(page1.total).toBe(3);
    expect(page1.entries.map((e) => e.code)).toEqual(["C1", "C2"]);
    expect(page2.entries.map((e) => e.code)).toEqual(["M1"]);

    const unclaimedManual = await store.listEntries({ claimed: false, source: "manual" }, { page: 1, pageSize: 10 });
    expect(unclaimedManual.entries.map((e) => e.code)).toEqual(["C1", "C2", "X1"]);
  });

  it("deletes by id and by filter", async () => {
    const store = await seeded();
    const x1 = store.dump().entries.find((e) => e.code === "X1");
    expect(await store.deleteEntries({ ids: [x1?.id ?? "missing"] })).toBe(1);
    expect(await store.deleteEntries({ tierValue: "10", claimed: false })).toBe(2);
    expect(store.dump().entries.map((e) => e.code)).toEqual(["M1"]);

    // deleted codes can be loaded again
    expect(await store.insertEntries([{ code: "C1", tierValue: "10", source: "manual" }], LATER)).toEqual({
      inserted: 1,
      skipped: [],
    });
  });
});

describe("reads", () => {
  it("counts unclaimed entries per tier", async () => {
    const store = await seeded();
    expect(await store.unclaimedCounts()).toEqual({ "10": 2, "0.5": 1 });
  });

  it("reports pool stats sorted by tier value", async () => {
    const store = await seeded();
    expect(await store.poolStats()).toEqual({
      total: 4,
      available: 3,
      claimed: 1,
      byTier: [
        { tierValue: "0.5", total: 1, available: 1 },
        { tierValue: "10", total: 3, available: 2 },
      ],
    });
  });

  it("returns recent claims newest first", async () => {
    const store = new MemoryLedgerStore();
    for (const [code, minutes] of [["A", 0], ["B", 30], ["C", 60]] as const) {
      const at = new Date(T0.getTime() + minutes * 60_000);
      await store.transaction((tx) =>
        tx.appendClaim({
          userId: "user-1",
          username: "u1",
          code,
          tierValue: "1",
          claimedAt: at,
          cooldownExpiresAt: at,
          autoRedeemed: false,
        }),
      );
    }
    const recent = await store.recentClaims("user-1", 2);
    expect(recent.map((c) => c.code)).toEqual(["C", "B"]);

    const since = await store.claimsSince("user-1", new Date("2025-01-01T00:30:00.000Z"));
    expect(since.map((c) => c.code)).toEqual(["B", "C"]);
  });
});
