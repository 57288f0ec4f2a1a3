/**
 * Eligibility vectors: sliding cooldown window with per-record expiry.
 */

import { describe, it, expect } from "vitest";
import {
  assessClaim,
  effectiveExpiry,
  evaluateEligibility,
  lookbackStart,
  type ClaimHistoryEntry,
} from "../../src/eligibility.js";
import { createSeededRandom } from "../../src/rng.js";
import { addMinutes } from "../../src/time.js";

const T0 = new Date("2025-01-01T00:00:00Z");
const at = (minutes: number) => addMinutes(T0, minutes);

/** A claim written at T0+m under the given cooldown. */
function claim(minutes: number, cooldownMinutes: number): ClaimHistoryEntry {
  return { claimedAt: at(minutes), cooldownExpiresAt: at(minutes + cooldownMinutes) };
}

describe("evaluateEligibility", () => {
  const policy = { cooldownMinutes: 480, claimsPerWindow: 1 };

  it("a user with no history can claim", () => {
    expect(evaluateEligibility({ now: T0, policy, history: [] })).toEqual({
      canClaim: true,
      remaining: 1,
      activeClaims: 0,
      cooldownEndsAt: null,
    });
  });

  it("an active claim blocks until its expiry", () => {
    const result = evaluateEligibility({ now: at(60), policy, history: [claim(0, 480)] });
    expect(result.canClaim).toBe(false);
    expect(result.remaining).toBe(0);
    expect(result.cooldownEndsAt?.getTime()).toBe(at(480).getTime());
  });

  it("a claim is inactive exactly at its expiry", () => {
    const result = evaluateEligibility({ now: at(480), policy, history: [claim(0, 480)] });
    expect(result.canClaim).toBe(true);
    expect(result.activeClaims).toBe(0);
  });

  it("cooldownEndsAt is the earliest active expiry", () => {
    const result = evaluateEligibility({
      now: at(30),
      policy: { cooldownMinutes: 480, claimsPerWindow: 3 },
      history: [claim(20, 480), claim(0, 480), claim(10, 480)],
    });
    expect(result.remaining).toBe(0);
    expect(result.cooldownEndsAt?.getTime()).toBe(at(480).getTime());
  });

  it("reports remaining claims and no end time while claims remain", () => {
    const result = evaluateEligibility({
      now: at(30),
      policy: { cooldownMinutes: 480, claimsPerWindow: 3 },
      history: [claim(0, 480), claim(10, 480)],
    });
    expect(result).toEqual({ canClaim: true, remaining: 1, activeClaims: 2, cooldownEndsAt: null });
  });

  it("remaining never goes negative", () => {
    const history = [0, 1, 2, 3, 4].map((m) => claim(m, 480));
    const result = evaluateEligibility({ now: at(5), policy, history });
    expect(result.activeClaims).toBe(5);
    expect(result.remaining).toBe(0);
  });

  it("shortening the cooldown frees the user immediately", () => {
    const history = [claim(0, 480)];
    const shortened = { cooldownMinutes: 60, claimsPerWindow: 1 };
    expect(evaluateEligibility({ now: at(70), policy, history }).canClaim).toBe(false);
    expect(evaluateEligibility({ now: at(70), policy: shortened, history }).canClaim).toBe(true);
    expect(evaluateEligibility({ now: at(71), policy: shortened, history }).canClaim).toBe(true);
  });

  it("lengthening the cooldown keeps the expiry stored on the record", () => {
    const history = [claim(0, 60)];
    expect(evaluateEligibility({ now: at(59), policy, history }).canClaim).toBe(false);
    expect(evaluateEligibility({ now: at(61), policy, history }).canClaim).toBe(true);
  });

  it("ignores records before the lookback start", () => {
    // Stored expiry far in the future, claimed long before 2× cooldown.
    const stale = { claimedAt: at(0), cooldownExpiresAt: at(100_000) };
    expect(evaluateEligibility({ now: at(1000), policy, history: [stale] }).canClaim).toBe(true);
  });

  it("a shorter cooldown never blocks someone a longer one allows", () => {
    const random = createSeededRandom("shorten");
    for (let round = 0; round < 200; round++) {
      const history = Array.from({ length: 1 + Math.floor(random.next() * 4) }, () =>
        claim(Math.floor(random.next() * 600), 30 + Math.floor(random.next() * 600)),
      );
      const now = at(300 + Math.floor(random.next() * 600));
      const long = 1 + Math.floor(random.next() * 900);
      const short = 1 + Math.floor(random.next() * long);
      const claims = 1 + Math.floor(random.next() * 3);

      const underLong = evaluateEligibility({
        now, history, policy: { cooldownMinutes: long, claimsPerWindow: claims },
      });
      const underShort = evaluateEligibility({
        now, history, policy: { cooldownMinutes: short, claimsPerWindow: claims },
      });
      if (underLong.canClaim) expect(underShort.canClaim).toBe(true);
      expect(underShort.remaining).toBeGreaterThanOrEqual(underLong.remaining);
    }
  });
});

describe("effectiveExpiry / lookbackStart", () => {
  it("takes the earlier of current-policy and stored expiry", () => {
    expect(effectiveExpiry(claim(0, 480), 60).getTime()).toBe(at(60).getTime());
    expect(effectiveExpiry(claim(0, 60), 480).getTime()).toBe(at(60).getTime());
  });

  it("looks back twice the cooldown", () => {
    expect(lookbackStart(at(1000), 480).getTime()).toBe(at(40).getTime());
  });
});

describe("assessClaim", () => {
  const policy = { cooldownMinutes: 480, claimsPerWindow: 1 };

  it("blocks an eligible user on an empty pool", () => {
    const result = assessClaim({ now: T0, policy, history: [], totalStock: 0 });
    expect(result.canClaim).toBe(false);
    expect(result.poolAvailable).toBe(false);
    expect(result.blockedBy).toBe("pool-exhausted");
    expect(result.remaining).toBe(1);
  });

  it("reports cooling-down ahead of an empty pool", () => {
    const result = assessClaim({ now: at(60), policy, history: [claim(0, 480)], totalStock: 0 });
    expect(result.blockedBy).toBe("cooling-down");
    expect(result.cooldownSecondsRemaining).toBe(420 * 60);
  });

  it("allows when both the user and the pool are ready", () => {
    const result = assessClaim({ now: T0, policy, history: [], totalStock: 4 });
    expect(result).toMatchObject({
      canClaim: true,
      poolAvailable: true,
      blockedBy: null,
      cooldownSecondsRemaining: 0,
    });
  });
});
