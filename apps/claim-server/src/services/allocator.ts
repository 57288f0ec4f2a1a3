/**
 * Award allocator: turns one eligible claim into exactly one awarded code.
 *
 *   CHECKING → DRAWING → RESERVING | MINTING → PERSISTING → REDEEMING → DONE
 *                                  ↘ FAILED(reason) from any state
 *
 * RESERVING  local-first and the drawn tier has unclaimed entries: one
 *            transaction takes an entry and appends the claim record.
 * MINTING    otherwise: reserve one unit of virtual stock, mint remotely,
 *            then PERSISTING commits entry + record together.
 * REDEEMING  only after the award is committed; the optional deposit runs
 *            outside any store transaction and only flags the record.
 *
 * A lost race for an entry or a stock unit redraws from a fresh policy
 * snapshot, up to MAX_DRAW_ATTEMPTS. Any mint failure releases the
 * reserved unit so nothing local changes.
 */

import {
  MAX_DRAW_ATTEMPTS,
  addMinutes,
  allocationFailed,
  assessClaim,
  coolingDown,
  drawTier,
  evaluateEligibility,
  lookbackStart,
  poolExhausted,
  tierAvailability,
  totalEffectiveStock,
  type ClaimFailure,
  type Clock,
  type Policy,
  type RandomSource,
  type TierValue,
} from "@codedrop/allocation";
import type { LedgerClient } from "@codedrop/ledger-client";
import type { Logger } from "../log.js";
import type { ClaimRecord, LedgerStore, LedgerTx } from "../store/types.js";
import type { PolicyStore } from "./policy-store.js";
import { KeyedLock } from "./user-lock.js";

export type AllocatorState =
  | "CHECKING"
  | "DRAWING"
  | "RESERVING"
  | "MINTING"
  | "PERSISTING"
  | "REDEEMING"
  | "DONE"
  | "FAILED";

export interface ClaimIdentity {
  userId: string;
  username: string;
  /** Needed for auto-redeem; never stored. */
  credential: string;
}

export interface Award {
  code: string;
  tierValue: TierValue;
  autoRedeemed: boolean;
  /** Claims left in the window after this one. */
  remaining: number;
  claimedAt: Date;
  cooldownExpiresAt: Date;
}

export type ClaimOutcome =
  | { ok: true; award: Award }
  | { ok: false; failure: ClaimFailure };

export interface AllocatorDeps {
  store: LedgerStore;
  policies: PolicyStore;
  ledger: LedgerClient;
  clock: Clock;
  random: RandomSource;
  log: Logger;
  locks?: KeyedLock;
  /** Commit attempts after a successful mint. Default 3. */
  commitAttempts?: number;
}

/** What one commit transaction decided. */
type CommitResult =
  | { kind: "committed"; record: ClaimRecord; remaining: number }
  | { kind: "blocked"; failure: ClaimFailure }
  | { kind: "lost-race" };

const DEFAULT_COMMIT_ATTEMPTS = 3;

function toAward(record: ClaimRecord, remaining: number): Award {
  return {
    code: record.code,
    tierValue: record.tierValue,
    autoRedeemed: record.autoRedeemed,
    remaining: Math.max(0, remaining),
    claimedAt: record.claimedAt,
    cooldownExpiresAt: record.cooldownExpiresAt,
  };
}

export class Allocator {
  private readonly store: LedgerStore;
  private readonly policies: PolicyStore;
  private readonly ledger: LedgerClient;
  private readonly clock: Clock;
  private readonly random: RandomSource;
  private readonly log: Logger;
  private readonly locks: KeyedLock;
  private readonly commitAttempts: number;

  constructor(deps: AllocatorDeps) {
    this.store = deps.store;
    this.policies = deps.policies;
    this.ledger = deps.ledger;
    this.clock = deps.clock;
    this.random = deps.random;
    this.log = deps.log;
    this.locks = deps.locks ?? new KeyedLock();
    this.commitAttempts = deps.commitAttempts ?? DEFAULT_COMMIT_ATTEMPTS;
  }

  /** One claim per user at a time; other users proceed in parallel. */
  claim(identity: ClaimIdentity): Promise<ClaimOutcome> {
    return this.locks.run(identity.userId, () => this.claimLocked(identity));
  }

  private enter(userId: string, state: AllocatorState, detail: Record<string, unknown> = {}): void {
    this.log.debug({ userId, state, ...detail }, "allocator transition");
  }

  private fail(userId: string, failure: ClaimFailure): ClaimOutcome {
    this.enter(userId, "FAILED", { reason: failure.kind });
    return { ok: false, failure };
  }

  private done(userId: string, award: Award): ClaimOutcome {
    this.enter(userId, "DONE");
    this.log.info(
      { userId, tierValue: award.tierValue, autoRedeemed: award.autoRedeemed },
      "code awarded",
    );
    return { ok: true, award };
  }

  private async claimLocked(identity: ClaimIdentity): Promise<ClaimOutcome> {
    const { userId } = identity;

    for (let attempt = 1; attempt <= MAX_DRAW_ATTEMPTS; attempt++) {
      this.enter(userId, "CHECKING", { attempt });
      const now = this.clock.now();
      const policy = await this.policies.snapshot();
      const local: Record<TierValue, number> =
        policy.allocationMode === "local-first" ? await this.store.unclaimedCounts() : {};
      const history = await this.store.claimsSince(userId, lookbackStart(now, policy.cooldownMinutes));

      const assessment = assessClaim({
        now,
        policy,
        history,
        totalStock: totalEffectiveStock(tierAvailability(policy, local)),
      });
      if (assessment.blockedBy === "cooling-down") {
        return this.fail(userId, coolingDown(now, assessment.cooldownEndsAt ?? now));
      }
      if (assessment.blockedBy === "pool-exhausted") {
        return this.fail(userId, poolExhausted());
      }

      this.enter(userId, "DRAWING", { policyVersion: policy.version });
      const tier = drawTier(policy, local, this.random);
      if (tier === null) return this.fail(userId, poolExhausted());

      if (policy.allocationMode === "local-first" && (local[tier] ?? 0) > 0) {
        this.enter(userId, "RESERVING", { tier });
        let result: CommitResult;
        try {
          result = await this.store.transaction((tx) => this.takeLocal(tx, policy, tier, identity));
        } catch (err) {
          this.log.warn({ err, userId, tier }, "local award failed");
          return this.fail(userId, allocationFailed());
        }
        switch (result.kind) {
          case "lost-race":
            continue;
          case "blocked":
            return this.fail(userId, result.failure);
          case "committed":
            return this.deliver(policy, identity, result.record, result.remaining);
        }
      }

      if (!(await this.store.reserveStock(tier))) {
        this.log.debug({ userId, tier, attempt }, "stock ran out under us, redrawing");
        continue;
      }
      return this.mintAndCommit(policy, tier, identity);
    }

    return this.fail(userId, poolExhausted());
  }

  /** Re-check under the user's store lock. Returns remaining claims or a block. */
  private async recheck(
    tx: LedgerTx,
    policy: Policy,
    userId: string,
    now: Date,
  ): Promise<{ ok: true; remaining: number } | { ok: false; failure: ClaimFailure }> {
    await tx.lockUser(userId);
    const history = await tx.claimsSince(userId, lookbackStart(now, policy.cooldownMinutes));
    const eligibility = evaluateEligibility({ now, policy, history });
    if (!eligibility.canClaim) {
      return { ok: false, failure: coolingDown(now, eligibility.cooldownEndsAt ?? now) };
    }
    return { ok: true, remaining: eligibility.remaining };
  }

  private async takeLocal(
    tx: LedgerTx,
    policy: Policy,
    tier: TierValue,
    identity: ClaimIdentity,
  ): Promise<CommitResult> {
    const now = this.clock.now();
    const check = await this.recheck(tx, policy, identity.userId, now);
    if (!check.ok) return { kind: "blocked", failure: check.failure };

    const entry = await tx.takeUnclaimed(tier, identity.userId, now);
    if (!entry) return { kind: "lost-race" };

    const record = await tx.appendClaim({
      userId: identity.userId,
      username: identity.username,
      code: entry.code,
      tierValue: entry.tierValue,
      claimedAt: now,
      cooldownExpiresAt: addMinutes(now, policy.cooldownMinutes),
      autoRedeemed: false,
    });
    return { kind: "committed", record, remaining: check.remaining - 1 };
  }

  private async mintAndCommit(
    policy: Policy,
    tier: TierValue,
    identity: ClaimIdentity,
  ): Promise<ClaimOutcome> {
    const { userId } = identity;
    this.enter(userId, "MINTING", { tier });

    const minted = await this.ledger.mintCode(tier);
    if (minted.kind !== "minted") {
      await this.store.releaseStock(tier);
      if (minted.kind === "unknown") {
        this.log.warn({ userId, tier, reason: minted.message }, "mint outcome unknown, reconcile against the ledger");
      } else {
        this.log.warn({ userId, tier, reason: minted.message }, "mint rejected");
      }
      return this.fail(userId, allocationFailed());
    }

    this.enter(userId, "PERSISTING", { tier });
    for (let attempt = 1; attempt <= this.commitAttempts; attempt++) {
      try {
        const result = await this.store.transaction((tx) =>
          this.commitMinted(tx, policy, tier, identity, minted.code),
        );
        switch (result.kind) {
          case "committed":
            return this.deliver(policy, identity, result.record, result.remaining);
          case "blocked":
            this.log.warn({ userId, tier }, "user became ineligible during mint, code kept in pool");
            return this.fail(userId, result.failure);
        }
      } catch (err) {
        this.log.warn({ err, userId, tier, attempt }, "commit of minted code failed");
      }
    }

    this.log.error({ userId, tier, code: minted.code }, "minted code not recorded, reconcile manually");
    return this.fail(userId, allocationFailed());
  }

  private async commitMinted(
    tx: LedgerTx,
    policy: Policy,
    tier: TierValue,
    identity: ClaimIdentity,
    code: string,
  ): Promise<Exclude<CommitResult, { kind: "lost-race" }>> {
    const now = this.clock.now();
    const check = await this.recheck(tx, policy, identity.userId, now);
    if (!check.ok) {
      await tx.insertEntries([{ code, tierValue: tier, source: "minted" }], now);
      return { kind: "blocked", failure: check.failure };
    }

    const inserted = await tx.insertEntries(
      [{ code, tierValue: tier, source: "minted", claimedBy: identity.userId, claimedAt: now }],
      now,
    );
    if (inserted.inserted !== 1) {
      throw new Error(`minted code ${code} already present in pool`);
    }

    const record = await tx.appendClaim({
      userId: identity.userId,
      username: identity.username,
      code,
      tierValue: tier,
      claimedAt: now,
      cooldownExpiresAt: addMinutes(now, policy.cooldownMinutes),
      autoRedeemed: false,
    });
    return { kind: "committed", record, remaining: check.remaining - 1 };
  }

  /** The award is committed; a deposit, if configured, is best effort on top. */
  private async deliver(
    policy: Policy,
    identity: ClaimIdentity,
    record: ClaimRecord,
    remaining: number,
  ): Promise<ClaimOutcome> {
    const award = toAward(record, remaining);
    if (!policy.autoRedeem) return this.done(identity.userId, award);

    this.enter(identity.userId, "REDEEMING", { tier: record.tierValue });
    if (!(await this.redeem(identity, record.code))) return this.done(identity.userId, award);

    try {
      await this.store.markAutoRedeemed(record.id);
    } catch (err) {
      this.log.warn({ err, userId: identity.userId, claimId: record.id }, "auto-redeem flag not recorded");
    }
    return this.done(identity.userId, { ...award, autoRedeemed: true });
  }

  /** A failure leaves the code with the user to redeem by hand. */
  private async redeem(identity: ClaimIdentity, code: string): Promise<boolean> {
    try {
      const result = await this.ledger.autoRedeem(identity.credential, code);
      if (result.kind === "redeemed") return true;
      this.log.warn({ userId: identity.userId, reason: result.message }, "auto-redeem failed");
    } catch (err) {
      this.log.warn({ err, userId: identity.userId }, "auto-redeem failed");
    }
    return false;
  }
}
