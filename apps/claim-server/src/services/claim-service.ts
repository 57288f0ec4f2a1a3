/**
 * Claim service: the operations the HTTP layer exposes.
 *
 * User:  verify, getEligibility, history, claim
 * Admin: loadEntries, listEntries, deleteEntries, stats (policy goes
 *        through PolicyStore directly)
 */

import {
  HISTORY_LIMIT,
  assessClaim,
  configInvalid,
  formatDuration,
  lookbackStart,
  parseTierValue,
  tierAvailability,
  totalEffectiveStock,
  unauthorized,
  type BlockReason,
  type ClaimFailure,
  type Clock,
  type TierValue,
} from "@codedrop/allocation";
import type { LedgerClient } from "@codedrop/ledger-client";
import type { Logger } from "../log.js";
import type {
  ClaimRecord,
  LedgerStore,
  Page,
  PoolFilter,
  PoolPage,
  PoolStats,
} from "../store/types.js";
import type { Allocator, ClaimIdentity, ClaimOutcome } from "./allocator.js";
import type { PolicyStore } from "./policy-store.js";

export type VerifyOutcome =
  | { kind: "verified"; identity: ClaimIdentity }
  | { kind: "rejected"; failure: ClaimFailure }
  | { kind: "unavailable"; message: string };

export interface EligibilityView {
  canClaim: boolean;
  remaining: number;
  cooldownSecondsRemaining: number;
  cooldownEndsAt: Date | null;
  /** Empty when no cooldown is running. */
  cooldownText: string;
  poolAvailable: boolean;
  blockedBy: BlockReason | null;
  /** Codes awardable right now across all drawable tiers. */
  availableCount: number;
}

export type LoadResult =
  | { ok: true; tierValue: TierValue; inserted: number; skipped: string[] }
  | { ok: false; failure: ClaimFailure };

export interface StatsView extends PoolStats {
  virtualStock: Record<TierValue, number>;
  policyVersion: number;
}

export const MAX_CODES_PER_LOAD = 10_000;
export const MAX_PAGE_SIZE = 500;

export interface ClaimServiceDeps {
  store: LedgerStore;
  policies: PolicyStore;
  ledger: LedgerClient;
  allocator: Allocator;
  clock: Clock;
  log: Logger;
}

export class ClaimService {
  constructor(private readonly deps: ClaimServiceDeps) {}

  async verify(credential: string): Promise<VerifyOutcome> {
    const result = await this.deps.ledger.verifyIdentity(credential);
    switch (result.kind) {
      case "valid":
        return {
          kind: "verified",
          identity: { userId: result.userId, username: result.username, credential },
        };
      case "invalid":
        this.deps.log.debug({ reason: result.reason }, "credential rejected");
        return { kind: "rejected", failure: unauthorized() };
      case "transient-error":
        this.deps.log.warn({ reason: result.message }, "identity service unavailable");
        return { kind: "unavailable", message: "Identity service unavailable, please try again." };
    }
  }

  async getEligibility(userId: string): Promise<EligibilityView> {
    const { store, policies, clock } = this.deps;
    const now = clock.now();
    const policy = await policies.snapshot();
    const local: Record<TierValue, number> =
      policy.allocationMode === "local-first" ? await store.unclaimedCounts() : {};
    const history = await store.claimsSince(userId, lookbackStart(now, policy.cooldownMinutes));
    const availableCount = totalEffectiveStock(tierAvailability(policy, local));

    const a = assessClaim({ now, policy, history, totalStock: availableCount });
    return {
      canClaim: a.canClaim,
      remaining: a.remaining,
      cooldownSecondsRemaining: a.cooldownSecondsRemaining,
      cooldownEndsAt: a.cooldownEndsAt,
      cooldownText: a.cooldownEndsAt ? formatDuration(a.cooldownSecondsRemaining) : "",
      poolAvailable: a.poolAvailable,
      blockedBy: a.blockedBy,
      availableCount,
    };
  }

  history(userId: string): Promise<ClaimRecord[]> {
    return this.deps.store.recentClaims(userId, HISTORY_LIMIT);
  }

  claim(identity: ClaimIdentity): Promise<ClaimOutcome> {
    return this.deps.allocator.claim(identity);
  }

  // ── Admin ────────────────────────────────────────────────────────

  /**
   * Add manual codes to one tier. Codes are trimmed; blanks, repeats
   * within the batch and codes already in the pool are skipped.
   */
  async loadEntries(codes: readonly string[], tierInput: string | number): Promise<LoadResult> {
    const tierValue = parseTierValue(tierInput);
    if (tierValue === null) {
      return { ok: false, failure: configInvalid(`tier_value: invalid tier value "${String(tierInput)}"`) };
    }
    if (codes.length > MAX_CODES_PER_LOAD) {
      return { ok: false, failure: configInvalid(`codes: at most ${MAX_CODES_PER_LOAD} per request`) };
    }

    const unique: string[] = [];
    const skipped: string[] = [];
    const seen = new Set<string>();
    for (const raw of codes) {
      const code = raw.trim();
      if (code.length === 0) continue;
      if (seen.has(code)) {
        skipped.push(code);
        continue;
      }
      seen.add(code);
      unique.push(code);
    }

    const result = await this.deps.store.insertEntries(
      unique.map((code) => ({ code, tierValue, source: "manual" as const })),
      this.deps.clock.now(),
    );
    this.deps.log.info({ tierValue, inserted: result.inserted }, "pool entries loaded");
    return { ok: true, tierValue, inserted: result.inserted, skipped: [...skipped, ...result.skipped] };
  }

  listEntries(filter: PoolFilter, page: Page): Promise<PoolPage> {
    return this.deps.store.listEntries(filter, {
      page: Math.max(1, page.page),
      pageSize: Math.min(MAX_PAGE_SIZE, Math.max(1, page.pageSize)),
    });
  }

  /** Refuses an empty filter: purging the whole pool takes an explicit criterion. */
  async deleteEntries(filter: PoolFilter): Promise<{ ok: true; deleted: number } | { ok: false; failure: ClaimFailure }> {
    const hasCriterion =
      filter.ids !== undefined ||
      filter.tierValue !== undefined ||
      filter.claimed !== undefined ||
      filter.source !== undefined;
    if (!hasCriterion) {
      return { ok: false, failure: configInvalid("filter: at least one criterion is required") };
    }
    const deleted = await this.deps.store.deleteEntries(filter);
    this.deps.log.info({ filter, deleted }, "pool entries deleted");
    return { ok: true, deleted };
  }

  async stats(): Promise<StatsView> {
    const [pool, policy] = await Promise.all([this.deps.store.poolStats(), this.deps.policies.snapshot()]);
    return { ...pool, virtualStock: { ...policy.tierStock }, policyVersion: policy.version };
  }
}
