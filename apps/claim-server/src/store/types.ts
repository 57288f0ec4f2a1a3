/**
 * Award ledger store interface.
 *
 * One authoritative store holds pool entries, claim records, policy settings
 * and tier stock counters. PgLedgerStore is the production implementation;
 * MemoryLedgerStore backs dev mode and tests.
 *
 * Everything that must commit together goes through transaction(). Stock
 * reservation is a single conditional update outside any transaction so no
 * lock is held while the ledger is minting.
 */

import type { PolicyRows, PolicyWrite, PoolEntrySource, TierValue } from "@codedrop/allocation";

export interface PoolEntry {
  id: string;
  code: string;
  tierValue: TierValue;
  claimed: boolean;
  claimedBy: string | null;
  claimedAt: Date | null;
  source: PoolEntrySource;
  createdAt: Date;
}

export interface NewPoolEntry {
  code: string;
  tierValue: TierValue;
  source: PoolEntrySource;
  /** Set for minted codes committed straight to their claimant. */
  claimedBy?: string;
  claimedAt?: Date;
}

export interface ClaimRecord {
  id: number;
  userId: string;
  username: string;
  code: string;
  tierValue: TierValue;
  claimedAt: Date;
  cooldownExpiresAt: Date;
  autoRedeemed: boolean;
}

export type NewClaimRecord = Omit<ClaimRecord, "id">;

export interface PoolFilter {
  ids?: string[];
  tierValue?: TierValue;
  claimed?: boolean;
  source?: PoolEntrySource;
}

export interface Page {
  /** 1-based. */
  page: number;
  pageSize: number;
}

export interface PoolPage {
  entries: PoolEntry[];
  total: number;
}

export interface InsertResult {
  inserted: number;
  /** Codes already present in the pool. */
  skipped: string[];
}

export interface TierStats {
  tierValue: TierValue;
  total: number;
  available: number;
}

export interface PoolStats {
  total: number;
  available: number;
  claimed: number;
  byTier: TierStats[];
}

/** Reads available both inside and outside a transaction. */
export interface LedgerReader {
  readPolicyRows(): Promise<PolicyRows>;
  /** Unclaimed entries per tier. Tiers with none are omitted. */
  unclaimedCounts(): Promise<Record<TierValue, number>>;
  /** Claim records with claimedAt ≥ since, oldest first. */
  claimsSince(userId: string, since: Date): Promise<ClaimRecord[]>;
}

export interface LedgerTx extends LedgerReader {
  /** Serialize commits for one user until the transaction ends. */
  lockUser(userId: string): Promise<void>;
  /** Mark one unclaimed entry of the tier as claimed by userId. Null if none left. */
  takeUnclaimed(tier: TierValue, userId: string, now: Date): Promise<PoolEntry | null>;
  insertEntries(entries: readonly NewPoolEntry[], now: Date): Promise<InsertResult>;
  appendClaim(record: NewClaimRecord): Promise<ClaimRecord>;
  /** Write settings and stock counters, bumping the policy version. */
  writePolicy(write: PolicyWrite): Promise<number>;
}

export interface LedgerStore extends LedgerReader {
  /**
   * Run fn in one transaction. A throw rolls back every write made
   * through tx and rethrows.
   */
  transaction<T>(fn: (tx: LedgerTx) => Promise<T>): Promise<T>;
  /** Settings and stock rows as one consistent read. */
  snapshotPolicyRows(): Promise<PolicyRows>;

  /** remaining -= 1 where remaining > 0. False when nothing was reserved. */
  reserveStock(tier: TierValue): Promise<boolean>;
  /** remaining += 1. Undoes a reservation. */
  releaseStock(tier: TierValue): Promise<void>;

  /** Flag a committed claim record as deposited to the user's balance. */
  markAutoRedeemed(claimId: number): Promise<void>;

  insertEntries(entries: readonly NewPoolEntry[], now: Date): Promise<InsertResult>;
  listEntries(filter: PoolFilter, page: Page): Promise<PoolPage>;
  deleteEntries(filter: PoolFilter): Promise<number>;
  /** Most recent claims first. */
  recentClaims(userId: string, limit: number): Promise<ClaimRecord[]>;
  poolStats(): Promise<PoolStats>;

  /** Throws when the store is unreachable. */
  ping(): Promise<void>;
  close(): Promise<void>;
}
