/**
 * In-memory ledger store: dev mode and tests.
 *
 * Every public operation runs exclusively, one at a time, so a transaction
 * never interleaves with another read or write. Writes made through a
 * transaction are recorded in an undo log and reverted if its callback
 * throws. State is lost on restart.
 */

import { randomUUID } from "node:crypto";
import { compareTierValues, type PolicyRows, type PolicyWrite, type TierValue } from "@codedrop/allocation";
import type {
  ClaimRecord,
  InsertResult,
  LedgerStore,
  LedgerTx,
  NewClaimRecord,
  NewPoolEntry,
  Page,
  PoolEntry,
  PoolFilter,
  PoolPage,
  PoolStats,
} from "./types.js";

export interface MemoryLedgerState {
  entries: PoolEntry[];
  claims: ClaimRecord[];
  settings: Record<string, string>;
  stock: Record<TierValue, number>;
  policyVersion: number;
}

type Undo = () => void;

function byCreatedThenCode(a: PoolEntry, b: PoolEntry): number {
  return a.createdAt.getTime() - b.createdAt.getTime() || a.code.localeCompare(b.code);
}

function matches(entry: PoolEntry, filter: PoolFilter): boolean {
  if (filter.ids && !filter.ids.includes(entry.id)) return false;
  if (filter.tierValue !== undefined && entry.tierValue !== filter.tierValue) return false;
  if (filter.claimed !== undefined && entry.claimed !== filter.claimed) return false;
  if (filter.source !== undefined && entry.source !== filter.source) return false;
  return true;
}

const copyEntry = (e: PoolEntry): PoolEntry => ({ ...e });
const copyClaim = (c: ClaimRecord): ClaimRecord => ({ ...c });

export class MemoryLedgerStore implements LedgerStore {
  private readonly entries = new Map<string, PoolEntry>();
  private readonly codes = new Set<string>();
  private readonly claims: ClaimRecord[] = [];
  private readonly settings = new Map<string, string>();
  private readonly stock = new Map<TierValue, number>();
  private policyVersion = 0;
  private nextClaimId = 1;
  private queue: Promise<unknown> = Promise.resolve();

  /** Run fn after every earlier operation has settled. */
  private exclusive<T>(fn: () => Promise<T> | T): Promise<T> {
    const run = this.queue.then(fn, fn);
    this.queue = run.catch(() => undefined);
    return run;
  }

  // ── Internal operations (no locking) ─────────────────────────────

  private readRows(): PolicyRows {
    return {
      version: this.policyVersion,
      settings: Object.fromEntries(this.settings),
      stock: Object.fromEntries(this.stock),
    };
  }

  private countUnclaimed(): Record<TierValue, number> {
    const counts: Record<TierValue, number> = {};
    for (const entry of this.entries.values()) {
      if (!entry.claimed) counts[entry.tierValue] = (counts[entry.tierValue] ?? 0) + 1;
    }
    return counts;
  }

  private claimsFor(userId: string, since: Date): ClaimRecord[] {
    return this.claims
      .filter((c) => c.userId === userId && c.claimedAt.getTime() >= since.getTime())
      .sort((a, b) => a.claimedAt.getTime() - b.claimedAt.getTime() || a.id - b.id)
      .map(copyClaim);
  }

  private insert(entries: readonly NewPoolEntry[], now: Date, undo?: Undo[]): InsertResult {
    let inserted = 0;
    const skipped: string[] = [];
    for (const input of entries) {
      if (this.codes.has(input.code)) {
        skipped.push(input.code);
        continue;
      }
      const entry: PoolEntry = {
        id: randomUUID(),
        code: input.code,
        tierValue: input.tierValue,
        claimed: input.claimedBy !== undefined,
        claimedBy: input.claimedBy ?? null,
        claimedAt: input.claimedBy !== undefined ? (input.claimedAt ?? now) : null,
        source: input.source,
        createdAt: new Date(now.getTime()),
      };
      this.entries.set(entry.id, entry);
      this.codes.add(entry.code);
      undo?.push(() => {
        this.entries.delete(entry.id);
        this.codes.delete(entry.code);
      });
      inserted++;
    }
    return { inserted, skipped };
  }

  private createTx(undo: Undo[]): LedgerTx {
    return {
      readPolicyRows: async () => this.readRows(),
      unclaimedCounts: async () => this.countUnclaimed(),
      claimsSince: async (userId, since) => this.claimsFor(userId, since),

      // Transactions already run one at a time.
      lockUser: async () => undefined,

      takeUnclaimed: async (tier, userId, now) => {
        const entry = [...this.entries.values()]
          .filter((e) => !e.claimed && e.tierValue === tier)
          .sort(byCreatedThenCode)[0];
        if (!entry) return null;
        const before = copyEntry(entry);
        entry.claimed = true;
        entry.claimedBy = userId;
        entry.claimedAt = new Date(now.getTime());
        undo.push(() => {
          Object.assign(entry, before);
        });
        return copyEntry(entry);
      },

      insertEntries: async (entries, now) => this.insert(entries, now, undo),

      appendClaim: async (record: NewClaimRecord) => {
        const stored: ClaimRecord = { ...record, id: this.nextClaimId++ };
        this.claims.push(stored);
        undo.push(() => {
          const i = this.claims.indexOf(stored);
          if (i >= 0) this.claims.splice(i, 1);
          this.nextClaimId--;
        });
        return copyClaim(stored);
      },

      writePolicy: async (write: PolicyWrite) => {
        const previousVersion = this.policyVersion;
        for (const [key, value] of Object.entries(write.settings)) {
          if (value === undefined) continue;
          const before = this.settings.get(key);
          this.settings.set(key, value);
          undo.push(() => {
            if (before === undefined) this.settings.delete(key);
            else this.settings.set(key, before);
          });
        }
        for (const [tier, remaining] of Object.entries(write.stock)) {
          const before = this.stock.get(tier);
          this.stock.set(tier, remaining);
          undo.push(() => {
            if (before === undefined) this.stock.delete(tier);
            else this.stock.set(tier, before);
          });
        }
        this.policyVersion = previousVersion + 1;
        undo.push(() => {
          this.policyVersion = previousVersion;
        });
        return this.policyVersion;
      },
    };
  }

  // ── LedgerStore ──────────────────────────────────────────────────

  transaction<T>(fn: (tx: LedgerTx) => Promise<T>): Promise<T> {
    return this.exclusive(async () => {
      const undo: Undo[] = [];
      try {
        return await fn(this.createTx(undo));
      } catch (err) {
        for (const step of undo.reverse()) step();
        throw err;
      }
    });
  }

  readPolicyRows(): Promise<PolicyRows> {
    return this.exclusive(() => this.readRows());
  }

  snapshotPolicyRows(): Promise<PolicyRows> {
    return this.exclusive(() => this.readRows());
  }

  unclaimedCounts(): Promise<Record<TierValue, number>> {
    return this.exclusive(() => this.countUnclaimed());
  }

  claimsSince(userId: string, since: Date): Promise<ClaimRecord[]> {
    return this.exclusive(() => this.claimsFor(userId, since));
  }

  reserveStock(tier: TierValue): Promise<boolean> {
    return this.exclusive(() => {
      const remaining = this.stock.get(tier) ?? 0;
      if (remaining <= 0) return false;
      this.stock.set(tier, remaining - 1);
      return true;
    });
  }

  releaseStock(tier: TierValue): Promise<void> {
    return this.exclusive(() => {
      this.stock.set(tier, (this.stock.get(tier) ?? 0) + 1);
    });
  }

  markAutoRedeemed(claimId: number): Promise<void> {
    return this.exclusive(() => {
      const record = this.claims.find((c) => c.id === claimId);
      if (!record) throw new Error(`claim record ${claimId} not found`);
      record.autoRedeemed = true;
    });
  }

  insertEntries(entries: readonly NewPoolEntry[], now: Date): Promise<InsertResult> {
    return this.exclusive(() => this.insert(entries, now));
  }

  listEntries(filter: PoolFilter, page: Page): Promise<PoolPage> {
    return this.exclusive(() => {
      const all = [...this.entries.values()].filter((e) => matches(e, filter)).sort(byCreatedThenCode);
      const start = (page.page - 1) * page.pageSize;
      return {
        entries: all.slice(start, start + page.pageSize).map(copyEntry),
        total: all.length,
      };
    });
  }

  deleteEntries(filter: PoolFilter): Promise<number> {
    return this.exclusive(() => {
      let deleted = 0;
      for (const entry of [...this.entries.values()]) {
        if (!matches(entry, filter)) continue;
        this.entries.delete(entry.id);
        this.codes.delete(entry.code);
        deleted++;
      }
      return deleted;
    });
  }

  recentClaims(userId: string, limit: number): Promise<ClaimRecord[]> {
    return this.exclusive(() =>
      this.claims
        .filter((c) => c.userId === userId)
        .sort((a, b) => b.claimedAt.getTime() - a.claimedAt.getTime() || b.id - a.id)
        .slice(0, limit)
        .map(copyClaim),
    );
  }

  poolStats(): Promise<PoolStats> {
    return this.exclusive(() => {
      const tiers = new Map<TierValue, { total: number; available: number }>();
      for (const entry of this.entries.values()) {
        const row = tiers.get(entry.tierValue) ?? { total: 0, available: 0 };
        row.total++;
        if (!entry.claimed) row.available++;
        tiers.set(entry.tierValue, row);
      }
      const byTier = [...tiers.entries()]
        .sort(([a], [b]) => compareTierValues(a, b))
        .map(([tierValue, row]) => ({ tierValue, ...row }));
      const total = byTier.reduce((sum, t) => sum + t.total, 0);
      const available = byTier.reduce((sum, t) => sum + t.available, 0);
      return { total, available, claimed: total - available, byTier };
    });
  }

  async ping(): Promise<void> {}

  async close(): Promise<void> {}

  /** Test helper: deep copy of everything stored. */
  dump(): MemoryLedgerState {
    return {
      entries: [...this.entries.values()].sort(byCreatedThenCode).map(copyEntry),
      claims: this.claims.map(copyClaim),
      settings: Object.fromEntries(this.settings),
      stock: Object.fromEntries(this.stock),
      policyVersion: this.policyVersion,
    };
  }
}
