/**
 * Postgres ledger store: Drizzle over node-postgres.
 *
 * Locking:
 *   takeUnclaimed   FOR UPDATE SKIP LOCKED on one pool entry row
 *   lockUser        pg_advisory_xact_lock(hashtext(user_id))
 *   writePolicy     pg_advisory_xact_lock(POLICY_LOCK_KEY)
 *   reserveStock    single conditional UPDATE, no transaction
 */

import { and, asc, count, desc, eq, gt, gte, inArray, sql, type SQL } from "drizzle-orm";
import { drizzle, type NodePgQueryResultHKT } from "drizzle-orm/node-postgres";
import type { PgDatabase } from "drizzle-orm/pg-core";
import pg, { type Pool } from "pg";
import {
  compareTierValues,
  type PolicyRows,
  type PolicyWrite,
  type TierValue,
} from "@codedrop/allocation";
import { migrate } from "../db/migrate.js";
import {
  claimRecords,
  policySettings,
  poolEntries,
  tierStock,
  type ClaimRecordRow,
  type PoolEntryRow,
} from "../db/schema.js";
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

/** Database handle or open transaction. */
type Executor = PgDatabase<NodePgQueryResultHKT>;

const POLICY_LOCK_KEY = 0x636f6465; // "code"

function toPoolEntry(row: PoolEntryRow): PoolEntry {
  return {
    id: row.id,
    code: row.code,
    tierValue: row.tierValue,
    claimed: row.claimed,
    claimedBy: row.claimedBy,
    claimedAt: row.claimedAt,
    source: row.source,
    createdAt: row.createdAt,
  };
}

function toClaimRecord(row: ClaimRecordRow): ClaimRecord {
  return {
    id: row.id,
    userId: row.userId,
    username: row.username,
    code: row.code,
    tierValue: row.tierValue,
    claimedAt: row.claimedAt,
    cooldownExpiresAt: row.cooldownExpiresAt,
    autoRedeemed: row.autoRedeemed,
  };
}

function poolWhere(filter: PoolFilter): SQL | undefined {
  const conds: SQL[] = [];
  if (filter.ids) {
    conds.push(filter.ids.length > 0 ? inArray(poolEntries.id, filter.ids) : sql`false`);
  }
  if (filter.tierValue !== undefined) conds.push(eq(poolEntries.tierValue, filter.tierValue));
  if (filter.claimed !== undefined) conds.push(eq(poolEntries.claimed, filter.claimed));
  if (filter.source !== undefined) conds.push(eq(poolEntries.source, filter.source));
  return and(...conds);
}

// ── Reads / writes shared by the store and its transactions ────────

async function readPolicyRows(db: Executor): Promise<PolicyRows> {
  const settings = await db.select().from(policySettings);
  const stock = await db.select().from(tierStock);

  let version = 0;
  for (const row of [...settings, ...stock]) version = Math.max(version, row.version);

  return {
    version,
    settings: Object.fromEntries(settings.map((r) => [r.key, r.value])),
    stock: Object.fromEntries(stock.map((r) => [r.tierValue, r.remaining])),
  };
}

async function unclaimedCounts(db: Executor): Promise<Record<TierValue, number>> {
  const rows = await db
    .select({ tierValue: poolEntries.tierValue, n: count() })
    .from(poolEntries)
    .where(eq(poolEntries.claimed, false))
    .groupBy(poolEntries.tierValue);
  return Object.fromEntries(rows.map((r) => [r.tierValue, r.n]));
}

async function claimsSince(db: Executor, userId: string, since: Date): Promise<ClaimRecord[]> {
  const rows = await db
    .select()
    .from(claimRecords)
    .where(and(eq(claimRecords.userId, userId), gte(claimRecords.claimedAt, since)))
    .orderBy(asc(claimRecords.claimedAt), asc(claimRecords.id));
  return rows.map(toClaimRecord);
}

async function insertEntries(
  db: Executor,
  entries: readonly NewPoolEntry[],
  now: Date,
): Promise<InsertResult> {
  if (entries.length === 0) return { inserted: 0, skipped: [] };

  const inserted = await db
    .insert(poolEntries)
    .values(
      entries.map((e) => ({
        code: e.code,
        tierValue: e.tierValue,
        source: e.source,
        claimed: e.claimedBy !== undefined,
        claimedBy: e.claimedBy ?? null,
        claimedAt: e.claimedBy !== undefined ? (e.claimedAt ?? now) : null,
        createdAt: now,
      })),
    )
    .onConflictDoNothing({ target: poolEntries.code })
    .returning({ code: poolEntries.code });

  const written = new Set(inserted.map((r) => r.code));
  return {
    inserted: inserted.length,
    skipped: entries.map((e) => e.code).filter((code) => !written.has(code)),
  };
}

// ── Store ──────────────────────────────────────────────────────────

export class PgLedgerStore implements LedgerStore {
  private readonly db: Executor;

  constructor(private readonly pool: Pool) {
    this.db = drizzle(pool);
  }

  /** Connect and bring the schema up to date. */
  static async connect(databaseUrl: string): Promise<PgLedgerStore> {
    const pool = new pg.Pool({ connectionString: databaseUrl });
    await migrate(pool);
    return new PgLedgerStore(pool);
  }

  private txFor(tx: Executor): LedgerTx {
    return {
      readPolicyRows: () => readPolicyRows(tx),
      unclaimedCounts: () => unclaimedCounts(tx),
      claimsSince: (userId, since) => claimsSince(tx, userId, since),

      lockUser: async (userId) => {
        await tx.execute(sql`select pg_advisory_xact_lock(hashtext(${userId}))`);
      },

      takeUnclaimed: async (tier, userId, now) => {
        const [candidate] = await tx
          .select({ id: poolEntries.id })
          .from(poolEntries)
          .where(and(eq(poolEntries.tierValue, tier), eq(poolEntries.claimed, false)))
          .orderBy(asc(poolEntries.createdAt), asc(poolEntries.code))
          .limit(1)
          .for("update", { skipLocked: true });
        if (!candidate) return null;

        const [row] = await tx
          .update(poolEntries)
          .set({ claimed: true, claimedBy: userId, claimedAt: now })
          .where(eq(poolEntries.id, candidate.id))
          .returning();
        return row ? toPoolEntry(row) : null;
      },

      insertEntries: (entries, now) => insertEntries(tx, entries, now),

      appendClaim: async (record: NewClaimRecord) => {
        const [row] = await tx.insert(claimRecords).values(record).returning();
        if (!row) throw new Error("claim record insert returned no row");
        return toClaimRecord(row);
      },

      writePolicy: async (write: PolicyWrite) => {
        await tx.execute(sql`select pg_advisory_xact_lock(${POLICY_LOCK_KEY})`);
        const version = (await readPolicyRows(tx)).version + 1;

        for (const [key, value] of Object.entries(write.settings)) {
          if (value === undefined) continue;
          await tx
            .insert(policySettings)
            .values({ key, value, version })
            .onConflictDoUpdate({ target: policySettings.key, set: { value, version } });
        }
        for (const [tierValue, remaining] of Object.entries(write.stock)) {
          await tx
            .insert(tierStock)
            .values({ tierValue, remaining, version })
            .onConflictDoUpdate({ target: tierStock.tierValue, set: { remaining, version } });
        }
        return version;
      },
    };
  }

  transaction<T>(fn: (tx: LedgerTx) => Promise<T>): Promise<T> {
    return this.db.transaction((tx) => fn(this.txFor(tx)));
  }

  readPolicyRows(): Promise<PolicyRows> {
    return readPolicyRows(this.db);
  }

  snapshotPolicyRows(): Promise<PolicyRows> {
    return this.db.transaction((tx) => readPolicyRows(tx), {
      isolationLevel: "repeatable read",
      accessMode: "read only",
    });
  }

  unclaimedCounts(): Promise<Record<TierValue, number>> {
    return unclaimedCounts(this.db);
  }

  claimsSince(userId: string, since: Date): Promise<ClaimRecord[]> {
    return claimsSince(this.db, userId, since);
  }

  async reserveStock(tier: TierValue): Promise<boolean> {
    const rows = await this.db
      .update(tierStock)
      .set({ remaining: sql`${tierStock.remaining} - 1` })
      .where(and(eq(tierStock.tierValue, tier), gt(tierStock.remaining, 0)))
      .returning({ remaining: tierStock.remaining });
    return rows.length > 0;
  }

  async releaseStock(tier: TierValue): Promise<void> {
    await this.db
      .insert(tierStock)
      .values({ tierValue: tier, remaining: 1, version: 0 })
      .onConflictDoUpdate({
        target: tierStock.tierValue,
        set: { remaining: sql`${tierStock.remaining} + 1` },
      });
  }

  async markAutoRedeemed(claimId: number): Promise<void> {
    await this.db
      .update(claimRecords)
      .set({ autoRedeemed: true })
      .where(eq(claimRecords.id, claimId));
  }

  insertEntries(entries: readonly NewPoolEntry[], now: Date): Promise<InsertResult> {
    return insertEntries(this.db, entries, now);
  }

  async listEntries(filter: PoolFilter, page: Page): Promise<PoolPage> {
    const where = poolWhere(filter);
    const rows = await this.db
      .select()
      .from(poolEntries)
      .where(where)
      .orderBy(asc(poolEntries.createdAt), asc(poolEntries.code))
      .limit(page.pageSize)
      .offset((page.page - 1) * page.pageSize);
    const [total] = await this.db.select({ n: count() }).from(poolEntries).where(where);
    return { entries: rows.map(toPoolEntry), total: total?.n ?? 0 };
  }

  async deleteEntries(filter: PoolFilter): Promise<number> {
    const rows = await this.db
      .delete(poolEntries)
      .where(poolWhere(filter))
      .returning({ id: poolEntries.id });
    return rows.length;
  }

  async recentClaims(userId: string, limit: number): Promise<ClaimRecord[]> {
    const rows = await this.db
      .select()
      .from(claimRecords)
      .where(eq(claimRecords.userId, userId))
      .orderBy(desc(claimRecords.claimedAt), desc(claimRecords.id))
      .limit(limit);
    return rows.map(toClaimRecord);
  }

  async poolStats(): Promise<PoolStats> {
    const rows = await this.db
      .select({
        tierValue: poolEntries.tierValue,
        total: count(),
        available: sql<number>`count(*) filter (where not ${poolEntries.claimed})`.mapWith(Number),
      })
      .from(poolEntries)
      .groupBy(poolEntries.tierValue);

    const byTier = rows.sort((a, b) => compareTierValues(a.tierValue, b.tierValue));
    const total = byTier.reduce((sum, t) => sum + t.total, 0);
    const available = byTier.reduce((sum, t) => sum + t.available, 0);
    return { total, available, claimed: total - available, byTier };
  }

  async ping(): Promise<void> {
    await this.db.execute(sql`select 1`);
  }

  async close(): Promise<void> {
    await this.pool.end();
  }
}
