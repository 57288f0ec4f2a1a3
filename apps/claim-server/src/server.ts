/**
 * Claim server: hands out redemption codes to verified users under a
 * per-user cooldown.
 *
 *   POST /api/verify, /api/claim/status, /api/claim    user routes
 *   /api/admin/*                                        policy + pool admin
 *   GET /health                                         liveness + store check
 *
 * Dev mode: no DATABASE_URL → in-memory store; no LEDGER_ADMIN_TOKEN →
 * mock ledger that accepts any sk- credential.
 */

import { fileURLToPath } from "node:url";
import { resolve } from "node:path";
import Fastify from "fastify";
import { mathRandom, systemClock, type Clock, type RandomSource } from "@codedrop/allocation";
import { HttpLedgerClient, MockLedgerClient, type LedgerClient } from "@codedrop/ledger-client";
import { config } from "./config.js";
import type { Logger } from "./log.js";
import { adminRoutes } from "./routes/admin.js";
import { claimRoutes } from "./routes/claim.js";
import { healthRoutes } from "./routes/health.js";
import { Allocator } from "./services/allocator.js";
import { ClaimService } from "./services/claim-service.js";
import { PolicyStore } from "./services/policy-store.js";
import { MemoryLedgerStore } from "./store/memory-store.js";
import { PgLedgerStore } from "./store/pg-store.js";
import type { LedgerStore } from "./store/types.js";

export interface ClaimServerDeps {
  /** Omitted = from DATABASE_URL (memory store when empty). */
  store?: LedgerStore;
  /** Omitted = from LEDGER_URL / LEDGER_ADMIN_TOKEN (mock when no token). */
  ledger?: LedgerClient;
  clock?: Clock;
  random?: RandomSource;
  adminPassword?: string;
  logLevel?: string;
}

async function createStore(log: Logger): Promise<LedgerStore> {
  if (!config.databaseUrl) {
    log.warn("No DATABASE_URL set, in-memory store, state is lost on restart");
    return new MemoryLedgerStore();
  }
  return PgLedgerStore.connect(config.databaseUrl);
}

function createLedgerClient(log: Logger): LedgerClient {
  if (!config.ledgerAdminToken) {
    log.warn("No LEDGER_ADMIN_TOKEN set, mock ledger, codes are not real");
    return new MockLedgerClient();
  }
  return new HttpLedgerClient({
    ledgerUrl: config.ledgerUrl,
    adminToken: config.ledgerAdminToken,
    quotaPerUnit: config.ledgerQuotaPerUnit,
    timeouts: {
      verifyMs: config.verifyTimeoutMs,
      mintMs: config.mintTimeoutMs,
      redeemMs: config.redeemTimeoutMs,
    },
  });
}

export async function buildApp(deps?: ClaimServerDeps) {
  const app = Fastify({ logger: { level: deps?.logLevel ?? config.logLevel } });

  const store = deps?.store ?? (await createStore(app.log));
  const ledger = deps?.ledger ?? createLedgerClient(app.log);
  const clock = deps?.clock ?? systemClock;

  const policies = new PolicyStore(store, app.log);
  const allocator = new Allocator({
    store,
    policies,
    ledger,
    clock,
    random: deps?.random ?? mathRandom,
    log: app.log,
  });
  const claims = new ClaimService({ store, policies, ledger, allocator, clock, log: app.log });

  claimRoutes(app, claims);
  adminRoutes(app, {
    claims,
    policies,
    adminPassword: deps?.adminPassword ?? config.adminPassword,
  });
  healthRoutes(app, store);

  app.addHook("onClose", async () => {
    await store.close();
  });

  return app;
}

// Run if executed directly (not when imported in tests)
if (
  process.argv[1] &&
  resolve(process.argv[1]) === fileURLToPath(import.meta.url)
) {
  console.log("─── claim-server config ───");
  console.log(`  port:     ${config.port}`);
  console.log(`  store:    ${config.databaseUrl ? "postgres" : "(memory, dev mode)"}`);
  console.log(`  ledger:   ${config.ledgerAdminToken ? config.ledgerUrl : "(mock, dev mode)"}`);
  console.log(`  admin:    ${config.adminPassword ? "enabled" : "disabled"}`);
  console.log("───────────────────────────");

  const app = await buildApp();
  app.listen({ port: config.port, host: config.host }, (err) => {
    if (err) {
      app.log.error(err);
      process.exit(1);
    }
  });
}
