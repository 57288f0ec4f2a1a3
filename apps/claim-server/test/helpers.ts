/**
 * Shared fixtures for claim-server tests: memory store, mock ledger,
 * manual clock, silent logger.
 */

import { vi } from "vitest";
import { ManualClock, createSeededRandom, type RandomSource } from "@codedrop/allocation";
import { MockLedgerClient } from "@codedrop/ledger-client";
import { Allocator, type ClaimIdentity } from "../src/services/allocator.js";
import { ClaimService } from "../src/services/claim-service.js";
import { PolicyStore } from "../src/services/policy-store.js";
import { MemoryLedgerStore } from "../src/store/memory-store.js";

export const T0 = new Date("2025-01-01T00:00:00.000Z");

export function silentLogger() {
  return { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
}

export function identity(n = 1): ClaimIdentity {
  return { userId: `user-${n}`, username: `sk-user-${n}****test`, credential: `sk-test-user-${n}` };
}

export interface Harness {
  store: MemoryLedgerStore;
  ledger: MockLedgerClient;
  clock: ManualClock;
  log: ReturnType<typeof silentLogger>;
  policies: PolicyStore;
  allocator: Allocator;
  claims: ClaimService;
}

/** Wire everything over a fresh memory store; apply the policy if given. */
export async function harness(
  opts: { policy?: unknown; store?: MemoryLedgerStore; ledger?: MockLedgerClient; random?: RandomSource } = {},
): Promise<Harness> {
  const store = opts.store ?? new MemoryLedgerStore();
  const ledger = opts.ledger ?? new MockLedgerClient();
  const clock = new ManualClock(T0);
  const log = silentLogger();
  const policies = new PolicyStore(store, log);

  if (opts.policy !== undefined) {
    const res = await policies.update(opts.policy);
    if (!res.ok) throw new Error(`bad test policy: ${res.failure.message}`);
  }

  const allocator = new Allocator({
    store,
    policies,
    ledger,
    clock,
    random: opts.random ?? createSeededRandom("claim-tests"),
    log,
  });
  const claims = new ClaimService({ store, policies, ledger, allocator, clock, log });
  return { store, ledger, clock, log, policies, allocator, claims };
}

/** weights {"1":50,"100":1}, stock {"1":0,"100":3}, 480 minutes, 1 claim. */
export const SCARCE_POLICY = {
  cooldown_minutes: 480,
  claims_per_window: 1,
  tier_weights: { "1": 50, "100": 1 },
  tier_stock: { "1": 0, "100": 3 },
};
