/**
 * Ledger client interface: identity, minting and deposit on the remote
 * ledger service, behind one abstraction so tests and dev mode can swap in
 * MockLedgerClient.
 *
 * Every outcome is a tagged value. Only programming errors throw.
 */

import type { TierValue } from "@codedrop/allocation";

export type VerifyResult =
  | { kind: "valid"; userId: string; username: string }
  | { kind: "invalid"; reason: string }
  | { kind: "transient-error"; message: string };

/**
 * `unknown` means the request may have reached the ledger (timeout, lost
 * response). The code may exist remotely; it is logged, never retried.
 */
export type MintResult =
  | { kind: "minted"; code: string }
  | { kind: "rejected"; message: string }
  | { kind: "unknown"; message: string };

export type RedeemResult =
  | { kind: "redeemed" }
  | { kind: "failed"; message: string };

export interface LedgerClient {
  verifyIdentity(credential: string): Promise<VerifyResult>;
  mintCode(tier: TierValue): Promise<MintResult>;
  /** Deposit a code into the credential owner's balance. Best effort. */
  autoRedeem(credential: string, code: string): Promise<RedeemResult>;
}

export interface LedgerTimeouts {
  verifyMs: number;
  mintMs: number;
  redeemMs: number;
}

export interface HttpLedgerClientOptions {
  /** Base URL of the ledger service, no trailing slash needed. */
  ledgerUrl: string;
  /** Admin token for mint calls. */
  adminToken: string;
  /** Ledger quota units per 1.0 of tier value. */
  quotaPerUnit?: number;
  timeouts?: Partial<LedgerTimeouts>;
  /** Injected for tests. Defaults to global fetch. */
  fetch?: typeof fetch;
}
