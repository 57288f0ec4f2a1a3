/**
 * Mock ledger client for tests and dev mode.
 *
 * Any credential with the sk- prefix verifies unless revoked. Minted codes
 * are deterministic ("MOCK-<tier>-<n>"). Failure modes are toggled per
 * operation; every call is recorded.
 */

import type { TierValue } from "@codedrop/allocation";
import { credentialFingerprint, credentialPreview, hasCredentialShape } from "./fingerprint.js";
import type { LedgerClient, MintResult, RedeemResult, VerifyResult } from "./types.js";

export type MockMintMode = "ok" | "rejected" | "unknown";
export type MockVerifyMode = "ok" | "transient-error";

export interface MockLedgerCalls {
  verify: string[];
  mint: TierValue[];
  redeem: Array<{ credential: string; code: string }>;
}

export class MockLedgerClient implements LedgerClient {
  readonly calls: MockLedgerCalls = { verify: [], mint: [], redeem: [] };

  verifyMode: MockVerifyMode = "ok";
  mintMode: MockMintMode = "ok";
  redeemFails = false;
  /** Artificial latency on mint, in ms. */
  mintDelayMs = 0;

  private readonly revoked = new Set<string>();
  private minted = 0;

  async verifyIdentity(credential: string): Promise<VerifyResult> {
    this.calls.verify.push(credential);
    if (this.verifyMode === "transient-error") {
      return { kind: "transient-error", message: "mock ledger unavailable" };
    }
    if (!hasCredentialShape(credential) || this.revoked.has(credential)) {
      return { kind: "invalid", reason: "mock: credential rejected" };
    }
    return {
      kind: "valid",
      userId: credentialFingerprint(credential),
      username: credentialPreview(credential),
    };
  }

  async mintCode(tier: TierValue): Promise<MintResult> {
    this.calls.mint.push(tier);
    if (this.mintDelayMs > 0) {
      await new Promise((resolve) => setTimeout(resolve, this.mintDelayMs));
    }
    switch (this.mintMode) {
      case "rejected":
        return { kind: "rejected", message: "mock: mint rejected" };
      case "unknown":
        return { kind: "unknown", message: "mock: mint timed out" };
      case "ok":
        this.minted++;
        return { kind: "minted", code: `MOCK-${tier}-${this.minted}` };
    }
  }

  async autoRedeem(credential: string, code: string): Promise<RedeemResult> {
    this.calls.redeem.push({ credential, code });
    if (this.redeemFails) return { kind: "failed", message: "mock: redeem failed" };
    return { kind: "redeemed" };
  }

  /** Test helper: make a credential fail verification. */
  revoke(credential: string): void {
    this.revoked.add(credential);
  }
}
