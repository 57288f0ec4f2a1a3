/**
 * HTTP ledger client: native fetch with a per-call AbortController timeout.
 *
 *   verifyIdentity  GET  /v1/models            (credential as bearer)
 *   mintCode        POST /api/redemption/      (admin token)
 *   autoRedeem      POST /api/user/topup       (credential as bearer)
 */

import { tierToUnits, type TierValue } from "@codedrop/allocation";
import { credentialFingerprint, credentialPreview, hasCredentialShape } from "./fingerprint.js";
import { interpretMint, interpretRedeem, interpretVerify, parseBody } from "./responses.js";
import type {
  HttpLedgerClientOptions,
  LedgerClient,
  LedgerTimeouts,
  MintResult,
  RedeemResult,
  VerifyResult,
} from "./types.js";

export const DEFAULT_QUOTA_PER_UNIT = 500_000;

export const DEFAULT_TIMEOUTS: LedgerTimeouts = {
  verifyMs: 10_000,
  mintMs: 15_000,
  redeemMs: 10_000,
};

type Exchange =
  | { delivered: true; status: number; body: unknown }
  | { delivered: false; timedOut: boolean; message: string };

export class HttpLedgerClient implements LedgerClient {
  private readonly baseUrl: string;
  private readonly adminToken: string;
  private readonly quotaPerUnit: number;
  private readonly timeouts: LedgerTimeouts;
  private readonly fetchImpl: typeof fetch;

  constructor(opts: HttpLedgerClientOptions) {
    this.baseUrl = opts.ledgerUrl.replace(/\/+$/, "");
    this.adminToken = opts.adminToken;
    this.quotaPerUnit = opts.quotaPerUnit ?? DEFAULT_QUOTA_PER_UNIT;
    this.timeouts = { ...DEFAULT_TIMEOUTS, ...opts.timeouts };
    this.fetchImpl = opts.fetch ?? ((input, init) => fetch(input, init));
  }

  private async exchange(
    method: "GET" | "POST",
    path: string,
    token: string,
    timeoutMs: number,
    body?: unknown,
  ): Promise<Exchange> {
    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), timeoutMs);
    try {
      const res = await this.fetchImpl(`${this.baseUrl}${path}`, {
        method,
        headers: {
          Authorization: `Bearer ${token}`,
          ...(body !== undefined ? { "Content-Type": "application/json" } : {}),
        },
        body: body !== undefined ? JSON.stringify(body) : undefined,
        signal: controller.signal,
      });
      const text = await res.text();
      return { delivered: true, status: res.status, body: parseBody(text) };
    } catch (err) {
      const timedOut = controller.signal.aborted;
      const message = timedOut
        ? `${method} ${path} timed out after ${timeoutMs}ms`
        : `${method} ${path} failed: ${err instanceof Error ? err.message : String(err)}`;
      return { delivered: false, timedOut, message };
    } finally {
      clearTimeout(timer);
    }
  }

  async verifyIdentity(credential: string): Promise<VerifyResult> {
    const trimmed = credential.trim();
    if (!hasCredentialShape(trimmed)) {
      return { kind: "invalid", reason: "credential must start with sk-" };
    }

    const res = await this.exchange("GET", "/v1/models", trimmed, this.timeouts.verifyMs);
    if (!res.delivered) return { kind: "transient-error", message: res.message };

    const verdict = interpretVerify(res.status, res.body);
    switch (verdict.kind) {
      case "accepted":
        return {
          kind: "valid",
          userId: credentialFingerprint(trimmed),
          username: credentialPreview(trimmed),
        };
      case "rejected":
        return { kind: "invalid", reason: verdict.reason };
      case "unavailable":
        return { kind: "transient-error", message: verdict.message };
    }
  }

  async mintCode(tier: TierValue): Promise<MintResult> {
    const quota = tierToUnits(tier, this.quotaPerUnit);
    if (quota > BigInt(Number.MAX_SAFE_INTEGER)) {
      return { kind: "rejected", message: `quota for tier ${tier} exceeds ledger range` };
    }

    const res = await this.exchange("POST", "/api/redemption/", this.adminToken, this.timeouts.mintMs, {
      name: `drop-${tier}`,
      key_count: 1,
      quota: Number(quota),
    });
    // Not delivered may still mean created remotely.
    if (!res.delivered) return { kind: "unknown", message: res.message };
    return interpretMint(res.status, res.body);
  }

  async autoRedeem(credential: string, code: string): Promise<RedeemResult> {
    const res = await this.exchange("POST", "/api/user/topup", credential.trim(), this.timeouts.redeemMs, {
      key: code,
    });
    if (!res.delivered) return { kind: "failed", message: res.message };
    return interpretRedeem(res.status, res.body);
  }
}
