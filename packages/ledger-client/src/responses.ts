/**
 * Response-shape adapters for the ledger's JSON API.
 *
 * The ledger wraps most replies as { success, message, data }, but not all
 * endpoints agree. All sniffing of that shape happens here.
 */

import type { MintResult, RedeemResult } from "./types.js";

type JsonRecord = Record<string, unknown>;

function isRecord(value: unknown): value is JsonRecord {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/** Parse a body as JSON. Non-JSON bodies come back as undefined. */
export function parseBody(text: string): unknown {
  if (text.length === 0) return undefined;
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}

function messageOf(body: unknown, fallback: string): string {
  if (isRecord(body)) {
    for (const key of ["message", "detail", "error"]) {
      const value = body[key];
      if (typeof value === "string" && value.length > 0) return value;
    }
  }
  return fallback;
}

const isSuccess = (status: number) => status >= 200 && status < 300;

export type VerifyVerdict =
  | { kind: "accepted" }
  | { kind: "rejected"; reason: string }
  | { kind: "unavailable"; message: string };

/** Request timeout and rate limiting say nothing about the credential. */
const TRANSIENT_STATUSES = new Set([408, 429]);

/** GET /v1/models with the credential as bearer token. */
export function interpretVerify(status: number, body: unknown): VerifyVerdict {
  if (status >= 500 || TRANSIENT_STATUSES.has(status)) {
    return { kind: "unavailable", message: `ledger returned ${status}` };
  }
  if (status !== 200) {
    return { kind: "rejected", reason: messageOf(body, `ledger returned ${status}`) };
  }
  if (isRecord(body) && (body.success === true || "data" in body)) {
    return { kind: "accepted" };
  }
  return { kind: "rejected", reason: messageOf(body, "unrecognized identity response") };
}

function firstCode(data: unknown): string | null {
  if (typeof data === "string" && data.length > 0) return data;
  if (Array.isArray(data)) {
    const first: unknown = data[0];
    if (typeof first === "string" && first.length > 0) return first;
  }
  return null;
}

/** POST /api/redemption/: data is the created key list (or a single key). */
export function interpretMint(status: number, body: unknown): MintResult {
  if (status >= 500) {
    // The ledger may have created the code before failing.
    return { kind: "unknown", message: messageOf(body, `ledger returned ${status}`) };
  }
  if (!isSuccess(status)) {
    return { kind: "rejected", message: messageOf(body, `ledger returned ${status}`) };
  }
  if (!isRecord(body)) {
    return { kind: "unknown", message: "mint response is not a JSON object" };
  }
  if (body.success === false) {
    return { kind: "rejected", message: messageOf(body, "mint rejected") };
  }
  const code = firstCode(body.data);
  if (code === null) {
    return { kind: "unknown", message: "mint response carries no code" };
  }
  return { kind: "minted", code };
}

/** POST /api/user/topup */
export function interpretRedeem(status: number, body: unknown): RedeemResult {
  if (!isSuccess(status)) {
    return { kind: "failed", message: messageOf(body, `ledger returned ${status}`) };
  }
  if (isRecord(body) && body.success === false) {
    return { kind: "failed", message: messageOf(body, "redeem rejected") };
  }
  return { kind: "redeemed" };
}
