/**
 * Request shapes, wire conversions and failure → HTTP mapping shared by
 * the user and admin routes. Wire names are snake_case; instants are
 * ISO-8601 UTC; tier values are decimal strings.
 */

import { Type, type Static, type TSchema } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";
import {
  PoolEntrySource,
  type ClaimFailure,
  type ClaimRecordV1,
  type PoolEntryV1,
} from "@codedrop/allocation";
import type { FastifyReply } from "fastify";
import type { Award } from "../services/allocator.js";
import type { EligibilityView } from "../services/claim-service.js";
import type { ClaimRecord, PoolEntry } from "../store/types.js";

// ── Request bodies ─────────────────────────────────────────────────

export const CredentialBody = Type.Object({
  credential: Type.String({ minLength: 1, maxLength: 512 }),
});

const TierInput = Type.Union([Type.String({ minLength: 1, maxLength: 32 }), Type.Number()]);

export const LoadPoolBody = Type.Object(
  {
    codes: Type.Array(Type.String({ maxLength: 128 })),
    tier_value: TierInput,
  },
  { additionalProperties: false },
);

export const DeletePoolBody = Type.Object(
  {
    ids: Type.Optional(Type.Array(Type.String())),
    tier_value: Type.Optional(TierInput),
    claimed: Type.Optional(Type.Boolean()),
    source: Type.Optional(PoolEntrySource),
  },
  { additionalProperties: false },
);

const PositiveIntString = Type.String({ pattern: "^[1-9][0-9]{0,8}$" });

export const PoolQuery = Type.Object(
  {
    claimed: Type.Optional(Type.Union([Type.Literal("true"), Type.Literal("false")])),
    tier_value: Type.Optional(Type.String({ minLength: 1, maxLength: 32 })),
    source: Type.Optional(PoolEntrySource),
    page: Type.Optional(PositiveIntString),
    page_size: Type.Optional(PositiveIntString),
  },
  { additionalProperties: false },
);

export type Checked<T extends TSchema> =
  | { ok: true; value: Static<T> }
  | { ok: false; error: string };

/** Validate untrusted input against a schema; the first error names the field. */
export function check<T extends TSchema>(schema: T, input: unknown): Checked<T> {
  if (Value.Check(schema, input)) return { ok: true, value: input };
  const first = Value.Errors(schema, input).First();
  const path = first?.path ? first.path.slice(1).replace(/\//g, ".") : "body";
  return { ok: false, error: `${path}: ${first?.message ?? "invalid"}` };
}

// ── Wire conversions ───────────────────────────────────────────────

export function awardToWire(award: Award) {
  return {
    code: award.code,
    tier_value: award.tierValue,
    auto_redeemed: award.autoRedeemed,
    remaining: award.remaining,
    claimed_at: award.claimedAt.toISOString(),
    cooldown_expires_at: award.cooldownExpiresAt.toISOString(),
  };
}

export function claimRecordToWire(record: ClaimRecord): ClaimRecordV1 {
  return {
    user_id: record.userId,
    username: record.username,
    code: record.code,
    tier_value: record.tierValue,
    claimed_at: record.claimedAt.toISOString(),
    cooldown_expires_at: record.cooldownExpiresAt.toISOString(),
    auto_redeemed: record.autoRedeemed,
  };
}

export function poolEntryToWire(entry: PoolEntry): PoolEntryV1 {
  return {
    id: entry.id,
    code: entry.code,
    tier_value: entry.tierValue,
    claimed: entry.claimed,
    claimed_by: entry.claimedBy,
    claimed_at: entry.claimedAt ? entry.claimedAt.toISOString() : null,
    source: entry.source,
    created_at: entry.createdAt.toISOString(),
  };
}

export function eligibilityToWire(view: EligibilityView, history: readonly ClaimRecord[]) {
  return {
    can_claim: view.canClaim,
    remaining: view.remaining,
    cooldown_seconds_remaining: view.cooldownSecondsRemaining,
    cooldown_ends_at: view.cooldownEndsAt ? view.cooldownEndsAt.toISOString() : null,
    cooldown_text: view.cooldownText,
    pool_available: view.poolAvailable,
    blocked_by: view.blockedBy,
    available_count: view.availableCount,
    history: history.map(claimRecordToWire),
  };
}

// ── Failures ───────────────────────────────────────────────────────

const FAILURE_STATUS: Record<ClaimFailure["kind"], number> = {
  unauthorized: 401,
  "cooling-down": 429,
  "pool-exhausted": 409,
  "allocation-failed": 503,
  "config-invalid": 422,
};

export function sendFailure(reply: FastifyReply, failure: ClaimFailure) {
  if (failure.kind === "cooling-down") {
    return reply
      .status(FAILURE_STATUS[failure.kind])
      .header("Retry-After", String(failure.retryAfterSeconds))
      .send({
        error: failure.kind,
        message: failure.message,
        retry_after_seconds: failure.retryAfterSeconds,
      });
  }
  return reply.status(FAILURE_STATUS[failure.kind]).send({ error: failure.kind, message: failure.message });
}
