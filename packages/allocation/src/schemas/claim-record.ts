/**
 * ClaimRecordV1: append-only award log entry.
 * cooldown_expires_at is fixed at write time from the policy then in force.
 */

import { Type, type Static } from "@sinclair/typebox";
import { TierValueV1 } from "./pool-entry.js";

export const ClaimRecordV1 = Type.Object(
  {
    user_id: Type.String(),
    username: Type.String(),
    code: Type.String(),
    tier_value: TierValueV1,
    claimed_at: Type.String({ format: "date-time" }),
    cooldown_expires_at: Type.String({ format: "date-time" }),
    auto_redeemed: Type.Boolean(),
  },
  { additionalProperties: false },
);

export type ClaimRecordV1 = Static<typeof ClaimRecordV1>;
