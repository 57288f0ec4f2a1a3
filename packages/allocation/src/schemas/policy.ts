/**
 * PolicyV1: allocation policy as it crosses the admin API and the
 * policy store. Field names double as policy store keys.
 */

import { Type, type Static } from "@sinclair/typebox";
import { MAX_CLAIMS_PER_WINDOW, MAX_COOLDOWN_MINUTES, MAX_TIER_STOCK } from "../constants.js";

export const AllocationModeV1 = Type.Union([
  Type.Literal("local-first"),
  Type.Literal("mint-only"),
]);

export const ProbabilityModeV1 = Type.Union([
  Type.Literal("weight-only"),
  Type.Literal("weight-times-stock"),
]);

/** tier value (decimal string) → non-negative weight */
export const TierWeightsV1 = Type.Record(Type.String(), Type.Number({ minimum: 0 }));

/** tier value (decimal string) → non-negative integer count */
export const TierStockV1 = Type.Record(
  Type.String(),
  Type.Integer({ minimum: 0, maximum: MAX_TIER_STOCK }),
);

export const CooldownMinutesV1 = Type.Integer({ minimum: 1, maximum: MAX_COOLDOWN_MINUTES });
export const ClaimsPerWindowV1 = Type.Integer({ minimum: 1, maximum: MAX_CLAIMS_PER_WINDOW });

export const PolicyV1 = Type.Object(
  {
    version: Type.Integer({ minimum: 0 }),
    cooldown_minutes: CooldownMinutesV1,
    claims_per_window: ClaimsPerWindowV1,
    tier_weights: TierWeightsV1,
    tier_stock: TierStockV1,
    allocation_mode: AllocationModeV1,
    probability_mode: ProbabilityModeV1,
    auto_redeem: Type.Boolean(),
  },
  { additionalProperties: false },
);

export type PolicyV1 = Static<typeof PolicyV1>;

/** Admin SetPolicy body. Tier maps merge per tier. */
export const PolicyPatchV1 = Type.Object(
  {
    cooldown_minutes: Type.Optional(CooldownMinutesV1),
    claims_per_window: Type.Optional(ClaimsPerWindowV1),
    tier_weights: Type.Optional(TierWeightsV1),
    tier_stock: Type.Optional(TierStockV1),
    allocation_mode: Type.Optional(AllocationModeV1),
    probability_mode: Type.Optional(ProbabilityModeV1),
    auto_redeem: Type.Optional(Type.Boolean()),
  },
  { additionalProperties: false },
);

export type PolicyPatchV1 = Static<typeof PolicyPatchV1>;
