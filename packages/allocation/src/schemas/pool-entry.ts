/**
 * PoolEntryV1: one awardable code, pre-loaded or minted at award time.
 */

import { Type, type Static } from "@sinclair/typebox";

export const TierValueV1 = Type.String({ pattern: "^\\d+(\\.\\d+)?$" });

export const PoolEntrySource = Type.Union([
  Type.Literal("manual"),
  Type.Literal("minted"),
]);

export type PoolEntrySource = Static<typeof PoolEntrySource>;

export const PoolEntryV1 = Type.Object(
  {
    id: Type.String(),
    code: Type.String({ minLength: 1, maxLength: 128 }),
    tier_value: TierValueV1,
    claimed: Type.Boolean(),
    claimed_by: Type.Union([Type.String(), Type.Null()]),
    claimed_at: Type.Union([Type.String({ format: "date-time" }), Type.Null()]),
    source: PoolEntrySource,
    created_at: Type.String({ format: "date-time" }),
  },
  { additionalProperties: false },
);

export type PoolEntryV1 = Static<typeof PoolEntryV1>;
