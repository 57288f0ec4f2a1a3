/**
 * @codedrop/allocation: allocation rules.
 *
 * Pure functions and types only: no I/O, no state, no clock reads.
 * The claim server and its clients import from here, never the reverse.
 */

// Clock + time windows
export {
  systemClock,
  ManualClock,
  toUtcInstant,
  addMinutes,
  secondsUntil,
  formatDuration,
  type Clock,
} from "./time.js";

// Tier values (exact decimals)
export {
  parseTierValue,
  compareTierValues,
  tierToUnits,
  type TierValue,
} from "./tier.js";

// Randomness
export {
  mathRandom,
  createSeededRandom,
  sequenceRandom,
  type RandomSource,
} from "./rng.js";

// Policy model
export {
  DEFAULT_POLICY,
  POLICY_KEYS,
  isPolicyKey,
  decodePolicy,
  policyValue,
  validatePolicyPatch,
  encodePolicyPatch,
  policyToWire,
  type Policy,
  type PolicyKey,
  type PolicyValues,
  type PolicyPatch,
  type PolicyRows,
  type PolicyWrite,
  type DecodedPolicy,
  type SettingKey,
  type AllocationMode,
  type ProbabilityMode,
} from "./policy.js";

// Eligibility
export {
  lookbackStart,
  effectiveExpiry,
  evaluateEligibility,
  assessClaim,
  type ClaimHistoryEntry,
  type Eligibility,
  type ClaimAssessment,
  type BlockReason,
} from "./eligibility.js";

// Tier selection
export {
  tierAvailability,
  totalEffectiveStock,
  drawTier,
  type TierAvailability,
  type LocalCounts,
} from "./tier-selection.js";

// Failure taxonomy
export {
  unauthorized,
  coolingDown,
  poolExhausted,
  allocationFailed,
  configInvalid,
  type ClaimFailure,
  type ClaimFailureKind,
} from "./errors.js";

// Constants
export * from "./constants.js";

// Wire schemas
export * from "./schemas/index.js";
