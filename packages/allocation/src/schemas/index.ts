/**
 * Schema barrel export.
 * All V1 wire types shared by the server and its clients.
 */

export {
  PolicyV1,
  PolicyPatchV1,
  AllocationModeV1,
  ProbabilityModeV1,
  TierWeightsV1,
  TierStockV1,
  CooldownMinutesV1,
  ClaimsPerWindowV1,
} from "./policy.js";

export {
  PoolEntryV1,
  PoolEntrySource,
  TierValueV1,
} from "./pool-entry.js";

export { ClaimRecordV1 } from "./claim-record.js";
