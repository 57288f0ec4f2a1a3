/**
 * Policy store: typed view over the policy_settings and tier_stock rows.
 *
 * snapshot() is the only way the allocator reads policy: one consistent
 * read, decoded once, used for a whole decision.
 */

import {
  configInvalid,
  decodePolicy,
  encodePolicyPatch,
  policyValue,
  validatePolicyPatch,
  type ClaimFailure,
  type Policy,
  type PolicyKey,
  type PolicyRows,
  type PolicyValues,
} from "@codedrop/allocation";
import type { Logger } from "../log.js";
import type { LedgerStore } from "../store/types.js";

export type PolicyUpdateResult =
  | { ok: true; policy: Policy }
  | { ok: false; failure: ClaimFailure };

export class PolicyStore {
  constructor(
    private readonly store: LedgerStore,
    private readonly log: Logger,
  ) {}

  private decode(rows: PolicyRows): Policy {
    const { policy, invalidKeys } = decodePolicy(rows);
    if (invalidKeys.length > 0) {
      this.log.warn({ invalidKeys, version: policy.version }, "policy store holds invalid values, defaults applied");
    }
    return policy;
  }

  async snapshot(): Promise<Policy> {
    return this.decode(await this.store.snapshotPolicyRows());
  }

  /** Stored value for key, or its default. */
  async get<K extends PolicyKey>(key: K): Promise<PolicyValues[K]> {
    return policyValue(await this.snapshot(), key);
  }

  async set(key: PolicyKey, value: unknown): Promise<PolicyUpdateResult> {
    return this.update({ [key]: value });
  }

  /**
   * Validate and apply a partial policy in one transaction.
   * Tier weights merge per tier; stock counters are set per tier.
   */
  async update(input: unknown): Promise<PolicyUpdateResult> {
    const checked = validatePolicyPatch(input);
    if (!checked.valid) {
      return { ok: false, failure: configInvalid(checked.error) };
    }

    const policy = await this.store.transaction(async (tx) => {
      const current = this.decode(await tx.readPolicyRows());
      await tx.writePolicy(encodePolicyPatch(current, checked.patch));
      return this.decode(await tx.readPolicyRows());
    });

    this.log.info({ version: policy.version, fields: Object.keys(checked.patch) }, "policy updated");
    return { ok: true, policy };
  }
}
