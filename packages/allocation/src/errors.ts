/**
 * Claim failure taxonomy.
 *
 * Expected outcomes are values, not exceptions: callers switch on `kind`.
 *
 *   unauthorized       bad or expired credential; needs a new one
 *   cooling-down       retry after retryAfterSeconds
 *   pool-exhausted     retry later, no ETA
 *   allocation-failed  transient external failure; a fresh claim may succeed
 *   config-invalid     admin input rejected
 */

import { formatDuration, secondsUntil } from "./time.js";

export type ClaimFailure =
  | { kind: "unauthorized"; message: string }
  | { kind: "cooling-down"; message: string; retryAfterSeconds: number; cooldownEndsAt: Date }
  | { kind: "pool-exhausted"; message: string }
  | { kind: "allocation-failed"; message: string }
  | { kind: "config-invalid"; message: string };

export type ClaimFailureKind = ClaimFailure["kind"];

export function unauthorized(): ClaimFailure {
  return { kind: "unauthorized", message: "Credential is invalid or expired" };
}

export function coolingDown(now: Date, cooldownEndsAt: Date): ClaimFailure {
  const retryAfterSeconds = secondsUntil(now, cooldownEndsAt);
  return {
    kind: "cooling-down",
    message: `Cooling down, try again in ${formatDuration(retryAfterSeconds)}`,
    retryAfterSeconds,
    cooldownEndsAt,
  };
}

export function poolExhausted(): ClaimFailure {
  return {
    kind: "pool-exhausted",
    message: "All codes have been claimed, please wait for a restock",
  };
}

export function allocationFailed(): ClaimFailure {
  return { kind: "allocation-failed", message: "Allocation failed, please try again." };
}

export function configInvalid(message: string): ClaimFailure {
  return { kind: "config-invalid", message };
}
