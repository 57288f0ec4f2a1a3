/**
 * @codedrop/ledger-client: remote ledger abstraction.
 *
 * The claim server verifies identities, mints codes and deposits them
 * through the LedgerClient interface. Swap HttpLedgerClient for
 * MockLedgerClient in tests and dev mode.
 */

export type {
  LedgerClient,
  LedgerTimeouts,
  HttpLedgerClientOptions,
  VerifyResult,
  MintResult,
  RedeemResult,
} from "./types.js";

export { HttpLedgerClient, DEFAULT_QUOTA_PER_UNIT, DEFAULT_TIMEOUTS } from "./http-client.js";
export { MockLedgerClient, type MockMintMode, type MockVerifyMode, type MockLedgerCalls } from "./mock-client.js";
export {
  CREDENTIAL_PREFIX,
  credentialFingerprint,
  credentialPreview,
  hasCredentialShape,
} from "./fingerprint.js";
export { interpretVerify, interpretMint, interpretRedeem, parseBody, type VerifyVerdict } from "./responses.js";
