/**
 * Credential fingerprints. The raw credential is never stored; users are
 * keyed by a truncated SHA-256 and shown a masked preview.
 */

import { sha256 } from "@noble/hashes/sha256";
import { bytesToHex, utf8ToBytes } from "@noble/hashes/utils";

export const CREDENTIAL_PREFIX = "sk-";
const USER_ID_HEX_CHARS = 32;

export function credentialFingerprint(credential: string): string {
  return bytesToHex(sha256(utf8ToBytes(credential))).slice(0, USER_ID_HEX_CHARS);
}

/** "sk-abcdefg****wxyz" */
export function credentialPreview(credential: string): string {
  return `${credential.slice(0, 10)}****${credential.slice(-4)}`;
}

export function hasCredentialShape(credential: string): boolean {
  return credential.startsWith(CREDENTIAL_PREFIX) && credential.length > CREDENTIAL_PREFIX.length;
}
