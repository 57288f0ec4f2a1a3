/**
 * Claim server configuration.
 *
 * Policy values (cooldown, weights, stock, modes) are runtime settings in
 * the policy store, not environment.
 */

function env(key: string, fallback?: string): string {
  const val = process.env[key] ?? fallback;
  if (val === undefined) throw new Error(`Missing env: ${key}`);
  return val;
}

export const config = {
  port: parseInt(env("CLAIM_SERVER_PORT", "3200"), 10),
  host: env("CLAIM_SERVER_HOST", "0.0.0.0"),
  /** Empty = in-memory store (dev mode). */
  databaseUrl: env("DATABASE_URL", ""),
  ledgerUrl: env("LEDGER_URL", "http://localhost:3000"),
  /** Empty = mock ledger (dev mode). */
  ledgerAdminToken: env("LEDGER_ADMIN_TOKEN", ""),
  /** Ledger quota units per 1.0 of tier value. */
  ledgerQuotaPerUnit: parseInt(env("LEDGER_QUOTA_PER_UNIT", "500000"), 10),
  verifyTimeoutMs: parseInt(env("VERIFY_TIMEOUT_MS", "10000"), 10),
  mintTimeoutMs: parseInt(env("MINT_TIMEOUT_MS", "15000"), 10),
  redeemTimeoutMs: parseInt(env("REDEEM_TIMEOUT_MS", "10000"), 10),
  /** Empty = admin routes disabled. */
  adminPassword: env("ADMIN_PASSWORD", ""),
  logLevel: env("LOG_LEVEL", "info"),
} as const;
