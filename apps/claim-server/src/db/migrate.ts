/**
 * Apply the schema SQL shipped in migrations/. Every statement is
 * idempotent, so this runs on each startup.
 */

import { readdir, readFile } from "node:fs/promises";
import { fileURLToPath } from "node:url";
import type { Pool } from "pg";

const MIGRATIONS_DIR = fileURLToPath(new URL("../../migrations/", import.meta.url));

export async function migrate(pool: Pool): Promise<string[]> {
  const files = (await readdir(MIGRATIONS_DIR)).filter((f) => f.endsWith(".sql")).sort();
  for (const file of files) {
    const text = await readFile(`${MIGRATIONS_DIR}${file}`, "utf8");
    await pool.query(text);
  }
  return files;
}
