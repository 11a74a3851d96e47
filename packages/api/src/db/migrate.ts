import fs from "node:fs";
import type { Pool } from "pg";

const schemaSqlUrl = new URL("../../sql/schema.sql", import.meta.url);

export function readSchemaSql(): string {
  return fs.readFileSync(schemaSqlUrl, "utf8");
}

/** Applies `sql/schema.sql`. Every statement is idempotent. */
export async function migrate(pool: Pool): Promise<void> {
  await pool.query(readSchemaSql());
}
