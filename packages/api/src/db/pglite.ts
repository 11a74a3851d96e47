import fs from "node:fs";
import path from "node:path";
import { PGlite } from "@electric-sql/pglite";
import { drizzle } from "drizzle-orm/pglite";
import * as schema from "./schema.js";
import { readSchemaSql } from "./migrate.js";

/**
 * Opens an embedded Postgres. Without `dir` the database lives in memory,
 * which is what the tests use.
 */
export async function createPglite(dir?: string) {
  let dataDir: string | undefined;
  if (dir) {
    dataDir = path.resolve(process.cwd(), dir);
    fs.mkdirSync(dataDir, { recursive: true });
  }
  const client = await PGlite.create(dataDir);
  await client.exec(readSchemaSql());
  const db = drizzle(client, { schema });
  const close = async () => {
    if (!client.closed) await client.close();
  };
  return { db, client, close };
}
