import { drizzle } from "drizzle-orm/node-postgres";
import pg from "pg";
import * as schema from "./schema.js";

const { Pool } = pg;

export function createDatabase(connectionString: string) {
  const pool = new Pool({ connectionString, keepAlive: true });

  return {
    db: drizzle(pool, { schema }),
    pool,
    async close() {
      await pool.end();
    },
  };
}
