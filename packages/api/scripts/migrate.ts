#!/usr/bin/env tsx
import { loadRootConfig } from "../src/config/loadConfig.js";
import { createLogger } from "../src/context/createContext.js";
import { createDatabase } from "../src/db/drizzle.js";
import { migrate } from "../src/db/migrate.js";
import { createPglite } from "../src/db/pglite.js";

async function run() {
  const config = loadRootConfig();
  const logger = createLogger(config);

  if (config.dbMode === "pglite") {
    // PGlite applies the schema when it opens.
    const { close } = await createPglite(config.pgliteDir || "data/pglite");
    await close();
  } else {
    const { pool, close } = createDatabase(config.postgresUri);
    try {
      await migrate(pool);
    } finally {
      await close();
    }
  }

  logger.info({ dbMode: config.dbMode }, "schema applied");
}

run().catch((error: unknown) => {
  createLogger({ isDevelopment: true }).fatal({ err: error }, "migration failed");
  process.exit(1);
});
