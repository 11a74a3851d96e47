#!/usr/bin/env tsx
import { loadRootConfig } from "../src/config/loadConfig.js";
import { createContext, createLogger } from "../src/context/createContext.js";
import { loadFixtures, readFixtureFile } from "../src/services/fixtures.js";

const defaultFixtures = new URL("../fixtures/sections.json", import.meta.url);

async function seed() {
  const file = process.argv[2] ?? defaultFixtures;
  const fixtures = readFixtureFile(file);
  const context = await createContext(loadRootConfig());
  try {
    const counts = await loadFixtures(context, fixtures);
    context.logger.info({ event: "fixtures.loaded", ...counts }, "fixtures loaded");
  } finally {
    await context.destroy();
  }
}

seed().catch((error: unknown) => {
  createLogger({ isDevelopment: true }).fatal({ err: error }, "seeding failed");
  process.exit(1);
});
