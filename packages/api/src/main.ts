import { pino } from "pino";
import { hasConfigFile, loadRootConfig } from "./config/loadConfig.js";
import { createContext } from "./context/createContext.js";
import { createServer } from "./createServer.js";

const rootLogger = pino();

async function main() {
  const config = loadRootConfig();
  const context = await createContext(config);
  const { logger } = context;

  try {
    if (!hasConfigFile()) {
      logger.info("No config.yaml found; using defaults and environment overrides");
    }
    if (config.googleClientIds.length === 0) {
      logger.warn("No Google client IDs configured; mobile authorization will reject every token");
    }

    const app = await createServer(context);
    await app.start();

    logger.info(
      {
        api: `http://localhost:${config.port}/api`,
        dbMode: config.dbMode,
      },
      "SDUI server started"
    );

    const shutdown = async (signal: NodeJS.Signals) => {
      logger.info({ signal }, "Shutting down");
      await app.stop();
      process.exit(0);
    };

    const onSignal = (signal: NodeJS.Signals) => {
      shutdown(signal).catch((error: unknown) => {
        logger.error({ err: error }, "Shutdown failed");
        process.exit(1);
      });
    };

    process.on("SIGINT", onSignal);
    process.on("SIGTERM", onSignal);
  } catch (error) {
    logger.error({ err: error }, "Failed to start server");
    await context.destroy();
    throw error;
  }
}

main().catch((error) => {
  rootLogger.error({ err: error }, "Fatal error");
  process.exit(1);
});
