import { pino } from "pino";
import { createDatabase } from "../db/drizzle.js";
import { createPglite } from "../db/pglite.js";
import { createGoogleIdTokenVerifier } from "../services/googleIdTokens.js";
import { createConfiguredVisibilityPolicy } from "../services/identity.js";
import { cleanupExpiredSessions } from "../services/sessions.js";
import type { Config, Context, Database, Logger, Services } from "../types.js";

const SESSION_CLEANUP_INTERVAL_MS = 15 * 60 * 1000;

export function createLogger(config: Pick<Config, "logLevel" | "isDevelopment">) {
  return pino({
    level: config.logLevel || "info",
    transport: config.isDevelopment
      ? {
          target: "pino-pretty",
          options: {
            colorize: true,
          },
        }
      : undefined,
  });
}

async function openDatabase(
  config: Config,
  logger: Logger
): Promise<{ db: Database; close: () => Promise<void> }> {
  if (config.dbMode === "pglite") {
    const { db, close } = await createPglite(config.pgliteDir || "data/pglite");
    return { db, close };
  }

  const { db, pool, close } = createDatabase(config.postgresUri);
  pool.on("error", (err) => {
    logger.error({ err }, "Database pool error");
  });
  return { db, close };
}

export interface CreateContextOptions {
  logger?: Logger;
  db?: Database;
  services?: Partial<Services>;
}

/**
 * Wires the process-wide collaborators. Tests pass their own database and
 * services; the session cleanup job only runs when the context owns the
 * database.
 */
export async function createContext(
  config: Config,
  options: CreateContextOptions = {}
): Promise<Context> {
  const cleanupFunctions: Array<() => Promise<void> | void> = [];
  const logger = options.logger ?? createLogger(config);

  let db: Database;
  if (options.db) {
    db = options.db;
  } else {
    const opened = await openDatabase(config, logger);
    db = opened.db;
    cleanupFunctions.push(opened.close);
  }

  const context: Context = {
    db,
    config,
    services: {
      idTokens: options.services?.idTokens ?? createGoogleIdTokenVerifier(config.googleClientIds),
      visibilityPolicy:
        options.services?.visibilityPolicy ?? createConfiguredVisibilityPolicy(config),
    },
    logger,
    cleanupFunctions,
    async destroy() {
      for (const cleanup of cleanupFunctions.splice(0).reverse()) {
        await cleanup();
      }
    },
  };

  if (!options.db) {
    const interval = setInterval(() => {
      cleanupExpiredSessions(context)
        .then((removed) => {
          if (removed > 0) {
            logger.info({ event: "session.cleanup", removed }, "expired sessions removed");
          }
        })
        .catch((err: unknown) => {
          logger.warn({ err }, "Session cleanup failed");
        });
    }, SESSION_CLEANUP_INTERVAL_MS);
    interval.unref();
    cleanupFunctions.push(() => clearInterval(interval));
  }

  return context;
}
