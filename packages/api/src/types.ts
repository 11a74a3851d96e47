import type { User, VisibilityPolicy } from "@mobile-sdui/core";
import type { PgDatabase, PgQueryResultHKT } from "drizzle-orm/pg-core";
import type { JWTPayload } from "jose";
import type { z } from "zod/v4";
import type * as schema from "./db/schema.js";

export type Database = PgDatabase<PgQueryResultHKT, typeof schema>;

export interface Context {
  db: Database;
  config: Config;
  services: Services;
  logger: Logger;
  cleanupFunctions: Array<() => Promise<void> | void>;
  destroy: () => Promise<void>;
}

export interface Logger {
  error: (obj: unknown, msg?: string) => void;
  warn: (obj: unknown, msg?: string) => void;
  info: (obj: unknown, msg?: string) => void;
  debug: (obj: unknown, msg?: string) => void;
  trace: (obj: unknown, msg?: string) => void;
  fatal: (obj: unknown, msg?: string) => void;
}

export interface GoogleIdTokenClaims extends JWTPayload {
  sub: string;
  email?: string;
  email_verified?: boolean;
  name?: string;
}

export interface Services {
  idTokens: {
    verify: (idToken: string) => Promise<GoogleIdTokenClaims>;
  };
  visibilityPolicy: VisibilityPolicy;
}

export interface Config {
  dbMode: "remote" | "pglite";
  pgliteDir?: string;
  postgresUri: string;
  port: number;
  googleClientIds: string[];
  sessionLifetimeSeconds: number;
  authorizedSectionsVisibleTo: Array<User["type"]>;
  isDevelopment: boolean;
  logLevel?: string; // Pino log level (error, warn, info, debug, trace, silent)
  configFile?: string;
}

export interface SessionRecord {
  id: string;
  userId: string;
  createdAt: Date;
  expiresAt: Date;
}

export type ControllerSchemaObject = z.ZodType | Record<string, unknown>;

export interface ControllerResponse {
  description: string;
  content?: Record<string, { schema: ControllerSchemaObject }>;
}

export interface ControllerBody {
  description?: string;
  contentType: string;
  required?: boolean;
  schema: ControllerSchemaObject;
}

export interface ControllerSchema {
  method: "GET" | "POST" | "PUT" | "PATCH" | "DELETE" | "OPTIONS";
  path: string;
  operationId: string;
  summary: string;
  description?: string;
  tags?: readonly string[];
  security?: ReadonlyArray<Record<string, readonly string[]>>;
  query?: z.ZodObject;
  body?: ControllerBody;
  responses: Record<string, ControllerResponse>;
}
