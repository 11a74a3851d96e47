import type { IncomingMessage } from "node:http";
import { eq, lt } from "drizzle-orm";
import { sessions } from "../db/schema.js";
import type { Context, SessionRecord } from "../types.js";
import { generateRandomString, sha256Base64Url } from "../utils/crypto.js";
import { parseAuthorizationHeader } from "../utils/http.js";

const SESSION_TOKEN_BYTES = 32;

/**
 * Issues an opaque session token for a user. Only the token's SHA-256 is
 * persisted, so a leaked database does not leak usable tokens.
 */
export async function createSession(
  context: Context,
  userId: string
): Promise<{ sessionToken: string; expiresAt: Date }> {
  const sessionToken = generateRandomString(SESSION_TOKEN_BYTES);
  const expiresAt = new Date(Date.now() + context.config.sessionLifetimeSeconds * 1000);

  await context.db.insert(sessions).values({
    id: sha256Base64Url(sessionToken),
    userId,
    createdAt: new Date(),
    expiresAt,
  });

  context.logger.info({ event: "session.create", userId, expiresAt }, "session created");

  return { sessionToken, expiresAt };
}

/** Returns the live session for a token; expired sessions are deleted on read. */
export async function getSession(
  context: Context,
  sessionToken: string
): Promise<SessionRecord | null> {
  const id = sha256Base64Url(sessionToken);
  const [session] = await context.db.select().from(sessions).where(eq(sessions.id, id)).limit(1);

  if (!session) return null;

  if (new Date() > session.expiresAt) {
    await context.db.delete(sessions).where(eq(sessions.id, id));
    return null;
  }

  return session;
}

/** Returns whether a session existed for the token. */
export async function deleteSession(context: Context, sessionToken: string): Promise<boolean> {
  const deleted = await context.db
    .delete(sessions)
    .where(eq(sessions.id, sha256Base64Url(sessionToken)))
    .returning({ id: sessions.id });
  return deleted.length > 0;
}

export async function cleanupExpiredSessions(context: Context): Promise<number> {
  const deleted = await context.db
    .delete(sessions)
    .where(lt(sessions.expiresAt, new Date()))
    .returning({ id: sessions.id });
  return deleted.length;
}

export function getSessionToken(request: IncomingMessage): string | null {
  const authorization = parseAuthorizationHeader(request);
  if (!authorization || authorization.type.toLowerCase() !== "bearer") return null;
  return authorization.credentials.trim() || null;
}
