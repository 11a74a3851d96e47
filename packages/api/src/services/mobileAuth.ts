import { MobileAuthorizationError } from "../errors.js";
import { upsertGoogleUser } from "../models/users.js";
import type { Context } from "../types.js";
import { createSession, deleteSession } from "./sessions.js";

/**
 * Exchanges a Google ID token for a session token. There is no separate
 * sign-up: a verified Google account is registered on its first call.
 */
export async function authorizeMobile(
  context: Context,
  googleIdToken: string
): Promise<{ sessionToken: string; userId: string }> {
  const claims = await context.services.idTokens.verify(googleIdToken);
  const user = await upsertGoogleUser(context, {
    googleSub: claims.sub,
    email: claims.email,
    name: claims.name,
  });
  if (!user.isActive) {
    throw new MobileAuthorizationError("user_disabled", "User account is disabled");
  }
  const { sessionToken } = await createSession(context, user.id);
  return { sessionToken, userId: user.id };
}

export async function deauthorizeMobile(context: Context, sessionToken: string): Promise<boolean> {
  const deleted = await deleteSession(context, sessionToken);
  context.logger.info({ event: "session.delete", deleted }, "mobile session deauthorized");
  return deleted;
}
