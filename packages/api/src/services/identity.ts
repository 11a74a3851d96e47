import type { IncomingMessage } from "node:http";
import {
  anonymousUser,
  authorizedUser,
  createVisibilityPolicy,
  type User,
  unauthorizedUser,
  userTypes,
  type VisibilityPolicy,
} from "@mobile-sdui/core";
import { getUserById } from "../models/users.js";
import type { Config, Context } from "../types.js";
import { getSession, getSessionToken } from "./sessions.js";

/**
 * Works out who is calling. A missing, unknown or expired token yields an
 * anonymous user; a live session of a deactivated account yields an
 * unauthorized one.
 */
export async function resolveUser(context: Context, request: IncomingMessage): Promise<User> {
  const sessionToken = getSessionToken(request);
  if (!sessionToken) return anonymousUser();

  const session = await getSession(context, sessionToken);
  if (!session) {
    context.logger.debug({ event: "session.unknown" }, "ignoring unknown session token");
    return anonymousUser();
  }

  const user = await getUserById(context, session.userId);
  if (!user) return anonymousUser();

  return user.isActive ? authorizedUser(user.id) : unauthorizedUser(user.id);
}

export function createConfiguredVisibilityPolicy(config: Config): VisibilityPolicy {
  return createVisibilityPolicy({
    public: userTypes,
    authorized: config.authorizedSectionsVisibleTo,
  });
}
