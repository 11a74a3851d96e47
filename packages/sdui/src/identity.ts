export const ANONYMOUS_USER_ID = "00000000-0000-0000-0000-000000000000";

export interface AuthorizedUser {
  type: "AuthorizedUser";
  id: string;
}

export interface AnonymousUser {
  type: "AnonymousUser";
  id: string;
}

/** Identified by a valid session, but not allowed to act as a signed-in user. */
export interface UnauthorizedUser {
  type: "UnauthorizedUser";
  id: string;
}

export type User = AuthorizedUser | AnonymousUser | UnauthorizedUser;

export type UserType = User["type"];

export const userTypes: readonly UserType[] = ["AuthorizedUser", "AnonymousUser", "UnauthorizedUser"];

export function authorizedUser(id: string): AuthorizedUser {
  return { type: "AuthorizedUser", id };
}

export function anonymousUser(id: string = ANONYMOUS_USER_ID): AnonymousUser {
  return { type: "AnonymousUser", id };
}

export function unauthorizedUser(id: string): UnauthorizedUser {
  return { type: "UnauthorizedUser", id };
}

export function assertNever(value: never): never {
  throw new Error(`Unexpected value: ${JSON.stringify(value)}`);
}

/**
 * Label used by `whoami`. Intended for tests and debugging only; clients must
 * not parse it.
 */
export function describeUser(user: User): string {
  switch (user.type) {
    case "AuthorizedUser":
      return "authorized user";
    case "AnonymousUser":
      return "anonymous user";
    case "UnauthorizedUser":
      return "unauthorized (but not anonymous) user";
    default:
      return assertNever(user);
  }
}
