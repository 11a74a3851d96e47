import { assertNever, type User, type UserType } from "./identity.js";

export const sectionVisibilities = ["public", "authorized"] as const;

export type SectionVisibility = (typeof sectionVisibilities)[number];

export function isSectionVisibility(value: string): value is SectionVisibility {
  return sectionVisibilities.some((visibility) => visibility === value);
}

export type VisibilityPolicy = (user: User, visibility: SectionVisibility) => boolean;

export type VisibilityRules = Record<SectionVisibility, readonly UserType[]>;

export const defaultVisibilityPolicy: VisibilityPolicy = (user, visibility) => {
  switch (visibility) {
    case "public":
      return true;
    case "authorized":
      switch (user.type) {
        case "AuthorizedUser":
          return true;
        case "AnonymousUser":
        case "UnauthorizedUser":
          return false;
        default:
          return assertNever(user);
      }
    default:
      return assertNever(visibility);
  }
};

/** Builds a policy from an explicit table of which user types see which visibility. */
export function createVisibilityPolicy(rules: VisibilityRules): VisibilityPolicy {
  return (user, visibility) => rules[visibility].includes(user.type);
}
