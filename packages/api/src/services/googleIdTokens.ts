import { createRemoteJWKSet, type JWTPayload, type JWTVerifyGetKey, jwtVerify } from "jose";
import { MobileAuthorizationError } from "../errors.js";
import type { GoogleIdTokenClaims, Services } from "../types.js";

export const GOOGLE_JWKS_URL = "https://www.googleapis.com/oauth2/v3/certs";
export const GOOGLE_ISSUERS = ["accounts.google.com", "https://accounts.google.com"];

/**
 * Verifies Google Sign-In ID tokens. `keys` defaults to Google's published
 * JWKS; tests hand in a local key set.
 */
export function createGoogleIdTokenVerifier(
  clientIds: string[],
  keys: JWTVerifyGetKey = createRemoteJWKSet(new URL(GOOGLE_JWKS_URL))
): Services["idTokens"] {
  return {
    async verify(idToken: string): Promise<GoogleIdTokenClaims> {
      if (clientIds.length === 0) {
        throw new MobileAuthorizationError("invalid_token", "No Google client IDs configured");
      }
      let payload: JWTPayload;
      try {
        ({ payload } = await jwtVerify(idToken, keys, {
          issuer: GOOGLE_ISSUERS,
          audience: clientIds,
        }));
      } catch (error) {
        const reason = error instanceof Error ? error.message : String(error);
        throw new MobileAuthorizationError("invalid_token", `Invalid Google ID token: ${reason}`);
      }

      const { sub } = payload;
      if (!sub) {
        throw new MobileAuthorizationError("invalid_token", "Google ID token has no subject");
      }
      if (payload.email_verified === false) {
        throw new MobileAuthorizationError(
          "email_not_verified",
          "Google account email is not verified"
        );
      }

      return {
        ...payload,
        sub,
        email: typeof payload.email === "string" ? payload.email : undefined,
        email_verified:
          typeof payload.email_verified === "boolean" ? payload.email_verified : undefined,
        name: typeof payload.name === "string" ? payload.name : undefined,
      };
    },
  };
}
