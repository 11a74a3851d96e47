import type { ServerResponse } from "node:http";

/**
 * Headers for a JSON-only API. Nothing here is rendered by a browser, so the
 * CSP denies everything.
 */
export function setSecurityHeaders(response: ServerResponse, isDevelopment = false): void {
  response.setHeader("Content-Security-Policy", "default-src 'none'; frame-ancestors 'none'");
  response.setHeader("X-Frame-Options", "DENY");
  response.setHeader("X-Content-Type-Options", "nosniff");
  response.setHeader("Referrer-Policy", "no-referrer");
  response.setHeader("Cache-Control", "no-store");

  // HSTS (only in production with HTTPS)
  if (!isDevelopment) {
    response.setHeader("Strict-Transport-Security", "max-age=31536000; includeSubDomains");
  }
}
