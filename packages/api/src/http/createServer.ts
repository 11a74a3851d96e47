import {
  createServer as createHttpServer,
  type IncomingMessage,
  type ServerResponse,
} from "node:http";
import { NotFoundError } from "../errors.js";
import type { Context } from "../types.js";
import { sendError } from "../utils/http.js";
import { setSecurityHeaders } from "../utils/security.js";
import { createApiRouter } from "./routers/apiRouter.js";

const API_PREFIX = "/api";

/** Strips the `/api` prefix and hands the request to the router. */
export function createRequestHandler(context: Context) {
  const router = createApiRouter(context);

  return async (request: IncomingMessage, response: ServerResponse) => {
    try {
      const url = new URL(request.url || "", `http://${request.headers.host}`);
      const pathname = url.pathname;

      const origin = request.headers.origin;
      if (origin) {
        response.setHeader("Access-Control-Allow-Origin", origin);
        response.setHeader("Vary", "Origin");
        response.setHeader(
          "Access-Control-Allow-Headers",
          request.headers["access-control-request-headers"] || "content-type,authorization"
        );
        response.setHeader(
          "Access-Control-Allow-Methods",
          request.headers["access-control-request-method"] || "GET,POST,OPTIONS"
        );
        if (request.method === "OPTIONS") {
          response.statusCode = 204;
          response.end();
          return;
        }
      }

      setSecurityHeaders(response, context.config.isDevelopment);

      if (pathname !== API_PREFIX && !pathname.startsWith(`${API_PREFIX}/`)) {
        throw new NotFoundError("Endpoint not found");
      }

      request.url = (pathname.slice(API_PREFIX.length) || "/") + url.search;
      await router(request, response);
    } catch (error) {
      sendError(response, error, context.logger);
    }
  };
}

export function createApiServer(context: Context) {
  const handler = createRequestHandler(context);
  return createHttpServer((request, response) => {
    handler(request, response).catch((error: unknown) => {
      context.logger.error({ err: error }, "Unhandled request error");
    });
  });
}
