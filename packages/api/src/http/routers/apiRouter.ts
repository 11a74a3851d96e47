import type { IncomingMessage, ServerResponse } from "node:http";
import { getHealth } from "../../controllers/health.js";
import { postAuthorizeMobile } from "../../controllers/mobile/authorize.js";
import { postDeauthorizeMobile } from "../../controllers/mobile/deauthorize.js";
import { getMobileEntrypointSections } from "../../controllers/mobile/entrypointSections.js";
import { getWhoami } from "../../controllers/whoami.js";
import { NotFoundError } from "../../errors.js";
import type { Context } from "../../types.js";
import { sendError } from "../../utils/http.js";
import { generateOpenApiDocument } from "../openapi.js";

/** Routes paths with the `/api` prefix already removed. */
export function createApiRouter(context: Context) {
  return async function router(request: IncomingMessage, response: ServerResponse) {
    const method = request.method || "GET";
    const url = new URL(request.url || "", `http://${request.headers.host}`);
    const pathname = url.pathname;

    try {
      if (method === "GET" && pathname === "/mobile/entrypoint-sections") {
        return await getMobileEntrypointSections(context, request, response);
      }

      if (method === "POST" && pathname === "/mobile/authorize") {
        return await postAuthorizeMobile(context, request, response);
      }

      if (method === "POST" && pathname === "/mobile/deauthorize") {
        return await postDeauthorizeMobile(context, request, response);
      }

      if (method === "GET" && pathname === "/whoami") {
        return await getWhoami(context, request, response);
      }

      if (method === "GET" && pathname === "/health") {
        return await getHealth(context, request, response);
      }

      if (method === "GET" && pathname === "/openapi") {
        const serverUrl = `http://localhost:${context.config.port}/api`;
        response.statusCode = 200;
        response.setHeader("Content-Type", "application/json");
        response.end(JSON.stringify(generateOpenApiDocument(serverUrl), null, 2));
        return;
      }

      throw new NotFoundError("Endpoint not found");
    } catch (error) {
      sendError(response, error, context.logger);
    }
  };
}
