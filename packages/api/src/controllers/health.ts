import type { IncomingMessage, ServerResponse } from "node:http";
import { z } from "zod/v4";
import type { Context, ControllerSchema } from "../types.js";
import { sendJson } from "../utils/http.js";

export async function getHealth(
  _context: Context,
  _request: IncomingMessage,
  response: ServerResponse
): Promise<void> {
  sendJson(response, 200, { ok: true });
}

export const schema = {
  method: "GET",
  path: "/health",
  operationId: "health",
  tags: ["Meta"],
  summary: "Liveness probe",
  responses: {
    200: {
      description: "Server is up",
      content: { "application/json": { schema: z.object({ ok: z.literal(true) }) } },
    },
  },
} as const satisfies ControllerSchema;
