import type { IncomingMessage, ServerResponse } from "node:http";
import { describeUser } from "@mobile-sdui/core";
import { z } from "zod/v4";
import { genericErrors } from "../http/openapi-helpers.js";
import { resolveUser } from "../services/identity.js";
import type { Context, ControllerSchema } from "../types.js";
import { sendJson } from "../utils/http.js";

const Resp = z.object({
  id: z.string(),
  humanReadableType: z.string(),
});

export async function getWhoami(
  context: Context,
  request: IncomingMessage,
  response: ServerResponse
): Promise<void> {
  const user = await resolveUser(context, request);
  sendJson(response, 200, {
    id: user.id,
    humanReadableType: describeUser(user),
  } satisfies z.infer<typeof Resp>);
}

export const schema = {
  method: "GET",
  path: "/whoami",
  operationId: "whoami",
  tags: ["Auth"],
  summary: "Describe the calling user",
  description:
    "Works for signed-in and anonymous callers alike. `humanReadableType` is meant for testing only; its format may change.",
  security: [{}, { sessionToken: [] }],
  responses: {
    200: {
      description: "Current user",
      content: { "application/json": { schema: Resp } },
    },
    ...genericErrors,
  },
} as const satisfies ControllerSchema;
