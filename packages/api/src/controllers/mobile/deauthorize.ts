import type { IncomingMessage, ServerResponse } from "node:http";
import { z } from "zod/v4";
import { genericErrors } from "../../http/openapi-helpers.js";
import { deauthorizeMobile } from "../../services/mobileAuth.js";
import type { Context, ControllerSchema } from "../../types.js";
import { readJsonBody, sendJson } from "../../utils/http.js";

const Body = z.object({
  sessionToken: z.string().min(1),
});

const Resp = z.object({ success: z.boolean() });

export async function postDeauthorizeMobile(
  context: Context,
  request: IncomingMessage,
  response: ServerResponse
): Promise<void> {
  const { sessionToken } = await readJsonBody(request, Body);
  const success = await deauthorizeMobile(context, sessionToken);
  sendJson(response, 200, { success } satisfies z.infer<typeof Resp>);
}

export const schema = {
  method: "POST",
  path: "/mobile/deauthorize",
  operationId: "deauthorizeMobile",
  tags: ["Auth"],
  summary: "End a mobile session",
  description: "The client should forget its session token afterwards.",
  body: {
    contentType: "application/json",
    schema: Body,
  },
  responses: {
    200: {
      description: "Whether a session was removed",
      content: { "application/json": { schema: Resp } },
    },
    ...genericErrors,
  },
} as const satisfies ControllerSchema;
