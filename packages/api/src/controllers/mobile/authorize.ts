import type { IncomingMessage, ServerResponse } from "node:http";
import { z } from "zod/v4";
import { MobileAuthorizationError } from "../../errors.js";
import { genericErrors } from "../../http/openapi-helpers.js";
import { authorizeMobile } from "../../services/mobileAuth.js";
import type { Context, ControllerSchema } from "../../types.js";
import { readJsonBody, sendJson } from "../../utils/http.js";

const Body = z.object({
  googleIdToken: z.string().min(1),
});

const Resp = z.object({
  success: z.boolean(),
  sessionToken: z.string().nullable(),
});

/**
 * A rejected token is a regular response with `success: false`, never an
 * HTTP error; the reason is only logged.
 */
export async function postAuthorizeMobile(
  context: Context,
  request: IncomingMessage,
  response: ServerResponse
): Promise<void> {
  const { googleIdToken } = await readJsonBody(request, Body);

  try {
    const { sessionToken, userId } = await authorizeMobile(context, googleIdToken);
    context.logger.info({ event: "mobile.authorize", userId }, "mobile client authorized");
    sendJson(response, 200, { success: true, sessionToken } satisfies z.infer<typeof Resp>);
  } catch (error) {
    if (!(error instanceof MobileAuthorizationError)) throw error;
    context.logger.warn(
      { event: "mobile.authorize.rejected", reason: error.reason, err: error },
      error.message
    );
    sendJson(response, 200, { success: false, sessionToken: null } satisfies z.infer<typeof Resp>);
  }
}

export const schema = {
  method: "POST",
  path: "/mobile/authorize",
  operationId: "authorizeMobile",
  tags: ["Auth"],
  summary: "Exchange a Google ID token for a session token",
  description:
    "Signs the user in, registering the account on first use. Send the returned session token as a bearer token on later requests.",
  body: {
    contentType: "application/json",
    schema: Body,
  },
  responses: {
    200: {
      description: "Authorization result",
      content: { "application/json": { schema: Resp } },
    },
    ...genericErrors,
  },
} as const satisfies ControllerSchema;
