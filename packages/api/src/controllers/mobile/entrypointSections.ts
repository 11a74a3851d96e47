import type { IncomingMessage, ServerResponse } from "node:http";
import { resolveSections, toSectionResponse } from "@mobile-sdui/core";
import { z } from "zod/v4";
import { ValidationError } from "../../errors.js";
import { genericErrors } from "../../http/openapi-helpers.js";
import { createSectionStore } from "../../models/sections.js";
import { resolveUser } from "../../services/identity.js";
import type { Context, ControllerSchema } from "../../types.js";
import { sendJson } from "../../utils/http.js";

const Query = z.object({
  key: z.string(),
});

export async function getMobileEntrypointSections(
  context: Context,
  request: IncomingMessage,
  response: ServerResponse
): Promise<void> {
  const url = new URL(request.url || "", `http://${request.headers.host}`);
  const parsed = Query.safeParse(Object.fromEntries(url.searchParams));
  if (!parsed.success) {
    throw new ValidationError(parsed.error.issues[0]?.message || "Invalid request");
  }

  const user = await resolveUser(context, request);
  const sections = await resolveSections(
    {
      store: createSectionStore(context),
      visibilityPolicy: context.services.visibilityPolicy,
    },
    user,
    parsed.data.key
  );

  context.logger.debug(
    {
      event: "entrypoint.sections",
      key: parsed.data.key,
      userType: user.type,
      count: sections.length,
    },
    "entrypoint sections resolved"
  );

  sendJson(response, 200, { sections: sections.map(toSectionResponse) });
}

export const schema = {
  method: "GET",
  path: "/mobile/entrypoint-sections",
  operationId: "mobileEntrypointSections",
  tags: ["SDUI"],
  summary: "List the UI sections of an entrypoint",
  description:
    "Returns the sections in the order the client must render them. Sections restricted to signed-in users are left out for other callers.",
  security: [{}, { sessionToken: [] }],
  query: Query,
  responses: {
    200: {
      description: "Ordered sections",
      content: {
        "application/json": {
          schema: {
            type: "object",
            properties: {
              sections: {
                type: "array",
                items: { $ref: "#/components/schemas/SDUISection" },
              },
            },
            required: ["sections"],
            additionalProperties: false,
          },
        },
      },
    },
    ...genericErrors,
    503: {
      description: "Section storage unavailable",
      content: {
        "application/json": { schema: { $ref: "#/components/schemas/ErrorResponse" } },
      },
    },
  },
} as const satisfies ControllerSchema;
