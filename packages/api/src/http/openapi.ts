import { describeComponentSchema } from "@mobile-sdui/core";
import { toJSONSchema, z } from "zod/v4";
import { schema as healthSchema } from "../controllers/health.js";
import { schema as mobileAuthorizeSchema } from "../controllers/mobile/authorize.js";
import { schema as mobileDeauthorizeSchema } from "../controllers/mobile/deauthorize.js";
import { schema as mobileEntrypointSectionsSchema } from "../controllers/mobile/entrypointSections.js";
import { schema as whoamiSchema } from "../controllers/whoami.js";
import type { ControllerSchema } from "../types.js";

const documentedSchemas: ControllerSchema[] = [
  mobileEntrypointSectionsSchema,
  mobileAuthorizeSchema,
  mobileDeauthorizeSchema,
  whoamiSchema,
  healthSchema,
];

const SCHEMA_REF_PREFIX = "#/components/schemas/";

function isZodType(value: unknown): value is z.ZodType {
  return value instanceof z.ZodType;
}

function toJsonSchema(schema: unknown) {
  if (isZodType(schema)) {
    const { $schema: _ignored, ...rest } = toJSONSchema(schema);
    return rest;
  }
  return schema;
}

function paramsFromObject(object: z.ZodObject, location: "path" | "query") {
  return Object.entries(object.shape).map(([name, definition]) => {
    const optional = isZodType(definition) && definition.safeParse(undefined).success;
    return {
      name,
      in: location,
      required: location === "path" || !optional,
      schema: toJsonSchema(definition),
    };
  });
}

function buildResponses(responses: ControllerSchema["responses"]) {
  return Object.fromEntries(
    Object.entries(responses).map(([status, response]) => {
      const content = response.content
        ? Object.fromEntries(
            Object.entries(response.content).map(([contentType, item]) => [
              contentType,
              { schema: toJsonSchema(item.schema) },
            ])
          )
        : undefined;
      return [
        status,
        {
          description: response.description,
          ...(content ? { content } : {}),
        },
      ];
    })
  );
}

function buildRequestBody(schema: ControllerSchema): Record<string, unknown> | undefined {
  if (!schema.body) return undefined;
  return {
    description: schema.body.description ?? "",
    required: schema.body.required ?? true,
    content: {
      [schema.body.contentType]: {
        schema: toJsonSchema(schema.body.schema),
      },
    },
  };
}

/**
 * The component union is published as `SDUIComponent`, a `oneOf` over one
 * named schema per kind, discriminated by `__typename`.
 */
function buildComponentSchemas(): Record<string, unknown> {
  const { name, description, discriminator, oneOf, variants } =
    describeComponentSchema(SCHEMA_REF_PREFIX);
  return {
    [name]: { description, oneOf, discriminator },
    ...variants,
    SDUISection: {
      type: "object",
      properties: {
        id: { type: "string" },
        component: { $ref: `${SCHEMA_REF_PREFIX}${name}` },
      },
      required: ["id", "component"],
      additionalProperties: false,
    },
  };
}

function errorSchema(example: string) {
  return {
    type: "object",
    properties: {
      error: { type: "string", example },
      code: { type: "string" },
      details: {},
    },
    required: ["error"],
  };
}

export function generateOpenApiDocument(serverUrl: string) {
  const paths: Record<string, Record<string, unknown>> = {};

  for (const schema of documentedSchemas) {
    const method = schema.method.toLowerCase();
    let pathItem = paths[schema.path];
    if (!pathItem) {
      pathItem = {};
      paths[schema.path] = pathItem;
    }
    const parameters = schema.query ? paramsFromObject(schema.query, "query") : [];
    const requestBody = buildRequestBody(schema);
    const responses = buildResponses(schema.responses);

    pathItem[method] = {
      operationId: schema.operationId,
      summary: schema.summary,
      description: schema.description,
      tags: schema.tags,
      ...(schema.security ? { security: schema.security } : {}),
      ...(parameters.length > 0 ? { parameters } : {}),
      ...(requestBody ? { requestBody } : {}),
      responses,
    };
  }

  return {
    openapi: "3.1.0",
    info: {
      version: "1.0.0",
      title: "Mobile SDUI API",
      description: "Server-driven UI sections and mobile session management",
    },
    servers: [{ url: serverUrl }],
    paths,
    components: {
      securitySchemes: {
        sessionToken: {
          type: "http",
          scheme: "bearer",
          description: "Session token returned by /mobile/authorize",
        },
      },
      schemas: {
        ...buildComponentSchemas(),
        ErrorResponse: errorSchema("Internal server error"),
        ValidationErrorResponse: errorSchema("Validation error"),
        NotFoundResponse: errorSchema("Endpoint not found"),
      },
    },
  };
}
