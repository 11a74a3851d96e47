export const genericErrors = {
  400: {
    description: "Bad Request",
    content: {
      "application/json": {
        schema: { $ref: "#/components/schemas/ValidationErrorResponse" },
      },
    },
  },
  404: {
    description: "Not Found",
    content: {
      "application/json": {
        schema: { $ref: "#/components/schemas/NotFoundResponse" },
      },
    },
  },
  500: {
    description: "Internal Server Error",
    content: {
      "application/json": {
        schema: { $ref: "#/components/schemas/ErrorResponse" },
      },
    },
  },
} as const;
