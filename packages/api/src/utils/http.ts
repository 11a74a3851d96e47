import type { IncomingMessage, ServerResponse } from "node:http";
import {
  DecodeResolutionError,
  InvalidEntrypointKeyError,
  StorageResolutionError,
} from "@mobile-sdui/core";
import type { z } from "zod/v4";
import { AppError, ValidationError } from "../errors.js";
import type { Logger } from "../types.js";

const MAX_BODY_BYTES = 64 * 1024;

export function readBody(request: IncomingMessage): Promise<string> {
  const reqWithRaw = request as IncomingMessage & { rawBody?: unknown };
  if (typeof reqWithRaw.rawBody === "string") {
    return Promise.resolve(reqWithRaw.rawBody);
  }
  return new Promise<string>((resolve, reject) => {
    let body = "";
    request.on("data", (chunk) => {
      body += chunk;
      if (body.length > MAX_BODY_BYTES) {
        reject(new ValidationError("Request body too large"));
        request.destroy();
      }
    });
    request.on("end", () => {
      reqWithRaw.rawBody = body;
      resolve(body);
    });
    request.on("error", reject);
  });
}

export function parseJsonSafely(jsonString: string): unknown {
  try {
    return JSON.parse(jsonString);
  } catch {
    throw new ValidationError("Invalid JSON");
  }
}

export async function readJsonBody<T>(request: IncomingMessage, schema: z.ZodType<T>): Promise<T> {
  const parsed = schema.safeParse(parseJsonSafely(await readBody(request)));
  if (!parsed.success) {
    throw new ValidationError(
      parsed.error.issues[0]?.message || "Invalid request body",
      parsed.error.issues.map((issue) => ({
        code: issue.code,
        path: issue.path.map((part) => (typeof part === "number" ? part : String(part))),
        message: issue.message,
      }))
    );
  }
  return parsed.data;
}

export function sendJson(response: ServerResponse, statusCode: number, data: unknown): void {
  response.statusCode = statusCode;
  response.setHeader("Content-Type", "application/json");
  response.end(JSON.stringify(data));
}

/**
 * Maps errors from the SDUI core onto HTTP errors. Decode failures are server
 * faults: the stored data is wrong, not the request.
 */
export function toAppError(error: unknown): AppError | null {
  if (error instanceof AppError) return error;
  if (error instanceof InvalidEntrypointKeyError) {
    return new AppError(error.message, error.code, 400, { entrypointKey: error.entrypointKey });
  }
  if (error instanceof DecodeResolutionError) {
    const { sectionError } = error;
    return new AppError("Entrypoint contains an invalid section", error.code, 500, {
      entrypointKey: error.entrypointKey,
      sectionId: sectionError.sectionId,
      kind: sectionError.decodeError.kind,
      field: sectionError.decodeError.field,
    });
  }
  if (error instanceof StorageResolutionError) {
    return new AppError("Sections are temporarily unavailable", error.code, 503, {
      entrypointKey: error.entrypointKey,
    });
  }
  return null;
}

export function sendError(response: ServerResponse, error: unknown, logger?: Logger): void {
  const appError = toAppError(error);
  if (appError) {
    if (appError.statusCode >= 500) logger?.error({ err: error }, appError.message);
    sendJson(response, appError.statusCode, {
      error: appError.message,
      code: appError.code,
      ...(appError.details ? { details: appError.details } : {}),
    });
    return;
  }

  logger?.error({ err: error }, "Unexpected error");
  sendJson(response, 500, { error: "Internal server error" });
}

export function parseAuthorizationHeader(
  request: IncomingMessage
): { type: string; credentials: string } | null {
  const authHeader = request.headers.authorization;
  if (!authHeader) return null;

  const [type, ...credentialsParts] = authHeader.split(" ");
  const credentials = credentialsParts.join(" ");

  if (!type || !credentials) return null;

  return { type, credentials };
}
