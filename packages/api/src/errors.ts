export class AppError extends Error {
  code?: string;
  statusCode: number;
  details?: unknown;

  constructor(message: string, code?: string, statusCode = 500, details?: unknown) {
    super(message);
    this.name = "AppError";
    this.code = code;
    this.statusCode = statusCode;
    this.details = details;
  }
}

export class ValidationError extends AppError {
  constructor(message: string, details?: unknown) {
    super(message, "VALIDATION_ERROR", 400, details);
    this.name = "ValidationError";
  }
}

export class NotFoundError extends AppError {
  constructor(message = "Resource not found") {
    super(message, "NOT_FOUND", 404);
    this.name = "NotFoundError";
  }
}

/** Raised while exchanging a Google ID token for a session. */
export class MobileAuthorizationError extends AppError {
  reason: "invalid_token" | "email_not_verified" | "user_disabled";

  constructor(reason: MobileAuthorizationError["reason"], message: string) {
    super(message, "MOBILE_AUTHORIZATION_REJECTED", 401);
    this.name = "MobileAuthorizationError";
    this.reason = reason;
  }
}
