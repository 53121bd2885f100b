/**
 * Custom Error Classes
 * ====================
 * Structured error handling for the application
 */

/**
 * Base application error
 */
export class AppError extends Error {
  constructor(
    message: string,
    public statusCode: number = 500,
    public code?: string
  ) {
    super(message);
    this.name = this.constructor.name;
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * Resource not found error
 */
export class NotFoundError extends AppError {
  constructor(resource: string, identifier?: string) {
    super(
      identifier
        ? `${resource} with ID '${identifier}' not found`
        : `${resource} not found`,
      404,
      "NOT_FOUND"
    );
  }
}

/**
 * Request payload failed schema validation
 */
export class ValidationError extends AppError {
  constructor(message: string, public details?: unknown) {
    super(message, 422, "VALIDATION_ERROR");
  }
}

/**
 * Well-formed request that cannot be honoured (eg. a dead email token)
 */
export class BadRequestError extends AppError {
  constructor(message: string) {
    super(message, 400, "BAD_REQUEST");
  }
}

/**
 * Unique constraint clash (duplicate user or contact email)
 */
export class ConflictError extends AppError {
  constructor(message: string) {
    super(message, 409, "CONFLICT");
  }
}

/**
 * External API error
 */
export class ExternalApiError extends AppError {
  constructor(
    public api: string,
    message: string,
    public originalError?: unknown
  ) {
    super(`${api} API error: ${message}`, 502, "EXTERNAL_API_ERROR");
  }
}

/**
 * Authentication error
 */
export class AuthenticationError extends AppError {
  constructor(message: string = "Authentication failed") {
    super(message, 401, "AUTHENTICATION_ERROR");
  }
}

/**
 * Authenticated, but not allowed
 */
export class AuthorizationError extends AppError {
  constructor(message: string = "Forbidden") {
    super(message, 403, "AUTHORIZATION_ERROR");
  }
}

export class RateLimitError extends AppError {
  constructor(public retryAfterSeconds: number) {
    super("Too many requests", 429, "RATE_LIMITED");
  }
}

/**
 * Configuration error
 */
export class ConfigurationError extends AppError {
  constructor(message: string) {
    super(`Configuration error: ${message}`, 500, "CONFIGURATION_ERROR");
  }
}
