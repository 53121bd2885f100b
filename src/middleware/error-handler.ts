/**
 * Error Handler Middleware
 * ========================
 * Central place for unhandled route errors.
 *
 * Notes:
 * - Use with `asyncHandler` to capture async/await errors.
 * - Keep responses consistent (success=false) and avoid leaking stack traces.
 */

import type { ErrorRequestHandler } from "express";
import multer from "multer";
import { ZodError } from "zod";

import { isUniqueViolation } from "../shared/db.js";
import { AppError, ConflictError, RateLimitError, ValidationError } from "../shared/errors.js";
import { fail } from "../shared/http.js";
import { formatZodError } from "../shared/validation.js";

function isBodyParserSyntaxError(error: unknown): boolean {
  return (
    error instanceof SyntaxError &&
    "type" in error &&
    error.type === "entity.parse.failed"
  );
}

export const errorHandler: ErrorRequestHandler = (error, req, res, next) => {
  if (res.headersSent) {return next(error);}

  const meta = { method: req.method, path: req.originalUrl };

  // Zod validation errors (request body/query/params parsing)
  if (error instanceof ZodError) {
    return fail(res, new ValidationError(formatZodError(error), error.issues), 422, meta);
  }

  // Bad JSON body (express.json)
  if (isBodyParserSyntaxError(error)) {
    return fail(res, new AppError("Invalid JSON body", 400, "INVALID_JSON"), 400, meta);
  }

  if (error instanceof multer.MulterError) {
    return fail(res, new ValidationError(`Upload error: ${error.message}`), 422, meta);
  }

  // Constraint races that slipped past the service-level checks
  if (isUniqueViolation(error)) {
    return fail(res, new ConflictError("Resource already exists"), 409, meta);
  }

  if (error instanceof RateLimitError) {
    res.setHeader("Retry-After", String(error.retryAfterSeconds));
  }

  return fail(res, error, 500, meta);
};
