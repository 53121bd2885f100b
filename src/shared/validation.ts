/**
 * Validation Helpers
 * ==================
 * zod parsing that surfaces as `ValidationError` (422) with the first issue in the message.
 */

import type { z, ZodError } from "zod";

import { ValidationError } from "./errors.js";
import { logger } from "./logger.js";

export function formatZodError(error: ZodError): string {
  const firstIssue = error.issues[0];
  if (!firstIssue) {return "Validation error";}
  const path = firstIssue.path.join(".");
  return path
    ? `Validation error: ${path}: ${firstIssue.message}`
    : `Validation error: ${firstIssue.message}`;
}

export function parseWith<S extends z.ZodTypeAny>(schema: S, data: unknown, label: string): z.output<S> {
  const result = schema.safeParse(data);
  if (!result.success) {
    logger.warn(`Invalid ${label}`, { issues: result.error.issues });
    throw new ValidationError(formatZodError(result.error), result.error.issues);
  }
  return result.data;
}
