/**
 * Auth Schemas
 * ============
 * Validation for authentication endpoints.
 */

import { z } from "zod";

import { parseWith } from "../../shared/validation.js";

const emailSchema = z.string().trim().toLowerCase().email().max(150);
const passwordSchema = z.string().min(6).max(128);

export const signupInputSchema = z.object({
  username: z.string().trim().min(3).max(25),
  email: emailSchema,
  password: passwordSchema,
});

export type SignupInput = z.infer<typeof signupInputSchema>;

export function validateSignupInput(data: unknown): SignupInput {
  return parseWith(signupInputSchema, data, "signup input");
}

// OAuth2 password-grant forms post the email as `username`.
function aliasUsernameToEmail(data: unknown): unknown {
  if (typeof data !== "object" || data === null) {return data;}
  if ("email" in data || !("username" in data)) {return data;}
  return { ...data, email: data.username };
}

export const loginInputSchema = z.preprocess(
  aliasUsernameToEmail,
  z.object({
    email: emailSchema,
    password: z.string().min(1).max(200),
  })
);

export type LoginInput = z.infer<typeof loginInputSchema>;

export function validateLoginInput(data: unknown): LoginInput {
  return parseWith(loginInputSchema, data, "login input");
}

export const refreshInputSchema = z.object({
  // Optional: for non-cookie clients (CLI / tests)
  refresh_token: z.string().trim().min(1).optional(),
});

export type RefreshInput = z.infer<typeof refreshInputSchema>;

export function validateRefreshInput(data: unknown): RefreshInput {
  return parseWith(refreshInputSchema, data ?? {}, "refresh input");
}

export const requestEmailInputSchema = z.object({
  email: emailSchema,
});

export type RequestEmailInput = z.infer<typeof requestEmailInputSchema>;

export function validateRequestEmailInput(data: unknown): RequestEmailInput {
  return parseWith(requestEmailInputSchema, data, "email request");
}

export const resetPasswordInputSchema = z
  .object({
    password: passwordSchema,
    confirm_password: z.string(),
  })
  .refine((v) => v.password === v.confirm_password, {
    message: "Passwords do not match",
    path: ["confirm_password"],
  });

export type ResetPasswordInput = z.infer<typeof resetPasswordInputSchema>;

export function validateResetPasswordInput(data: unknown): ResetPasswordInput {
  return parseWith(resetPasswordInputSchema, data, "reset-password input");
}
