/**
 * Auth Routes
 * ===========
 * Signup, JWT login/refresh/logout, email confirmation and password reset.
 */

import { type Request, type Response, Router } from "express";

import { asyncHandler } from "../../middleware/async-handler.js";
import { rateLimit } from "../../middleware/rate-limit.js";
import { extractBearerToken, getAuthConfig, getCookieValue } from "../../shared/auth.js";
import { ok, requestBaseUrl } from "../../shared/http.js";
import { renderResetPasswordPage } from "./auth.pages.js";
import {
  validateLoginInput,
  validateRefreshInput,
  validateRequestEmailInput,
  validateResetPasswordInput,
  validateSignupInput,
} from "./auth.schemas.js";
import * as authService from "./auth.service.js";
import type { TokenPair } from "./auth.service.js";

export const authRouter = Router();

const REFRESH_COOKIE_PATH = "/api/auth";

const authRateLimit = (name: string) =>
  rateLimit({
    name,
    limitEnvKey: "AUTH_RATE_LIMIT",
    defaultLimit: 20,
    windowEnvKey: "AUTH_RATE_WINDOW_SECONDS",
    defaultWindowSeconds: 60,
  });

function setRefreshCookie(res: Response, refreshToken: string) {
  const cfg = getAuthConfig();
  res.cookie(cfg.refreshCookieName, refreshToken, {
    httpOnly: true,
    secure: cfg.cookieSecure,
    sameSite: cfg.cookieSameSite,
    path: REFRESH_COOKIE_PATH,
    maxAge: cfg.refreshTtlSeconds * 1000,
  });
}

function clearRefreshCookie(res: Response) {
  const cfg = getAuthConfig();
  res.clearCookie(cfg.refreshCookieName, {
    httpOnly: true,
    secure: cfg.cookieSecure,
    sameSite: cfg.cookieSameSite,
    path: REFRESH_COOKIE_PATH,
  });
}

function tokenResponse(pair: TokenPair) {
  return {
    access_token: pair.accessToken,
    refresh_token: pair.refreshToken,
    token_type: "bearer",
    expires_in: pair.accessTokenExpiresIn,
  };
}

/** Cookie first, then body, then `Authorization: Bearer`. */
function readRefreshToken(req: Request): string {
  const cfg = getAuthConfig();
  const input = validateRefreshInput(req.body);
  return (
    getCookieValue(req.headers.cookie, cfg.refreshCookieName) ||
    input.refresh_token ||
    extractBearerToken(req.headers.authorization) ||
    ""
  );
}

/**
 * @swagger
 * /api/auth/signup:
 *   post:
 *     summary: Register a new account
 *     tags: [Auth]
 *     requestBody:
 *       required: true
 *       content:
 *         application/json:
 *           schema:
 *             type: object
 *             required: [username, email, password]
 *             properties:
 *               username: { type: string }
 *               email: { type: string, format: email }
 *               password: { type: string, minLength: 6 }
 *     responses:
 *       201:
 *         description: Account created, verification email queued
 *       409:
 *         description: Account already exists
 *       422:
 *         description: Invalid body
 */
authRouter.post(
  "/signup",
  asyncHandler(async (req: Request, res: Response) => {
    const input = validateSignupInput(req.body);
    const result = await authService.signup({ ...input, baseUrl: requestBaseUrl(req) });
    return ok(res, result, 201);
  })
);

/**
 * @swagger
 * /api/auth/login:
 *   post:
 *     summary: Exchange credentials for an access and refresh token
 *     tags: [Auth]
 *     requestBody:
 *       required: true
 *       content:
 *         application/json:
 *           schema:
 *             type: object
 *             required: [email, password]
 *             properties:
 *               email: { type: string, format: email }
 *               password: { type: string }
 *         application/x-www-form-urlencoded:
 *           schema:
 *             type: object
 *             required: [username, password]
 *             properties:
 *               username: { type: string, description: Account email }
 *               password: { type: string }
 *     responses:
 *       200:
 *         description: Token pair (refresh token is also set as an httpOnly cookie)
 *       401:
 *         description: Invalid email or password
 *       403:
 *         description: Email not confirmed
 *       429:
 *         description: Too many attempts
 */
authRouter.post(
  "/login",
  authRateLimit("login"),
  asyncHandler(async (req: Request, res: Response) => {
    const input = validateLoginInput(req.body);

    const result = await authService.login({
      email: input.email,
      password: input.password,
      ip: req.ip,
      userAgent: req.get("user-agent"),
    });

    setRefreshCookie(res, result.refreshToken);
    return ok(res, tokenResponse(result));
  })
);

/**
 * @swagger
 * /api/auth/refresh_token:
 *   post:
 *     summary: Rotate the refresh token and issue a new access token
 *     tags: [Auth]
 *     description: Token is read from the refresh cookie, the `refresh_token` body field, or a Bearer header.
 *     responses:
 *       200:
 *         description: New token pair
 *       401:
 *         description: Missing, unknown, expired or reused refresh token
 */
authRouter.post(
  "/refresh_token",
  asyncHandler(async (req: Request, res: Response) => {
    const result = await authService.refresh({
      refreshToken: readRefreshToken(req),
      ip: req.ip,
      userAgent: req.get("user-agent"),
    });

    setRefreshCookie(res, result.refreshToken);
    return ok(res, tokenResponse(result));
  })
);

/**
 * @swagger
 * /api/auth/logout:
 *   post:
 *     summary: Revoke the current refresh token
 *     tags: [Auth]
 *     responses:
 *       200:
 *         description: Logged out (idempotent)
 */
authRouter.post(
  "/logout",
  asyncHandler(async (req: Request, res: Response) => {
    await authService.logout({ refreshToken: readRefreshToken(req) });
    clearRefreshCookie(res);
    return ok(res, { logged_out: true });
  })
);

/**
 * @swagger
 * /api/auth/confirmed_email/{token}:
 *   get:
 *     summary: Confirm an email address from the verification link
 *     tags: [Auth]
 *     parameters:
 *       - in: path
 *         name: token
 *         required: true
 *         schema: { type: string }
 *     responses:
 *       200:
 *         description: Email confirmed (or already confirmed)
 *       400:
 *         description: Verification error
 */
authRouter.get(
  "/confirmed_email/:token",
  asyncHandler(async (req: Request, res: Response) => {
    const result = await authService.confirmEmail(req.params.token);
    return ok(res, result);
  })
);

/**
 * @swagger
 * /api/auth/request_email:
 *   post:
 *     summary: Resend the verification email
 *     tags: [Auth]
 *     requestBody:
 *       required: true
 *       content:
 *         application/json:
 *           schema:
 *             type: object
 *             required: [email]
 *             properties:
 *               email: { type: string, format: email }
 *     responses:
 *       200:
 *         description: Generic acknowledgement
 */
authRouter.post(
  "/request_email",
  authRateLimit("request_email"),
  asyncHandler(async (req: Request, res: Response) => {
    const input = validateRequestEmailInput(req.body);
    const result = await authService.requestEmail({ email: input.email, baseUrl: requestBaseUrl(req) });
    return ok(res, result);
  })
);

/**
 * @swagger
 * /api/auth/forgot_password:
 *   post:
 *     summary: Send a password reset link
 *     tags: [Auth]
 *     requestBody:
 *       required: true
 *       content:
 *         application/json:
 *           schema:
 *             type: object
 *             required: [email]
 *             properties:
 *               email: { type: string, format: email }
 *     responses:
 *       202:
 *         description: Generic acknowledgement
 */
authRouter.post(
  "/forgot_password",
  authRateLimit("forgot_password"),
  asyncHandler(async (req: Request, res: Response) => {
    const input = validateRequestEmailInput(req.body);
    const result = await authService.forgotPassword({ email: input.email, baseUrl: requestBaseUrl(req) });
    return ok(res, result, 202);
  })
);

/**
 * @swagger
 * /api/auth/reset_password/{token}:
 *   get:
 *     summary: HTML form for the reset link
 *     tags: [Auth]
 *     parameters:
 *       - in: path
 *         name: token
 *         required: true
 *         schema: { type: string }
 *     responses:
 *       200:
 *         description: Reset form
 *         content:
 *           text/html: {}
 *       400:
 *         description: Invalid or expired reset token
 *   post:
 *     summary: Set a new password with a reset token
 *     tags: [Auth]
 *     parameters:
 *       - in: path
 *         name: token
 *         required: true
 *         schema: { type: string }
 *     requestBody:
 *       required: true
 *       content:
 *         application/json:
 *           schema:
 *             type: object
 *             required: [password, confirm_password]
 *             properties:
 *               password: { type: string, minLength: 6 }
 *               confirm_password: { type: string }
 *     responses:
 *       200:
 *         description: Password reset
 *       400:
 *         description: Invalid, used or expired reset token
 *       422:
 *         description: Passwords do not match
 */
authRouter.get(
  "/reset_password/:token",
  asyncHandler(async (req: Request, res: Response) => {
    const target = await authService.getResetTarget(req.params.token);
    const html = renderResetPasswordPage({ username: target.username, action: req.originalUrl });
    res.status(200).type("html").send(html);
  })
);

authRouter.post(
  "/reset_password/:token",
  asyncHandler(async (req: Request, res: Response) => {
    const input = validateResetPasswordInput(req.body);
    const result = await authService.resetPassword({ token: req.params.token, password: input.password });
    return ok(res, result);
  })
);
