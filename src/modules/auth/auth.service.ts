/**
 * Auth Service
 * ============
 * Signup / login / refresh / logout, email verification and password reset.
 */

import { generateOpaqueToken, getAuthConfig, hashOpaqueToken, signAccessToken } from "../../shared/auth.js";
import { withTransaction, type Queryable } from "../../shared/db.js";
import {
  AuthenticationError,
  AuthorizationError,
  BadRequestError,
  ConflictError,
} from "../../shared/errors.js";
import { logger } from "../../shared/logger.js";
import { hashPassword, passwordNeedsRehash, verifyPassword } from "../../shared/password.js";
import { mailService } from "../mail/index.js";
import { evictUserProfile } from "../users/users.cache.js";
import * as usersRepository from "../users/users.repository.js";
import type { User } from "../users/users.repository.js";
import type { UserProfile } from "../users/users.schemas.js";
import { gravatarUrl, toUserProfile } from "../users/users.service.js";
import {
  consumeUserToken,
  createRefreshToken,
  createUserToken,
  getRefreshTokenByHash,
  getUserTokenByHash,
  invalidateUserTokens,
  revokeAllRefreshTokensForUser,
  revokeRefreshToken,
  type UserToken,
  type UserTokenPurpose,
} from "./auth.repository.js";

const REFRESH_TOKEN_BYTES = 48;
const EMAIL_TOKEN_BYTES = 32;

export const MESSAGES = {
  signedUp: "User successfully created. Check your email for confirmation.",
  alreadyConfirmed: "Your email is already confirmed",
  emailConfirmed: "Email confirmed",
  checkConfirmation: "Check your email for confirmation.",
  checkReset: "Check your email for reset password.",
  passwordReset: "Password reset successfully",
} as const;

function authFailed(): never {
  // Avoid user enumeration.
  throw new AuthenticationError("Invalid email or password");
}

export type TokenPair = {
  accessToken: string;
  accessTokenExpiresIn: number;
  refreshToken: string;
};

type ClientInfo = {
  ip?: string | null;
  userAgent?: string | null;
};

async function issueTokenPair(user: User, client: ClientInfo, db?: Queryable): Promise<TokenPair & { refreshTokenId: number }> {
  const cfg = getAuthConfig();

  const accessToken = await signAccessToken({ userId: user.id, email: user.email });

  const refreshToken = generateOpaqueToken(REFRESH_TOKEN_BYTES);
  const created = await createRefreshToken(
    {
      userId: user.id,
      tokenHash: hashOpaqueToken(refreshToken),
      expiresAt: new Date(Date.now() + cfg.refreshTtlSeconds * 1000),
      createdByIp: client.ip ?? null,
      userAgent: client.userAgent ?? null,
    },
    db
  );

  return {
    accessToken,
    accessTokenExpiresIn: cfg.accessTtlSeconds,
    refreshToken,
    refreshTokenId: created.id,
  };
}

async function issueEmailToken(
  userId: number,
  purpose: UserTokenPurpose,
  db?: Queryable
): Promise<string> {
  const cfg = getAuthConfig();
  const ttlSeconds = purpose === "verify_email" ? cfg.verifyEmailTtlSeconds : cfg.resetPasswordTtlSeconds;

  const raw = generateOpaqueToken(EMAIL_TOKEN_BYTES);
  await createUserToken(
    {
      userId,
      purpose,
      tokenHash: hashOpaqueToken(raw),
      expiresAt: new Date(Date.now() + ttlSeconds * 1000),
    },
    db
  );
  return raw;
}

function isLive(token: UserToken): boolean {
  return token.usedAt === null && token.expiresAt.getTime() > Date.now();
}

// ═══════════════════════════════════════════════════════════════════════════
// REGISTRATION & SESSIONS
// ═══════════════════════════════════════════════════════════════════════════

export async function signup(params: {
  username: string;
  email: string;
  password: string;
  baseUrl: string;
}): Promise<{ user: UserProfile; detail: string }> {
  const existing = await usersRepository.getUserByEmail(params.email);
  if (existing) {throw new ConflictError("Account already exists");}

  const passwordHash = await hashPassword(params.password);

  const { user, verifyToken } = await withTransaction(async (tx) => {
    const created = await usersRepository.createUser(
      {
        username: params.username,
        email: params.email,
        passwordHash,
        avatar: gravatarUrl(params.email),
      },
      tx
    );
    const token = await issueEmailToken(created.id, "verify_email", tx);
    return { user: created, verifyToken: token };
  });

  logger.info("User registered", { user_id: user.id });
  mailService.queueVerificationEmail({
    email: user.email,
    username: user.username,
    token: verifyToken,
    baseUrl: params.baseUrl,
  });

  return { user: toUserProfile(user), detail: MESSAGES.signedUp };
}

export async function login(params: {
  email: string;
  password: string;
  ip?: string | null;
  userAgent?: string | null;
}): Promise<TokenPair> {
  const email = usersRepository.normalizeEmail(params.email);
  const password = String(params.password || "");
  if (!email || !password) {authFailed();}

  const user = await usersRepository.getUserByEmail(email);
  if (!user) {authFailed();}

  const ok = await verifyPassword(password, user.passwordHash);
  if (!ok) {authFailed();}

  if (!user.confirmed) {throw new AuthorizationError("Email not confirmed");}

  if (passwordNeedsRehash(user.passwordHash)) {
    await usersRepository.updatePassword(user.id, await hashPassword(password));
    logger.info("Password hash upgraded", { user_id: user.id });
  }

  const pair = await issueTokenPair(user, params);
  return {
    accessToken: pair.accessToken,
    accessTokenExpiresIn: pair.accessTokenExpiresIn,
    refreshToken: pair.refreshToken,
  };
}

export async function refresh(params: {
  refreshToken: string;
  ip?: string | null;
  userAgent?: string | null;
}): Promise<TokenPair> {
  const raw = String(params.refreshToken || "").trim();
  if (!raw) {throw new AuthenticationError("Missing refresh token");}

  const found = await getRefreshTokenByHash(hashOpaqueToken(raw));
  if (!found) {throw new AuthenticationError("Invalid refresh token");}

  if (found.revokedAt) {
    // A rotated-out token came back: assume it leaked and end every session.
    const revoked = await revokeAllRefreshTokensForUser(found.userId);
    logger.warn("Refresh token reuse detected", { user_id: found.userId, revoked });
    throw new AuthenticationError("Invalid refresh token");
  }
  if (found.expiresAt.getTime() <= Date.now()) {throw new AuthenticationError("Refresh token expired");}

  const user = await usersRepository.getUserById(found.userId);
  if (!user || !user.confirmed) {throw new AuthenticationError("Invalid refresh token");}

  // Rotate refresh token
  const pair = await withTransaction(async (tx) => {
    const next = await issueTokenPair(user, params, tx);
    const revoked = await revokeRefreshToken({ tokenId: found.id, replacedById: next.refreshTokenId }, tx);
    if (!revoked) {throw new AuthenticationError("Invalid refresh token");}
    return next;
  });

  return {
    accessToken: pair.accessToken,
    accessTokenExpiresIn: pair.accessTokenExpiresIn,
    refreshToken: pair.refreshToken,
  };
}

export async function logout(params: { refreshToken: string }): Promise<void> {
  const raw = String(params.refreshToken || "").trim();
  if (!raw) {return;}

  const found = await getRefreshTokenByHash(hashOpaqueToken(raw));
  if (!found) {return;}
  if (found.revokedAt) {return;}

  await revokeRefreshToken({ tokenId: found.id, replacedById: null });
}

// ═══════════════════════════════════════════════════════════════════════════
// EMAIL VERIFICATION
// ═══════════════════════════════════════════════════════════════════════════

export async function confirmEmail(token: string): Promise<{ message: string }> {
  const found = await getUserTokenByHash(hashOpaqueToken(token), "verify_email");
  if (!found) {throw new BadRequestError("Verification error");}

  const user = await usersRepository.getUserById(found.userId);
  if (!user) {throw new BadRequestError("Verification error");}
  if (user.confirmed) {return { message: MESSAGES.alreadyConfirmed };}
  if (!isLive(found)) {throw new BadRequestError("Verification error");}

  await withTransaction(async (tx) => {
    const consumed = await consumeUserToken(found.id, tx);
    if (!consumed) {throw new BadRequestError("Verification error");}
    await usersRepository.confirmEmail(user.id, tx);
  });
  await evictUserProfile(user.id);

  logger.info("Email confirmed", { user_id: user.id });
  return { message: MESSAGES.emailConfirmed };
}

export async function requestEmail(params: { email: string; baseUrl: string }): Promise<{ message: string }> {
  const user = await usersRepository.getUserByEmail(params.email);
  if (user?.confirmed) {return { message: MESSAGES.alreadyConfirmed };}

  if (user) {
    const token = await withTransaction(async (tx) => {
      await invalidateUserTokens(user.id, "verify_email", tx);
      return issueEmailToken(user.id, "verify_email", tx);
    });
    mailService.queueVerificationEmail({ email: user.email, username: user.username, token, baseUrl: params.baseUrl });
  }

  return { message: MESSAGES.checkConfirmation };
}

// ═══════════════════════════════════════════════════════════════════════════
// PASSWORD RESET
// ═══════════════════════════════════════════════════════════════════════════

export async function forgotPassword(params: { email: string; baseUrl: string }): Promise<{ message: string }> {
  const user = await usersRepository.getUserByEmail(params.email);

  if (user) {
    const token = await withTransaction(async (tx) => {
      await invalidateUserTokens(user.id, "reset_password", tx);
      return issueEmailToken(user.id, "reset_password", tx);
    });
    mailService.queueResetPasswordEmail({ email: user.email, username: user.username, token, baseUrl: params.baseUrl });
  }

  return { message: MESSAGES.checkReset };
}

/**
 * Resolves the account behind a live reset link (for rendering the reset form).
 */
export async function getResetTarget(token: string): Promise<{ username: string; email: string }> {
  const found = await getUserTokenByHash(hashOpaqueToken(token), "reset_password");
  if (!found || !isLive(found)) {throw new BadRequestError("Invalid or expired reset token");}

  const user = await usersRepository.getUserById(found.userId);
  if (!user) {throw new BadRequestError("Invalid or expired reset token");}

  return { username: user.username, email: user.email };
}

export async function resetPassword(params: { token: string; password: string }): Promise<{ message: string }> {
  const found = await getUserTokenByHash(hashOpaqueToken(params.token), "reset_password");
  if (!found || !isLive(found)) {throw new BadRequestError("Invalid or expired reset token");}

  const passwordHash = await hashPassword(params.password);

  const revokedSessions = await withTransaction(async (tx) => {
    // Consume first so two concurrent submissions cannot both succeed.
    const consumed = await consumeUserToken(found.id, tx);
    if (!consumed) {throw new BadRequestError("Invalid or expired reset token");}

    const updated = await usersRepository.updatePassword(found.userId, passwordHash, tx);
    if (!updated) {throw new BadRequestError("Invalid or expired reset token");}

    return revokeAllRefreshTokensForUser(found.userId, tx);
  });
  await evictUserProfile(found.userId);

  logger.info("Password reset", { user_id: found.userId, revoked_sessions: revokedSessions });
  return { message: MESSAGES.passwordReset };
}
