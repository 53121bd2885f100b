/**
 * Auth Repository
 * ===============
 * DB access for refresh tokens and single-use email tokens.
 * Only sha256 digests of tokens are stored.
 */

import type { QueryResultRow } from "pg";

import { pool, type Queryable } from "../../shared/db.js";

export type RefreshToken = {
  id: number;
  userId: number;
  tokenHash: string;
  expiresAt: Date;
  revokedAt: Date | null;
  replacedById: number | null;
  createdAt: Date;
};

interface RefreshTokenRow extends QueryResultRow {
  id: number;
  user_id: number;
  token_hash: string;
  expires_at: Date;
  revoked_at: Date | null;
  replaced_by_id: number | null;
  created_at: Date;
}

export type UserTokenPurpose = "verify_email" | "reset_password";

export type UserToken = {
  id: number;
  userId: number;
  purpose: UserTokenPurpose;
  expiresAt: Date;
  usedAt: Date | null;
  createdAt: Date;
};

interface UserTokenRow extends QueryResultRow {
  id: number;
  user_id: number;
  purpose: UserTokenPurpose;
  expires_at: Date;
  used_at: Date | null;
  created_at: Date;
}

const REFRESH_COLUMNS = "id, user_id, token_hash, expires_at, revoked_at, replaced_by_id, created_at";
const USER_TOKEN_COLUMNS = "id, user_id, purpose, expires_at, used_at, created_at";

function toRefreshToken(row: RefreshTokenRow): RefreshToken {
  return {
    id: row.id,
    userId: row.user_id,
    tokenHash: row.token_hash,
    expiresAt: row.expires_at,
    revokedAt: row.revoked_at,
    replacedById: row.replaced_by_id,
    createdAt: row.created_at,
  };
}

function toUserToken(row: UserTokenRow): UserToken {
  return {
    id: row.id,
    userId: row.user_id,
    purpose: row.purpose,
    expiresAt: row.expires_at,
    usedAt: row.used_at,
    createdAt: row.created_at,
  };
}

// ═══════════════════════════════════════════════════════════════════════════
// REFRESH TOKENS
// ═══════════════════════════════════════════════════════════════════════════

export async function createRefreshToken(
  params: {
    userId: number;
    tokenHash: string;
    expiresAt: Date;
    createdByIp?: string | null;
    userAgent?: string | null;
  },
  db: Queryable = pool
): Promise<RefreshToken> {
  const result = await db.query<RefreshTokenRow>(
    `INSERT INTO refresh_tokens (user_id, token_hash, expires_at, created_by_ip, user_agent)
     VALUES ($1, $2, $3, $4, $5)
     RETURNING ${REFRESH_COLUMNS}`,
    [
      params.userId,
      params.tokenHash,
      params.expiresAt,
      params.createdByIp ?? null,
      params.userAgent ? params.userAgent.slice(0, 512) : null,
    ]
  );
  return toRefreshToken(result.rows[0]);
}

export async function getRefreshTokenByHash(tokenHash: string, db: Queryable = pool): Promise<RefreshToken | null> {
  const hash = String(tokenHash || "").trim();
  if (!hash) {return null;}

  const result = await db.query<RefreshTokenRow>(
    `SELECT ${REFRESH_COLUMNS} FROM refresh_tokens WHERE token_hash = $1`,
    [hash]
  );
  const row = result.rows[0];
  return row ? toRefreshToken(row) : null;
}

/**
 * Revokes a still-active token. Returns false when it was already revoked,
 * which callers treat as a concurrent (or replayed) use.
 */
export async function revokeRefreshToken(
  params: { tokenId: number; replacedById?: number | null },
  db: Queryable = pool
): Promise<boolean> {
  const result = await db.query(
    `UPDATE refresh_tokens
     SET revoked_at = NOW(), replaced_by_id = COALESCE($2, replaced_by_id)
     WHERE id = $1 AND revoked_at IS NULL`,
    [params.tokenId, params.replacedById ?? null]
  );
  return result.rowCount === 1;
}

export async function revokeAllRefreshTokensForUser(userId: number, db: Queryable = pool): Promise<number> {
  const result = await db.query(
    "UPDATE refresh_tokens SET revoked_at = NOW() WHERE user_id = $1 AND revoked_at IS NULL",
    [userId]
  );
  return result.rowCount ?? 0;
}

// ═══════════════════════════════════════════════════════════════════════════
// EMAIL TOKENS (verification / password reset)
// ═══════════════════════════════════════════════════════════════════════════

export async function createUserToken(
  params: { userId: number; purpose: UserTokenPurpose; tokenHash: string; expiresAt: Date },
  db: Queryable = pool
): Promise<UserToken> {
  const result = await db.query<UserTokenRow>(
    `INSERT INTO user_tokens (user_id, purpose, token_hash, expires_at)
     VALUES ($1, $2, $3, $4)
     RETURNING ${USER_TOKEN_COLUMNS}`,
    [params.userId, params.purpose, params.tokenHash, params.expiresAt]
  );
  return toUserToken(result.rows[0]);
}

export async function getUserTokenByHash(
  tokenHash: string,
  purpose: UserTokenPurpose,
  db: Queryable = pool
): Promise<UserToken | null> {
  const hash = String(tokenHash || "").trim();
  if (!hash) {return null;}

  const result = await db.query<UserTokenRow>(
    `SELECT ${USER_TOKEN_COLUMNS} FROM user_tokens WHERE token_hash = $1 AND purpose = $2`,
    [hash, purpose]
  );
  const row = result.rows[0];
  return row ? toUserToken(row) : null;
}

/**
 * Marks a live token used. Exactly one caller wins; expired or already-used
 * tokens are never consumed.
 */
export async function consumeUserToken(tokenId: number, db: Queryable = pool): Promise<boolean> {
  const result = await db.query(
    "UPDATE user_tokens SET used_at = NOW() WHERE id = $1 AND used_at IS NULL AND expires_at > NOW()",
    [tokenId]
  );
  return result.rowCount === 1;
}

/**
 * Retires outstanding tokens of a purpose so only the newest emailed link works.
 */
export async function invalidateUserTokens(
  userId: number,
  purpose: UserTokenPurpose,
  db: Queryable = pool
): Promise<number> {
  const result = await db.query(
    "UPDATE user_tokens SET used_at = NOW() WHERE user_id = $1 AND purpose = $2 AND used_at IS NULL",
    [userId, purpose]
  );
  return result.rowCount ?? 0;
}
