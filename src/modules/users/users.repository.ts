/**
 * Users Repository
 * ================
 * SQL access for the `users` table.
 */

import type { QueryResultRow } from "pg";

import { isUniqueViolation, pool, type Queryable } from "../../shared/db.js";
import { ConflictError } from "../../shared/errors.js";

export type User = {
  id: number;
  username: string;
  email: string;
  passwordHash: string;
  avatar: string | null;
  confirmed: boolean;
  createdAt: Date;
  updatedAt: Date;
};

interface UserRow extends QueryResultRow {
  id: number;
  username: string;
  email: string;
  password_hash: string;
  avatar: string | null;
  confirmed: boolean;
  created_at: Date;
  updated_at: Date;
}

const USER_COLUMNS = "id, username, email, password_hash, avatar, confirmed, created_at, updated_at";

function toUser(row: UserRow): User {
  return {
    id: row.id,
    username: row.username,
    email: row.email,
    passwordHash: row.password_hash,
    avatar: row.avatar,
    confirmed: row.confirmed,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}

export function normalizeEmail(email: string): string {
  return String(email || "").trim().toLowerCase();
}

export async function getUserByEmail(email: string, db: Queryable = pool): Promise<User | null> {
  const normalized = normalizeEmail(email);
  if (!normalized) {return null;}

  const result = await db.query<UserRow>(`SELECT ${USER_COLUMNS} FROM users WHERE email = $1`, [normalized]);
  const row = result.rows[0];
  return row ? toUser(row) : null;
}

export async function getUserById(id: number, db: Queryable = pool): Promise<User | null> {
  const result = await db.query<UserRow>(`SELECT ${USER_COLUMNS} FROM users WHERE id = $1`, [id]);
  const row = result.rows[0];
  return row ? toUser(row) : null;
}

export async function createUser(
  params: { username: string; email: string; passwordHash: string; avatar: string | null },
  db: Queryable = pool
): Promise<User> {
  try {
    const result = await db.query<UserRow>(
      `INSERT INTO users (username, email, password_hash, avatar)
       VALUES ($1, $2, $3, $4)
       RETURNING ${USER_COLUMNS}`,
      [params.username, normalizeEmail(params.email), params.passwordHash, params.avatar]
    );
    return toUser(result.rows[0]);
  } catch (err) {
    if (isUniqueViolation(err, "users_email_key")) {
      throw new ConflictError("Account already exists");
    }
    throw err;
  }
}

async function updateReturning(
  sql: string,
  params: unknown[],
  db: Queryable
): Promise<User | null> {
  const result = await db.query<UserRow>(`${sql} RETURNING ${USER_COLUMNS}`, params);
  const row = result.rows[0];
  return row ? toUser(row) : null;
}

export async function updateAvatar(userId: number, url: string, db: Queryable = pool): Promise<User | null> {
  return updateReturning("UPDATE users SET avatar = $1, updated_at = NOW() WHERE id = $2", [url, userId], db);
}

export async function confirmEmail(userId: number, db: Queryable = pool): Promise<User | null> {
  return updateReturning("UPDATE users SET confirmed = TRUE, updated_at = NOW() WHERE id = $1", [userId], db);
}

export async function updatePassword(userId: number, passwordHash: string, db: Queryable = pool): Promise<User | null> {
  return updateReturning(
    "UPDATE users SET password_hash = $1, updated_at = NOW() WHERE id = $2",
    [passwordHash, userId],
    db
  );
}
