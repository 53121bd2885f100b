import { createHash, randomBytes } from "node:crypto";

import { jwtVerify, SignJWT } from "jose";

import { envInt, envString } from "./env.js";
import { AuthenticationError, ConfigurationError } from "./errors.js";

export const ACCESS_TOKEN_SCOPE = "access_token";

const SUPPORTED_ALGORITHMS = ["HS256", "HS384", "HS512"] as const;

export type JwtAlgorithm = (typeof SUPPORTED_ALGORITHMS)[number];

export type AccessTokenClaims = {
  sub: string; // user id
  email: string;
};

export type AuthConfig = {
  issuer: string;
  audience: string;
  algorithm: JwtAlgorithm;
  accessTtlSeconds: number;
  refreshTtlSeconds: number;
  verifyEmailTtlSeconds: number;
  resetPasswordTtlSeconds: number;
  refreshCookieName: string;
  cookieSecure: boolean;
  cookieSameSite: "lax" | "strict" | "none";
};

function readAlgorithm(): JwtAlgorithm {
  const raw = (envString("JWT_ALGORITHM") || "HS256").toUpperCase();
  const found = SUPPORTED_ALGORITHMS.find((alg) => alg === raw);
  if (!found) {
    throw new ConfigurationError(`JWT_ALGORITHM must be one of ${SUPPORTED_ALGORITHMS.join(", ")}`);
  }
  return found;
}

export function getAuthConfig(): AuthConfig {
  const issuer = envString("JWT_ISSUER") || "contacts-api";
  const audience = envString("JWT_AUDIENCE") || "contacts-api";
  const accessTtlSeconds = envInt("AUTH_ACCESS_TTL_SECONDS", 15 * 60);
  const refreshTtlSeconds = envInt("AUTH_REFRESH_TTL_SECONDS", 7 * 24 * 60 * 60);
  const verifyEmailTtlSeconds = envInt("AUTH_VERIFY_TTL_SECONDS", 7 * 24 * 60 * 60);
  const resetPasswordTtlSeconds = envInt("AUTH_RESET_TTL_SECONDS", 60 * 60);
  const refreshCookieName = envString("AUTH_REFRESH_COOKIE_NAME") || "refresh_token";

  const sameSiteRaw = (envString("AUTH_COOKIE_SAMESITE") || "lax").toLowerCase();
  const cookieSameSite: AuthConfig["cookieSameSite"] =
    sameSiteRaw === "strict" ? "strict" : sameSiteRaw === "none" ? "none" : "lax";

  const cookieSecureRaw = (process.env.AUTH_COOKIE_SECURE ?? "").trim().toLowerCase();
  const cookieSecure =
    cookieSecureRaw === "1" ||
    cookieSecureRaw === "true" ||
    (cookieSecureRaw === "" && process.env.NODE_ENV === "production");

  return {
    issuer,
    audience,
    algorithm: readAlgorithm(),
    accessTtlSeconds,
    refreshTtlSeconds,
    verifyEmailTtlSeconds,
    resetPasswordTtlSeconds,
    refreshCookieName,
    cookieSecure,
    cookieSameSite,
  };
}

function requireJwtAccessSecret(): Uint8Array {
  const secret = envString("JWT_ACCESS_SECRET");
  if (!secret) {throw new ConfigurationError("JWT_ACCESS_SECRET is required");}
  return new TextEncoder().encode(secret);
}

export async function signAccessToken(params: { userId: number; email: string }): Promise<string> {
  const cfg = getAuthConfig();
  const key = requireJwtAccessSecret();

  return await new SignJWT({
    email: params.email,
    scope: ACCESS_TOKEN_SCOPE,
  })
    .setProtectedHeader({ alg: cfg.algorithm, typ: "JWT" })
    .setIssuer(cfg.issuer)
    .setAudience(cfg.audience)
    .setSubject(String(params.userId))
    .setIssuedAt()
    .setExpirationTime(`${cfg.accessTtlSeconds}s`)
    .sign(key);
}

export async function verifyAccessToken(token: string): Promise<AccessTokenClaims> {
  const cfg = getAuthConfig();
  const key = requireJwtAccessSecret();

  try {
    const { payload } = await jwtVerify(token, key, {
      issuer: cfg.issuer,
      audience: cfg.audience,
      algorithms: [cfg.algorithm],
    });

    const sub = typeof payload.sub === "string" && /^\d+$/.test(payload.sub) ? payload.sub : null;
    const email = typeof payload.email === "string" && payload.email.trim() ? payload.email.trim() : null;
    if (!sub || !email || payload.scope !== ACCESS_TOKEN_SCOPE) {
      throw new AuthenticationError("Invalid access token");
    }

    return { sub, email };
  } catch (err: unknown) {
    if (err instanceof ConfigurationError) {throw err;}
    throw new AuthenticationError("Could not validate credentials");
  }
}

export function extractBearerToken(value: unknown): string | null {
  if (typeof value !== "string") {return null;}
  const v = value.trim();
  if (!v) {return null;}
  const m = /^Bearer\s+(.+)$/i.exec(v);
  if (!m) {return null;}
  const token = m[1]?.trim();
  return token ? token : null;
}

export function generateOpaqueToken(bytes = 32): string {
  return randomBytes(Math.max(16, bytes)).toString("base64url");
}

export function hashOpaqueToken(token: string): string {
  return createHash("sha256").update(String(token || ""), "utf8").digest("base64url");
}

export function parseCookieHeader(header: unknown): Record<string, string> {
  if (typeof header !== "string" || header.trim().length === 0) {return {};}
  const out: Record<string, string> = {};
  const parts = header.split(";");
  for (const part of parts) {
    const idx = part.indexOf("=");
    if (idx === -1) {continue;}
    const rawKey = part.slice(0, idx).trim();
    const rawVal = part.slice(idx + 1).trim();
    if (!rawKey) {continue;}
    try {
      out[rawKey] = decodeURIComponent(rawVal);
    } catch {
      out[rawKey] = rawVal;
    }
  }
  return out;
}

export function getCookieValue(cookieHeader: unknown, name: string): string | null {
  const cookies = parseCookieHeader(cookieHeader);
  const v = cookies[name];
  return typeof v === "string" && v.length > 0 ? v : null;
}
