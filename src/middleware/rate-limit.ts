/**
 * Rate Limiting
 * =============
 * Fixed-window request counters kept in Redis (INCR + PEXPIRE).
 *
 * - The caller is identified by user id when authenticated, by IP otherwise.
 * - Without Redis (REDIS_URL unset or unreachable) the limiter lets requests through.
 */

import type { Request, RequestHandler, Response } from "express";

import { getRequestAuth } from "../shared/auth-context.js";
import { REDIS_KEYS } from "../shared/constants.js";
import { envInt } from "../shared/env.js";
import { RateLimitError } from "../shared/errors.js";
import { logger } from "../shared/logger.js";
import { getRedisClient } from "../shared/redis.js";

export type RateLimitHit = {
  count: number;
  ttlMs: number;
};

export interface RateLimitStore {
  increment(key: string, windowMs: number): Promise<RateLimitHit>;
}

export type RateLimitOptions = {
  name: string;
  limitEnvKey: string;
  defaultLimit: number;
  windowEnvKey: string;
  defaultWindowSeconds: number;
};

let storeOverride: RateLimitStore | null = null;

const redisStore: RateLimitStore = {
  async increment(key, windowMs) {
    const redis = await getRedisClient();
    if (!redis) {return { count: 0, ttlMs: windowMs };}

    const count = await redis.incr(key);
    if (count === 1) {
      await redis.pExpire(key, windowMs);
    }
    const ttl = await redis.pTTL(key);
    if (ttl < 0) {
      // Key lost its expiry (eg. crash between INCR and PEXPIRE)
      await redis.pExpire(key, windowMs);
      return { count, ttlMs: windowMs };
    }
    return { count, ttlMs: ttl };
  },
};

function resolveStore(): RateLimitStore {
  return storeOverride ?? redisStore;
}

function callerKey(req: Request): string {
  const auth = getRequestAuth(req);
  if (auth) {return `user:${auth.userId}`;}
  return `ip:${req.ip ?? "unknown"}`;
}

function setLimitHeaders(res: Response, limit: number, remaining: number) {
  res.setHeader("X-RateLimit-Limit", String(limit));
  res.setHeader("X-RateLimit-Remaining", String(Math.max(0, remaining)));
}

export function rateLimit(options: RateLimitOptions): RequestHandler {
  return (req, res, next) => {
    const limit = envInt(options.limitEnvKey, options.defaultLimit);
    const windowMs = envInt(options.windowEnvKey, options.defaultWindowSeconds) * 1000;
    const key = `${REDIS_KEYS.RATE_LIMIT}${options.name}:${callerKey(req)}`;

    void resolveStore()
      .increment(key, windowMs)
      .then((hit) => {
        if (hit.count === 0) {return next();}

        setLimitHeaders(res, limit, limit - hit.count);
        if (hit.count > limit) {
          return next(new RateLimitError(Math.max(1, Math.ceil(hit.ttlMs / 1000))));
        }
        return next();
      })
      .catch((err: unknown) => {
        logger.warn("Rate limiter unavailable (allowing request)", {
          limiter: options.name,
          error: err instanceof Error ? err.message : String(err),
        });
        next();
      });
  };
}

export function __setRateLimitStoreForTests(store: RateLimitStore | null): void {
  storeOverride = store;
}
