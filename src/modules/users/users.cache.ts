/**
 * Users Cache
 * ===========
 * Redis snapshot of public user profiles, keyed `user:<id>`.
 * Every operation degrades to a no-op when Redis is absent or failing.
 */

import { REDIS_KEYS } from "../../shared/constants.js";
import { envInt } from "../../shared/env.js";
import { logger } from "../../shared/logger.js";
import { getRedisClient } from "../../shared/redis.js";
import { type UserProfile, userProfileSchema } from "./users.schemas.js";

function keyFor(userId: number): string {
  return `${REDIS_KEYS.USER_SNAPSHOT}${userId}`;
}

function warn(op: string, userId: number, err: unknown) {
  logger.warn("User cache unavailable", {
    op,
    user_id: userId,
    error: err instanceof Error ? err.message : String(err),
  });
}

export async function getCachedUserProfile(userId: number): Promise<UserProfile | null> {
  try {
    const redis = await getRedisClient();
    if (!redis) {return null;}

    const raw = await redis.get(keyFor(userId));
    if (!raw) {return null;}

    const parsed = userProfileSchema.safeParse(JSON.parse(raw));
    if (!parsed.success) {
      await redis.del(keyFor(userId));
      return null;
    }
    return parsed.data;
  } catch (err) {
    warn("get", userId, err);
    return null;
  }
}

export async function cacheUserProfile(profile: UserProfile): Promise<void> {
  try {
    const redis = await getRedisClient();
    if (!redis) {return;}
    await redis.set(keyFor(profile.id), JSON.stringify(profile), {
      EX: envInt("USER_CACHE_TTL_SECONDS", 15 * 60),
    });
  } catch (err) {
    warn("set", profile.id, err);
  }
}

export async function evictUserProfile(userId: number): Promise<void> {
  try {
    const redis = await getRedisClient();
    if (!redis) {return;}
    await redis.del(keyFor(userId));
  } catch (err) {
    warn("del", userId, err);
  }
}
