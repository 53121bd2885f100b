/**
 * Redis Singleton
 * ===============
 * Centralized Redis client used for the user snapshot cache and rate limiting.
 *
 * Notes:
 * - Uses lazy connection (connect on first use).
 * - If REDIS_URL is not configured, functions return null and callers skip Redis.
 */

import { createClient, type RedisClientType } from "redis";

import { envString } from "./env.js";
import { logger } from "./logger.js";

let client: RedisClientType | null = null;
let connectPromise: Promise<void> | null = null;

async function ensureConnected(c: RedisClientType): Promise<void> {
  if (c.isOpen) {return;}
  if (!connectPromise) {
    connectPromise = c
      .connect()
      .then(() => undefined)
      .catch((err: unknown) => {
        // Reset promise so future attempts can retry
        connectPromise = null;
        throw err;
      });
  }
  await connectPromise;
}

export function isRedisConfigured(): boolean {
  return Boolean(envString("REDIS_URL"));
}

/**
 * Get the shared Redis client, or null if Redis is not configured.
 */
export async function getRedisClient(): Promise<RedisClientType | null> {
  const url = envString("REDIS_URL");
  if (!url) {return null;}

  if (!client) {
    client = createClient({ url });
    client.on("error", (err: unknown) => {
      logger.error("Redis client error", { error: err instanceof Error ? err.message : String(err) });
    });
    client.on("reconnecting", () => {
      logger.warn("Redis reconnecting...");
    });
  }

  await ensureConnected(client);
  return client;
}

export async function disconnectRedis(): Promise<void> {
  if (!client) {return;}
  try {
    if (client.isOpen) {
      await client.quit();
    }
  } catch (err) {
    logger.warn("Redis quit failed", { error: err instanceof Error ? err.message : String(err) });
  } finally {
    client = null;
    connectPromise = null;
  }
}
