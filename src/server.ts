/**
 * Server Entry Point
 * ==================
 * Starts the Express server
 */

import { createApp } from "./app.js";
import { disconnectDb } from "./shared/db.js";
import { envInt } from "./shared/env.js";
import { logger } from "./shared/logger.js";
import { disconnectRedis } from "./shared/redis.js";

const app = createApp();
const PORT = envInt("PORT", 3000);

const server = app.listen(PORT, () => {
  logger.info("Server listening", {
    url: `http://localhost:${PORT}`,
    health: `http://localhost:${PORT}/health`,
    docs: `http://localhost:${PORT}/api-docs`,
  });
});

async function shutdown(signal: string): Promise<void> {
  logger.info(`${signal} received, closing server...`);
  server.close();
  await Promise.allSettled([disconnectDb(), disconnectRedis()]);
  process.exit(0);
}

// Graceful shutdown
process.on("SIGTERM", () => {
  void shutdown("SIGTERM");
});

process.on("SIGINT", () => {
  void shutdown("SIGINT");
});

export default app;
