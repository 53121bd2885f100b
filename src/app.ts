/**
 * Express Application Factory
 * ============================
 * Creates and configures the Express app with all routes and middleware
 */

import "dotenv/config";

import cors from "cors";
import express from "express";
import swaggerUi from "swagger-ui-express";

import { swaggerSpec } from "./config/swagger.js";
import { authContextMiddleware } from "./middleware/auth-context.js";
import { errorHandler } from "./middleware/error-handler.js";
import { notFoundHandler } from "./middleware/not-found.js";
import { authRouter } from "./modules/auth/index.js";
import { contactsRouter } from "./modules/contacts/index.js";
import { usersRouter } from "./modules/users/index.js";
import { API_VERSION, SERVICE_NAME } from "./shared/constants.js";
import { envList } from "./shared/env.js";
import { isRedisConfigured } from "./shared/redis.js";

const DEFAULT_CORS_ORIGINS = ["http://localhost:3000", "http://localhost:5173"];

export function createApp() {
  const app = express();

  const origins = envList("CORS_ORIGINS");
  app.use(
    cors({
      origin: origins.length > 0 ? origins : DEFAULT_CORS_ORIGINS,
      credentials: true,
    })
  );
  app.use(express.json({ limit: "1mb" }));
  app.use(express.urlencoded({ extended: false }));
  app.use(authContextMiddleware);

  // Swagger UI
  app.use("/api-docs", swaggerUi.serve, swaggerUi.setup(swaggerSpec));
  app.get("/api-docs.json", (_req, res) => {
    res.json(swaggerSpec);
  });

  /**
   * @swagger
   * /:
   *   get:
   *     summary: API banner
   *     tags: [Health]
   *     responses:
   *       200:
   *         description: Service name and docs location
   */
  app.get("/", (_req, res) => {
    res.json({ message: `${SERVICE_NAME} ${API_VERSION}`, docs: "/api-docs" });
  });

  /**
   * @swagger
   * /health:
   *   get:
   *     summary: Liveness probe
   *     tags: [Health]
   *     responses:
   *       200:
   *         description: Service is up
   */
  app.get("/health", (_req, res) => {
    res.json({
      status: "ok",
      timestamp: new Date().toISOString(),
      service: SERVICE_NAME,
      version: API_VERSION,
      redis: isRedisConfigured() ? "configured" : "disabled",
    });
  });

  // Register module routes
  app.use("/api/auth", authRouter);
  app.use("/api/users", usersRouter);
  app.use("/api/contacts", contactsRouter);

  // 404 + error handling (keep last)
  app.use(notFoundHandler);
  app.use(errorHandler);

  return app;
}
