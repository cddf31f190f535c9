/**
 * Foodgram API Service
 *
 * Entry point: loads configuration, connects to Postgres and starts the
 * HTTP server built by `buildApp`.
 *
 * Endpoints:
 *   /api/users/, /api/auth/token/*   - Registration and token auth
 *   /api/tags/, /api/ingredients/    - Catalog
 *   /api/recipes/*                   - Recipes, shopping cart, short links
 *   GET /s/:token/                   - Short link redirect
 *   GET /health, /health/ready       - Health checks
 *   GET /metrics                     - Prometheus metrics
 *   GET /docs                        - Swagger UI
 */

import "dotenv/config";
import type { FastifyInstance } from "fastify";
import { logger } from "@foodgram/logger";
import { checkDbConnection, disconnectDb, initDb } from "@foodgram/db";

import { buildApp } from "./app.js";
import { configWarnings, getConfig } from "./config.js";

let app: FastifyInstance | null = null;

// ============================================================================
// Graceful Shutdown
// ============================================================================

async function gracefulShutdown(signal: string): Promise<void> {
  logger.info({ signal }, "Received shutdown signal");

  try {
    if (app) {
      await app.close();
      logger.info("Fastify server closed");
    }

    await disconnectDb();
    logger.info("Database connection closed");

    process.exit(0);
  } catch (err) {
    logger.error({ err }, "Error during shutdown");
    process.exit(1);
  }
}

process.on("SIGINT", () => void gracefulShutdown("SIGINT"));
process.on("SIGTERM", () => void gracefulShutdown("SIGTERM"));

// ============================================================================
// Server Start
// ============================================================================

async function start(): Promise<void> {
  const config = getConfig();

  for (const warning of configWarnings(config)) {
    logger.warn(warning);
  }

  initDb({ databaseUrl: config.databaseUrl, dbTimeoutMs: config.dbTimeoutMs });

  if (!(await checkDbConnection())) {
    throw new Error("Database connection failed");
  }
  logger.info("Database connection verified");

  app = await buildApp({
    logger: {
      level: config.logLevel,
      transport:
        config.nodeEnv === "development"
          ? {
              target: "pino-pretty",
              options: { colorize: true },
            }
          : undefined,
    },
    docs: true,
    rateLimit: true,
  });

  await app.listen({ port: config.port, host: config.host });

  logger.info(`Foodgram API running on http://${config.host}:${config.port}`);
  logger.info(`Swagger docs: http://${config.host}:${config.port}/docs`);
}

start().catch((err: unknown) => {
  logger.error({ err }, "Failed to start server");
  process.exit(1);
});
