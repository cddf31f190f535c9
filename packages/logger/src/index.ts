/**
 * @foodgram/logger - Structured Logging Package
 *
 * pino JSON logging shared by the API, the database layer and the CLI
 * scripts.
 *
 * Usage:
 * ```ts
 * import { logger, createLogger } from "@foodgram/logger";
 *
 * logger.info({ recipeId: 42 }, "Recipe created");
 *
 * const dbLogger = createLogger("db");
 * dbLogger.warn({ durationMs }, "Slow query");
 * ```
 */

import pino from "pino";

// ============================================================================
// Configuration
// ============================================================================

const LOG_LEVEL = process.env.LOG_LEVEL || "info";
const NODE_ENV = process.env.NODE_ENV || "development";
const SERVICE_NAME = process.env.SERVICE_NAME || "foodgram";

export type LogLevel = "trace" | "debug" | "info" | "warn" | "error" | "fatal";

// ============================================================================
// Logger Factory
// ============================================================================

/**
 * Create a logger for a component. Records carry `service` and `env`;
 * development output goes through pino-pretty.
 */
export function createLogger(name: string): pino.Logger {
  return pino({
    name: `${SERVICE_NAME}:${name}`,
    level: LOG_LEVEL,
    timestamp: pino.stdTimeFunctions.isoTime,
    formatters: {
      level: (label) => ({ level: label }),
    },
    transport:
      NODE_ENV === "development"
        ? {
            target: "pino-pretty",
            options: {
              colorize: true,
              translateTime: "SYS:standard",
              ignore: "pid,hostname",
            },
          }
        : undefined,
    base: {
      service: name,
      env: NODE_ENV,
    },
  });
}

// ============================================================================
// Default Logger Instance
// ============================================================================

export const logger = createLogger("main");

export type { Logger } from "pino";
