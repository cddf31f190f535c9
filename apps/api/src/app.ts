/**
 * Foodgram API application factory
 *
 * Builds the Fastify instance with plugins, routes, hooks and error
 * handling. `index.ts` starts it; tests drive it with `inject`.
 */

import Fastify, { type FastifyError, type FastifyInstance, type FastifyServerOptions } from "fastify";
import cors from "@fastify/cors";
import helmet from "@fastify/helmet";
import rateLimit from "@fastify/rate-limit";
import swagger from "@fastify/swagger";
import swaggerUi from "@fastify/swagger-ui";
import { getDbMetrics, type DbMetrics } from "@foodgram/db";
import { ShortLinkGenerationError } from "@foodgram/shared";

import { getConfig, RATE_LIMITS } from "./config.js";
import { HttpError, MESSAGES } from "./errors.js";
import { authPlugin } from "./middleware/auth.js";
import { healthRoutes } from "./routes/health.js";
import { userRoutes } from "./routes/users/index.js";
import { catalogRoutes } from "./routes/catalog/index.js";
import { recipeRoutes } from "./routes/recipes/index.js";
import { shoppingCartRoutes } from "./routes/recipes/shopping-cart.js";
import { shortLinkRoutes } from "./routes/short-links.js";

export interface BuildAppOptions {
  logger?: FastifyServerOptions["logger"];
  /** Serve the OpenAPI document and Swagger UI on /docs */
  docs?: boolean;
  rateLimit?: boolean;
}

// ============================================================================
// Metrics
// ============================================================================

/**
 * Build Prometheus-compatible metrics string
 */
export function buildPrometheusMetrics(dbMetrics: DbMetrics): string {
  const lines: string[] = [];

  lines.push("# HELP foodgram_api_db_queries_total Total database queries");
  lines.push("# TYPE foodgram_api_db_queries_total counter");
  lines.push(`foodgram_api_db_queries_total ${dbMetrics.totalQueries}`);

  lines.push("# HELP foodgram_api_db_slow_queries_total Slow database queries");
  lines.push("# TYPE foodgram_api_db_slow_queries_total counter");
  lines.push(`foodgram_api_db_slow_queries_total ${dbMetrics.slowQueries}`);

  lines.push("# HELP foodgram_api_db_errors_total Database errors");
  lines.push("# TYPE foodgram_api_db_errors_total counter");
  lines.push(`foodgram_api_db_errors_total ${dbMetrics.errors}`);

  lines.push("# HELP foodgram_api_db_avg_query_time_ms Average query time in ms");
  lines.push("# TYPE foodgram_api_db_avg_query_time_ms gauge");
  lines.push(`foodgram_api_db_avg_query_time_ms ${dbMetrics.avgQueryTimeMs.toFixed(2)}`);

  return lines.join("\n") + "\n";
}

// ============================================================================
// Plugins
// ============================================================================

async function registerPlugins(fastify: FastifyInstance, options: BuildAppOptions): Promise<void> {
  const config = getConfig();

  // Security headers
  await fastify.register(helmet, {
    contentSecurityPolicy: config.nodeEnv === "production",
  });

  await fastify.register(cors, {
    origin: config.corsOrigin,
    credentials: true,
  });

  if (options.rateLimit) {
    await fastify.register(rateLimit, {
      max: RATE_LIMITS.default.max,
      timeWindow: RATE_LIMITS.default.timeWindow,
      keyGenerator: (request) => request.ip || "unknown",
      errorResponseBuilder: (request, context) => ({
        statusCode: 429,
        detail: MESSAGES.TOO_MANY_REQUESTS,
        retryAfter: context.after,
      }),
    });
  }

  if (options.docs) {
    await fastify.register(swagger, {
      openapi: {
        info: {
          title: "Foodgram API",
          description: "Recipes, shopping cart and short links",
          version: "1.0.0",
        },
        servers: [{ url: config.publicBaseUrl }],
        tags: [
          { name: "users", description: "Registration and profile" },
          { name: "auth", description: "Token login and logout" },
          { name: "tags", description: "Recipe tags" },
          { name: "ingredients", description: "Ingredient catalog" },
          { name: "recipes", description: "Recipes" },
          { name: "shopping cart", description: "Shopping cart and list download" },
          { name: "short links", description: "Short link redirects" },
          { name: "health", description: "Health check endpoints" },
        ],
        components: {
          securitySchemes: {
            tokenAuth: {
              type: "apiKey",
              in: "header",
              name: "Authorization",
              description: "Token <jwt>",
            },
          },
        },
      },
    });

    await fastify.register(swaggerUi, {
      routePrefix: "/docs",
      uiConfig: {
        docExpansion: "list",
        deepLinking: true,
      },
    });
  }
}

// ============================================================================
// Routes
// ============================================================================

async function registerRoutes(fastify: FastifyInstance): Promise<void> {
  // Decorates request with auth properties
  await fastify.register(authPlugin);

  await fastify.register(healthRoutes);
  await fastify.register(userRoutes);
  await fastify.register(catalogRoutes);
  await fastify.register(shoppingCartRoutes);
  await fastify.register(recipeRoutes);
  await fastify.register(shortLinkRoutes);

  fastify.get("/metrics", { schema: { hide: true } }, async (request, reply) => {
    reply.header("Content-Type", "text/plain; version=0.0.4");
    return buildPrometheusMetrics(getDbMetrics());
  });
}

// ============================================================================
// Hooks and Error Handling
// ============================================================================

function registerHooks(fastify: FastifyInstance): void {
  fastify.addHook("onRequest", async (request) => {
    request.log.info({ url: request.url, method: request.method }, "Incoming request");
  });

  fastify.addHook("onResponse", async (request, reply) => {
    request.log.info(
      {
        url: request.url,
        method: request.method,
        statusCode: reply.statusCode,
        responseTime: reply.elapsedTime,
      },
      "Request completed"
    );
  });

  fastify.setErrorHandler((error: FastifyError, request, reply) => {
    if (error instanceof HttpError) {
      return reply.status(error.statusCode).send({ detail: error.message });
    }

    if (error instanceof ShortLinkGenerationError) {
      request.log.error({ err: error }, "Short link generation exhausted");
      return reply.status(503).send({ detail: MESSAGES.SHORT_LINK_UNAVAILABLE });
    }

    // Rate limit exceeded
    if (error.statusCode === 429) {
      return reply.status(429).send({ detail: MESSAGES.TOO_MANY_REQUESTS });
    }

    if (error.validation) {
      return reply.status(400).send({ detail: MESSAGES.VALIDATION_FAILED, errors: error.validation });
    }

    // Malformed JSON, oversized body, unsupported media type
    if (error.statusCode !== undefined && error.statusCode < 500) {
      return reply.status(error.statusCode).send({ detail: error.message });
    }

    request.log.error({ err: error }, "Request error");
    return reply.status(500).send({
      detail: getConfig().nodeEnv === "production" ? MESSAGES.INTERNAL : error.message,
    });
  });

  fastify.setNotFoundHandler((request, reply) => {
    return reply.status(404).send({ detail: MESSAGES.NOT_FOUND });
  });
}

// ============================================================================
// Factory
// ============================================================================

export async function buildApp(options: BuildAppOptions = {}): Promise<FastifyInstance> {
  const fastify = Fastify({
    logger: options.logger ?? false,
    ignoreTrailingSlash: true,
    trustProxy: true,
    requestIdHeader: "x-request-id",
  });

  await registerPlugins(fastify, options);
  registerHooks(fastify);
  await registerRoutes(fastify);

  return fastify;
}
