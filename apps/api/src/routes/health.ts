/**
 * Health Check Routes
 *
 * Liveness and readiness checks for the orchestrator and load balancer.
 */

import type { FastifyInstance } from "fastify";
import { checkDbConnection } from "@foodgram/db";
import type { HealthCheckResponse, HealthStatus } from "@foodgram/shared";

const VERSION = process.env.npm_package_version || "1.0.0";

async function checkDatabase(): Promise<HealthStatus> {
  const started = Date.now();
  const ok = await checkDbConnection();
  return ok
    ? { status: "up", latencyMs: Date.now() - started }
    : { status: "down", message: "Database ping failed" };
}

export async function healthRoutes(fastify: FastifyInstance): Promise<void> {
  // Liveness: process is up
  fastify.get("/health", { schema: { tags: ["health"] } }, async () => {
    return { status: "ok", timestamp: new Date().toISOString() };
  });

  // Readiness: database reachable
  fastify.get("/health/ready", { schema: { tags: ["health"] } }, async (request, reply) => {
    const database = await checkDatabase();
    const healthy = database.status === "up";

    const body: HealthCheckResponse = {
      status: healthy ? "healthy" : "unhealthy",
      timestamp: new Date().toISOString(),
      version: VERSION,
      uptime: Math.round(process.uptime()),
      checks: { database },
    };

    return reply.status(healthy ? 200 : 503).send(body);
  });
}
