/**
 * Health and Metrics Route Tests
 */

import { describe, it, expect, beforeEach, afterEach } from "@jest/globals";
import type { FastifyInstance } from "fastify";
import { createTestApp, mockedDb } from "./helpers.js";
import { buildPrometheusMetrics } from "../src/app.js";

describe("Health Routes", () => {
  let app: FastifyInstance;

  beforeEach(async () => {
    app = await createTestApp();
  });

  afterEach(async () => {
    await app.close();
  });

  it("GET /health should report liveness", async () => {
    const response = await app.inject({ method: "GET", url: "/health" });

    expect(response.statusCode).toBe(200);
    expect(response.json().status).toBe("ok");
  });

  it("GET /health/ready should report a reachable database", async () => {
    mockedDb.checkDbConnection.mockResolvedValue(true);

    const response = await app.inject({ method: "GET", url: "/health/ready" });

    expect(response.statusCode).toBe(200);
    expect(response.json()).toMatchObject({ status: "healthy", checks: { database: { status: "up" } } });
  });

  it("GET /health/ready should answer 503 when the database is down", async () => {
    mockedDb.checkDbConnection.mockResolvedValue(false);

    const response = await app.inject({ method: "GET", url: "/health/ready" });

    expect(response.statusCode).toBe(503);
    expect(response.json()).toMatchObject({
      status: "unhealthy",
      checks: { database: { status: "down", message: "Database ping failed" } },
    });
  });

  it("should answer unknown routes with a detail body", async () => {
    const response = await app.inject({ method: "GET", url: "/api/unknown/" });

    expect(response.statusCode).toBe(404);
    expect(response.json()).toEqual({ detail: "Страница не найдена." });
  });
});

describe("buildPrometheusMetrics", () => {
  it("should render database counters", () => {
    const text = buildPrometheusMetrics({ totalQueries: 12, slowQueries: 1, errors: 0, avgQueryTimeMs: 2.5 });

    expect(text.split("\n")).toEqual(
      expect.arrayContaining([
        "foodgram_api_db_queries_total 12",
        "foodgram_api_db_slow_queries_total 1",
        "foodgram_api_db_errors_total 0",
        "foodgram_api_db_avg_query_time_ms 2.50",
      ])
    );
  });
});
