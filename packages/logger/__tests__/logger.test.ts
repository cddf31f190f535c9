/**
 * Logger Tests
 */

import { describe, it, expect } from "@jest/globals";
import { createLogger, logger } from "../src/index.js";

describe("createLogger", () => {
  it("should tag records with the component name", () => {
    expect(createLogger("db").bindings()).toMatchObject({
      name: `${process.env.SERVICE_NAME || "foodgram"}:db`,
      service: "db",
    });
  });

  it("should take its level from LOG_LEVEL", () => {
    expect(createLogger("seed").level).toBe(process.env.LOG_LEVEL || "info");
  });

  it("should expose a default logger", () => {
    expect(logger.bindings()).toMatchObject({ service: "main" });
  });
});
