/**
 * Schema Migration Script
 *
 * Applies sql/schema.sql. Every statement is CREATE ... IF NOT EXISTS.
 *
 * Usage:
 *   npm run db:migrate
 */

import { readFile } from "node:fs/promises";
import path from "node:path";
import { createLogger } from "@foodgram/logger";
import { disconnectDb, withTransaction, type Queryable } from "./client.js";

const log = createLogger("migrate");

export const SCHEMA_PATH = path.join(__dirname, "..", "sql", "schema.sql");

export async function applySchema(client: Queryable, sql?: string): Promise<void> {
  await client.query(sql ?? (await readFile(SCHEMA_PATH, "utf8")));
}

async function main(): Promise<void> {
  await withTransaction((client) => applySchema(client)).finally(disconnectDb);
  log.info({ schema: SCHEMA_PATH }, "Schema applied");
}

if (require.main === module) {
  main().catch((err) => {
    log.error({ err }, "Migration failed");
    process.exitCode = 1;
  });
}
