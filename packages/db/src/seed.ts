/**
 * Database Seeding Script
 *
 * Loads the ingredient catalog and default tags. Existing rows are kept
 * (ON CONFLICT DO NOTHING), so the script can run on every deploy.
 *
 * Usage:
 *   npm run db:seed
 *
 * Data:
 *   - data/ingredients.json: [{ name, measurement_unit }]
 *   - data/tags.json:        [{ name, slug }]
 */

import { readFile } from "node:fs/promises";
import path from "node:path";
import { z } from "zod";
import { createLogger } from "@foodgram/logger";
import { disconnectDb, withTransaction, type Queryable } from "./client.js";
import { insertIngredients } from "./repositories/ingredients.js";
import { insertTags } from "./repositories/tags.js";
import type { NewIngredient, NewTag } from "./types.js";

const log = createLogger("seed");

/** Resolves from both src/ and dist/ */
const DATA_DIR = path.join(__dirname, "..", "data");

export interface SeedData {
  ingredients: NewIngredient[];
  tags: NewTag[];
}

export interface SeedResult {
  ingredients: number;
  tags: number;
}

const ingredientFile = z.array(
  z
    .object({
      name: z.string().min(1).max(128),
      measurement_unit: z.string().min(1).max(64),
    })
    .transform((item): NewIngredient => ({ name: item.name, measurementUnit: item.measurement_unit }))
);

const tagFile = z.array(
  z.object({
    name: z.string().min(1).max(32),
    slug: z.string().regex(/^[-a-zA-Z0-9_]+$/).max(32),
  })
);

async function readJson(file: string): Promise<unknown> {
  return JSON.parse(await readFile(path.join(DATA_DIR, file), "utf8"));
}

export async function loadSeedData(): Promise<SeedData> {
  return {
    ingredients: ingredientFile.parse(await readJson("ingredients.json")),
    tags: tagFile.parse(await readJson("tags.json")),
  };
}

/**
 * Insert seed data through `client`.
 *
 * @returns rows actually inserted per table
 */
export async function seedCatalog(client: Queryable, data: SeedData): Promise<SeedResult> {
  const tags = await insertTags(data.tags, client);
  const ingredients = await insertIngredients(data.ingredients, client);
  return { ingredients, tags };
}

async function main(): Promise<void> {
  const data = await loadSeedData();
  const result = await withTransaction((client) => seedCatalog(client, data)).finally(disconnectDb);

  log.info(
    {
      ingredients: result.ingredients,
      tags: result.tags,
      skipped: data.ingredients.length + data.tags.length - result.ingredients - result.tags,
    },
    "Seed complete"
  );
}

// =============================================================================
// CLI Entry Point
// =============================================================================

if (require.main === module) {
  main().catch((err) => {
    log.error({ err }, "Seed failed");
    process.exitCode = 1;
  });
}
