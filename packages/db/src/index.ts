/**
 * @foodgram/db - Database Package
 *
 * node-postgres pool, SQL repositories and domain types.
 *
 * Usage:
 * ```ts
 * import { findRecipeById, withTransaction, insertRecipe } from "@foodgram/db";
 *
 * const recipe = await findRecipeById(42);
 * const id = await withTransaction((client) => insertRecipe(client, input));
 * ```
 */

// Pool, transactions, metrics
export * from "./client.js";

// Postgres error helpers
export * from "./errors.js";

// Domain types
export * from "./types.js";

// Repositories
export * from "./repositories/users.js";
export * from "./repositories/tags.js";
export * from "./repositories/ingredients.js";
export * from "./repositories/recipes.js";
export * from "./repositories/cart.js";

// Schema and seed data
export { applySchema, SCHEMA_PATH } from "./migrate.js";
export { loadSeedData, seedCatalog, type SeedData, type SeedResult } from "./seed.js";
