/**
 * Ingredients Repository
 */

import { z } from "zod";
import { getDb, type Queryable } from "../client.js";
import { affectedRows, parseFirstRow, parseRows } from "../rows.js";
import type { Ingredient, NewIngredient } from "../types.js";

const ingredientRow = z
  .object({
    id: z.number(),
    name: z.string(),
    measurement_unit: z.string(),
  })
  .transform(
    (row): Ingredient => ({
      id: row.id,
      name: row.name,
      measurementUnit: row.measurement_unit,
    })
  );

const idRow = z.object({ id: z.number() });

const SELECT_ALL = "SELECT id, name, measurement_unit FROM ingredients ORDER BY name, id";

/**
 * Case-insensitive prefix match; LIKE wildcards in the prefix are escaped
 * by the caller.
 */
const SELECT_BY_PREFIX = `
  SELECT id, name, measurement_unit
  FROM ingredients
  WHERE lower(name) LIKE lower($1) || '%' ESCAPE '\\'
  ORDER BY name, id
`;

const SELECT_BY_ID = "SELECT id, name, measurement_unit FROM ingredients WHERE id = $1";

const SELECT_EXISTING_IDS = "SELECT id FROM ingredients WHERE id = ANY($1::int[])";

const INSERT_MANY = `
  INSERT INTO ingredients (name, measurement_unit)
  SELECT * FROM unnest($1::text[], $2::text[])
  ON CONFLICT DO NOTHING
`;

export function escapeLikePattern(value: string): string {
  return value.replace(/[\\%_]/g, "\\$&");
}

/**
 * All ingredients, or those whose name starts with `prefix` (any case).
 */
export async function searchIngredients(prefix?: string, client: Queryable = getDb()): Promise<Ingredient[]> {
  const { rows } = prefix
    ? await client.query(SELECT_BY_PREFIX, [escapeLikePattern(prefix)])
    : await client.query(SELECT_ALL);
  return parseRows(ingredientRow, rows);
}

export async function findIngredientById(id: number, client: Queryable = getDb()): Promise<Ingredient | null> {
  const { rows } = await client.query(SELECT_BY_ID, [id]);
  return parseFirstRow(ingredientRow, rows);
}

/**
 * Ids from `ids` with no ingredient row, in input order.
 */
export async function findMissingIngredientIds(
  ids: readonly number[],
  client: Queryable = getDb()
): Promise<number[]> {
  if (ids.length === 0) {
    return [];
  }

  const { rows } = await client.query(SELECT_EXISTING_IDS, [ids]);
  const existing = new Set(parseRows(idRow, rows).map((row) => row.id));
  return ids.filter((id) => !existing.has(id));
}

/**
 * Insert ingredients, skipping (name, unit) pairs already present.
 *
 * @returns number of rows inserted
 */
export async function insertIngredients(
  ingredients: readonly NewIngredient[],
  client: Queryable = getDb()
): Promise<number> {
  if (ingredients.length === 0) {
    return 0;
  }

  const result = await client.query(INSERT_MANY, [
    ingredients.map((ingredient) => ingredient.name),
    ingredients.map((ingredient) => ingredient.measurementUnit),
  ]);
  return affectedRows(result);
}
