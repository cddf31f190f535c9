/**
 * Shopping Cart Repository
 */

import { z } from "zod";
import type { CartRecipe } from "@foodgram/shared";
import { getDb, type Queryable } from "../client.js";
import { affectedRows, parseRows } from "../rows.js";

const INSERT_ENTRY = "INSERT INTO shopping_cart (user_id, recipe_id) VALUES ($1, $2)";

const DELETE_ENTRY = "DELETE FROM shopping_cart WHERE user_id = $1 AND recipe_id = $2";

const ENTRIES_FOR_RECIPES = `
  SELECT recipe_id
  FROM shopping_cart
  WHERE user_id = $1 AND recipe_id = ANY($2::int[])
`;

/**
 * One row per (cart recipe, ingredient line); recipes without ingredients
 * come back once with NULL ingredient columns.
 */
const CART_CONTENTS = `
  SELECT r.id AS recipe_id, r.name AS recipe_name,
         i.name AS ingredient_name, i.measurement_unit, ri.amount
  FROM shopping_cart sc
  JOIN recipes r ON r.id = sc.recipe_id
  LEFT JOIN recipe_ingredients ri ON ri.recipe_id = r.id
  LEFT JOIN ingredients i ON i.id = ri.ingredient_id
  WHERE sc.user_id = $1
  ORDER BY sc.id, ri.id
`;

const recipeIdRow = z.object({ recipe_id: z.number() });

const cartContentRow = z.object({
  recipe_id: z.number(),
  recipe_name: z.string(),
  ingredient_name: z.string().nullable(),
  measurement_unit: z.string().nullable(),
  amount: z.number().nullable(),
});

/**
 * Add a recipe to a user's cart. A second add of the same pair raises a
 * unique violation on shopping_cart_user_id_recipe_id_key.
 */
export async function addCartEntry(userId: number, recipeId: number, client: Queryable = getDb()): Promise<void> {
  await client.query(INSERT_ENTRY, [userId, recipeId]);
}

/**
 * @returns false when there was no such entry
 */
export async function removeCartEntry(userId: number, recipeId: number, client: Queryable = getDb()): Promise<boolean> {
  const result = await client.query(DELETE_ENTRY, [userId, recipeId]);
  return affectedRows(result) > 0;
}

/**
 * Subset of `recipeIds` present in the user's cart.
 */
export async function findCartRecipeIds(
  userId: number,
  recipeIds: readonly number[],
  client: Queryable = getDb()
): Promise<Set<number>> {
  if (recipeIds.length === 0) {
    return new Set();
  }

  const { rows } = await client.query(ENTRIES_FOR_RECIPES, [userId, recipeIds]);
  return new Set(parseRows(recipeIdRow, rows).map((row) => row.recipe_id));
}

export async function cartEntryExists(userId: number, recipeId: number, client: Queryable = getDb()): Promise<boolean> {
  const ids = await findCartRecipeIds(userId, [recipeId], client);
  return ids.has(recipeId);
}

/**
 * Load the user's cart with every ingredient line, in the order recipes
 * were added.
 */
export async function loadCart(userId: number, client: Queryable = getDb()): Promise<CartRecipe[]> {
  const { rows } = await client.query(CART_CONTENTS, [userId]);
  const cart = new Map<number, CartRecipe>();

  for (const row of parseRows(cartContentRow, rows)) {
    let recipe = cart.get(row.recipe_id);
    if (!recipe) {
      recipe = { recipeId: row.recipe_id, recipeName: row.recipe_name, ingredients: [] };
      cart.set(row.recipe_id, recipe);
    }

    if (row.ingredient_name !== null && row.measurement_unit !== null && row.amount !== null) {
      recipe.ingredients.push({
        name: row.ingredient_name,
        measurementUnit: row.measurement_unit,
        amount: row.amount,
      });
    }
  }

  return [...cart.values()];
}
