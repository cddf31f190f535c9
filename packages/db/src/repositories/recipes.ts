/**
 * Recipes Repository
 *
 * Recipes are read in two steps: the recipe rows joined with their author,
 * then tags and ingredients for all of those ids at once.
 */

import { z } from "zod";
import { getDb, type Queryable } from "../client.js";
import { affectedRows, parseFirstRow, parseRows } from "../rows.js";
import { tagRow } from "./tags.js";
import { escapeLikePattern } from "./ingredients.js";
import type {
  CreateRecipeInput,
  IngredientAmount,
  RecipeDetail,
  RecipeFilter,
  RecipeIngredient,
  Tag,
  UpdateRecipeInput,
} from "../types.js";

// =============================================================================
// SQL Queries
// =============================================================================

const RECIPE_SELECT = `
  SELECT r.id, r.author_id, r.name, r.text, r.cooking_time, r.short_link,
         u.email AS author_email, u.username AS author_username,
         u.first_name AS author_first_name, u.last_name AS author_last_name
  FROM recipes r
  JOIN users u ON u.id = r.author_id
`;

const TAGS_FOR_RECIPES = `
  SELECT rt.recipe_id, t.id, t.name, t.slug
  FROM recipe_tags rt
  JOIN tags t ON t.id = rt.tag_id
  WHERE rt.recipe_id = ANY($1::int[])
  ORDER BY t.id
`;

const INGREDIENTS_FOR_RECIPES = `
  SELECT ri.recipe_id, i.id, i.name, i.measurement_unit, ri.amount
  FROM recipe_ingredients ri
  JOIN ingredients i ON i.id = ri.ingredient_id
  WHERE ri.recipe_id = ANY($1::int[])
  ORDER BY ri.id
`;

const INSERT_RECIPE = `
  INSERT INTO recipes (author_id, name, text, cooking_time, short_link)
  VALUES ($1, $2, $3, $4, $5)
  RETURNING id
`;

/** short_link is never part of this statement. */
const UPDATE_RECIPE = `
  UPDATE recipes
  SET name = COALESCE($2, name),
      text = COALESCE($3, text),
      cooking_time = COALESCE($4, cooking_time),
      updated_at = now()
  WHERE id = $1
`;

const ASSIGN_SHORT_LINK = `
  UPDATE recipes
  SET short_link = $2
  WHERE id = $1 AND short_link IS NULL
  RETURNING short_link
`;

const DELETE_TAGS = "DELETE FROM recipe_tags WHERE recipe_id = $1";

const INSERT_TAGS = `
  INSERT INTO recipe_tags (recipe_id, tag_id)
  SELECT $1, unnest($2::int[])
`;

const DELETE_INGREDIENTS = "DELETE FROM recipe_ingredients WHERE recipe_id = $1";

const INSERT_INGREDIENTS = `
  INSERT INTO recipe_ingredients (recipe_id, ingredient_id, amount)
  SELECT $1, t.ingredient_id, t.amount
  FROM unnest($2::int[], $3::int[]) AS t(ingredient_id, amount)
`;

const SHORT_LINK_EXISTS = "SELECT 1 FROM recipes WHERE short_link = $1 LIMIT 1";

const SELECT_ID_BY_SHORT_LINK = "SELECT id FROM recipes WHERE short_link = $1";

const DELETE_RECIPE = "DELETE FROM recipes WHERE id = $1";

// =============================================================================
// Row Schemas
// =============================================================================

const recipeRow = z
  .object({
    id: z.number(),
    author_id: z.number(),
    name: z.string(),
    text: z.string(),
    cooking_time: z.number(),
    short_link: z.string().nullable(),
    author_email: z.string(),
    author_username: z.string(),
    author_first_name: z.string(),
    author_last_name: z.string(),
  })
  .transform((row): RecipeDetail => ({
    id: row.id,
    authorId: row.author_id,
    name: row.name,
    text: row.text,
    cookingTime: row.cooking_time,
    shortLink: row.short_link,
    author: {
      id: row.author_id,
      email: row.author_email,
      username: row.author_username,
      firstName: row.author_first_name,
      lastName: row.author_last_name,
    },
    tags: [],
    ingredients: [],
  }));

const recipeTagRow = tagRow.extend({ recipe_id: z.number() });

const recipeIngredientRow = z.object({
  recipe_id: z.number(),
  id: z.number(),
  name: z.string(),
  measurement_unit: z.string(),
  amount: z.number(),
});

const idRow = z.object({ id: z.number() });

const shortLinkRow = z.object({ short_link: z.string() });

// =============================================================================
// Reads
// =============================================================================

async function hydrate(recipes: RecipeDetail[], client: Queryable): Promise<RecipeDetail[]> {
  if (recipes.length === 0) {
    return recipes;
  }

  const ids = recipes.map((recipe) => recipe.id);
  const tagResult = await client.query(TAGS_FOR_RECIPES, [ids]);
  const ingredientResult = await client.query(INGREDIENTS_FOR_RECIPES, [ids]);

  const tags = new Map<number, Tag[]>();
  for (const row of parseRows(recipeTagRow, tagResult.rows)) {
    const list = tags.get(row.recipe_id) ?? [];
    list.push({ id: row.id, name: row.name, slug: row.slug });
    tags.set(row.recipe_id, list);
  }

  const ingredients = new Map<number, RecipeIngredient[]>();
  for (const row of parseRows(recipeIngredientRow, ingredientResult.rows)) {
    const list = ingredients.get(row.recipe_id) ?? [];
    list.push({
      id: row.id,
      name: row.name,
      measurementUnit: row.measurement_unit,
      amount: row.amount,
    });
    ingredients.set(row.recipe_id, list);
  }

  return recipes.map((recipe) => ({
    ...recipe,
    tags: tags.get(recipe.id) ?? [],
    ingredients: ingredients.get(recipe.id) ?? [],
  }));
}

export async function findRecipeById(id: number, client: Queryable = getDb()): Promise<RecipeDetail | null> {
  const { rows } = await client.query(`${RECIPE_SELECT} WHERE r.id = $1`, [id]);
  const recipe = parseFirstRow(recipeRow, rows);
  if (!recipe) {
    return null;
  }

  const [hydrated] = await hydrate([recipe], client);
  return hydrated;
}

/**
 * Build the WHERE clause for a list query. Placeholders are numbered in
 * the order values are pushed.
 */
export function buildRecipeFilter(filter: RecipeFilter): { where: string; values: unknown[] } {
  const conditions: string[] = [];
  const values: unknown[] = [];

  if (filter.authorId !== undefined) {
    values.push(filter.authorId);
    conditions.push(`r.author_id = $${values.length}`);
  }

  if (filter.tagSlugs && filter.tagSlugs.length > 0) {
    values.push(filter.tagSlugs);
    conditions.push(
      `EXISTS (SELECT 1 FROM recipe_tags rt JOIN tags t ON t.id = rt.tag_id ` +
        `WHERE rt.recipe_id = r.id AND t.slug = ANY($${values.length}::text[]))`
    );
  }

  if (filter.search) {
    values.push(`%${escapeLikePattern(filter.search)}%`);
    conditions.push(`(r.name ILIKE $${values.length} OR r.text ILIKE $${values.length})`);
  }

  if (filter.shoppingCart) {
    values.push(filter.shoppingCart.userId);
    const exists =
      `EXISTS (SELECT 1 FROM shopping_cart sc ` +
      `WHERE sc.recipe_id = r.id AND sc.user_id = $${values.length})`;
    conditions.push(filter.shoppingCart.included ? exists : `NOT ${exists}`);
  }

  return {
    where: conditions.length > 0 ? `WHERE ${conditions.join(" AND ")}` : "",
    values,
  };
}

/**
 * Recipes matching `filter`, newest first.
 */
export async function listRecipes(filter: RecipeFilter = {}, client: Queryable = getDb()): Promise<RecipeDetail[]> {
  const { where, values } = buildRecipeFilter(filter);
  const { rows } = await client.query(`${RECIPE_SELECT} ${where} ORDER BY r.id DESC`, values);
  return hydrate(parseRows(recipeRow, rows), client);
}

export async function shortLinkExists(token: string, client: Queryable = getDb()): Promise<boolean> {
  const { rows } = await client.query(SHORT_LINK_EXISTS, [token]);
  return rows.length > 0;
}

export async function findRecipeIdByShortLink(token: string, client: Queryable = getDb()): Promise<number | null> {
  const { rows } = await client.query(SELECT_ID_BY_SHORT_LINK, [token]);
  return parseFirstRow(idRow, rows)?.id ?? null;
}

// =============================================================================
// Writes (run these inside withTransaction)
// =============================================================================

async function replaceTags(client: Queryable, recipeId: number, tagIds: readonly number[]): Promise<void> {
  await client.query(DELETE_TAGS, [recipeId]);
  if (tagIds.length > 0) {
    await client.query(INSERT_TAGS, [recipeId, tagIds]);
  }
}

async function replaceIngredients(
  client: Queryable,
  recipeId: number,
  ingredients: readonly IngredientAmount[]
): Promise<void> {
  await client.query(DELETE_INGREDIENTS, [recipeId]);
  if (ingredients.length > 0) {
    await client.query(INSERT_INGREDIENTS, [
      recipeId,
      ingredients.map((ingredient) => ingredient.id),
      ingredients.map((ingredient) => ingredient.amount),
    ]);
  }
}

/**
 * Insert a recipe with its tags and ingredients.
 *
 * A taken `shortLink` raises a unique violation on recipes_short_link_key.
 *
 * @returns the new recipe id
 */
export async function insertRecipe(client: Queryable, input: CreateRecipeInput): Promise<number> {
  const { rows } = await client.query(INSERT_RECIPE, [
    input.authorId,
    input.name,
    input.text,
    input.cookingTime,
    input.shortLink,
  ]);

  const inserted = parseFirstRow(idRow, rows);
  if (!inserted) {
    throw new Error("INSERT INTO recipes returned no row");
  }

  await replaceTags(client, inserted.id, input.tagIds);
  await replaceIngredients(client, inserted.id, input.ingredients);

  return inserted.id;
}

/**
 * Apply `input` to a recipe. Omitted fields keep their value; tags and
 * ingredients, when given, replace the whole set.
 */
export async function updateRecipe(client: Queryable, id: number, input: UpdateRecipeInput): Promise<boolean> {
  const result = await client.query(UPDATE_RECIPE, [
    id,
    input.name ?? null,
    input.text ?? null,
    input.cookingTime ?? null,
  ]);

  if (affectedRows(result) === 0) {
    return false;
  }

  if (input.tagIds !== undefined) {
    await replaceTags(client, id, input.tagIds);
  }
  if (input.ingredients !== undefined) {
    await replaceIngredients(client, id, input.ingredients);
  }

  return true;
}

/**
 * Set a short link on a recipe that has none.
 *
 * @returns the stored token, or null when the recipe already had one
 */
export async function assignShortLink(client: Queryable, id: number, token: string): Promise<string | null> {
  const { rows } = await client.query(ASSIGN_SHORT_LINK, [id, token]);
  return parseFirstRow(shortLinkRow, rows)?.short_link ?? null;
}

export async function deleteRecipe(id: number, client: Queryable = getDb()): Promise<boolean> {
  const result = await client.query(DELETE_RECIPE, [id]);
  return affectedRows(result) > 0;
}
