/**
 * Recipe Service
 *
 * Recipe CRUD plus short link assignment. The token is chosen before the
 * INSERT and guarded by the recipes_short_link_key constraint; losing that
 * race regenerates the token and saves again.
 */

import {
  assignShortLink,
  findCartRecipeIds,
  findMissingIngredientIds,
  findMissingTagIds,
  findRecipeById,
  insertRecipe,
  isUniqueViolation,
  listRecipes as findRecipes,
  deleteRecipe as deleteRecipeRow,
  updateRecipe as updateRecipeRow,
  shortLinkExists,
  withTransaction,
  CONSTRAINTS,
  type IngredientAmount,
  type RecipeDetail,
} from "@foodgram/db";
import {
  generateUniqueShortLink,
  ShortLinkGenerationError,
  SHORT_LINK_CONFIG,
} from "@foodgram/shared";
import { logger } from "@foodgram/logger";

// ============================================================================
// Types
// ============================================================================

export interface RecipeInput {
  name: string;
  text: string;
  cookingTime: number;
  tagIds: number[];
  ingredients: IngredientAmount[];
}

export type RecipeChanges = Partial<RecipeInput>;

export interface RecipeQuery {
  authorId?: number;
  tagSlugs?: string[];
  /** Only applied for an authenticated viewer */
  inShoppingCart?: boolean;
  /** Case-insensitive substring of the name or text */
  search?: string;
}

/** A recipe as seen by one viewer */
export interface RecipeView {
  recipe: RecipeDetail;
  inShoppingCart: boolean;
}

export interface ReferenceErrors {
  tags?: string[];
  ingredients?: string[];
}

type InvalidReferences = { success: false; errorCode: "INVALID_REFERENCES"; errors: ReferenceErrors };

export type CreateRecipeResult = { success: true; recipe: RecipeDetail } | InvalidReferences;

export type UpdateRecipeResult =
  | { success: true; recipe: RecipeDetail }
  | { success: false; errorCode: "NOT_FOUND" | "FORBIDDEN" }
  | InvalidReferences;

export type DeleteRecipeResult = { success: true } | { success: false; errorCode: "NOT_FOUND" | "FORBIDDEN" };

export type ShortLinkResult = { success: true; shortLink: string } | { success: false; errorCode: "NOT_FOUND" };

// ============================================================================
// Helpers
// ============================================================================

/**
 * Report tag and ingredient ids that do not exist.
 */
async function checkReferences(changes: RecipeChanges): Promise<ReferenceErrors | null> {
  const errors: ReferenceErrors = {};

  if (changes.tagIds) {
    const missing = await findMissingTagIds(changes.tagIds);
    if (missing.length > 0) {
      errors.tags = missing.map((id) => `Тег с id=${id} не существует.`);
    }
  }

  if (changes.ingredients) {
    const missing = await findMissingIngredientIds(changes.ingredients.map((ingredient) => ingredient.id));
    if (missing.length > 0) {
      errors.ingredients = missing.map((id) => `Ингредиент с id=${id} не существует.`);
    }
  }

  return errors.tags || errors.ingredients ? errors : null;
}

/**
 * Run `save` with a fresh token, retrying with a new one whenever the save
 * loses a race on recipes_short_link_key.
 *
 * @throws ShortLinkGenerationError when every attempt collided
 */
export async function saveWithShortLink<T>(save: (shortLink: string) => Promise<T>): Promise<T> {
  let lastError: unknown;

  for (let attempt = 1; attempt <= SHORT_LINK_CONFIG.MAX_SAVE_ATTEMPTS; attempt++) {
    const shortLink = await generateUniqueShortLink((token) => shortLinkExists(token), {
      onCollision: (token, attempt) => {
        logger.debug({ token, attempt }, "Short link candidate already taken");
      },
    });

    try {
      return await save(shortLink);
    } catch (error) {
      if (!isUniqueViolation(error, CONSTRAINTS.RECIPE_SHORT_LINK)) {
        throw error;
      }
      lastError = error;
      logger.warn({ shortLink, attempt }, "Short link collided on save, retrying");
    }
  }

  throw new ShortLinkGenerationError(SHORT_LINK_CONFIG.MAX_SAVE_ATTEMPTS, { cause: lastError });
}

// ============================================================================
// Reads
// ============================================================================

export async function getRecipe(recipeId: number, viewerId: number | null): Promise<RecipeView | null> {
  const recipe = await findRecipeById(recipeId);
  if (!recipe) {
    return null;
  }

  const inCart = viewerId === null ? new Set<number>() : await findCartRecipeIds(viewerId, [recipe.id]);
  return { recipe, inShoppingCart: inCart.has(recipe.id) };
}

/**
 * Recipes newest first, with the viewer's cart flag on each.
 */
export async function listRecipes(query: RecipeQuery, viewerId: number | null): Promise<RecipeView[]> {
  const recipes = await findRecipes({
    authorId: query.authorId,
    tagSlugs: query.tagSlugs,
    search: query.search,
    shoppingCart:
      viewerId !== null && query.inShoppingCart !== undefined
        ? { userId: viewerId, included: query.inShoppingCart }
        : undefined,
  });

  const inCart =
    viewerId === null
      ? new Set<number>()
      : await findCartRecipeIds(
          viewerId,
          recipes.map((recipe) => recipe.id)
        );

  return recipes.map((recipe) => ({ recipe, inShoppingCart: inCart.has(recipe.id) }));
}

// ============================================================================
// Writes
// ============================================================================

/**
 * Create a recipe; its short link is assigned in the same INSERT.
 */
export async function createRecipe(authorId: number, input: RecipeInput): Promise<CreateRecipeResult> {
  const errors = await checkReferences(input);
  if (errors) {
    return { success: false, errorCode: "INVALID_REFERENCES", errors };
  }

  const recipeId = await saveWithShortLink((shortLink) =>
    withTransaction((client) =>
      insertRecipe(client, {
        authorId,
        name: input.name,
        text: input.text,
        cookingTime: input.cookingTime,
        shortLink,
        tagIds: input.tagIds,
        ingredients: input.ingredients,
      })
    )
  );

  logger.info({ recipeId, authorId }, "Recipe created");

  const recipe = await findRecipeById(recipeId);
  if (!recipe) {
    throw new Error(`Recipe ${recipeId} not found after insert`);
  }
  return { success: true, recipe };
}

/**
 * Update a recipe owned by `userId`. The short link is never changed.
 */
export async function updateRecipe(
  userId: number,
  recipeId: number,
  changes: RecipeChanges
): Promise<UpdateRecipeResult> {
  const existing = await findRecipeById(recipeId);
  if (!existing) {
    return { success: false, errorCode: "NOT_FOUND" };
  }
  if (existing.authorId !== userId) {
    return { success: false, errorCode: "FORBIDDEN" };
  }

  const errors = await checkReferences(changes);
  if (errors) {
    return { success: false, errorCode: "INVALID_REFERENCES", errors };
  }

  const updated = await withTransaction((client) =>
    updateRecipeRow(client, recipeId, {
      name: changes.name,
      text: changes.text,
      cookingTime: changes.cookingTime,
      tagIds: changes.tagIds,
      ingredients: changes.ingredients,
    })
  );

  const recipe = updated ? await findRecipeById(recipeId) : null;
  if (!recipe) {
    return { success: false, errorCode: "NOT_FOUND" };
  }

  logger.info({ recipeId, userId }, "Recipe updated");
  return { success: true, recipe };
}

export async function deleteRecipe(userId: number, recipeId: number): Promise<DeleteRecipeResult> {
  const existing = await findRecipeById(recipeId);
  if (!existing) {
    return { success: false, errorCode: "NOT_FOUND" };
  }
  if (existing.authorId !== userId) {
    return { success: false, errorCode: "FORBIDDEN" };
  }

  if (!(await deleteRecipeRow(recipeId))) {
    return { success: false, errorCode: "NOT_FOUND" };
  }

  logger.info({ recipeId, userId }, "Recipe deleted");
  return { success: true };
}

/**
 * Token of a recipe. Rows created outside the API may have none; those get
 * one now, exactly once.
 */
export async function getShortLink(recipeId: number): Promise<ShortLinkResult> {
  const recipe = await findRecipeById(recipeId);
  if (!recipe) {
    return { success: false, errorCode: "NOT_FOUND" };
  }
  if (recipe.shortLink !== null) {
    return { success: true, shortLink: recipe.shortLink };
  }

  const assigned = await saveWithShortLink((shortLink) =>
    withTransaction((client) => assignShortLink(client, recipeId, shortLink))
  );
  if (assigned !== null) {
    logger.info({ recipeId, shortLink: assigned }, "Short link assigned");
    return { success: true, shortLink: assigned };
  }

  // Another request assigned it first.
  const current = await findRecipeById(recipeId);
  if (!current) {
    return { success: false, errorCode: "NOT_FOUND" };
  }
  if (current.shortLink === null) {
    throw new Error(`Recipe ${recipeId} has no short link after assignment`);
  }
  return { success: true, shortLink: current.shortLink };
}
