/**
 * Shopping Cart Service
 */

import {
  addCartEntry,
  cartEntryExists,
  findRecipeById,
  isUniqueViolation,
  loadCart,
  removeCartEntry,
  CONSTRAINTS,
  type RecipeDetail,
} from "@foodgram/db";
import { aggregateShoppingList, type ShoppingList } from "@foodgram/shared";
import { logger } from "@foodgram/logger";

export type AddToCartResult =
  | { success: true; recipe: RecipeDetail }
  | { success: false; errorCode: "NOT_FOUND" | "ALREADY_IN_CART" };

export type RemoveFromCartResult =
  | { success: true }
  | { success: false; errorCode: "NOT_FOUND" | "NOT_IN_CART" };

/**
 * Add a recipe to the cart. A repeat add is reported, never ignored; the
 * unique constraint catches concurrent adds that pass the existence check.
 */
export async function addToCart(userId: number, recipeId: number): Promise<AddToCartResult> {
  const recipe = await findRecipeById(recipeId);
  if (!recipe) {
    return { success: false, errorCode: "NOT_FOUND" };
  }

  if (await cartEntryExists(userId, recipeId)) {
    return { success: false, errorCode: "ALREADY_IN_CART" };
  }

  try {
    await addCartEntry(userId, recipeId);
  } catch (error) {
    if (isUniqueViolation(error, CONSTRAINTS.SHOPPING_CART_ENTRY)) {
      return { success: false, errorCode: "ALREADY_IN_CART" };
    }
    throw error;
  }

  logger.info({ userId, recipeId }, "Recipe added to shopping cart");
  return { success: true, recipe };
}

export async function removeFromCart(userId: number, recipeId: number): Promise<RemoveFromCartResult> {
  const recipe = await findRecipeById(recipeId);
  if (!recipe) {
    return { success: false, errorCode: "NOT_FOUND" };
  }

  if (!(await removeCartEntry(userId, recipeId))) {
    return { success: false, errorCode: "NOT_IN_CART" };
  }

  logger.info({ userId, recipeId }, "Recipe removed from shopping cart");
  return { success: true };
}

/**
 * Aggregate the user's cart into one line per (ingredient, unit).
 */
export async function buildShoppingList(userId: number): Promise<ShoppingList> {
  return aggregateShoppingList(await loadCart(userId));
}
