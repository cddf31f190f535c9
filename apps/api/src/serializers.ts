/**
 * Domain → JSON payload mapping (camelCase → snake_case).
 */

import type { Ingredient, PublicUser, RecipeDetail, Tag } from "@foodgram/db";
import type {
  IngredientPayload,
  RecipeMinifiedPayload,
  RecipePayload,
  TagPayload,
  UserPayload,
} from "@foodgram/shared";
import type { RecipeView } from "./services/recipes.js";

export function toUserPayload(user: PublicUser): UserPayload {
  return {
    id: user.id,
    email: user.email,
    username: user.username,
    first_name: user.firstName,
    last_name: user.lastName,
  };
}

export function toTagPayload(tag: Tag): TagPayload {
  return { id: tag.id, name: tag.name, slug: tag.slug };
}

export function toIngredientPayload(ingredient: Ingredient): IngredientPayload {
  return {
    id: ingredient.id,
    name: ingredient.name,
    measurement_unit: ingredient.measurementUnit,
  };
}

export function toRecipePayload({ recipe, inShoppingCart }: RecipeView): RecipePayload {
  return {
    id: recipe.id,
    author: toUserPayload(recipe.author),
    name: recipe.name,
    text: recipe.text,
    cooking_time: recipe.cookingTime,
    tags: recipe.tags.map(toTagPayload),
    ingredients: recipe.ingredients.map((ingredient) => ({
      ...toIngredientPayload(ingredient),
      amount: ingredient.amount,
    })),
    short_link: recipe.shortLink,
    is_in_shopping_cart: inShoppingCart,
  };
}

export function toRecipeMinifiedPayload(recipe: RecipeDetail): RecipeMinifiedPayload {
  return {
    id: recipe.id,
    name: recipe.name,
    cooking_time: recipe.cookingTime,
  };
}
