/**
 * Database Type Definitions
 *
 * Domain shapes returned by the repositories. Columns are snake_case in
 * SQL and camelCase here.
 *
 * @see sql/schema.sql for the authoritative schema
 */

// =============================================================================
// TABLE: users
// =============================================================================

/** User without sensitive fields (for API responses) */
export interface PublicUser {
  id: number;
  email: string;
  username: string;
  firstName: string;
  lastName: string;
}

export interface User extends PublicUser {
  hashedPassword: string;
}

export interface CreateUserInput {
  email: string;
  username: string;
  firstName: string;
  lastName: string;
  hashedPassword: string;
}

// =============================================================================
// AUTH TYPES
// =============================================================================

/** JWT payload stored in token */
export interface AuthPayload {
  userId: number;
  email: string;
  iat?: number;
  exp?: number;
}

// =============================================================================
// TABLES: tags, ingredients
// =============================================================================

export interface Tag {
  id: number;
  name: string;
  slug: string;
}

export interface Ingredient {
  id: number;
  name: string;
  measurementUnit: string;
}

export interface NewTag {
  name: string;
  slug: string;
}

export interface NewIngredient {
  name: string;
  measurementUnit: string;
}

// =============================================================================
// TABLE: recipes (+ recipe_ingredients, recipe_tags)
// =============================================================================

export interface Recipe {
  id: number;
  authorId: number;
  name: string;
  text: string;
  cookingTime: number;
  /** Assigned at first save, then immutable; null only for rows never saved through the API */
  shortLink: string | null;
}

/** Ingredient with the amount a recipe uses */
export interface RecipeIngredient extends Ingredient {
  amount: number;
}

export interface RecipeDetail extends Recipe {
  author: PublicUser;
  tags: Tag[];
  ingredients: RecipeIngredient[];
}

export interface IngredientAmount {
  id: number;
  amount: number;
}

export interface CreateRecipeInput {
  authorId: number;
  name: string;
  text: string;
  cookingTime: number;
  shortLink: string;
  tagIds: number[];
  ingredients: IngredientAmount[];
}

/**
 * Fields a recipe update may change. `shortLink` is deliberately absent.
 */
export interface UpdateRecipeInput {
  name?: string;
  text?: string;
  cookingTime?: number;
  tagIds?: number[];
  ingredients?: IngredientAmount[];
}

export interface RecipeFilter {
  authorId?: number;
  /** Recipes carrying at least one of these tags */
  tagSlugs?: string[];
  /** Case-insensitive substring of name or text */
  search?: string;
  /** Restrict to recipes in (or not in) a user's shopping cart */
  shoppingCart?: {
    userId: number;
    included: boolean;
  };
}
