/**
 * Shared Utility Functions
 */

// Short links
export {
  generateShortLink,
  generateUniqueShortLink,
  isValidShortLink,
  ShortLinkGenerationError,
} from "./shortlink.js";

export type { ExistsChecker, UniqueShortLinkOptions } from "./shortlink.js";

// Shopping list
export {
  aggregateShoppingList,
  formatShoppingListLine,
  renderShoppingList,
} from "./shopping-list.js";

export type {
  CartRecipe,
  IngredientLine,
  ShoppingList,
  ShoppingListItem,
} from "./shopping-list.js";
