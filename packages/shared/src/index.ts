/**
 * @foodgram/shared - Shared Package Exports
 *
 * Short link generation, shopping list aggregation, constants and the JSON
 * payload types used by the API.
 *
 * ```ts
 * import { generateUniqueShortLink, aggregateShoppingList } from "@foodgram/shared";
 * ```
 */

// Types (RecipePayload, ErrorPayload, HealthCheckResponse, etc.)
export * from "./types/index.js";

// Utilities (short links, shopping list)
export * from "./utils/index.js";

// Constants (SHORT_LINK_CONFIG, RECIPE_LIMITS, SHOPPING_LIST)
export * from "./constants/index.js";
