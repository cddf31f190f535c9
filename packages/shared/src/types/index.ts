/**
 * Shared Type Definitions
 *
 * JSON payloads exchanged with the web client. Field names are snake_case
 * on the wire.
 */

// =============================================================================
// Catalog Types
// =============================================================================

export interface TagPayload {
  id: number;
  name: string;
  slug: string;
}

export interface IngredientPayload {
  id: number;
  name: string;
  measurement_unit: string;
}

/**
 * Ingredient as it appears inside a recipe, with the amount used.
 */
export interface RecipeIngredientPayload extends IngredientPayload {
  amount: number;
}

// =============================================================================
// User Types
// =============================================================================

export interface UserPayload {
  id: number;
  email: string;
  username: string;
  first_name: string;
  last_name: string;
}

export interface AuthTokenPayload {
  auth_token: string;
}

// =============================================================================
// Recipe Types
// =============================================================================

export interface RecipePayload {
  id: number;
  author: UserPayload;
  name: string;
  text: string;
  cooking_time: number;
  tags: TagPayload[];
  ingredients: RecipeIngredientPayload[];
  short_link: string | null;
  /** Always false for anonymous viewers */
  is_in_shopping_cart: boolean;
}

/**
 * Short form returned when a recipe is added to the shopping cart.
 */
export interface RecipeMinifiedPayload {
  id: number;
  name: string;
  cooking_time: number;
}

export interface ShortLinkPayload {
  "short-link": string;
}

// =============================================================================
// Error Types
// =============================================================================

export interface ErrorPayload {
  detail: string;
  /** Field-level validation messages */
  errors?: Record<string, string[] | undefined>;
}

// =============================================================================
// Service Health Types
// =============================================================================

export interface HealthCheckResponse {
  status: "healthy" | "degraded" | "unhealthy";
  timestamp: string;
  version: string;
  uptime: number;
  checks: {
    database: HealthStatus;
  };
}

export interface HealthStatus {
  status: "up" | "down" | "degraded";
  latencyMs?: number;
  message?: string;
}
