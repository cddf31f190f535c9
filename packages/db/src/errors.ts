/**
 * PostgreSQL error helpers
 */

/** SQLSTATE for unique_violation */
export const UNIQUE_VIOLATION = "23505";

/**
 * Named constraints from sql/schema.sql that callers react to.
 */
export const CONSTRAINTS = {
  RECIPE_SHORT_LINK: "recipes_short_link_key",
  SHOPPING_CART_ENTRY: "shopping_cart_user_id_recipe_id_key",
  USER_EMAIL: "users_email_key",
  USER_USERNAME: "users_username_key",
} as const;

export type ConstraintName = (typeof CONSTRAINTS)[keyof typeof CONSTRAINTS];

/**
 * True when `err` is a pg unique violation, optionally on one constraint.
 *
 * @example
 * ```ts
 * if (isUniqueViolation(err, CONSTRAINTS.RECIPE_SHORT_LINK)) retry();
 * ```
 */
export function isUniqueViolation(err: unknown, constraint?: ConstraintName): boolean {
  if (typeof err !== "object" || err === null) {
    return false;
  }

  if (!("code" in err) || err.code !== UNIQUE_VIOLATION) {
    return false;
  }

  if (constraint === undefined) {
    return true;
  }

  return "constraint" in err && err.constraint === constraint;
}
