/**
 * Short Link Configuration Constants
 *
 * Parameters for the per-recipe short link token.
 * 6 chars over Base62 = 62^6 = ~56.8 billion combinations.
 */
export const SHORT_LINK_CONFIG = {
  /** Token length; matches the varchar(6) column. */
  LENGTH: 6,

  /**
   * Alphabet: A-Z, a-z, 0-9.
   * URL-safe, case-sensitive, 62 characters total.
   */
  ALPHABET: "ABCDEFGHIJKLMNOPQRSTUVWXYZabcdefghijklmnopqrstuvwxyz0123456789",

  /** Candidates tried against the existence check before giving up. */
  MAX_ATTEMPTS: 10,

  /** Inserts retried after losing a unique-constraint race. */
  MAX_SAVE_ATTEMPTS: 3,

  PATTERN: /^[A-Za-z0-9]{6}$/,
} as const;

/**
 * Recipe field limits, mirrored by the CHECK constraints in schema.sql.
 */
export const RECIPE_LIMITS = {
  NAME_MAX_LENGTH: 256,
  COOKING_TIME_MIN: 1,
  COOKING_TIME_MAX: 1440,
  AMOUNT_MIN: 1,
  /** Largest value of the INTEGER amount column */
  AMOUNT_MAX: 2147483647,
} as const;

export const SHOPPING_LIST = {
  FILENAME: "shopping_cart.txt",
  HEADER: "Список покупок:",
  EMPTY_DETAIL: "Список покупок пуст.",
} as const;

export const USER_LIMITS = {
  EMAIL_MAX_LENGTH: 254,
  NAME_MAX_LENGTH: 150,
  PASSWORD_MIN_LENGTH: 8,
  PASSWORD_MAX_LENGTH: 128,
  USERNAME_PATTERN: /^[\w.@+-]+$/,
  /** Usernames that collide with fixed routes such as /api/users/me/. */
  RESERVED_USERNAMES: new Set<string>(["me"]),
} as const;
