/**
 * Short Link Generation
 *
 * Every recipe gets a 6-character Base62 token at first save. The token is
 * looked up by the redirect route and never changes afterwards.
 *
 * Collision handling: random candidate → existence check → retry
 * (max SHORT_LINK_CONFIG.MAX_ATTEMPTS). The caller still INSERTs under the
 * unique constraint, since a check-then-insert can race.
 */

import { randomInt } from "node:crypto";
import { SHORT_LINK_CONFIG } from "../constants/index.js";

// =============================================================================
// TYPES
// =============================================================================

/**
 * Function signature for checking token existence in storage
 */
export type ExistsChecker = (token: string) => Promise<boolean>;

export interface UniqueShortLinkOptions {
  /** Candidates to try before failing (default: SHORT_LINK_CONFIG.MAX_ATTEMPTS) */
  maxAttempts?: number;
  /** Token length (default: SHORT_LINK_CONFIG.LENGTH) */
  length?: number;
  /** Candidate source; tests inject a deterministic sequence here */
  generate?: (length: number) => string;
  /** Called for every candidate that was already taken */
  onCollision?: (token: string, attempt: number) => void;
}

export class ShortLinkGenerationError extends Error {
  readonly attempts: number;

  constructor(attempts: number, options?: ErrorOptions) {
    super(`Failed to generate a unique short link after ${attempts} attempts`, options);
    this.name = "ShortLinkGenerationError";
    this.attempts = attempts;
  }
}

// =============================================================================
// GENERATION
// =============================================================================

/**
 * Generate a random token.
 *
 * Each character is drawn independently and uniformly from the alphabet
 * with `crypto.randomInt`, so there is no modulo bias.
 *
 * @example
 * ```ts
 * generateShortLink();  // "aB3xY9"
 * ```
 */
export function generateShortLink(length: number = SHORT_LINK_CONFIG.LENGTH): string {
  const { ALPHABET } = SHORT_LINK_CONFIG;
  let token = "";

  for (let i = 0; i < length; i++) {
    token += ALPHABET[randomInt(ALPHABET.length)];
  }

  return token;
}

/**
 * Generate a token that `existsCheck` reports as free.
 *
 * Taken candidates are discarded and a new one is drawn. Nothing is written
 * to storage here.
 *
 * @throws ShortLinkGenerationError when every attempt collided
 *
 * @example
 * ```ts
 * const token = await generateUniqueShortLink((t) => shortLinkExists(t));
 * ```
 */
export async function generateUniqueShortLink(
  existsCheck: ExistsChecker,
  options: UniqueShortLinkOptions = {}
): Promise<string> {
  const {
    maxAttempts = SHORT_LINK_CONFIG.MAX_ATTEMPTS,
    length = SHORT_LINK_CONFIG.LENGTH,
    generate = generateShortLink,
    onCollision,
  } = options;

  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    const token = generate(length);

    if (!(await existsCheck(token))) {
      return token;
    }

    onCollision?.(token, attempt);
  }

  throw new ShortLinkGenerationError(maxAttempts);
}

// =============================================================================
// VALIDATION
// =============================================================================

/**
 * Shape check for tokens arriving on the redirect route.
 */
export function isValidShortLink(token: string): boolean {
  return SHORT_LINK_CONFIG.PATTERN.test(token);
}
