/**
 * Short Link Service
 *
 * Builds public URLs around recipe tokens and resolves tokens back to the
 * recipe page.
 */

import { findRecipeIdByShortLink } from "@foodgram/db";
import { isValidShortLink } from "@foodgram/shared";
import { getConfig } from "../config.js";

/**
 * Public URL that redirects to the recipe, e.g. `https://host/s/aB3xY9/`.
 */
export function buildShortLinkUrl(token: string): string {
  return `${getConfig().publicBaseUrl}/s/${token}/`;
}

/**
 * Recipe page on the web client.
 */
export function buildRecipeUrl(recipeId: number): string {
  return `${getConfig().publicBaseUrl}/recipes/${recipeId}/`;
}

/**
 * @returns the recipe page URL, or null for malformed or unknown tokens
 */
export async function resolveShortLink(token: string): Promise<string | null> {
  if (!isValidShortLink(token)) {
    return null;
  }

  const recipeId = await findRecipeIdByShortLink(token);
  return recipeId === null ? null : buildRecipeUrl(recipeId);
}
