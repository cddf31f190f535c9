/**
 * Shopping List Aggregation
 *
 * Collapses a user's cart into one line per (ingredient name, measurement
 * unit). The same ingredient used by several recipes is summed, never
 * listed twice. Output order is fixed so repeated downloads of an unchanged
 * cart are byte-identical.
 */

import { SHOPPING_LIST } from "../constants/index.js";

// =============================================================================
// TYPES
// =============================================================================

export interface IngredientLine {
  name: string;
  measurementUnit: string;
  amount: number;
}

/**
 * A recipe in the cart together with its ingredient lines.
 */
export interface CartRecipe {
  recipeId: number;
  recipeName: string;
  ingredients: IngredientLine[];
}

export interface ShoppingListItem {
  name: string;
  measurementUnit: string;
  totalAmount: number;
}

export type ShoppingList =
  | { kind: "empty" }
  | { kind: "list"; items: ShoppingListItem[] };

// =============================================================================
// AGGREGATION
// =============================================================================

/**
 * Group cart ingredients by (name, unit) and sum their amounts.
 *
 * Items are sorted by name in code-unit order, ties broken by unit. A cart
 * whose recipes carry no ingredients still yields `kind: "list"` with no
 * items; only a cart without recipes is `empty`.
 */
export function aggregateShoppingList(cart: readonly CartRecipe[]): ShoppingList {
  if (cart.length === 0) {
    return { kind: "empty" };
  }

  const totals = new Map<string, ShoppingListItem>();

  for (const recipe of cart) {
    for (const line of recipe.ingredients) {
      const key = JSON.stringify([line.name, line.measurementUnit]);
      const item = totals.get(key);

      if (item) {
        item.totalAmount += line.amount;
      } else {
        totals.set(key, {
          name: line.name,
          measurementUnit: line.measurementUnit,
          totalAmount: line.amount,
        });
      }
    }
  }

  const items = [...totals.values()].sort(
    (a, b) => compare(a.name, b.name) || compare(a.measurementUnit, b.measurementUnit)
  );

  return { kind: "list", items };
}

function compare(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

// =============================================================================
// RENDERING
// =============================================================================

/**
 * @example
 * ```ts
 * formatShoppingListLine({ name: "flour", measurementUnit: "g", totalAmount: 500 });
 * // "flour (g): 500"
 * ```
 */
export function formatShoppingListLine(item: ShoppingListItem): string {
  return `${item.name} (${item.measurementUnit}): ${item.totalAmount}`;
}

/**
 * Render the downloadable text: header, blank line, one line per item,
 * every line terminated by "\n".
 */
export function renderShoppingList(items: readonly ShoppingListItem[]): string {
  let text = `${SHOPPING_LIST.HEADER}\n\n`;

  for (const item of items) {
    text += `${formatShoppingListLine(item)}\n`;
  }

  return text;
}
