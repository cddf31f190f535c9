/**
 * Shopping List Tests
 *
 * @see packages/shared/src/utils/shopping-list.ts
 */

import { describe, it, expect } from "@jest/globals";
import {
  aggregateShoppingList,
  renderShoppingList,
  formatShoppingListLine,
  type CartRecipe,
} from "../src/index.js";

const pancakes: CartRecipe = {
  recipeId: 1,
  recipeName: "Pancakes",
  ingredients: [{ name: "flour", measurementUnit: "g", amount: 200 }],
};

const omelette: CartRecipe = {
  recipeId: 2,
  recipeName: "Omelette",
  ingredients: [
    { name: "flour", measurementUnit: "g", amount: 300 },
    { name: "egg", measurementUnit: "pcs", amount: 2 },
  ],
};

describe("aggregateShoppingList", () => {
  it("should report an empty cart", () => {
    expect(aggregateShoppingList([])).toEqual({ kind: "empty" });
  });

  it("should sum the same ingredient across recipes", () => {
    expect(aggregateShoppingList([pancakes, omelette])).toEqual({
      kind: "list",
      items: [
        { name: "egg", measurementUnit: "pcs", totalAmount: 2 },
        { name: "flour", measurementUnit: "g", totalAmount: 500 },
      ],
    });
  });

  it("should keep single-unit amounts and sum them", () => {
    const cart: CartRecipe[] = [
      { recipeId: 4, recipeName: "Soup", ingredients: [{ name: "соль", measurementUnit: "г", amount: 1 }] },
      { recipeId: 5, recipeName: "Salad", ingredients: [{ name: "лавровый лист", measurementUnit: "шт", amount: 1 }] },
      { recipeId: 6, recipeName: "Stew", ingredients: [{ name: "лавровый лист", measurementUnit: "шт", amount: 1 }] },
    ];

    const result = aggregateShoppingList(cart);

    expect(result).toEqual({
      kind: "list",
      items: [
        { name: "лавровый лист", measurementUnit: "шт", totalAmount: 2 },
        { name: "соль", measurementUnit: "г", totalAmount: 1 },
      ],
    });
    expect(renderShoppingList(result.kind === "list" ? result.items : [])).toBe(
      "Список покупок:\n\nлавровый лист (шт): 2\nсоль (г): 1\n"
    );
  });

  it("should keep different units of one ingredient apart", () => {
    const cart: CartRecipe[] = [
      {
        recipeId: 3,
        recipeName: "Tea",
        ingredients: [
          { name: "sugar", measurementUnit: "tsp", amount: 2 },
          { name: "sugar", measurementUnit: "g", amount: 10 },
        ],
      },
    ];

    const result = aggregateShoppingList(cart);

    expect(result).toEqual({
      kind: "list",
      items: [
        { name: "sugar", measurementUnit: "g", totalAmount: 10 },
        { name: "sugar", measurementUnit: "tsp", totalAmount: 2 },
      ],
    });
  });

  it("should sort by code unit order", () => {
    const cart: CartRecipe[] = [
      {
        recipeId: 4,
        recipeName: "Mixed",
        ingredients: [
          { name: "яйца", measurementUnit: "шт", amount: 1 },
          { name: "apple", measurementUnit: "pcs", amount: 1 },
          { name: "Banana", measurementUnit: "pcs", amount: 1 },
        ],
      },
    ];

    const result = aggregateShoppingList(cart);
    const names = result.kind === "list" ? result.items.map((item) => item.name) : [];

    expect(names).toEqual(["Banana", "apple", "яйца"]);
  });

  it("should return an empty list for recipes without ingredients", () => {
    const cart: CartRecipe[] = [{ recipeId: 5, recipeName: "Water", ingredients: [] }];

    expect(aggregateShoppingList(cart)).toEqual({ kind: "list", items: [] });
  });

  it("should not depend on cart order", () => {
    expect(aggregateShoppingList([omelette, pancakes])).toEqual(
      aggregateShoppingList([pancakes, omelette])
    );
  });
});

describe("renderShoppingList", () => {
  it("should render header, blank line and one line per item", () => {
    const result = aggregateShoppingList([pancakes, omelette]);
    const items = result.kind === "list" ? result.items : [];

    expect(renderShoppingList(items)).toBe(
      "Список покупок:\n\negg (pcs): 2\nflour (g): 500\n"
    );
  });

  it("should render identical bytes for the same cart", () => {
    const first = aggregateShoppingList([pancakes, omelette]);
    const second = aggregateShoppingList([pancakes, omelette]);
    const render = (list: typeof first) => renderShoppingList(list.kind === "list" ? list.items : []);

    expect(render(first)).toBe(render(second));
  });

  it("should render only the header for no items", () => {
    expect(renderShoppingList([])).toBe("Список покупок:\n\n");
  });
});

describe("formatShoppingListLine", () => {
  it("should format name, unit and total", () => {
    expect(
      formatShoppingListLine({ name: "молоко", measurementUnit: "мл", totalAmount: 750 })
    ).toBe("молоко (мл): 750");
  });
});
