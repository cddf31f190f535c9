/**
 * Shopping Cart Routes Tests
 */

import { describe, it, expect, beforeEach, afterEach } from "@jest/globals";
import type { FastifyInstance } from "fastify";
import type { CartRecipe } from "@foodgram/shared";
import { authHeaders, cook, createTestApp, guest, makeRecipe, mockedDb, uniqueViolation } from "./helpers.js";

const cart: CartRecipe[] = [
  {
    recipeId: 7,
    recipeName: "Блины",
    ingredients: [{ name: "мука", measurementUnit: "г", amount: 200 }],
  },
  {
    recipeId: 8,
    recipeName: "Омлет",
    ingredients: [
      { name: "мука", measurementUnit: "г", amount: 300 },
      { name: "яйца", measurementUnit: "шт", amount: 2 },
    ],
  },
];

describe("Shopping Cart Routes", () => {
  let app: FastifyInstance;

  beforeEach(async () => {
    app = await createTestApp();
  });

  afterEach(async () => {
    await app.close();
  });

  describe("POST /api/recipes/:id/shopping_cart/", () => {
    it("should add the recipe and return its minified form", async () => {
      mockedDb.findRecipeById.mockResolvedValue(makeRecipe());
      mockedDb.cartEntryExists.mockResolvedValue(false);
      mockedDb.addCartEntry.mockResolvedValue(undefined);

      const response = await app.inject({
        method: "POST",
        url: "/api/recipes/7/shopping_cart/",
        headers: authHeaders(guest),
      });

      expect(response.statusCode).toBe(201);
      expect(response.json()).toEqual({ id: 7, name: "Блины", cooking_time: 30 });
      expect(mockedDb.addCartEntry).toHaveBeenCalledWith(2, 7);
    });

    it("should reject a recipe already in the cart", async () => {
      mockedDb.findRecipeById.mockResolvedValue(makeRecipe());
      mockedDb.cartEntryExists.mockResolvedValue(true);

      const response = await app.inject({
        method: "POST",
        url: "/api/recipes/7/shopping_cart/",
        headers: authHeaders(guest),
      });

      expect(response.statusCode).toBe(400);
      expect(response.json()).toEqual({ detail: "Рецепт уже в списке покупок." });
      expect(mockedDb.addCartEntry).not.toHaveBeenCalled();
    });

    it("should reject a concurrent duplicate caught by the unique constraint", async () => {
      mockedDb.findRecipeById.mockResolvedValue(makeRecipe());
      mockedDb.cartEntryExists.mockResolvedValue(false);
      mockedDb.addCartEntry.mockRejectedValue(uniqueViolation("shopping_cart_user_id_recipe_id_key"));

      const response = await app.inject({
        method: "POST",
        url: "/api/recipes/7/shopping_cart/",
        headers: authHeaders(guest),
      });

      expect(response.statusCode).toBe(400);
      expect(response.json()).toEqual({ detail: "Рецепт уже в списке покупок." });
    });

    it("should answer 404 for an unknown recipe", async () => {
      mockedDb.findRecipeById.mockResolvedValue(null);

      const response = await app.inject({
        method: "POST",
        url: "/api/recipes/999/shopping_cart/",
        headers: authHeaders(guest),
      });

      expect(response.statusCode).toBe(404);
    });

    it("should require authentication", async () => {
      const response = await app.inject({ method: "POST", url: "/api/recipes/7/shopping_cart/" });

      expect(response.statusCode).toBe(401);
    });
  });

  describe("DELETE /api/recipes/:id/shopping_cart/", () => {
    it("should remove the recipe", async () => {
      mockedDb.findRecipeById.mockResolvedValue(makeRecipe());
      mockedDb.removeCartEntry.mockResolvedValue(true);

      const response = await app.inject({
        method: "DELETE",
        url: "/api/recipes/7/shopping_cart/",
        headers: authHeaders(guest),
      });

      expect(response.statusCode).toBe(204);
      expect(mockedDb.removeCartEntry).toHaveBeenCalledWith(2, 7);
    });

    it("should reject a recipe that is not in the cart", async () => {
      mockedDb.findRecipeById.mockResolvedValue(makeRecipe());
      mockedDb.removeCartEntry.mockResolvedValue(false);

      const response = await app.inject({
        method: "DELETE",
        url: "/api/recipes/7/shopping_cart/",
        headers: authHeaders(guest),
      });

      expect(response.statusCode).toBe(400);
      expect(response.json()).toEqual({ detail: "Рецепта нет в списке покупок." });
    });
  });

  describe("GET /api/recipes/download_shopping_cart/", () => {
    it("should download the aggregated list as a text attachment", async () => {
      mockedDb.loadCart.mockResolvedValue(cart);

      const response = await app.inject({
        method: "GET",
        url: "/api/recipes/download_shopping_cart/",
        headers: authHeaders(cook),
      });

      expect(response.statusCode).toBe(200);
      expect(response.headers["content-type"]).toBe("text/plain; charset=utf-8");
      expect(response.headers["content-disposition"]).toBe('attachment; filename="shopping_cart.txt"');
      expect(response.body).toBe("Список покупок:\n\nмука (г): 500\nяйца (шт): 2\n");
      expect(mockedDb.loadCart).toHaveBeenCalledWith(1);
    });

    it("should render identical bytes for the same cart", async () => {
      mockedDb.loadCart.mockResolvedValue(cart);
      const headers = authHeaders(cook);

      const first = await app.inject({ method: "GET", url: "/api/recipes/download_shopping_cart/", headers });
      const second = await app.inject({ method: "GET", url: "/api/recipes/download_shopping_cart/", headers });

      expect(second.rawPayload.equals(first.rawPayload)).toBe(true);
    });

    it("should answer 400 for an empty cart", async () => {
      mockedDb.loadCart.mockResolvedValue([]);

      const response = await app.inject({
        method: "GET",
        url: "/api/recipes/download_shopping_cart/",
        headers: authHeaders(cook),
      });

      expect(response.statusCode).toBe(400);
      expect(response.json()).toEqual({ detail: "Список покупок пуст." });
    });

    it("should require authentication", async () => {
      const response = await app.inject({ method: "GET", url: "/api/recipes/download_shopping_cart/" });

      expect(response.statusCode).toBe(401);
    });
  });
});
