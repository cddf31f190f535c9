/**
 * Shopping Cart Routes
 *
 * Endpoints:
 *   POST   /api/recipes/:id/shopping_cart/          - Add a recipe
 *   DELETE /api/recipes/:id/shopping_cart/          - Remove a recipe
 *   GET    /api/recipes/download_shopping_cart/     - Aggregated list as text
 */

import type { FastifyInstance, FastifyRequest, FastifyReply } from "fastify";
import { renderShoppingList, SHOPPING_LIST } from "@foodgram/shared";
import { addToCart, buildShoppingList, removeFromCart } from "../../services/cart.js";
import { currentUserId, requireAuth } from "../../middleware/auth.js";
import { toRecipeMinifiedPayload } from "../../serializers.js";
import { MESSAGES } from "../../errors.js";
import { parseIdParam } from "../validation.js";

async function addHandler(request: FastifyRequest, reply: FastifyReply): Promise<FastifyReply> {
  const result = await addToCart(currentUserId(request), parseIdParam(request.params));

  if (!result.success) {
    return result.errorCode === "NOT_FOUND"
      ? reply.status(404).send({ detail: MESSAGES.RECIPE_NOT_FOUND })
      : reply.status(400).send({ detail: MESSAGES.ALREADY_IN_CART });
  }

  return reply.status(201).send(toRecipeMinifiedPayload(result.recipe));
}

async function removeHandler(request: FastifyRequest, reply: FastifyReply): Promise<FastifyReply> {
  const result = await removeFromCart(currentUserId(request), parseIdParam(request.params));

  if (!result.success) {
    return result.errorCode === "NOT_FOUND"
      ? reply.status(404).send({ detail: MESSAGES.RECIPE_NOT_FOUND })
      : reply.status(400).send({ detail: MESSAGES.NOT_IN_CART });
  }

  return reply.status(204).send();
}

async function downloadHandler(request: FastifyRequest, reply: FastifyReply): Promise<FastifyReply> {
  const list = await buildShoppingList(currentUserId(request));

  if (list.kind === "empty") {
    return reply.status(400).send({ detail: SHOPPING_LIST.EMPTY_DETAIL });
  }

  return reply
    .status(200)
    .header("Content-Type", "text/plain; charset=utf-8")
    .header("Content-Disposition", `attachment; filename="${SHOPPING_LIST.FILENAME}"`)
    .send(renderShoppingList(list.items));
}

export async function shoppingCartRoutes(fastify: FastifyInstance): Promise<void> {
  const schema = (description: string) => ({
    description,
    tags: ["shopping cart"],
    security: [{ tokenAuth: [] }],
  });

  fastify.get(
    "/api/recipes/download_shopping_cart/",
    { preHandler: requireAuth, schema: schema("Download the aggregated shopping list") },
    downloadHandler
  );

  fastify.post(
    "/api/recipes/:id/shopping_cart/",
    { preHandler: requireAuth, schema: schema("Add a recipe to the shopping cart") },
    addHandler
  );

  fastify.delete(
    "/api/recipes/:id/shopping_cart/",
    { preHandler: requireAuth, schema: schema("Remove a recipe from the shopping cart") },
    removeHandler
  );
}
