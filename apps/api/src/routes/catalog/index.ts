/**
 * Tag and Ingredient Routes (read-only)
 *
 * Endpoints:
 *   GET /api/tags/                  - All tags
 *   GET /api/tags/:id/              - One tag
 *   GET /api/ingredients/?name=     - Ingredients, optionally by name prefix
 *   GET /api/ingredients/:id/       - One ingredient
 */

import type { FastifyInstance, FastifyRequest, FastifyReply } from "fastify";
import { z } from "zod";
import { findIngredientById, findTagById, listTags, searchIngredients } from "@foodgram/db";
import { toIngredientPayload, toTagPayload } from "../../serializers.js";
import { MESSAGES } from "../../errors.js";
import { parseIdParam, sendValidationError } from "../validation.js";

const ingredientQuerySchema = z.object({
  name: z.string().max(128).optional(),
});

async function listTagsHandler(_request: FastifyRequest, reply: FastifyReply): Promise<FastifyReply> {
  const tags = await listTags();
  return reply.send(tags.map(toTagPayload));
}

async function getTagHandler(request: FastifyRequest, reply: FastifyReply): Promise<FastifyReply> {
  const tag = await findTagById(parseIdParam(request.params));
  if (!tag) {
    return reply.status(404).send({ detail: MESSAGES.NOT_FOUND });
  }
  return reply.send(toTagPayload(tag));
}

async function listIngredientsHandler(request: FastifyRequest, reply: FastifyReply): Promise<FastifyReply> {
  const parseResult = ingredientQuerySchema.safeParse(request.query);
  if (!parseResult.success) {
    return sendValidationError(reply, parseResult.error);
  }

  const ingredients = await searchIngredients(parseResult.data.name || undefined);
  return reply.send(ingredients.map(toIngredientPayload));
}

async function getIngredientHandler(request: FastifyRequest, reply: FastifyReply): Promise<FastifyReply> {
  const ingredient = await findIngredientById(parseIdParam(request.params));
  if (!ingredient) {
    return reply.status(404).send({ detail: MESSAGES.NOT_FOUND });
  }
  return reply.send(toIngredientPayload(ingredient));
}

export async function catalogRoutes(fastify: FastifyInstance): Promise<void> {
  fastify.get("/api/tags/", { schema: { description: "List tags", tags: ["tags"] } }, listTagsHandler);
  fastify.get("/api/tags/:id/", { schema: { description: "Get a tag", tags: ["tags"] } }, getTagHandler);
  fastify.get(
    "/api/ingredients/",
    { schema: { description: "List ingredients, filtered by name prefix", tags: ["ingredients"] } },
    listIngredientsHandler
  );
  fastify.get(
    "/api/ingredients/:id/",
    { schema: { description: "Get an ingredient", tags: ["ingredients"] } },
    getIngredientHandler
  );
}
