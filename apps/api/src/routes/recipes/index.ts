/**
 * Recipe Routes
 *
 * Endpoints:
 *   GET    /api/recipes/                 - List (filters: author, tags, is_in_shopping_cart, search)
 *   POST   /api/recipes/                 - Create; assigns the short link
 *   GET    /api/recipes/:id/             - Detail
 *   PATCH  /api/recipes/:id/             - Update (author only)
 *   DELETE /api/recipes/:id/             - Delete (author only)
 *   GET    /api/recipes/:id/get-link/    - Public short URL of the recipe
 */

import type { FastifyInstance, FastifyRequest, FastifyReply } from "fastify";
import { z } from "zod";
import { RECIPE_LIMITS, type ShortLinkPayload } from "@foodgram/shared";
import {
  createRecipe,
  deleteRecipe,
  getRecipe,
  getShortLink,
  listRecipes,
  updateRecipe,
  type ReferenceErrors,
} from "../../services/recipes.js";
import { buildShortLinkUrl } from "../../services/short-links.js";
import { currentUserId, optionalAuth, requireAuth } from "../../middleware/auth.js";
import { toRecipePayload } from "../../serializers.js";
import { MESSAGES } from "../../errors.js";
import { parseIdParam, sendValidationError } from "../validation.js";

// ============================================================================
// Request Schemas (Zod)
// ============================================================================

function hasDuplicates(values: readonly number[]): boolean {
  return new Set(values).size !== values.length;
}

// JSON bodies carry real numbers; only params and query strings are coerced.
const ingredientAmountSchema = z.object({
  id: z.number().int().positive(),
  amount: z
    .number()
    .int()
    .min(RECIPE_LIMITS.AMOUNT_MIN, `Количество должно быть не меньше ${RECIPE_LIMITS.AMOUNT_MIN}.`)
    .max(RECIPE_LIMITS.AMOUNT_MAX, `Количество должно быть не больше ${RECIPE_LIMITS.AMOUNT_MAX}.`),
});

const recipeFields = {
  name: z.string().trim().min(1).max(RECIPE_LIMITS.NAME_MAX_LENGTH),
  text: z.string().trim().min(1),
  cooking_time: z
    .number()
    .int()
    .min(RECIPE_LIMITS.COOKING_TIME_MIN, `Время приготовления не меньше ${RECIPE_LIMITS.COOKING_TIME_MIN} мин.`)
    .max(RECIPE_LIMITS.COOKING_TIME_MAX, `Время приготовления не больше ${RECIPE_LIMITS.COOKING_TIME_MAX} мин.`),
  tags: z
    .array(z.number().int().positive())
    .min(1, "Нужно выбрать хотя бы один тег.")
    .refine((ids) => !hasDuplicates(ids), "Теги не должны повторяться."),
  ingredients: z
    .array(ingredientAmountSchema)
    .min(1, "Нужен хотя бы один ингредиент.")
    .refine((items) => !hasDuplicates(items.map((item) => item.id)), "Ингредиенты не должны повторяться."),
};

const createRecipeSchema = z.object(recipeFields);

const updateRecipeSchema = z.object(recipeFields).partial();

const stringList = z
  .union([z.string(), z.array(z.string())])
  .transform((value) => (Array.isArray(value) ? value : [value]));

const listQuerySchema = z.object({
  author: z.coerce.number().int().positive().optional(),
  tags: stringList.optional(),
  is_in_shopping_cart: z.enum(["0", "1"]).optional(),
  search: z.string().trim().max(RECIPE_LIMITS.NAME_MAX_LENGTH).optional(),
});

function sendReferenceErrors(reply: FastifyReply, errors: ReferenceErrors): FastifyReply {
  return reply.status(400).send({ detail: MESSAGES.VALIDATION_FAILED, errors });
}

// ============================================================================
// Route Handlers
// ============================================================================

async function listHandler(request: FastifyRequest, reply: FastifyReply): Promise<FastifyReply> {
  const parseResult = listQuerySchema.safeParse(request.query);
  if (!parseResult.success) {
    return sendValidationError(reply, parseResult.error);
  }

  const { author, tags, is_in_shopping_cart, search } = parseResult.data;
  const views = await listRecipes(
    {
      authorId: author,
      tagSlugs: tags,
      inShoppingCart: is_in_shopping_cart === undefined ? undefined : is_in_shopping_cart === "1",
      search: search || undefined,
    },
    request.userId
  );

  return reply.send(views.map(toRecipePayload));
}

async function createHandler(request: FastifyRequest, reply: FastifyReply): Promise<FastifyReply> {
  const parseResult = createRecipeSchema.safeParse(request.body);
  if (!parseResult.success) {
    return sendValidationError(reply, parseResult.error);
  }

  const body = parseResult.data;
  const result = await createRecipe(currentUserId(request), {
    name: body.name,
    text: body.text,
    cookingTime: body.cooking_time,
    tagIds: body.tags,
    ingredients: body.ingredients,
  });

  if (!result.success) {
    return sendReferenceErrors(reply, result.errors);
  }

  return reply.status(201).send(toRecipePayload({ recipe: result.recipe, inShoppingCart: false }));
}

async function getHandler(request: FastifyRequest, reply: FastifyReply): Promise<FastifyReply> {
  const view = await getRecipe(parseIdParam(request.params), request.userId);
  if (!view) {
    return reply.status(404).send({ detail: MESSAGES.RECIPE_NOT_FOUND });
  }
  return reply.send(toRecipePayload(view));
}

async function updateHandler(request: FastifyRequest, reply: FastifyReply): Promise<FastifyReply> {
  const recipeId = parseIdParam(request.params);
  const parseResult = updateRecipeSchema.safeParse(request.body);
  if (!parseResult.success) {
    return sendValidationError(reply, parseResult.error);
  }

  const body = parseResult.data;
  const userId = currentUserId(request);
  const result = await updateRecipe(userId, recipeId, {
    name: body.name,
    text: body.text,
    cookingTime: body.cooking_time,
    tagIds: body.tags,
    ingredients: body.ingredients,
  });

  if (!result.success) {
    if (result.errorCode === "INVALID_REFERENCES") {
      return sendReferenceErrors(reply, result.errors);
    }
    return result.errorCode === "NOT_FOUND"
      ? reply.status(404).send({ detail: MESSAGES.RECIPE_NOT_FOUND })
      : reply.status(403).send({ detail: MESSAGES.FORBIDDEN });
  }

  const view = await getRecipe(result.recipe.id, userId);
  return reply.send(toRecipePayload(view ?? { recipe: result.recipe, inShoppingCart: false }));
}

async function deleteHandler(request: FastifyRequest, reply: FastifyReply): Promise<FastifyReply> {
  const result = await deleteRecipe(currentUserId(request), parseIdParam(request.params));

  if (!result.success) {
    return result.errorCode === "NOT_FOUND"
      ? reply.status(404).send({ detail: MESSAGES.RECIPE_NOT_FOUND })
      : reply.status(403).send({ detail: MESSAGES.FORBIDDEN });
  }

  return reply.status(204).send();
}

async function getLinkHandler(request: FastifyRequest, reply: FastifyReply): Promise<FastifyReply> {
  const result = await getShortLink(parseIdParam(request.params));
  if (!result.success) {
    return reply.status(404).send({ detail: MESSAGES.RECIPE_NOT_FOUND });
  }

  const body: ShortLinkPayload = { "short-link": buildShortLinkUrl(result.shortLink) };
  return reply.send(body);
}

// ============================================================================
// Route Registration
// ============================================================================

export async function recipeRoutes(fastify: FastifyInstance): Promise<void> {
  const secured = { security: [{ tokenAuth: [] }] };

  fastify.get(
    "/api/recipes/",
    { preHandler: optionalAuth, schema: { description: "List recipes", tags: ["recipes"] } },
    listHandler
  );

  fastify.post(
    "/api/recipes/",
    { preHandler: requireAuth, schema: { description: "Create a recipe", tags: ["recipes"], ...secured } },
    createHandler
  );

  fastify.get(
    "/api/recipes/:id/",
    { preHandler: optionalAuth, schema: { description: "Get a recipe", tags: ["recipes"] } },
    getHandler
  );

  fastify.patch(
    "/api/recipes/:id/",
    { preHandler: requireAuth, schema: { description: "Update a recipe", tags: ["recipes"], ...secured } },
    updateHandler
  );

  fastify.delete(
    "/api/recipes/:id/",
    { preHandler: requireAuth, schema: { description: "Delete a recipe", tags: ["recipes"], ...secured } },
    deleteHandler
  );

  fastify.get(
    "/api/recipes/:id/get-link/",
    { schema: { description: "Get the recipe's short link", tags: ["recipes"] } },
    getLinkHandler
  );
}
