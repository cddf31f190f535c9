/**
 * Request parsing helpers shared by the route modules.
 */

import type { FastifyReply } from "fastify";
import { z } from "zod";
import type { ErrorPayload } from "@foodgram/shared";
import { HttpError, MESSAGES } from "../errors.js";

/** Largest value of a Postgres INTEGER column */
const MAX_ID = 2147483647;

const idParamsSchema = z.object({
  id: z.coerce.number().int().positive().max(MAX_ID),
});

/**
 * Numeric `:id` route param. Anything else is a 404, like an unmatched
 * route.
 */
export function parseIdParam(params: unknown): number {
  const parsed = idParamsSchema.safeParse(params);
  if (!parsed.success) {
    throw new HttpError(404, MESSAGES.NOT_FOUND);
  }
  return parsed.data.id;
}

export function sendValidationError(reply: FastifyReply, error: z.ZodError): FastifyReply {
  const body: ErrorPayload = {
    detail: MESSAGES.VALIDATION_FAILED,
    errors: error.flatten().fieldErrors,
  };
  return reply.status(400).send(body);
}
