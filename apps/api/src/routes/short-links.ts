/**
 * Short Link Redirect
 *
 *   GET /s/:token/ - 302 to the recipe page on the web client
 */

import type { FastifyInstance, FastifyRequest, FastifyReply } from "fastify";
import { z } from "zod";
import { resolveShortLink } from "../services/short-links.js";
import { MESSAGES } from "../errors.js";

const paramsSchema = z.object({ token: z.string() });

async function redirectHandler(request: FastifyRequest, reply: FastifyReply): Promise<FastifyReply> {
  const params = paramsSchema.safeParse(request.params);
  const target = params.success ? await resolveShortLink(params.data.token) : null;

  if (!target) {
    return reply.status(404).send({ detail: MESSAGES.NOT_FOUND });
  }

  request.log.debug({ token: params.success ? params.data.token : null, target }, "Short link resolved");
  return reply.redirect(target, 302);
}

export async function shortLinkRoutes(fastify: FastifyInstance): Promise<void> {
  fastify.get(
    "/s/:token/",
    { schema: { description: "Redirect a short link to its recipe", tags: ["short links"] } },
    redirectHandler
  );
}
