/**
 * Authentication Middleware
 *
 * Fastify hooks and decorators for JWT-based authentication.
 * Accepts `Authorization: Token <jwt>` (the web client's scheme) and
 * `Authorization: Bearer <jwt>`.
 */

import type {
  FastifyInstance,
  FastifyRequest,
  FastifyReply,
  FastifyPluginAsync,
  preHandlerAsyncHookHandler,
} from "fastify";
import fp from "fastify-plugin";
import type { AuthPayload, PublicUser } from "@foodgram/db";
import { logger } from "@foodgram/logger";
import { verifyToken, getUserById } from "../services/auth.js";
import { HttpError, MESSAGES } from "../errors.js";

// ============================================================================
// Type Augmentation
// ============================================================================

declare module "fastify" {
  interface FastifyRequest {
    /** JWT payload if authenticated */
    auth: AuthPayload | null;
    /** Current user if authenticated */
    user: PublicUser | null;
    userId: number | null;
  }
}

const AUTH_SCHEMES = new Set(["Token", "Bearer"]);

// ============================================================================
// Helper Functions
// ============================================================================

/**
 * Extract the token from the Authorization header
 */
export function extractToken(header: string | undefined): string | null {
  if (!header) {
    return null;
  }

  const [scheme, token] = header.trim().split(/\s+/);

  if (!AUTH_SCHEMES.has(scheme) || !token) {
    return null;
  }

  return token;
}

async function authenticate(request: FastifyRequest): Promise<PublicUser | null> {
  const token = extractToken(request.headers.authorization);
  if (!token) {
    return null;
  }

  const payload = verifyToken(token);
  if (!payload) {
    return null;
  }

  const user = await getUserById(payload.userId);
  if (user) {
    request.auth = payload;
    request.user = user;
    request.userId = user.id;
  }
  return user;
}

/**
 * Id of the authenticated user; use after `requireAuth`.
 *
 * @throws HttpError 401 when the request is anonymous
 */
export function currentUserId(request: FastifyRequest): number {
  if (request.userId === null) {
    throw new HttpError(401, MESSAGES.NOT_AUTHENTICATED);
  }
  return request.userId;
}

// ============================================================================
// Middleware Hooks
// ============================================================================

/**
 * Required authentication hook
 *
 * Usage:
 * ```ts
 * fastify.get("/api/users/me/", { preHandler: requireAuth }, handler);
 * ```
 */
export const requireAuth: preHandlerAsyncHookHandler = async (
  request: FastifyRequest,
  reply: FastifyReply
) => {
  if (!extractToken(request.headers.authorization)) {
    return reply.status(401).send({ detail: MESSAGES.NOT_AUTHENTICATED });
  }

  if (!(await authenticate(request))) {
    return reply.status(401).send({ detail: MESSAGES.INVALID_TOKEN });
  }
};

/**
 * Optional authentication hook
 *
 * Attaches the user when a valid token is sent; anonymous otherwise.
 */
export const optionalAuth: preHandlerAsyncHookHandler = async (request: FastifyRequest) => {
  if (!(await authenticate(request)) && request.headers.authorization) {
    logger.debug("Invalid token provided for optional auth route");
  }
};

// ============================================================================
// Fastify Plugin
// ============================================================================

const authPluginCallback: FastifyPluginAsync = async (fastify: FastifyInstance): Promise<void> => {
  fastify.decorateRequest("auth", null);
  fastify.decorateRequest("user", null);
  fastify.decorateRequest("userId", null);
};

export const authPlugin = fp(authPluginCallback, {
  name: "auth-plugin",
  fastify: "4.x",
});
