/**
 * User and Token Routes
 *
 * Endpoints:
 *   GET  /api/users/               - List users
 *   POST /api/users/               - Register a new user
 *   GET  /api/users/me/            - Current user profile
 *   GET  /api/users/:id/           - User profile
 *   POST /api/users/set_password/  - Change the current user's password
 *   POST /api/auth/token/login/    - Exchange email + password for a token
 *   POST /api/auth/token/logout/   - End the session (tokens are stateless)
 */

import type { FastifyInstance, FastifyRequest, FastifyReply } from "fastify";
import { z } from "zod";
import { USER_LIMITS, type AuthTokenPayload, type ErrorPayload } from "@foodgram/shared";
import { register, login, getUserById, listUsers, changePassword } from "../../services/auth.js";
import { requireAuth, currentUserId } from "../../middleware/auth.js";
import { toUserPayload } from "../../serializers.js";
import { MESSAGES } from "../../errors.js";
import { RATE_LIMITS } from "../../config.js";
import { parseIdParam, sendValidationError } from "../validation.js";

// ============================================================================
// Request Schemas (Zod)
// ============================================================================

const registerSchema = z.object({
  email: z.string().email("Некорректный email.").max(USER_LIMITS.EMAIL_MAX_LENGTH),
  username: z
    .string()
    .min(1)
    .max(USER_LIMITS.NAME_MAX_LENGTH)
    .regex(USER_LIMITS.USERNAME_PATTERN, "Допустимы только буквы, цифры и символы @/./+/-/_.")
    .refine((value) => !USER_LIMITS.RESERVED_USERNAMES.has(value.toLowerCase()), "Это имя пользователя занято."),
  first_name: z.string().min(1).max(USER_LIMITS.NAME_MAX_LENGTH),
  last_name: z.string().min(1).max(USER_LIMITS.NAME_MAX_LENGTH),
  password: z
    .string()
    .min(USER_LIMITS.PASSWORD_MIN_LENGTH, "Пароль должен содержать не менее 8 символов.")
    .max(USER_LIMITS.PASSWORD_MAX_LENGTH),
});

const loginSchema = z.object({
  email: z.string().min(1).max(USER_LIMITS.EMAIL_MAX_LENGTH),
  password: z.string().min(1).max(USER_LIMITS.PASSWORD_MAX_LENGTH),
});

const setPasswordSchema = z.object({
  new_password: z
    .string()
    .min(USER_LIMITS.PASSWORD_MIN_LENGTH, "Пароль должен содержать не менее 8 символов.")
    .max(USER_LIMITS.PASSWORD_MAX_LENGTH),
  current_password: z.string().min(1).max(USER_LIMITS.PASSWORD_MAX_LENGTH),
});

// ============================================================================
// Route Handlers
// ============================================================================

async function registerHandler(request: FastifyRequest, reply: FastifyReply): Promise<FastifyReply> {
  const parseResult = registerSchema.safeParse(request.body);
  if (!parseResult.success) {
    return sendValidationError(reply, parseResult.error);
  }

  const { email, username, first_name, last_name, password } = parseResult.data;
  const result = await register({ email, username, firstName: first_name, lastName: last_name, password });

  if (!result.success) {
    const detail = result.errorCode === "EMAIL_TAKEN" ? MESSAGES.EMAIL_TAKEN : MESSAGES.USERNAME_TAKEN;
    return reply.status(400).send({ detail });
  }

  return reply.status(201).send(toUserPayload(result.user));
}

async function loginHandler(request: FastifyRequest, reply: FastifyReply): Promise<FastifyReply> {
  const parseResult = loginSchema.safeParse(request.body);
  if (!parseResult.success) {
    return sendValidationError(reply, parseResult.error);
  }

  const result = await login(parseResult.data);
  if (!result.success) {
    return reply.status(400).send({ detail: MESSAGES.INVALID_CREDENTIALS });
  }

  const body: AuthTokenPayload = { auth_token: result.token };
  return reply.status(200).send(body);
}

async function logoutHandler(_request: FastifyRequest, reply: FastifyReply): Promise<FastifyReply> {
  return reply.status(204).send();
}

async function meHandler(request: FastifyRequest, reply: FastifyReply): Promise<FastifyReply> {
  const user = request.user ?? (await getUserById(currentUserId(request)));
  if (!user) {
    return reply.status(401).send({ detail: MESSAGES.INVALID_TOKEN });
  }

  return reply.status(200).send(toUserPayload(user));
}

async function listHandler(_request: FastifyRequest, reply: FastifyReply): Promise<FastifyReply> {
  const users = await listUsers();
  return reply.status(200).send(users.map(toUserPayload));
}

async function detailHandler(request: FastifyRequest, reply: FastifyReply): Promise<FastifyReply> {
  const user = await getUserById(parseIdParam(request.params));
  if (!user) {
    return reply.status(404).send({ detail: MESSAGES.NOT_FOUND });
  }

  return reply.status(200).send(toUserPayload(user));
}

async function setPasswordHandler(request: FastifyRequest, reply: FastifyReply): Promise<FastifyReply> {
  const parseResult = setPasswordSchema.safeParse(request.body);
  if (!parseResult.success) {
    return sendValidationError(reply, parseResult.error);
  }

  const { current_password, new_password } = parseResult.data;
  const result = await changePassword(currentUserId(request), current_password, new_password);

  if (!result.success) {
    if (result.errorCode === "USER_NOT_FOUND") {
      return reply.status(401).send({ detail: MESSAGES.INVALID_TOKEN });
    }
    const body: ErrorPayload = {
      detail: MESSAGES.VALIDATION_FAILED,
      errors: { current_password: [MESSAGES.WRONG_PASSWORD] },
    };
    return reply.status(400).send(body);
  }

  return reply.status(204).send();
}

// ============================================================================
// Route Registration
// ============================================================================

export async function userRoutes(fastify: FastifyInstance): Promise<void> {
  fastify.get("/api/users/", { schema: { description: "List users", tags: ["users"] } }, listHandler);

  fastify.post(
    "/api/users/",
    { config: { rateLimit: RATE_LIMITS.auth }, schema: { description: "Register a new user", tags: ["users"] } },
    registerHandler
  );

  fastify.get(
    "/api/users/me/",
    {
      preHandler: requireAuth,
      schema: { description: "Current user profile", tags: ["users"], security: [{ tokenAuth: [] }] },
    },
    meHandler
  );

  fastify.get("/api/users/:id/", { schema: { description: "User profile", tags: ["users"] } }, detailHandler);

  fastify.post(
    "/api/users/set_password/",
    {
      preHandler: requireAuth,
      config: { rateLimit: RATE_LIMITS.auth },
      schema: { description: "Change the current user's password", tags: ["users"], security: [{ tokenAuth: [] }] },
    },
    setPasswordHandler
  );

  fastify.post(
    "/api/auth/token/login/",
    { config: { rateLimit: RATE_LIMITS.auth }, schema: { description: "Obtain an auth token", tags: ["auth"] } },
    loginHandler
  );

  fastify.post(
    "/api/auth/token/logout/",
    {
      preHandler: requireAuth,
      schema: { description: "Discard the current token", tags: ["auth"], security: [{ tokenAuth: [] }] },
    },
    logoutHandler
  );
}
