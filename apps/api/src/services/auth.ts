/**
 * Authentication Service
 *
 * Handles user registration, login, and JWT token management.
 * Uses bcrypt for password hashing and jsonwebtoken for JWT.
 */

import bcrypt from "bcrypt";
import jwt from "jsonwebtoken";
import { z } from "zod";
import {
  createUser,
  findUserByEmail,
  findUserById,
  listUsers as listUserRows,
  updateUserPassword,
  isUniqueViolation,
  CONSTRAINTS,
  type AuthPayload,
  type PublicUser,
  type User,
} from "@foodgram/db";
import { logger } from "@foodgram/logger";
import { getConfig } from "../config.js";

// ============================================================================
// Types
// ============================================================================

export interface RegisterInput {
  email: string;
  username: string;
  firstName: string;
  lastName: string;
  password: string;
}

export interface LoginInput {
  email: string;
  password: string;
}

export type RegisterResult =
  | { success: true; user: PublicUser }
  | { success: false; errorCode: "EMAIL_TAKEN" | "USERNAME_TAKEN" };

export type LoginResult =
  | { success: true; token: string; user: PublicUser }
  | { success: false; errorCode: "INVALID_CREDENTIALS" };

export type ChangePasswordResult =
  | { success: true }
  | { success: false; errorCode: "USER_NOT_FOUND" | "INVALID_PASSWORD" };

const tokenPayloadSchema = z.object({
  userId: z.number().int().positive(),
  email: z.string(),
  iat: z.number().optional(),
  exp: z.number().optional(),
});

// ============================================================================
// Helper Functions
// ============================================================================

/**
 * Strip the password hash
 */
export function toPublicUser(user: User): PublicUser {
  return {
    id: user.id,
    email: user.email,
    username: user.username,
    firstName: user.firstName,
    lastName: user.lastName,
  };
}

export async function hashPassword(password: string): Promise<string> {
  return bcrypt.hash(password, getConfig().bcryptRounds);
}

export async function verifyPassword(password: string, hash: string): Promise<boolean> {
  return bcrypt.compare(password, hash);
}

export function generateToken(user: PublicUser): string {
  const payload: AuthPayload = {
    userId: user.id,
    email: user.email,
  };

  const { jwtSecret, jwtExpiresIn } = getConfig();
  return jwt.sign(payload, jwtSecret, { expiresIn: jwtExpiresIn });
}

/**
 * Verify and decode a JWT token
 *
 * @returns null for bad signatures, expired tokens or foreign payloads
 */
export function verifyToken(token: string): AuthPayload | null {
  try {
    const parsed = tokenPayloadSchema.safeParse(jwt.verify(token, getConfig().jwtSecret));
    return parsed.success ? parsed.data : null;
  } catch (error) {
    logger.debug({ error }, "Token verification failed");
    return null;
  }
}

// ============================================================================
// Auth Service Functions
// ============================================================================

/**
 * Register a new user. Emails are stored lower-cased.
 */
export async function register(input: RegisterInput): Promise<RegisterResult> {
  const email = input.email.toLowerCase();

  if (await findUserByEmail(email)) {
    return { success: false, errorCode: "EMAIL_TAKEN" };
  }

  try {
    const user = await createUser({
      email,
      username: input.username,
      firstName: input.firstName,
      lastName: input.lastName,
      hashedPassword: await hashPassword(input.password),
    });

    logger.info({ userId: user.id, username: user.username }, "User registered");

    return { success: true, user: toPublicUser(user) };
  } catch (error) {
    if (isUniqueViolation(error, CONSTRAINTS.USER_USERNAME)) {
      return { success: false, errorCode: "USERNAME_TAKEN" };
    }
    if (isUniqueViolation(error, CONSTRAINTS.USER_EMAIL)) {
      return { success: false, errorCode: "EMAIL_TAKEN" };
    }
    throw error;
  }
}

/**
 * Login with email and password.
 * Unknown email and wrong password give the same result.
 */
export async function login(input: LoginInput): Promise<LoginResult> {
  const user = await findUserByEmail(input.email.toLowerCase());

  if (!user || !(await verifyPassword(input.password, user.hashedPassword))) {
    logger.debug({ email: input.email }, "Invalid login attempt");
    return { success: false, errorCode: "INVALID_CREDENTIALS" };
  }

  logger.info({ userId: user.id }, "User logged in");

  const publicUser = toPublicUser(user);
  return { success: true, token: generateToken(publicUser), user: publicUser };
}

export async function getUserById(userId: number): Promise<PublicUser | null> {
  const user = await findUserById(userId);
  return user ? toPublicUser(user) : null;
}

export async function listUsers(): Promise<PublicUser[]> {
  const users = await listUserRows();
  return users.map(toPublicUser);
}

/**
 * Replace the password after checking the current one. Issued tokens stay
 * valid.
 */
export async function changePassword(
  userId: number,
  currentPassword: string,
  newPassword: string
): Promise<ChangePasswordResult> {
  const user = await findUserById(userId);
  if (!user) {
    return { success: false, errorCode: "USER_NOT_FOUND" };
  }

  if (!(await verifyPassword(currentPassword, user.hashedPassword))) {
    logger.debug({ userId }, "Password change with a wrong current password");
    return { success: false, errorCode: "INVALID_PASSWORD" };
  }

  if (!(await updateUserPassword(userId, await hashPassword(newPassword)))) {
    return { success: false, errorCode: "USER_NOT_FOUND" };
  }

  logger.info({ userId }, "Password changed");
  return { success: true };
}
