/**
 * Fixtures and helpers for the API tests.
 */

import { jest } from "@jest/globals";
import type { FastifyInstance } from "fastify";
import * as db from "@foodgram/db";
import type { RecipeDetail, User } from "@foodgram/db";
import { buildApp } from "../src/app.js";
import { generateToken, toPublicUser } from "../src/services/auth.js";

export const mockedDb = jest.mocked(db);

export const cook: User = {
  id: 1,
  email: "cook@example.com",
  username: "cook",
  firstName: "Anna",
  lastName: "Petrova",
  hashedPassword: "$2b$04$placeholderplaceholderplaceholderplaceholderplaceho",
};

export const guest: User = {
  id: 2,
  email: "guest@example.com",
  username: "guest",
  firstName: "Ivan",
  lastName: "Sidorov",
  hashedPassword: "$2b$04$placeholderplaceholderplaceholderplaceholderplaceho",
};

export function makeRecipe(overrides: Partial<RecipeDetail> = {}): RecipeDetail {
  return {
    id: 7,
    authorId: cook.id,
    name: "Блины",
    text: "Смешать и пожарить.",
    cookingTime: 30,
    shortLink: "aB3xY9",
    author: toPublicUser(cook),
    tags: [{ id: 1, name: "Завтрак", slug: "breakfast" }],
    ingredients: [
      { id: 10, name: "мука", measurementUnit: "г", amount: 200 },
      { id: 11, name: "яйца", measurementUnit: "шт", amount: 2 },
    ],
    ...overrides,
  };
}

/**
 * Authorization header for `user`; the token resolves through the mocked
 * findUserById.
 */
export function authHeaders(user: User): { authorization: string } {
  mockedDb.findUserById.mockImplementation(async (id) => (id === user.id ? user : null));
  return { authorization: `Token ${generateToken(toPublicUser(user))}` };
}

export async function createTestApp(): Promise<FastifyInstance> {
  const app = await buildApp();
  await app.ready();
  return app;
}

export function uniqueViolation(constraint: string): Error {
  return Object.assign(new Error(`duplicate key value violates unique constraint "${constraint}"`), {
    code: "23505",
    constraint,
  });
}
