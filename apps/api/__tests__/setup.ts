/**
 * API Test Setup
 *
 * Environment and module mocks shared by the API tests. The repositories of
 * @foodgram/db are replaced by jest mocks; its pure helpers stay real.
 */

import { jest } from "@jest/globals";
import type { Queryable } from "@foodgram/db";

process.env.NODE_ENV = "test";
process.env.JWT_SECRET = "test-secret";
process.env.BCRYPT_ROUNDS = "4";
process.env.PUBLIC_BASE_URL = "http://localhost:3000";

jest.mock("@foodgram/logger", () => {
  const mockLogger = {
    info: jest.fn(),
    debug: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
  };
  return {
    logger: mockLogger,
    createLogger: jest.fn(() => mockLogger),
  };
});

jest.mock("@foodgram/db", () => ({
  ...jest.requireActual<typeof import("@foodgram/db")>("@foodgram/db"),
  // users
  createUser: jest.fn(),
  findUserByEmail: jest.fn(),
  findUserById: jest.fn(),
  listUsers: jest.fn(),
  updateUserPassword: jest.fn(),
  // catalog
  listTags: jest.fn(),
  findTagById: jest.fn(),
  findMissingTagIds: jest.fn(),
  searchIngredients: jest.fn(),
  findIngredientById: jest.fn(),
  findMissingIngredientIds: jest.fn(),
  // recipes
  findRecipeById: jest.fn(),
  listRecipes: jest.fn(),
  insertRecipe: jest.fn(),
  updateRecipe: jest.fn(),
  deleteRecipe: jest.fn(),
  assignShortLink: jest.fn(),
  shortLinkExists: jest.fn(),
  findRecipeIdByShortLink: jest.fn(),
  // shopping cart
  addCartEntry: jest.fn(),
  removeCartEntry: jest.fn(),
  cartEntryExists: jest.fn(),
  findCartRecipeIds: jest.fn(),
  loadCart: jest.fn(),
  // lifecycle
  checkDbConnection: jest.fn(),
  withTransaction: jest.fn(<T>(fn: (client: Queryable) => Promise<T>) =>
    fn({ query: async () => ({ rows: [], rowCount: 0 }) })
  ),
}));
