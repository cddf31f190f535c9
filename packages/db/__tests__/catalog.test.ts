/**
 * Tags, Ingredients and Users Repository Tests
 */

import { describe, it, expect } from "@jest/globals";
import {
  createUser,
  escapeLikePattern,
  findMissingIngredientIds,
  findMissingTagIds,
  findUserByEmail,
  listTags,
  listUsers,
  searchIngredients,
  updateUserPassword,
} from "../src/index.js";
import { createFakeClient } from "./fake-client.js";

describe("tags", () => {
  it("should list tags", async () => {
    const client = createFakeClient([
      { match: "FROM tags", rows: [{ id: 1, name: "Завтрак", slug: "breakfast" }] },
    ]);

    expect(await listTags(client)).toEqual([{ id: 1, name: "Завтрак", slug: "breakfast" }]);
  });

  it("should report ids with no tag", async () => {
    const client = createFakeClient([{ match: "SELECT id FROM tags", rows: [{ id: 1 }, { id: 3 }] }]);

    expect(await findMissingTagIds([3, 2, 1, 4], client)).toEqual([2, 4]);
    expect(client.valuesFor("SELECT id FROM tags")).toEqual([[3, 2, 1, 4]]);
  });
});

describe("ingredients", () => {
  it("should escape LIKE wildcards", () => {
    expect(escapeLikePattern("50%_a\\b")).toBe("50\\%\\_a\\\\b");
  });

  it("should search by escaped prefix", async () => {
    const client = createFakeClient([
      { match: "LIKE", rows: [{ id: 4, name: "мука пшеничная", measurement_unit: "г" }] },
    ]);

    expect(await searchIngredients("Мук", client)).toEqual([
      { id: 4, name: "мука пшеничная", measurementUnit: "г" },
    ]);
    expect(client.valuesFor("LIKE")).toEqual(["Мук"]);
  });

  it("should list everything without a prefix", async () => {
    const client = createFakeClient();

    await searchIngredients(undefined, client);

    expect(client.texts()[0]).not.toContain("LIKE");
  });

  it("should report ids with no ingredient", async () => {
    const client = createFakeClient([{ match: "SELECT id FROM ingredients", rows: [{ id: 10 }] }]);

    expect(await findMissingIngredientIds([10, 11], client)).toEqual([11]);
    expect(await findMissingIngredientIds([], client)).toEqual([]);
    expect(client.query).toHaveBeenCalledTimes(1);
  });
});

describe("users", () => {
  const row = {
    id: 3,
    email: "cook@example.com",
    username: "cook",
    first_name: "Ann",
    last_name: "Cook",
    hashed_password: "hashed",
  };

  it("should map the inserted row", async () => {
    const client = createFakeClient([{ match: "INSERT INTO users", rows: [row] }]);

    const user = await createUser(
      { email: "cook@example.com", username: "cook", firstName: "Ann", lastName: "Cook", hashedPassword: "hashed" },
      client
    );

    expect(user).toEqual({
      id: 3,
      email: "cook@example.com",
      username: "cook",
      firstName: "Ann",
      lastName: "Cook",
      hashedPassword: "hashed",
    });
    expect(client.valuesFor("INSERT INTO users")).toEqual(["cook@example.com", "cook", "Ann", "Cook", "hashed"]);
  });

  it("should return null for an unknown email", async () => {
    expect(await findUserByEmail("nobody@example.com", createFakeClient())).toBeNull();
  });

  it("should list users by id", async () => {
    const client = createFakeClient([{ match: "FROM users ORDER BY id", rows: [row] }]);

    expect(await listUsers(client)).toEqual([
      { id: 3, email: "cook@example.com", username: "cook", firstName: "Ann", lastName: "Cook", hashedPassword: "hashed" },
    ]);
  });

  it("should report whether a password row was updated", async () => {
    const updated = createFakeClient([{ match: "UPDATE users", rowCount: 1 }]);

    expect(await updateUserPassword(3, "new-hash", updated)).toBe(true);
    expect(updated.valuesFor("UPDATE users")).toEqual([3, "new-hash"]);
    expect(await updateUserPassword(4, "new-hash", createFakeClient())).toBe(false);
  });
});
