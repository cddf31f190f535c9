/**
 * Users Repository
 */

import { z } from "zod";
import { getDb, type Queryable } from "../client.js";
import { affectedRows, parseFirstRow, parseRows } from "../rows.js";
import type { CreateUserInput, User } from "../types.js";

const USER_COLUMNS = "id, email, username, first_name, last_name, hashed_password";

const INSERT_USER = `
  INSERT INTO users (email, username, first_name, last_name, hashed_password)
  VALUES ($1, $2, $3, $4, $5)
  RETURNING ${USER_COLUMNS}
`;

const SELECT_BY_EMAIL = `SELECT ${USER_COLUMNS} FROM users WHERE email = $1`;

const SELECT_BY_ID = `SELECT ${USER_COLUMNS} FROM users WHERE id = $1`;

const SELECT_ALL = `SELECT ${USER_COLUMNS} FROM users ORDER BY id`;

const UPDATE_PASSWORD = `UPDATE users SET hashed_password = $2 WHERE id = $1`;

const userRow = z
  .object({
    id: z.number(),
    email: z.string(),
    username: z.string(),
    first_name: z.string(),
    last_name: z.string(),
    hashed_password: z.string(),
  })
  .transform(
    (row): User => ({
      id: row.id,
      email: row.email,
      username: row.username,
      firstName: row.first_name,
      lastName: row.last_name,
      hashedPassword: row.hashed_password,
    })
  );

/**
 * Insert a user. Duplicate email or username surfaces as a unique
 * violation on users_email_key / users_username_key.
 */
export async function createUser(input: CreateUserInput, client: Queryable = getDb()): Promise<User> {
  const { rows } = await client.query(INSERT_USER, [
    input.email,
    input.username,
    input.firstName,
    input.lastName,
    input.hashedPassword,
  ]);

  const user = parseFirstRow(userRow, rows);
  if (!user) {
    throw new Error("INSERT INTO users returned no row");
  }
  return user;
}

/** Emails are stored lower-cased; pass a normalized address. */
export async function findUserByEmail(email: string, client: Queryable = getDb()): Promise<User | null> {
  const { rows } = await client.query(SELECT_BY_EMAIL, [email]);
  return parseFirstRow(userRow, rows);
}

export async function findUserById(id: number, client: Queryable = getDb()): Promise<User | null> {
  const { rows } = await client.query(SELECT_BY_ID, [id]);
  return parseFirstRow(userRow, rows);
}

export async function listUsers(client: Queryable = getDb()): Promise<User[]> {
  const { rows } = await client.query(SELECT_ALL);
  return parseRows(userRow, rows);
}

/** @returns false when no user has that id */
export async function updateUserPassword(
  id: number,
  hashedPassword: string,
  client: Queryable = getDb()
): Promise<boolean> {
  return affectedRows(await client.query(UPDATE_PASSWORD, [id, hashedPassword])) > 0;
}
