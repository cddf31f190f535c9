/**
 * Tags Repository
 */

import { z } from "zod";
import { getDb, type Queryable } from "../client.js";
import { affectedRows, parseFirstRow, parseRows } from "../rows.js";
import type { NewTag, Tag } from "../types.js";

export const tagRow = z.object({
  id: z.number(),
  name: z.string(),
  slug: z.string(),
});

const SELECT_ALL = "SELECT id, name, slug FROM tags ORDER BY id";

const SELECT_BY_ID = "SELECT id, name, slug FROM tags WHERE id = $1";

const SELECT_EXISTING_IDS = "SELECT id FROM tags WHERE id = ANY($1::int[])";

const INSERT_MANY = `
  INSERT INTO tags (name, slug)
  SELECT * FROM unnest($1::text[], $2::text[])
  ON CONFLICT DO NOTHING
`;

const idRow = z.object({ id: z.number() });

export async function listTags(client: Queryable = getDb()): Promise<Tag[]> {
  const { rows } = await client.query(SELECT_ALL);
  return parseRows(tagRow, rows);
}

export async function findTagById(id: number, client: Queryable = getDb()): Promise<Tag | null> {
  const { rows } = await client.query(SELECT_BY_ID, [id]);
  return parseFirstRow(tagRow, rows);
}

/**
 * Ids from `ids` with no tag row, in input order.
 */
export async function findMissingTagIds(ids: readonly number[], client: Queryable = getDb()): Promise<number[]> {
  if (ids.length === 0) {
    return [];
  }

  const { rows } = await client.query(SELECT_EXISTING_IDS, [ids]);
  const existing = new Set(parseRows(idRow, rows).map((row) => row.id));
  return ids.filter((id) => !existing.has(id));
}

/**
 * Insert tags, skipping names or slugs already present.
 *
 * @returns number of rows inserted
 */
export async function insertTags(tags: readonly NewTag[], client: Queryable = getDb()): Promise<number> {
  if (tags.length === 0) {
    return 0;
  }

  const result = await client.query(INSERT_MANY, [
    tags.map((tag) => tag.name),
    tags.map((tag) => tag.slug),
  ]);
  return affectedRows(result);
}
