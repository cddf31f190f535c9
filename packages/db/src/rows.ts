import { z } from "zod";

/**
 * Validate driver rows against a column schema and map them to domain
 * objects.
 */
export function parseRows<S extends z.ZodTypeAny>(schema: S, rows: unknown[]): z.output<S>[] {
  return z.array(schema).parse(rows);
}

export function parseFirstRow<S extends z.ZodTypeAny>(schema: S, rows: unknown[]): z.output<S> | null {
  return rows.length > 0 ? schema.parse(rows[0]) : null;
}

export function affectedRows(result: { rowCount: number | null }): number {
  return result.rowCount ?? 0;
}
