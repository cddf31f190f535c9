/**
 * In-process stand-in for a pg pool or client.
 *
 * Each route answers queries whose text contains `match` (or matches the
 * regex); the first matching route wins. Unmatched queries return no rows.
 */

import { jest } from "@jest/globals";
import type { QueryOutcome } from "../src/index.js";

export interface FakeRoute {
  match: string | RegExp;
  rows?: unknown[];
  rowCount?: number;
  error?: Error;
}

export function createFakeClient(routes: FakeRoute[] = []) {
  const query = jest.fn(async (text: string, _values?: unknown[]): Promise<QueryOutcome> => {
    const route = routes.find((candidate) =>
      typeof candidate.match === "string" ? text.includes(candidate.match) : candidate.match.test(text)
    );

    if (route?.error) {
      throw route.error;
    }

    const rows = route?.rows ?? [];
    return { rows, rowCount: route?.rowCount ?? rows.length };
  });

  return {
    query,
    /** SQL text of every call, in order */
    texts: () => query.mock.calls.map(([text]) => text),
    /** Bound values of the call whose text contains `fragment` */
    valuesFor: (fragment: string) => query.mock.calls.find(([text]) => text.includes(fragment))?.[1],
  };
}

export function uniqueViolation(constraint: string): Error {
  return Object.assign(new Error(`duplicate key value violates unique constraint "${constraint}"`), {
    code: "23505",
    constraint,
  });
}
