/**
 * Transaction stand-in for the fake repositories: runs the callback directly.
 */

import type { Queryable } from "../../src/shared/db.js";

export const fakeConnection: Queryable = {
  query: () => Promise.reject(new Error("SQL is not available in HTTP tests")),
};

export async function withTransaction<T>(fn: (tx: Queryable) => Promise<T>): Promise<T> {
  return fn(fakeConnection);
}
