/**
 * PostgreSQL Pool
 * ===============
 * Shared connection pool. Plain queries borrow a connection for the duration
 * of the statement; `withTransaction` pins one client until COMMIT/ROLLBACK.
 */

import pg, { type QueryResult, type QueryResultRow } from "pg";

import { envInt, envString } from "./env.js";
import { logger } from "./logger.js";

const { Pool, types } = pg;

// DATE columns come back as `YYYY-MM-DD` instead of a local-midnight Date.
const PG_DATE_OID = 1082;
types.setTypeParser(PG_DATE_OID, (value: string) => value);

const UNIQUE_VIOLATION = "23505";

/**
 * What repositories need from a connection: the pool itself or a client
 * pinned by `withTransaction`.
 */
export interface Queryable {
  query<R extends QueryResultRow = QueryResultRow>(
    text: string,
    values?: unknown[]
  ): Promise<QueryResult<R>>;
}

export const pool = new Pool({
  connectionString: envString("DATABASE_URL"),
  max: envInt("DATABASE_POOL_MAX", 10),
});

pool.on("error", (err) => {
  logger.error("Idle PostgreSQL client error", err);
});

export async function withTransaction<T>(
  fn: (tx: Queryable) => Promise<T>
): Promise<T> {
  const client = await pool.connect();
  try {
    await client.query("BEGIN");
    const result = await fn(client);
    await client.query("COMMIT");
    return result;
  } catch (err) {
    await client.query("ROLLBACK").catch((rollbackErr: unknown) => {
      logger.error("Transaction rollback failed", {
        error: rollbackErr instanceof Error ? rollbackErr.message : String(rollbackErr),
      });
    });
    throw err;
  } finally {
    client.release();
  }
}

export function isUniqueViolation(err: unknown, constraint?: string): boolean {
  if (typeof err !== "object" || err === null) {return false;}
  if (!("code" in err) || err.code !== UNIQUE_VIOLATION) {return false;}
  if (!constraint) {return true;}
  return "constraint" in err && err.constraint === constraint;
}

export async function disconnectDb() {
  await pool.end();
}
