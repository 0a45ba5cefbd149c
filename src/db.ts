/**
 * db.ts — PostgreSQL connection layer
 *
 * Only the Postgres mirror of the canonical store talks to the database.
 *
 * Pattern:
 *   const pool = createPool(config.databaseUrl);
 *   const store = new PostgresFlightStore(pool);
 *   await store.initSchema();
 *   ...
 *   await pool.end();
 */

import pg from "pg";
import { log } from "./logger.js";
const { Pool } = pg;
type Pool = pg.Pool;
type PoolClient = pg.PoolClient;
type QueryResult = pg.QueryResult;

export type { Pool, PoolClient, QueryResult };

/** The slice of `Pool` the stores use; tests pass an in-process fake. */
export type Queryable = Pick<Pool, "query" | "connect">;

export function createPool(connectionString: string): Pool {
  // One batch run at a time; a handful of connections is plenty
  const pool = new Pool({
    connectionString,
    max: 3,
    connectionTimeoutMillis: 5000,
    idleTimeoutMillis: 30000,
    statement_timeout: 30000,
  });

  // Must handle pool error events: unhandled idle-client errors crash the process
  pool.on("error", (err) => {
    log.store.error({ err: err.message }, "pg pool idle client error");
  });

  return pool;
}

/**
 * Run a sequence of DDL statements inside a single transaction.
 * Used by stores during schema initialization.
 */
export async function initSchema(
  pool: Queryable,
  statements: string[],
): Promise<void> {
  await withTransaction(pool, async (client) => {
    for (const stmt of statements) {
      await client.query(stmt);
    }
  });
}

/**
 * Execute a callback inside a transaction.
 * Commits on success, rolls back on error.
 */
export async function withTransaction<T>(
  pool: Queryable,
  fn: (client: PoolClient) => Promise<T>,
): Promise<T> {
  const client = await pool.connect();
  try {
    await client.query("BEGIN");
    const result = await fn(client);
    await client.query("COMMIT");
    return result;
  } catch (e) {
    await client.query("ROLLBACK");
    throw e;
  } finally {
    client.release();
  }
}
