/**
 * PostgreSQL connection pool and the narrow query interfaces the repositories
 * depend on.
 *
 * Every pooled connection starts with `search_path` set to the configured
 * schema, so SQL refers to `slack_messages` and friends unqualified.
 */
import pg from "pg";
import type { Pool, QueryResultRow } from "pg";

import type { AppConfig } from "@config/index";
import { describeError, logger } from "@infrastructure/logging/Logger";

export interface QueryOutcome {
  rows: QueryResultRow[];
  rowCount: number | null;
}

export interface Queryable {
  query(text: string, values?: unknown[]): Promise<QueryOutcome>;
}

export interface TransactionalClient extends Queryable {
  release(): void;
}

export interface ConnectionPool extends Queryable {
  connect(): Promise<TransactionalClient>;
  end(): Promise<void>;
}

export function createPool(db: AppConfig["db"]): Pool {
  const pool = new pg.Pool({
    host: db.host,
    port: db.port,
    user: db.user,
    password: db.password,
    database: db.database,
    max: db.max,
    idleTimeoutMillis: db.idleTimeoutMs,
    connectionTimeoutMillis: db.connectionTimeoutMs,
    options: `-c search_path=${db.schema},public`,
  });

  pool.on("error", (err) => {
    logger.log("error", "Unexpected PG pool error", {
      message: err.message,
      name: err.name,
    });
  });

  return pool;
}

export function wrapPool(pool: Pool): ConnectionPool {
  return {
    query: (text, values) => pool.query(text, values),
    connect: async () => {
      const client = await pool.connect();
      return {
        query: (text, values) => client.query(text, values),
        release: () => client.release(),
      };
    },
    end: () => pool.end(),
  };
}

/**
 * Issues ROLLBACK after a failed transaction. A failure here is logged and
 * swallowed so the caller rethrows the error that aborted the work.
 */
export async function rollback(client: Queryable): Promise<void> {
  try {
    await client.query("ROLLBACK");
  } catch (error: unknown) {
    logger.log("error", "Rollback failed", describeError(error));
  }
}
