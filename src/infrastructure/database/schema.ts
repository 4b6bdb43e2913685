import { readFile } from "fs/promises";
import { fileURLToPath } from "url";

import { rollback, type ConnectionPool } from "@infrastructure/database/db";
import { describeError, logEvent } from "@infrastructure/logging/Logger";
import { ValidationError } from "@typesLocal/errors";

export const SCHEMA_FILE = fileURLToPath(
  new URL("../../../db/init.sql", import.meta.url)
);

const IDENTIFIER = /^[a-z_][a-z0-9_]*$/;

export function loadSchemaSql(file: string = SCHEMA_FILE): Promise<string> {
  return readFile(file, "utf-8");
}

/**
 * Creates `schema` if needed and applies the DDL inside it, all in one
 * transaction. Re-running against an initialized database changes nothing.
 */
export async function applySchema(
  pool: ConnectionPool,
  schema: string,
  ddl: string
): Promise<void> {
  if (!IDENTIFIER.test(schema)) {
    throw new ValidationError("Schema name must be a lowercase SQL identifier", {
      schema,
    });
  }

  const client = await pool.connect();
  const startedAt = Date.now();

  try {
    await client.query("BEGIN");
    await client.query(`CREATE SCHEMA IF NOT EXISTS ${schema};`);
    await client.query(`SET LOCAL search_path TO ${schema}, public;`);
    await client.query(ddl);
    await client.query("COMMIT");

    logEvent("DB_SCHEMA_APPLIED", {
      schema,
      durationMs: Date.now() - startedAt,
    });
  } catch (error: unknown) {
    await rollback(client);

    logEvent("DB_SCHEMA_FAILED", { schema, ...describeError(error) });
    throw error;
  } finally {
    client.release();
  }
}
