// Applies db/init.sql to the configured database.
import { config } from "@config/index";
import { createPool, wrapPool } from "@infrastructure/database/db";
import { applySchema, loadSchemaSql } from "@infrastructure/database/schema";
import { describeError, logger } from "@infrastructure/logging/Logger";

async function run(): Promise<void> {
  const pool = wrapPool(createPool(config.db));

  try {
    const ddl = await loadSchemaSql();
    await applySchema(pool, config.db.schema, ddl);

    logger.log("info", "Database initialized", {
      database: config.db.database,
      schema: config.db.schema,
      tables: ["slack_messages", "user_contexts", "conversation_threads"],
    });
  } finally {
    await pool.end();
  }
}

run().catch((error: unknown) => {
  logger.log("error", "Database initialization failed", describeError(error));
  process.exitCode = 1;
});
