import type { AppConfig } from "@config/index";
import type { MessageStore } from "@domain/messages/ports";
import { createPool, wrapPool } from "@infrastructure/database/db";
import { PgMessageStore } from "@infrastructure/database/PgMessageStore";
import { logger } from "@infrastructure/logging/Logger";
import { InMemoryMessageStore } from "@infrastructure/memory/InMemoryMessageStore";

/**
 * Builds the store selected by STORE_DRIVER.
 */
export function createStore(cfg: AppConfig): MessageStore {
  if (cfg.store.driver === "memory") {
    logger.log("warn", "Using in-memory message store; data is not persisted");
    return new InMemoryMessageStore();
  }

  logger.log("info", "Creating database pool", {
    host: cfg.db.host,
    port: cfg.db.port,
    database: cfg.db.database,
    schema: cfg.db.schema,
    max: cfg.db.max,
  });

  return new PgMessageStore(wrapPool(createPool(cfg.db)));
}
