import type {
  ConversationThreadRepository,
  MessageRepository,
  MessageStore,
  StoreSession,
  UserContextRepository,
} from "@domain/messages/ports";
import {
  rollback,
  type ConnectionPool,
  type Queryable,
} from "@infrastructure/database/db";
import { PgConversationThreadRepository } from "@infrastructure/database/PgConversationThreadRepository";
import { PgMessageRepository } from "@infrastructure/database/PgMessageRepository";
import { PgUserContextRepository } from "@infrastructure/database/PgUserContextRepository";
import {
  describeError,
  logEvent,
  logger,
} from "@infrastructure/logging/Logger";

function createSession(db: Queryable): StoreSession {
  return {
    messages: new PgMessageRepository(db),
    users: new PgUserContextRepository(db),
    threads: new PgConversationThreadRepository(db),
  };
}

/**
 * Store backed by one pg pool.
 *
 * Transactions run on a single checked-out client at Postgres' default
 * READ COMMITTED isolation; the unique index on `slack_message_id` settles
 * racing inserts of the same message. HNSW index maintenance happens inside
 * the writing transaction, so search never sees a stale index.
 */
export class PgMessageStore implements MessageStore {
  readonly driver = "postgres" as const;
  readonly messages: MessageRepository;
  readonly users: UserContextRepository;
  readonly threads: ConversationThreadRepository;

  constructor(private readonly pool: ConnectionPool) {
    const session = createSession(pool);
    this.messages = session.messages;
    this.users = session.users;
    this.threads = session.threads;
  }

  async transaction<T>(work: (session: StoreSession) => Promise<T>): Promise<T> {
    const client = await this.pool.connect();

    try {
      await client.query("BEGIN");
      const result = await work(createSession(client));
      await client.query("COMMIT");
      return result;
    } catch (error: unknown) {
      await rollback(client);

      logEvent("DB_TRANSACTION_FAILED", describeError(error));
      throw error;
    } finally {
      client.release();
    }
  }

  async healthCheck(): Promise<boolean> {
    try {
      await this.pool.query("SELECT 1;");
      return true;
    } catch (error: unknown) {
      logger.log("error", "Database health check failed", describeError(error));
      return false;
    }
  }

  async close(): Promise<void> {
    await this.pool.end();
    logger.log("info", "Database connections closed");
  }
}
