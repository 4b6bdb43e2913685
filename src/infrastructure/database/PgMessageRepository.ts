import type { MessageRepository } from "@domain/messages/ports";
import {
  DEFAULT_LIST_LIMIT,
  type CountMessagesFilter,
  type ListMessagesOptions,
  type Message,
  type NewMessage,
  type SimilarMessage,
  type SimilaritySearchOptions,
} from "@domain/messages/types";
import {
  assertEmbedding,
  isUuid,
  validateNewMessage,
  type ValidatedMessage,
} from "@domain/messages/validation";
import type { Queryable } from "@infrastructure/database/db";
import { mapPgError } from "@infrastructure/database/pgErrors";
import {
  MESSAGE_COLUMNS,
  toMessage,
  toSimilarMessage,
} from "@infrastructure/database/rows";
import { toPgVectorLiteral } from "@utils/vector";

const INSERT_COLUMNS = [
  "slack_message_id",
  "channel_id",
  "channel_name",
  "user_id",
  "user_name",
  "message_text",
  "message_type",
  "embedding",
  "slack_timestamp",
  "metadata",
] as const;

function insertValues(message: ValidatedMessage): unknown[] {
  return [
    message.slackMessageId,
    message.channelId,
    message.channelName,
    message.userId,
    message.userName,
    message.messageText,
    message.messageType,
    message.embedding === null ? null : toPgVectorLiteral(message.embedding),
    message.slackTimestamp,
    JSON.stringify(message.metadata),
  ];
}

const CASTS: Record<number, string> = {
  7: "::vector",
  8: "::numeric",
  9: "::jsonb",
};

/** `($1, $2, ..., $8::vector, $9::numeric, $10::jsonb)` */
function placeholders(): string {
  const params = INSERT_COLUMNS.map((_, i) => `$${i + 1}${CASTS[i] ?? ""}`);
  return `(${params.join(", ")})`;
}

/**
 * `unnest($1::text[], ..., $10::jsonb[])`: one array parameter per column,
 * so a batch of any size is a single statement with ten parameters.
 */
function unnestArrays(): string {
  const params = INSERT_COLUMNS.map(
    (_, i) => `$${i + 1}${CASTS[i] ?? "::text"}[]`
  );
  return `unnest(${params.join(", ")})`;
}

/**
 * Postgres + pgvector implementation of the MessageRepository port.
 *
 * Unscoped similarity searches go through the `search_similar_messages`
 * stored function; author- or channel-scoped ones issue the same
 * filter/order/limit inline. Both run against the HNSW cosine index, so
 * results are approximate nearest neighbours.
 */
export class PgMessageRepository implements MessageRepository {
  constructor(private readonly db: Queryable) {}

  async insert(message: NewMessage): Promise<Message> {
    const validated = validateNewMessage(message);

    try {
      const result = await this.db.query(
        `
        INSERT INTO slack_messages (${INSERT_COLUMNS.join(", ")})
        VALUES ${placeholders()}
        RETURNING ${MESSAGE_COLUMNS};
        `,
        insertValues(validated)
      );

      return toMessage(result.rows[0]);
    } catch (error: unknown) {
      throw mapPgError(error, { slackMessageId: validated.slackMessageId });
    }
  }

  async insertMany(messages: NewMessage[]): Promise<number> {
    if (messages.length === 0) {
      return 0;
    }

    const validated = messages.map(validateNewMessage);
    const rows = validated.map(insertValues);
    const columns = INSERT_COLUMNS.map((_, c) => rows.map((row) => row[c]));

    try {
      const result = await this.db.query(
        `
        INSERT INTO slack_messages (${INSERT_COLUMNS.join(", ")})
        SELECT * FROM ${unnestArrays()};
        `,
        columns
      );

      return result.rowCount ?? validated.length;
    } catch (error: unknown) {
      throw mapPgError(error, { batchSize: validated.length });
    }
  }

  async findById(id: string): Promise<Message | null> {
    if (!isUuid(id)) {
      return null;
    }

    const result = await this.run(
      `SELECT ${MESSAGE_COLUMNS} FROM slack_messages WHERE id = $1;`,
      [id]
    );
    return result.rows.length > 0 ? toMessage(result.rows[0]) : null;
  }

  async findBySlackId(slackMessageId: string): Promise<Message | null> {
    const result = await this.run(
      `SELECT ${MESSAGE_COLUMNS} FROM slack_messages WHERE slack_message_id = $1;`,
      [slackMessageId]
    );
    return result.rows.length > 0 ? toMessage(result.rows[0]) : null;
  }

  listByUser(
    userId: string,
    options: ListMessagesOptions = {}
  ): Promise<Message[]> {
    return this.listBy("user_id", userId, options);
  }

  listByChannel(
    channelId: string,
    options: ListMessagesOptions = {}
  ): Promise<Message[]> {
    return this.listBy("channel_id", channelId, options);
  }

  async count(filter: CountMessagesFilter = {}): Promise<number> {
    const clauses: string[] = [];
    const values: unknown[] = [];

    if (filter.userId !== undefined) {
      values.push(filter.userId);
      clauses.push(`user_id = $${values.length}`);
    }
    if (filter.channelId !== undefined) {
      values.push(filter.channelId);
      clauses.push(`channel_id = $${values.length}`);
    }
    if (!filter.includeDeleted) {
      clauses.push("is_deleted = FALSE");
    }

    const where = clauses.length > 0 ? `WHERE ${clauses.join(" AND ")}` : "";
    const result = await this.run(
      `SELECT COUNT(*)::int AS count FROM slack_messages ${where};`,
      values
    );

    const count: unknown = result.rows[0]?.count;
    return typeof count === "number" ? count : Number(count ?? 0);
  }

  async softDelete(id: string): Promise<boolean> {
    if (!isUuid(id)) {
      return false;
    }

    // Only live rows are touched, so a repeat delete leaves updated_at alone.
    const updated = await this.run(
      `
      UPDATE slack_messages
      SET is_deleted = TRUE
      WHERE id = $1 AND is_deleted = FALSE
      RETURNING id;
      `,
      [id]
    );

    if ((updated.rowCount ?? updated.rows.length) > 0) {
      return true;
    }

    const existing = await this.run(
      "SELECT 1 FROM slack_messages WHERE id = $1;",
      [id]
    );
    return existing.rows.length > 0;
  }

  async updateEmbedding(
    id: string,
    embedding: number[]
  ): Promise<Message | null> {
    assertEmbedding(embedding);

    if (!isUuid(id)) {
      return null;
    }

    const result = await this.run(
      `
      UPDATE slack_messages
      SET embedding = $2::vector
      WHERE id = $1
      RETURNING ${MESSAGE_COLUMNS};
      `,
      [id, toPgVectorLiteral(embedding)]
    );

    return result.rows.length > 0 ? toMessage(result.rows[0]) : null;
  }

  async searchSimilar(
    queryEmbedding: number[],
    options: SimilaritySearchOptions
  ): Promise<SimilarMessage[]> {
    assertEmbedding(queryEmbedding, "queryEmbedding");

    const vectorLiteral = toPgVectorLiteral(queryEmbedding);
    const { similarityThreshold, limit, userId, channelId } = options;

    if (userId === undefined && channelId === undefined) {
      const result = await this.run(
        `
        SELECT
          message_id,
          message_text,
          user_name,
          channel_name,
          similarity,
          slack_timestamp::text AS slack_timestamp
        FROM search_similar_messages($1::vector, $2, $3);
        `,
        [vectorLiteral, similarityThreshold, limit]
      );
      return result.rows.map(toSimilarMessage);
    }

    const values: unknown[] = [vectorLiteral, similarityThreshold, limit];
    const scope: string[] = [];

    if (userId !== undefined) {
      values.push(userId);
      scope.push(`AND sm.user_id = $${values.length}`);
    }
    if (channelId !== undefined) {
      values.push(channelId);
      scope.push(`AND sm.channel_id = $${values.length}`);
    }

    const result = await this.run(
      `
      SELECT
        sm.id AS message_id,
        sm.message_text,
        sm.user_name,
        sm.channel_name,
        1 - (sm.embedding <=> $1::vector) AS similarity,
        sm.slack_timestamp::text AS slack_timestamp
      FROM slack_messages sm
      WHERE sm.is_deleted = FALSE
        AND sm.embedding IS NOT NULL
        AND 1 - (sm.embedding <=> $1::vector) >= $2
        ${scope.join("\n        ")}
      ORDER BY sm.embedding <=> $1::vector
      LIMIT $3;
      `,
      values
    );

    return result.rows.map(toSimilarMessage);
  }

  private async listBy(
    column: "user_id" | "channel_id",
    value: string,
    options: ListMessagesOptions
  ): Promise<Message[]> {
    const limit = options.limit ?? DEFAULT_LIST_LIMIT;
    // Keeping the literal predicate lets the planner use the partial indexes.
    const liveOnly = options.includeDeleted ? "" : "AND is_deleted = FALSE";

    const result = await this.run(
      `
      SELECT ${MESSAGE_COLUMNS}
      FROM slack_messages
      WHERE ${column} = $1 ${liveOnly}
      ORDER BY slack_timestamp DESC
      LIMIT $2;
      `,
      [value, limit]
    );

    return result.rows.map(toMessage);
  }

  private async run(text: string, values: unknown[]) {
    try {
      return await this.db.query(text, values);
    } catch (error: unknown) {
      throw mapPgError(error);
    }
  }
}
