import type { ConversationThreadRepository } from "@domain/messages/ports";
import {
  THREAD_TS_METADATA_KEY,
  type ConversationThread,
} from "@domain/messages/types";
import { parseSlackTimestamp } from "@domain/messages/validation";
import type { Queryable } from "@infrastructure/database/db";
import { mapPgError } from "@infrastructure/database/pgErrors";
import {
  THREAD_COLUMNS,
  toConversationThread,
} from "@infrastructure/database/rows";

export class PgConversationThreadRepository
  implements ConversationThreadRepository
{
  constructor(private readonly db: Queryable) {}

  async get(threadTs: string): Promise<ConversationThread | null> {
    const ts = parseSlackTimestamp(threadTs, "threadTs");
    const result = await this.run(
      `SELECT ${THREAD_COLUMNS} FROM conversation_threads WHERE thread_ts = $1::numeric;`,
      [ts]
    );
    return result.rows.length > 0 ? toConversationThread(result.rows[0]) : null;
  }

  async create(
    threadTs: string,
    channelId: string,
    startedAt: Date
  ): Promise<ConversationThread> {
    const ts = parseSlackTimestamp(threadTs, "threadTs");
    const result = await this.run(
      `
      INSERT INTO conversation_threads (thread_ts, channel_id, started_at, last_activity_at)
      VALUES ($1::numeric, $2, $3, $3)
      RETURNING ${THREAD_COLUMNS};
      `,
      [ts, channelId, startedAt]
    );
    return toConversationThread(result.rows[0]);
  }

  async recordActivity(
    threadTs: string,
    channelId: string,
    at: Date
  ): Promise<ConversationThread> {
    const ts = parseSlackTimestamp(threadTs, "threadTs");

    // Participants are recounted from the live messages tagged with the thread.
    const result = await this.run(
      `
      INSERT INTO conversation_threads
        (thread_ts, channel_id, participant_count, message_count, started_at, last_activity_at)
      VALUES (
        $1::numeric,
        $2,
        (
          SELECT COUNT(DISTINCT user_id)
          FROM slack_messages
          WHERE is_deleted = FALSE
            AND metadata->>'${THREAD_TS_METADATA_KEY}' = $4
        ),
        1,
        $3,
        $3
      )
      ON CONFLICT (thread_ts) DO UPDATE SET
        message_count = COALESCE(conversation_threads.message_count, 0) + 1,
        participant_count = EXCLUDED.participant_count,
        started_at = LEAST(conversation_threads.started_at, EXCLUDED.started_at),
        last_activity_at = GREATEST(conversation_threads.last_activity_at, EXCLUDED.last_activity_at)
      RETURNING ${THREAD_COLUMNS};
      `,
      [ts, channelId, at, ts]
    );

    return toConversationThread(result.rows[0]);
  }

  async updateSummary(
    threadTs: string,
    summary: string | null
  ): Promise<ConversationThread | null> {
    const ts = parseSlackTimestamp(threadTs, "threadTs");
    const result = await this.run(
      `
      UPDATE conversation_threads
      SET summary = $2
      WHERE thread_ts = $1::numeric
      RETURNING ${THREAD_COLUMNS};
      `,
      [ts, summary]
    );
    return result.rows.length > 0 ? toConversationThread(result.rows[0]) : null;
  }

  private async run(text: string, values: unknown[]) {
    try {
      return await this.db.query(text, values);
    } catch (error: unknown) {
      throw mapPgError(error, { table: "conversation_threads" });
    }
  }
}
