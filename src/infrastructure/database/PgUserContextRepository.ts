import type { UserContextRepository } from "@domain/messages/ports";
import type { UserContext, UserProfileUpdate } from "@domain/messages/types";
import type { Queryable } from "@infrastructure/database/db";
import { mapPgError } from "@infrastructure/database/pgErrors";
import {
  USER_CONTEXT_COLUMNS,
  toUserContext,
} from "@infrastructure/database/rows";

/**
 * Per-author aggregates in `user_contexts`.
 *
 * Rows appear lazily on the first message of an author and are only ever
 * updated afterwards; `updated_at` is left to the table trigger.
 */
export class PgUserContextRepository implements UserContextRepository {
  constructor(private readonly db: Queryable) {}

  async get(userId: string): Promise<UserContext | null> {
    const result = await this.run(
      `SELECT ${USER_CONTEXT_COLUMNS} FROM user_contexts WHERE user_id = $1;`,
      [userId]
    );
    return result.rows.length > 0 ? toUserContext(result.rows[0]) : null;
  }

  async getOrCreate(
    userId: string,
    userName: string | null = null
  ): Promise<UserContext> {
    const inserted = await this.run(
      `
      INSERT INTO user_contexts (user_id, user_name)
      VALUES ($1, $2)
      ON CONFLICT (user_id) DO NOTHING
      RETURNING ${USER_CONTEXT_COLUMNS};
      `,
      [userId, userName]
    );

    if (inserted.rows.length > 0) {
      return toUserContext(inserted.rows[0]);
    }

    const existing = await this.get(userId);
    if (!existing) {
      throw new Error(`user context for ${userId} vanished after upsert`);
    }
    return existing;
  }

  async recordMessage(
    userId: string,
    userName: string | null,
    at: Date
  ): Promise<UserContext> {
    // LEAST/GREATEST ignore NULLs, so the first message seeds both bounds.
    const result = await this.run(
      `
      INSERT INTO user_contexts
        (user_id, user_name, total_messages, first_message_at, last_message_at)
      VALUES ($1, $2, 1, $3, $3)
      ON CONFLICT (user_id) DO UPDATE SET
        user_name = COALESCE(EXCLUDED.user_name, user_contexts.user_name),
        total_messages = COALESCE(user_contexts.total_messages, 0) + 1,
        first_message_at = LEAST(user_contexts.first_message_at, EXCLUDED.first_message_at),
        last_message_at = GREATEST(user_contexts.last_message_at, EXCLUDED.last_message_at)
      RETURNING ${USER_CONTEXT_COLUMNS};
      `,
      [userId, userName, at]
    );

    return toUserContext(result.rows[0]);
  }

  async updateProfile(
    userId: string,
    update: UserProfileUpdate
  ): Promise<UserContext | null> {
    const sets: string[] = [];
    const values: unknown[] = [userId];

    if (update.communicationStyle !== undefined) {
      values.push(update.communicationStyle);
      sets.push(`communication_style = $${values.length}`);
    }
    if (update.topicsOfInterest !== undefined) {
      values.push(JSON.stringify(update.topicsOfInterest));
      sets.push(`topics_of_interest = $${values.length}::jsonb`);
    }

    if (sets.length === 0) {
      return this.get(userId);
    }

    const result = await this.run(
      `
      UPDATE user_contexts
      SET ${sets.join(", ")}
      WHERE user_id = $1
      RETURNING ${USER_CONTEXT_COLUMNS};
      `,
      values
    );

    return result.rows.length > 0 ? toUserContext(result.rows[0]) : null;
  }

  private async run(text: string, values: unknown[]) {
    try {
      return await this.db.query(text, values);
    } catch (error: unknown) {
      throw mapPgError(error, { table: "user_contexts" });
    }
  }
}
