/**
 * Message ingestion.
 *
 * One transaction per message:
 * - insert the row (embedding supplied, or computed when asked for)
 * - record the author in user_contexts
 * - tag and record the thread when the caller names one with `threadTs`
 *
 * A Slack message id that is already stored rolls everything back and is
 * reported as a duplicate: the message was ingested before, nothing failed.
 */
import type { EmbeddingProvider } from "@domain/llm/ports";
import type { MessageStore } from "@domain/messages/ports";
import {
  THREAD_TS_METADATA_KEY,
  type Message,
  type NewMessage,
} from "@domain/messages/types";
import { parseSlackTimestamp } from "@domain/messages/validation";
import { logEvent } from "@infrastructure/logging/Logger";
import { ConflictError, InfrastructureError } from "@typesLocal/errors";
import { slackTimestampToDate } from "@utils/slackTimestamp";

export interface IngestMessageInput extends NewMessage {
  /** Parent thread `ts`, when the message is part of a thread. */
  threadTs?: string | undefined;
  /** Compute the embedding from the message text when none is supplied. */
  embed?: boolean | undefined;
}

export type IngestOutcome =
  | { status: "created"; message: Message }
  | { status: "duplicate"; slackMessageId: string };

export interface IngestBatchResult {
  created: number;
  duplicates: number;
  outcomes: IngestOutcome[];
}

export class IngestUseCase {
  constructor(
    private readonly store: MessageStore,
    private readonly embedder: EmbeddingProvider | null
  ) {}

  async ingestMessage(input: IngestMessageInput): Promise<IngestOutcome> {
    const { threadTs, embed, ...fields } = input;
    const message: NewMessage = { ...fields };
    const thread =
      threadTs === undefined ? null : parseSlackTimestamp(threadTs, "threadTs");

    if (thread !== null) {
      message.metadata = {
        ...(fields.metadata ?? {}),
        [THREAD_TS_METADATA_KEY]: thread,
      };
    }

    if (embed && !message.embedding) {
      message.embedding = await this.requireEmbedder().embed(message.messageText);
    }

    try {
      const created = await this.store.transaction(async (session) => {
        const row = await session.messages.insert(message);
        const at = slackTimestampToDate(row.slackTimestamp);

        await session.users.recordMessage(row.userId, row.userName, at);

        if (thread !== null) {
          await session.threads.recordActivity(thread, row.channelId, at);
        }

        return row;
      });

      logEvent("MESSAGE_CREATED", {
        messageId: created.id,
        slackMessageId: created.slackMessageId,
        channelId: created.channelId,
        userId: created.userId,
        hasEmbedding: created.embedding !== null,
      });

      return { status: "created", message: created };
    } catch (error: unknown) {
      if (error instanceof ConflictError) {
        logEvent("MESSAGE_DUPLICATE", {
          slackMessageId: message.slackMessageId,
        });
        return { status: "duplicate", slackMessageId: message.slackMessageId };
      }
      throw error;
    }
  }

  /** Ingests sequentially; duplicates are counted, other failures abort. */
  async ingestBatch(inputs: IngestMessageInput[]): Promise<IngestBatchResult> {
    const outcomes: IngestOutcome[] = [];

    for (const input of inputs) {
      outcomes.push(await this.ingestMessage(input));
    }

    const created = outcomes.filter((o) => o.status === "created").length;
    const result = {
      created,
      duplicates: outcomes.length - created,
      outcomes,
    };

    logEvent("MESSAGES_BULK_CREATED", {
      received: inputs.length,
      created: result.created,
      duplicates: result.duplicates,
    });

    return result;
  }

  private requireEmbedder(): EmbeddingProvider {
    if (!this.embedder) {
      throw new InfrastructureError("Embedding provider is not configured", 503, {
        hint: "set OPENAI_API_KEY",
      });
    }
    return this.embedder;
  }
}
