import type { EmbeddingProvider } from "@domain/llm/ports";
import type { MessageRepository } from "@domain/messages/ports";
import type { ListMessagesOptions, Message } from "@domain/messages/types";
import { logEvent } from "@infrastructure/logging/Logger";
import {
  InfrastructureError,
  NotFoundError,
  ValidationError,
} from "@typesLocal/errors";

export type EmbeddingSource = { embedding: number[] } | { text: string };

export interface MessageListQuery extends ListMessagesOptions {
  userId?: string | undefined;
  channelId?: string | undefined;
}

export interface MessageCountQuery {
  userId?: string | undefined;
  channelId?: string | undefined;
  includeDeleted?: boolean | undefined;
}

/**
 * Reads and maintenance operations on individual messages.
 */
export class MessageUseCase {
  constructor(
    private readonly messages: MessageRepository,
    private readonly embedder: EmbeddingProvider | null
  ) {}

  async getMessage(id: string): Promise<Message> {
    const message = await this.messages.findById(id);
    if (!message) {
      throw new NotFoundError("Message not found", { id });
    }
    return message;
  }

  /** Lists one author's or one channel's messages, newest first. */
  async listMessages(query: MessageListQuery): Promise<Message[]> {
    const { userId, channelId, ...options } = query;

    if (userId !== undefined && channelId === undefined) {
      return this.messages.listByUser(userId, options);
    }
    if (channelId !== undefined && userId === undefined) {
      return this.messages.listByChannel(channelId, options);
    }

    throw new ValidationError("Exactly one of userId or channelId is required");
  }

  countMessages(query: MessageCountQuery = {}): Promise<number> {
    return this.messages.count(query);
  }

  async softDeleteMessage(id: string): Promise<void> {
    const found = await this.messages.softDelete(id);
    if (!found) {
      throw new NotFoundError("Message not found", { id });
    }

    logEvent("MESSAGE_SOFT_DELETED", { messageId: id });
  }

  async attachEmbedding(id: string, source: EmbeddingSource): Promise<Message> {
    const embedding =
      "embedding" in source ? source.embedding : await this.embedText(source.text);

    const updated = await this.messages.updateEmbedding(id, embedding);
    if (!updated) {
      throw new NotFoundError("Message not found", { id });
    }

    logEvent("MESSAGE_EMBEDDING_UPDATED", {
      messageId: id,
      computed: !("embedding" in source),
    });
    return updated;
  }

  private async embedText(text: string): Promise<number[]> {
    if (!text.trim()) {
      throw new ValidationError("text is required");
    }
    if (!this.embedder) {
      throw new InfrastructureError("Embedding provider is not configured", 503, {
        hint: "set OPENAI_API_KEY or send an embedding",
      });
    }
    return this.embedder.embed(text);
  }
}
