/**
 * In-process message store with exact similarity search.
 *
 * Mirrors the Postgres schema rules (unique Slack message id, soft-delete
 * filtering, trigger-maintained `updated_at`) without a database. Search is a
 * brute-force cosine scan: exact top-K, O(n) per query, suited to development
 * and tests rather than large archives.
 */
import { randomUUID } from "crypto";

import type {
  ConversationThreadRepository,
  MessageRepository,
  MessageStore,
  StoreSession,
  UserContextRepository,
} from "@domain/messages/ports";
import {
  DEFAULT_LIST_LIMIT,
  THREAD_TS_METADATA_KEY,
  type ConversationThread,
  type CountMessagesFilter,
  type ListMessagesOptions,
  type Message,
  type NewMessage,
  type SimilarMessage,
  type SimilaritySearchOptions,
  type UserContext,
  type UserProfileUpdate,
} from "@domain/messages/types";
import {
  assertEmbedding,
  parseSlackTimestamp,
  validateNewMessage,
} from "@domain/messages/validation";
import { logger } from "@infrastructure/logging/Logger";
import { ConflictError } from "@typesLocal/errors";
import { compareSlackTimestamps } from "@utils/slackTimestamp";
import { cosineDistance } from "@utils/vector";

type Clock = () => Date;

interface MemoryState {
  messages: Map<string, Message>;
  users: Map<string, UserContext>;
  threads: Map<string, ConversationThread>;
}

function emptyState(): MemoryState {
  return { messages: new Map(), users: new Map(), threads: new Map() };
}

/** Stand-in for the BEFORE UPDATE trigger: never moves backwards. */
function touch(previous: Date, clock: Clock): Date {
  const now = clock();
  return now.getTime() >= previous.getTime() ? now : new Date(previous);
}

function minDate(a: Date | null, b: Date): Date {
  return a === null || b.getTime() < a.getTime() ? b : a;
}

function maxDate(a: Date | null, b: Date): Date {
  return a === null || b.getTime() > a.getTime() ? b : a;
}

class InMemoryMessageRepository implements MessageRepository {
  constructor(
    private readonly state: MemoryState,
    private readonly clock: Clock
  ) {}

  async insert(input: NewMessage): Promise<Message> {
    const validated = validateNewMessage(input);

    if (this.findBySlackIdSync(validated.slackMessageId)) {
      throw new ConflictError("Record already exists", {
        slackMessageId: validated.slackMessageId,
        constraint: "slack_messages_slack_message_id_key",
      });
    }

    const now = this.clock();
    const message: Message = {
      id: randomUUID(),
      ...validated,
      embedding: validated.embedding ? [...validated.embedding] : null,
      metadata: structuredClone(validated.metadata),
      isDeleted: false,
      createdAt: now,
      updatedAt: now,
    };

    this.state.messages.set(message.id, message);
    return structuredClone(message);
  }

  async insertMany(inputs: NewMessage[]): Promise<number> {
    const validated = inputs.map(validateNewMessage);
    const seen = new Set<string>();

    for (const message of validated) {
      if (
        seen.has(message.slackMessageId) ||
        this.findBySlackIdSync(message.slackMessageId)
      ) {
        throw new ConflictError("Record already exists", {
          slackMessageId: message.slackMessageId,
          constraint: "slack_messages_slack_message_id_key",
        });
      }
      seen.add(message.slackMessageId);
    }

    for (const message of validated) {
      await this.insert(message);
    }
    return validated.length;
  }

  async findById(id: string): Promise<Message | null> {
    const message = this.state.messages.get(id);
    return message ? structuredClone(message) : null;
  }

  async findBySlackId(slackMessageId: string): Promise<Message | null> {
    const message = this.findBySlackIdSync(slackMessageId);
    return message ? structuredClone(message) : null;
  }

  async listByUser(
    userId: string,
    options: ListMessagesOptions = {}
  ): Promise<Message[]> {
    return this.listWhere((m) => m.userId === userId, options);
  }

  async listByChannel(
    channelId: string,
    options: ListMessagesOptions = {}
  ): Promise<Message[]> {
    return this.listWhere((m) => m.channelId === channelId, options);
  }

  async count(filter: CountMessagesFilter = {}): Promise<number> {
    let total = 0;

    for (const m of this.state.messages.values()) {
      if (filter.userId !== undefined && m.userId !== filter.userId) continue;
      if (filter.channelId !== undefined && m.channelId !== filter.channelId)
        continue;
      if (!filter.includeDeleted && m.isDeleted) continue;
      total++;
    }
    return total;
  }

  async softDelete(id: string): Promise<boolean> {
    const message = this.state.messages.get(id);

    if (!message) {
      return false;
    }
    if (!message.isDeleted) {
      message.isDeleted = true;
      message.updatedAt = touch(message.updatedAt, this.clock);
    }
    return true;
  }

  async updateEmbedding(
    id: string,
    embedding: number[]
  ): Promise<Message | null> {
    assertEmbedding(embedding);

    const message = this.state.messages.get(id);
    if (!message) {
      return null;
    }

    message.embedding = [...embedding];
    message.updatedAt = touch(message.updatedAt, this.clock);
    return structuredClone(message);
  }

  async searchSimilar(
    queryEmbedding: number[],
    options: SimilaritySearchOptions
  ): Promise<SimilarMessage[]> {
    assertEmbedding(queryEmbedding, "queryEmbedding");

    const scored: { message: Message; distance: number }[] = [];

    for (const message of this.state.messages.values()) {
      if (message.isDeleted || message.embedding === null) continue;
      if (options.userId !== undefined && message.userId !== options.userId)
        continue;
      if (
        options.channelId !== undefined &&
        message.channelId !== options.channelId
      )
        continue;

      const distance = cosineDistance(message.embedding, queryEmbedding);
      if (1 - distance >= options.similarityThreshold) {
        scored.push({ message, distance });
      }
    }

    scored.sort((a, b) => a.distance - b.distance);

    return scored.slice(0, options.limit).map(({ message, distance }) => ({
      messageId: message.id,
      messageText: message.messageText,
      userName: message.userName,
      channelName: message.channelName,
      similarity: 1 - distance,
      slackTimestamp: message.slackTimestamp,
    }));
  }

  private findBySlackIdSync(slackMessageId: string): Message | undefined {
    for (const message of this.state.messages.values()) {
      if (message.slackMessageId === slackMessageId) {
        return message;
      }
    }
    return undefined;
  }

  private listWhere(
    predicate: (message: Message) => boolean,
    options: ListMessagesOptions
  ): Message[] {
    const limit = options.limit ?? DEFAULT_LIST_LIMIT;

    return [...this.state.messages.values()]
      .filter((m) => predicate(m) && (options.includeDeleted || !m.isDeleted))
      .sort((a, b) => compareSlackTimestamps(b.slackTimestamp, a.slackTimestamp))
      .slice(0, limit)
      .map((m) => structuredClone(m));
  }
}

class InMemoryUserContextRepository implements UserContextRepository {
  constructor(
    private readonly state: MemoryState,
    private readonly clock: Clock
  ) {}

  async get(userId: string): Promise<UserContext | null> {
    const context = this.state.users.get(userId);
    return context ? structuredClone(context) : null;
  }

  async getOrCreate(
    userId: string,
    userName: string | null = null
  ): Promise<UserContext> {
    const existing = this.state.users.get(userId);
    if (existing) {
      return structuredClone(existing);
    }

    const now = this.clock();
    const context: UserContext = {
      id: randomUUID(),
      userId,
      userName,
      totalMessages: 0,
      firstMessageAt: null,
      lastMessageAt: null,
      communicationStyle: null,
      topicsOfInterest: [],
      createdAt: now,
      updatedAt: now,
    };

    this.state.users.set(userId, context);
    return structuredClone(context);
  }

  async recordMessage(
    userId: string,
    userName: string | null,
    at: Date
  ): Promise<UserContext> {
    const existing = this.state.users.get(userId);

    if (!existing) {
      await this.getOrCreate(userId, userName);
      const created = this.state.users.get(userId);
      if (!created) {
        throw new Error(`user context for ${userId} was not created`);
      }
      created.totalMessages = 1;
      created.firstMessageAt = at;
      created.lastMessageAt = at;
      return structuredClone(created);
    }

    existing.userName = userName ?? existing.userName;
    existing.totalMessages += 1;
    existing.firstMessageAt = minDate(existing.firstMessageAt, at);
    existing.lastMessageAt = maxDate(existing.lastMessageAt, at);
    existing.updatedAt = touch(existing.updatedAt, this.clock);
    return structuredClone(existing);
  }

  async updateProfile(
    userId: string,
    update: UserProfileUpdate
  ): Promise<UserContext | null> {
    const context = this.state.users.get(userId);
    if (!context) {
      return null;
    }

    if (
      update.communicationStyle === undefined &&
      update.topicsOfInterest === undefined
    ) {
      return structuredClone(context);
    }

    if (update.communicationStyle !== undefined) {
      context.communicationStyle = update.communicationStyle;
    }
    if (update.topicsOfInterest !== undefined) {
      context.topicsOfInterest = [...update.topicsOfInterest];
    }
    context.updatedAt = touch(context.updatedAt, this.clock);
    return structuredClone(context);
  }
}

class InMemoryConversationThreadRepository
  implements ConversationThreadRepository
{
  constructor(
    private readonly state: MemoryState,
    private readonly clock: Clock
  ) {}

  async get(threadTs: string): Promise<ConversationThread | null> {
    const thread = this.state.threads.get(parseSlackTimestamp(threadTs, "threadTs"));
    return thread ? structuredClone(thread) : null;
  }

  async create(
    threadTs: string,
    channelId: string,
    startedAt: Date
  ): Promise<ConversationThread> {
    const ts = parseSlackTimestamp(threadTs, "threadTs");

    if (this.state.threads.has(ts)) {
      throw new ConflictError("Record already exists", {
        threadTs: ts,
        constraint: "conversation_threads_thread_ts_key",
      });
    }

    const thread: ConversationThread = {
      id: randomUUID(),
      threadTs: ts,
      channelId,
      summary: null,
      participantCount: 0,
      messageCount: 0,
      startedAt,
      lastActivityAt: startedAt,
      createdAt: this.clock(),
    };

    this.state.threads.set(ts, thread);
    return structuredClone(thread);
  }

  async recordActivity(
    threadTs: string,
    channelId: string,
    at: Date
  ): Promise<ConversationThread> {
    const ts = parseSlackTimestamp(threadTs, "threadTs");
    const participants = this.countParticipants(ts);
    const existing = this.state.threads.get(ts);

    if (!existing) {
      await this.create(ts, channelId, at);
      const created = this.state.threads.get(ts);
      if (!created) {
        throw new Error(`thread ${ts} was not created`);
      }
      created.messageCount = 1;
      created.participantCount = participants;
      return structuredClone(created);
    }

    existing.messageCount += 1;
    existing.participantCount = participants;
    existing.startedAt = minDate(existing.startedAt, at);
    existing.lastActivityAt = maxDate(existing.lastActivityAt, at);
    return structuredClone(existing);
  }

  async updateSummary(
    threadTs: string,
    summary: string | null
  ): Promise<ConversationThread | null> {
    const thread = this.state.threads.get(parseSlackTimestamp(threadTs, "threadTs"));
    if (!thread) {
      return null;
    }
    thread.summary = summary;
    return structuredClone(thread);
  }

  private countParticipants(threadTs: string): number {
    const authors = new Set<string>();

    for (const message of this.state.messages.values()) {
      if (
        !message.isDeleted &&
        message.metadata[THREAD_TS_METADATA_KEY] === threadTs
      ) {
        authors.add(message.userId);
      }
    }
    return authors.size;
  }
}

export interface InMemoryMessageStoreOptions {
  clock?: Clock;
}

export class InMemoryMessageStore implements MessageStore {
  readonly driver = "memory" as const;
  readonly messages: MessageRepository;
  readonly users: UserContextRepository;
  readonly threads: ConversationThreadRepository;

  private readonly state: MemoryState = emptyState();

  constructor(options: InMemoryMessageStoreOptions = {}) {
    const clock = options.clock ?? (() => new Date());

    this.messages = new InMemoryMessageRepository(this.state, clock);
    this.users = new InMemoryUserContextRepository(this.state, clock);
    this.threads = new InMemoryConversationThreadRepository(this.state, clock);
  }

  /**
   * Snapshot-and-restore transaction. Not isolated from concurrent callers;
   * this driver assumes a single writer.
   */
  async transaction<T>(work: (session: StoreSession) => Promise<T>): Promise<T> {
    const snapshot = structuredClone(this.state);

    try {
      return await work(this);
    } catch (error: unknown) {
      // Repositories hold this object, so swap its maps rather than the object.
      Object.assign(this.state, snapshot);
      throw error;
    }
  }

  async healthCheck(): Promise<boolean> {
    return true;
  }

  async close(): Promise<void> {
    logger.log("debug", "In-memory store closed", {
      messages: this.state.messages.size,
    });
  }
}
