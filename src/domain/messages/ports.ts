import type {
  ConversationThread,
  CountMessagesFilter,
  ListMessagesOptions,
  Message,
  NewMessage,
  SimilarMessage,
  SimilaritySearchOptions,
  UserContext,
  UserProfileUpdate,
} from "@domain/messages/types";

/**
 * Storage contract for Slack messages and their embeddings.
 *
 * Implemented by the pgvector adapter (approximate HNSW search) and the
 * in-memory driver (exact brute-force search).
 */
export interface MessageRepository {
  /** Throws ConflictError when the Slack message id already exists. */
  insert(message: NewMessage): Promise<Message>;

  /** All-or-nothing bulk insert. Returns the number of rows written. */
  insertMany(messages: NewMessage[]): Promise<number>;

  findById(id: string): Promise<Message | null>;
  findBySlackId(slackMessageId: string): Promise<Message | null>;

  /** Newest first by Slack timestamp. */
  listByUser(userId: string, options?: ListMessagesOptions): Promise<Message[]>;
  listByChannel(
    channelId: string,
    options?: ListMessagesOptions
  ): Promise<Message[]>;

  count(filter?: CountMessagesFilter): Promise<number>;

  /**
   * Flags the row as deleted. Returns false only when the id is unknown;
   * deleting an already deleted row changes nothing and returns true.
   */
  softDelete(id: string): Promise<boolean>;

  updateEmbedding(id: string, embedding: number[]): Promise<Message | null>;

  searchSimilar(
    queryEmbedding: number[],
    options: SimilaritySearchOptions
  ): Promise<SimilarMessage[]>;
}

export interface UserContextRepository {
  get(userId: string): Promise<UserContext | null>;
  getOrCreate(userId: string, userName?: string | null): Promise<UserContext>;

  /** Creates the profile on first sight, then bumps counters and time bounds. */
  recordMessage(
    userId: string,
    userName: string | null,
    at: Date
  ): Promise<UserContext>;

  updateProfile(
    userId: string,
    update: UserProfileUpdate
  ): Promise<UserContext | null>;
}

export interface ConversationThreadRepository {
  get(threadTs: string): Promise<ConversationThread | null>;
  create(
    threadTs: string,
    channelId: string,
    startedAt: Date
  ): Promise<ConversationThread>;

  /**
   * Creates the thread on first sight, then bumps the message count, widens
   * the activity window and recounts distinct participants.
   */
  recordActivity(
    threadTs: string,
    channelId: string,
    at: Date
  ): Promise<ConversationThread>;

  updateSummary(
    threadTs: string,
    summary: string | null
  ): Promise<ConversationThread | null>;
}

export interface StoreSession {
  messages: MessageRepository;
  users: UserContextRepository;
  threads: ConversationThreadRepository;
}

export interface MessageStore extends StoreSession {
  readonly driver: "postgres" | "memory";

  /**
   * Runs `work` atomically: either every write it makes is kept or none is.
   */
  transaction<T>(work: (session: StoreSession) => Promise<T>): Promise<T>;

  healthCheck(): Promise<boolean>;
  close(): Promise<void>;
}
