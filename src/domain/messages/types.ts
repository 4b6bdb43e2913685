/**
 * Core records of the message store.
 *
 * Authors, channels and threads are related by shared identifier values only;
 * there are no foreign keys between the three tables.
 */

/** Open JSON document attached to a message. No schema is enforced on it. */
export type MessageMetadata = Record<string, unknown>;

export interface Message {
  id: string;
  slackMessageId: string;
  channelId: string;
  channelName: string | null;
  userId: string;
  userName: string | null;
  messageText: string;
  messageType: string;
  embedding: number[] | null;
  /** Slack `ts`, normalized to six fractional digits. */
  slackTimestamp: string;
  metadata: MessageMetadata;
  isDeleted: boolean;
  createdAt: Date;
  updatedAt: Date;
}

export interface NewMessage {
  slackMessageId: string;
  channelId: string;
  channelName?: string | null;
  userId: string;
  userName?: string | null;
  messageText: string;
  messageType?: string;
  embedding?: number[] | null;
  slackTimestamp: string;
  metadata?: MessageMetadata;
}

export interface SimilarMessage {
  messageId: string;
  messageText: string;
  userName: string | null;
  channelName: string | null;
  similarity: number;
  slackTimestamp: string;
}

export interface SimilaritySearchOptions {
  similarityThreshold: number;
  limit: number;
  userId?: string | undefined;
  channelId?: string | undefined;
}

export interface ListMessagesOptions {
  limit?: number;
  includeDeleted?: boolean;
}

export interface CountMessagesFilter {
  userId?: string | undefined;
  channelId?: string | undefined;
  includeDeleted?: boolean | undefined;
}

export interface UserContext {
  id: string;
  userId: string;
  userName: string | null;
  totalMessages: number;
  firstMessageAt: Date | null;
  lastMessageAt: Date | null;
  communicationStyle: string | null;
  topicsOfInterest: string[];
  createdAt: Date;
  updatedAt: Date;
}

export interface UserProfileUpdate {
  communicationStyle?: string | null | undefined;
  topicsOfInterest?: string[] | undefined;
}

export interface ConversationThread {
  id: string;
  threadTs: string;
  channelId: string;
  summary: string | null;
  participantCount: number;
  messageCount: number;
  startedAt: Date | null;
  lastActivityAt: Date | null;
  createdAt: Date;
}

/** Metadata key under which a message records the thread it belongs to. */
export const THREAD_TS_METADATA_KEY = "thread_ts";

export const DEFAULT_MESSAGE_TYPE = "message";
export const DEFAULT_LIST_LIMIT = 100;
