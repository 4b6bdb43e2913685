/**
 * Row shapes returned by the SQL in this directory, parsed with zod so the
 * repositories never trust `any` columns from node-postgres.
 */
import { z } from "zod";

import {
  DEFAULT_MESSAGE_TYPE,
  type ConversationThread,
  type Message,
  type SimilarMessage,
  type UserContext,
} from "@domain/messages/types";
import { InfrastructureError } from "@typesLocal/errors";
import { fromPgVectorLiteral } from "@utils/vector";

export const MESSAGE_COLUMNS = `
  id,
  slack_message_id,
  channel_id,
  channel_name,
  user_id,
  user_name,
  message_text,
  message_type,
  embedding::text AS embedding,
  slack_timestamp::text AS slack_timestamp,
  metadata,
  is_deleted,
  created_at,
  updated_at`;

export const USER_CONTEXT_COLUMNS = `
  id,
  user_id,
  user_name,
  total_messages,
  first_message_at,
  last_message_at,
  communication_style,
  topics_of_interest,
  created_at,
  updated_at`;

export const THREAD_COLUMNS = `
  id,
  thread_ts::text AS thread_ts,
  channel_id,
  summary,
  participant_count,
  message_count,
  started_at,
  last_activity_at,
  created_at`;

const MessageRowSchema = z.object({
  id: z.string(),
  slack_message_id: z.string(),
  channel_id: z.string(),
  channel_name: z.string().nullable(),
  user_id: z.string(),
  user_name: z.string().nullable(),
  message_text: z.string(),
  message_type: z.string().nullable(),
  embedding: z.string().nullable(),
  slack_timestamp: z.string(),
  metadata: z.record(z.unknown()).nullable(),
  is_deleted: z.boolean().nullable(),
  created_at: z.date(),
  updated_at: z.date(),
});

const SimilarMessageRowSchema = z.object({
  message_id: z.string(),
  message_text: z.string(),
  user_name: z.string().nullable(),
  channel_name: z.string().nullable(),
  similarity: z.coerce.number(),
  slack_timestamp: z.string(),
});

const UserContextRowSchema = z.object({
  id: z.string(),
  user_id: z.string(),
  user_name: z.string().nullable(),
  total_messages: z.number().nullable(),
  first_message_at: z.date().nullable(),
  last_message_at: z.date().nullable(),
  communication_style: z.string().nullable(),
  topics_of_interest: z.array(z.string()).nullable(),
  created_at: z.date(),
  updated_at: z.date(),
});

const ThreadRowSchema = z.object({
  id: z.string(),
  thread_ts: z.string(),
  channel_id: z.string(),
  summary: z.string().nullable(),
  participant_count: z.number().nullable(),
  message_count: z.number().nullable(),
  started_at: z.date().nullable(),
  last_activity_at: z.date().nullable(),
  created_at: z.date(),
});

function parseRow<T>(
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  row: unknown,
  table: string
): T {
  const parsed = schema.safeParse(row);

  if (!parsed.success) {
    throw new InfrastructureError(`Unexpected ${table} row shape`, 500, {
      issues: parsed.error.issues,
    });
  }
  return parsed.data;
}

export function toMessage(row: unknown): Message {
  const r = parseRow(MessageRowSchema, row, "slack_messages");

  return {
    id: r.id,
    slackMessageId: r.slack_message_id,
    channelId: r.channel_id,
    channelName: r.channel_name,
    userId: r.user_id,
    userName: r.user_name,
    messageText: r.message_text,
    messageType: r.message_type ?? DEFAULT_MESSAGE_TYPE,
    embedding: r.embedding === null ? null : fromPgVectorLiteral(r.embedding),
    slackTimestamp: r.slack_timestamp,
    metadata: r.metadata ?? {},
    isDeleted: r.is_deleted ?? false,
    createdAt: r.created_at,
    updatedAt: r.updated_at,
  };
}

export function toSimilarMessage(row: unknown): SimilarMessage {
  const r = parseRow(SimilarMessageRowSchema, row, "search_similar_messages");

  return {
    messageId: r.message_id,
    messageText: r.message_text,
    userName: r.user_name,
    channelName: r.channel_name,
    similarity: r.similarity,
    slackTimestamp: r.slack_timestamp,
  };
}

export function toUserContext(row: unknown): UserContext {
  const r = parseRow(UserContextRowSchema, row, "user_contexts");

  return {
    id: r.id,
    userId: r.user_id,
    userName: r.user_name,
    totalMessages: r.total_messages ?? 0,
    firstMessageAt: r.first_message_at,
    lastMessageAt: r.last_message_at,
    communicationStyle: r.communication_style,
    topicsOfInterest: r.topics_of_interest ?? [],
    createdAt: r.created_at,
    updatedAt: r.updated_at,
  };
}

export function toConversationThread(row: unknown): ConversationThread {
  const r = parseRow(ThreadRowSchema, row, "conversation_threads");

  return {
    id: r.id,
    threadTs: r.thread_ts,
    channelId: r.channel_id,
    summary: r.summary,
    participantCount: r.participant_count ?? 0,
    messageCount: r.message_count ?? 0,
    startedAt: r.started_at,
    lastActivityAt: r.last_activity_at,
    createdAt: r.created_at,
  };
}
