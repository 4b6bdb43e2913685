import { z } from "zod";

/**
 * Request DTOs for the message endpoints.
 *
 * Field lengths mirror the `slack_messages` columns. Embedding width and the
 * Slack timestamp format are checked by the domain, which owns those rules.
 */

/** Slack sends `ts` as a string; numbers are accepted and kept to 6 places. */
export const SlackTimestampSchema = z
  .union([z.string().min(1), z.number().nonnegative()])
  .transform((value) => (typeof value === "number" ? value.toFixed(6) : value));

export const EmbeddingSchema = z.array(z.number());

export const CreateMessageSchema = z.object({
  slackMessageId: z.string().min(1).max(100),
  channelId: z.string().min(1).max(100),
  channelName: z.string().max(255).nullish(),
  userId: z.string().min(1).max(100),
  userName: z.string().max(255).nullish(),
  messageText: z.string(),
  messageType: z.string().min(1).max(50).optional(),
  embedding: EmbeddingSchema.nullish(),
  slackTimestamp: SlackTimestampSchema,
  threadTs: SlackTimestampSchema.optional(),
  metadata: z.record(z.unknown()).optional(),
  embed: z.boolean().optional(),
});

export type CreateMessageRequest = z.infer<typeof CreateMessageSchema>;

export const BulkCreateMessagesSchema = z.object({
  messages: z.array(CreateMessageSchema).min(1).max(500),
});

export const MessageIdParamsSchema = z.object({
  id: z.string().min(1),
});

const BooleanQuerySchema = z
  .enum(["true", "false"])
  .transform((value) => value === "true");

export const ListMessagesQuerySchema = z
  .object({
    userId: z.string().min(1).optional(),
    channelId: z.string().min(1).optional(),
    limit: z.coerce.number().int().min(1).max(1000).optional(),
    includeDeleted: BooleanQuerySchema.optional(),
  })
  .refine((q) => (q.userId === undefined) !== (q.channelId === undefined), {
    message: "Exactly one of userId or channelId is required",
  });

export const CountMessagesQuerySchema = z.object({
  userId: z.string().min(1).optional(),
  channelId: z.string().min(1).optional(),
  includeDeleted: BooleanQuerySchema.optional(),
});

export const AttachEmbeddingSchema = z.union([
  z.object({ embedding: EmbeddingSchema }).strict(),
  z.object({ text: z.string().min(1) }).strict(),
]);
