import { EMBEDDING_DIMENSION } from "@config/index";
import {
  DEFAULT_MESSAGE_TYPE,
  type MessageMetadata,
  type NewMessage,
} from "@domain/messages/types";
import { ValidationError } from "@typesLocal/errors";
import {
  isSlackTimestamp,
  normalizeSlackTimestamp,
} from "@utils/slackTimestamp";

/**
 * Rejects anything but exactly EMBEDDING_DIMENSION finite numbers with a
 * nonzero magnitude. Vectors are never truncated or padded.
 */
export function assertEmbedding(
  embedding: unknown,
  field = "embedding"
): asserts embedding is number[] {
  if (!Array.isArray(embedding)) {
    throw new ValidationError(`${field} must be an array of numbers`, {
      field,
    });
  }

  if (embedding.length !== EMBEDDING_DIMENSION) {
    throw new ValidationError(
      `${field} must have exactly ${EMBEDDING_DIMENSION} dimensions, got ${embedding.length}`,
      { field, expected: EMBEDDING_DIMENSION, received: embedding.length }
    );
  }

  if (!embedding.every((v) => typeof v === "number" && Number.isFinite(v))) {
    throw new ValidationError(`${field} must contain only finite numbers`, {
      field,
    });
  }

  // Cosine similarity is undefined for a zero vector.
  if (embedding.every((v) => v === 0)) {
    throw new ValidationError(`${field} must not be a zero vector`, { field });
  }
}

export function parseSlackTimestamp(value: string, field: string): string {
  if (!isSlackTimestamp(value)) {
    throw new ValidationError(
      `${field} must be a Slack timestamp like 1700000000.000100`,
      { field, value }
    );
  }
  return normalizeSlackTimestamp(value);
}

function requireText(value: unknown, field: string, maxLength?: number): string {
  if (typeof value !== "string" || value.length === 0) {
    throw new ValidationError(`${field} is required`, { field });
  }
  if (maxLength !== undefined && value.length > maxLength) {
    throw new ValidationError(`${field} exceeds ${maxLength} characters`, {
      field,
      maxLength,
    });
  }
  return value;
}

function optionalText(
  value: string | null | undefined,
  field: string,
  maxLength: number
): string | null {
  if (value === undefined || value === null) {
    return null;
  }
  if (value.length > maxLength) {
    throw new ValidationError(`${field} exceeds ${maxLength} characters`, {
      field,
      maxLength,
    });
  }
  return value;
}

export interface ValidatedMessage {
  slackMessageId: string;
  channelId: string;
  channelName: string | null;
  userId: string;
  userName: string | null;
  messageText: string;
  messageType: string;
  embedding: number[] | null;
  slackTimestamp: string;
  metadata: MessageMetadata;
}

/**
 * Checks a new message against the column constraints of `slack_messages`
 * and fills in column defaults.
 */
export function validateNewMessage(input: NewMessage): ValidatedMessage {
  const embedding = input.embedding ?? null;
  if (embedding !== null) {
    assertEmbedding(embedding);
  }

  const messageText = input.messageText;
  if (typeof messageText !== "string") {
    throw new ValidationError("messageText is required", {
      field: "messageText",
    });
  }

  return {
    slackMessageId: requireText(input.slackMessageId, "slackMessageId", 100),
    channelId: requireText(input.channelId, "channelId", 100),
    channelName: optionalText(input.channelName, "channelName", 255),
    userId: requireText(input.userId, "userId", 100),
    userName: optionalText(input.userName, "userName", 255),
    messageText,
    messageType:
      optionalText(input.messageType, "messageType", 50) ??
      DEFAULT_MESSAGE_TYPE,
    embedding,
    slackTimestamp: parseSlackTimestamp(
      requireText(input.slackTimestamp, "slackTimestamp"),
      "slackTimestamp"
    ),
    metadata: input.metadata ?? {},
  };
}

const UUID_PATTERN =
  /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/i;

export function isUuid(value: string): boolean {
  return UUID_PATTERN.test(value);
}
