/**
 * HTTP handlers for /api/messages.
 *
 * Each handler validates its input with the zod DTOs, calls one use case and
 * hands failures to the error middleware.
 */
import type { AppServices } from "@app/services";
import type { IngestMessageInput } from "@app/ingest/IngestUseCase";
import { toMessageDto } from "@interfaces/http/dto";
import {
  AttachEmbeddingSchema,
  BulkCreateMessagesSchema,
  CountMessagesQuerySchema,
  CreateMessageSchema,
  ListMessagesQuerySchema,
  MessageIdParamsSchema,
  type CreateMessageRequest,
} from "@interfaces/http/messages/schema";
import { parseRequest } from "@interfaces/http/validation";
import type { NextFunction, Request, Response } from "express";

type Handler = (req: Request, res: Response, next: NextFunction) => Promise<void>;

export interface MessageController {
  create: Handler;
  createBulk: Handler;
  get: Handler;
  list: Handler;
  count: Handler;
  remove: Handler;
  attachEmbedding: Handler;
}

function toIngestInput(body: CreateMessageRequest): IngestMessageInput {
  return {
    slackMessageId: body.slackMessageId,
    channelId: body.channelId,
    channelName: body.channelName ?? null,
    userId: body.userId,
    userName: body.userName ?? null,
    messageText: body.messageText,
    messageType: body.messageType,
    embedding: body.embedding ?? null,
    slackTimestamp: body.slackTimestamp,
    metadata: body.metadata,
    threadTs: body.threadTs,
    embed: body.embed,
  };
}

export function createMessageController(services: AppServices): MessageController {
  return {
    async create(req, res, next) {
      try {
        const body = parseRequest(CreateMessageSchema, req.body);
        const outcome = await services.ingest.ingestMessage(toIngestInput(body));

        if (outcome.status === "duplicate") {
          res.status(200).json(outcome);
          return;
        }
        res.status(201).json({
          status: outcome.status,
          message: toMessageDto(outcome.message),
        });
      } catch (err: unknown) {
        next(err);
      }
    },

    async createBulk(req, res, next) {
      try {
        const { messages } = parseRequest(BulkCreateMessagesSchema, req.body);
        const result = await services.ingest.ingestBatch(messages.map(toIngestInput));

        res.json({ created: result.created, duplicates: result.duplicates });
      } catch (err: unknown) {
        next(err);
      }
    },

    async get(req, res, next) {
      try {
        const { id } = parseRequest(MessageIdParamsSchema, req.params, "params");
        const message = await services.messages.getMessage(id);

        res.json({ message: toMessageDto(message) });
      } catch (err: unknown) {
        next(err);
      }
    },

    async list(req, res, next) {
      try {
        const query = parseRequest(ListMessagesQuerySchema, req.query, "query");
        const messages = await services.messages.listMessages(query);

        res.json({ messages: messages.map(toMessageDto) });
      } catch (err: unknown) {
        next(err);
      }
    },

    async count(req, res, next) {
      try {
        const query = parseRequest(CountMessagesQuerySchema, req.query, "query");
        const count = await services.messages.countMessages(query);

        res.json({ count });
      } catch (err: unknown) {
        next(err);
      }
    },

    async remove(req, res, next) {
      try {
        const { id } = parseRequest(MessageIdParamsSchema, req.params, "params");
        await services.messages.softDeleteMessage(id);

        res.status(204).end();
      } catch (err: unknown) {
        next(err);
      }
    },

    async attachEmbedding(req, res, next) {
      try {
        const { id } = parseRequest(MessageIdParamsSchema, req.params, "params");
        const source = parseRequest(AttachEmbeddingSchema, req.body);
        const message = await services.messages.attachEmbedding(id, source);

        res.json({ message: toMessageDto(message) });
      } catch (err: unknown) {
        next(err);
      }
    },
  };
}
