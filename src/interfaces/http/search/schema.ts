import { z } from "zod";

import { EmbeddingSchema } from "@interfaces/http/messages/schema";

/**
 * Similarity search request: a query vector, or text to embed first.
 * Threshold and limit fall back to the configured defaults.
 */
export const SearchRequestSchema = z
  .object({
    embedding: EmbeddingSchema.optional(),
    query: z.string().min(1).optional(),
    similarityThreshold: z.number().min(0).max(1).optional(),
    limit: z.number().int().min(0).max(100).optional(),
    userId: z.string().min(1).optional(),
    channelId: z.string().min(1).optional(),
  })
  .refine((r) => (r.embedding === undefined) !== (r.query === undefined), {
    message: "Provide exactly one of embedding or query",
  });

export type SearchRequest = z.infer<typeof SearchRequestSchema>;
