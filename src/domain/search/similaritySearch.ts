/**
 * Similarity search over stored Slack messages.
 *
 * Resolves defaults, validates the request and delegates to the repository:
 * - similarity is `1 - cosine distance`
 * - soft-deleted rows and rows without an embedding never match
 * - rows below the threshold are dropped, best match first, at most `limit`
 *
 * A request that matches nothing returns an empty array, not an error.
 */
import type { MessageRepository } from "@domain/messages/ports";
import type {
  SimilarMessage,
  SimilaritySearchOptions,
} from "@domain/messages/types";
import { assertEmbedding } from "@domain/messages/validation";
import { logEvent } from "@infrastructure/logging/Logger";
import { ValidationError } from "@typesLocal/errors";

export interface SimilaritySearchRequest {
  embedding: number[];
  similarityThreshold?: number | undefined;
  limit?: number | undefined;
  userId?: string | undefined;
  channelId?: string | undefined;
}

export interface SimilaritySearchDefaults {
  similarityThreshold: number;
  limit: number;
}

export function resolveSearchOptions(
  request: Omit<SimilaritySearchRequest, "embedding">,
  defaults: SimilaritySearchDefaults
): SimilaritySearchOptions {
  const similarityThreshold =
    request.similarityThreshold ?? defaults.similarityThreshold;
  const limit = request.limit ?? defaults.limit;

  if (
    !Number.isFinite(similarityThreshold) ||
    similarityThreshold < 0 ||
    similarityThreshold > 1
  ) {
    throw new ValidationError("similarityThreshold must be between 0 and 1", {
      similarityThreshold,
    });
  }

  if (!Number.isInteger(limit) || limit < 0) {
    throw new ValidationError("limit must be a non-negative integer", {
      limit,
    });
  }

  return {
    similarityThreshold,
    limit,
    userId: request.userId,
    channelId: request.channelId,
  };
}

export async function searchSimilarMessages(
  repository: MessageRepository,
  request: SimilaritySearchRequest,
  defaults: SimilaritySearchDefaults
): Promise<SimilarMessage[]> {
  assertEmbedding(request.embedding, "queryEmbedding");
  const options = resolveSearchOptions(request, defaults);

  const results = await repository.searchSimilar(request.embedding, options);

  logEvent("SIMILARITY_SEARCH", {
    similarityThreshold: options.similarityThreshold,
    limit: options.limit,
    userId: options.userId,
    channelId: options.channelId,
    returned: results.length,
    topSimilarity: results[0]?.similarity,
  });

  return results;
}
