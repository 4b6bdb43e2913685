/**
 * Retrieval entry points: search by vector or by free text.
 */
import type { AppConfig } from "@config/index";
import type { EmbeddingProvider } from "@domain/llm/ports";
import type { MessageRepository } from "@domain/messages/ports";
import type { SimilarMessage } from "@domain/messages/types";
import {
  searchSimilarMessages,
  type SimilaritySearchDefaults,
  type SimilaritySearchRequest,
} from "@domain/search/similaritySearch";
import { InfrastructureError, ValidationError } from "@typesLocal/errors";

export type TextSearchRequest = Omit<SimilaritySearchRequest, "embedding"> & {
  query: string;
};

export interface TextSearchResponse {
  query: string;
  results: SimilarMessage[];
}

export function searchDefaults(cfg: Pick<AppConfig, "search">): SimilaritySearchDefaults {
  return {
    similarityThreshold: cfg.search.minSimilarity,
    limit: cfg.search.topK,
  };
}

export class SearchUseCase {
  constructor(
    private readonly messages: MessageRepository,
    private readonly embedder: EmbeddingProvider | null,
    private readonly defaults: SimilaritySearchDefaults
  ) {}

  searchByEmbedding(request: SimilaritySearchRequest): Promise<SimilarMessage[]> {
    return searchSimilarMessages(this.messages, request, this.defaults);
  }

  async searchByText(request: TextSearchRequest): Promise<TextSearchResponse> {
    const { query, ...options } = request;
    const normalized = query.trim();

    if (!normalized) {
      throw new ValidationError("query is required");
    }
    if (!this.embedder) {
      throw new InfrastructureError("Embedding provider is not configured", 503, {
        hint: "set OPENAI_API_KEY or search with an embedding",
      });
    }

    const embedding = await this.embedder.embed(normalized);
    const results = await this.searchByEmbedding({ ...options, embedding });

    return { query: normalized, results };
  }
}
