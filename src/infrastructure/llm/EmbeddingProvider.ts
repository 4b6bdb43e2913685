/**
 * OpenAI-backed embedding provider.
 *
 * Requests vectors truncated to the store's column width through the
 * `dimensions` parameter and rejects any response of another length, so a
 * model change can never write mismatched vectors.
 */
import type { AppConfig } from "@config/index";
import type { EmbeddingProvider } from "@domain/llm/ports";
import { createOpenAIClient, withRetry } from "@infrastructure/llm/OpenAIAdapter";
import { describeError, logEvent } from "@infrastructure/logging/Logger";
import {
  AppError,
  InfrastructureError,
  ValidationError,
} from "@typesLocal/errors";

export interface EmbeddingsApi {
  create(body: {
    model: string;
    input: string | string[];
    dimensions?: number;
  }): Promise<{ data: { embedding: number[]; index: number }[] }>;
}

export interface OpenAIEmbeddingOptions {
  model: string;
  dimension: number;
  backoffDelays?: readonly number[];
}

export class OpenAIEmbeddingProvider implements EmbeddingProvider {
  readonly dimension: number;

  constructor(
    private readonly api: EmbeddingsApi,
    private readonly options: OpenAIEmbeddingOptions
  ) {
    this.dimension = options.dimension;
  }

  async embed(text: string): Promise<number[]> {
    const normalized = text.trim();

    if (!normalized) {
      throw new ValidationError("Cannot embed empty text");
    }

    const [embedding] = await this.request([normalized], "embeddings.create.single");
    if (!embedding) {
      throw new InfrastructureError("Embedding API returned no data", 502);
    }
    return embedding;
  }

  async embedBatch(texts: string[]): Promise<number[][]> {
    const normalized = texts.map((t) => t.trim());

    if (normalized.some((t) => t.length === 0)) {
      throw new ValidationError("Cannot embed empty text", {
        emptyIndexes: normalized.flatMap((t, i) => (t.length === 0 ? [i] : [])),
      });
    }
    if (normalized.length === 0) {
      return [];
    }

    return this.request(normalized, "embeddings.create.batch");
  }

  private async request(inputs: string[], operation: string): Promise<number[][]> {
    const startedAt = Date.now();
    const { model, dimension } = this.options;

    try {
      const response = await withRetry(
        () =>
          this.api.create({
            model,
            input: inputs.length === 1 ? (inputs[0] ?? "") : inputs,
            dimensions: dimension,
          }),
        operation,
        this.options.backoffDelays
      );

      const ordered = [...response.data].sort((a, b) => a.index - b.index);

      if (ordered.length !== inputs.length) {
        throw new InfrastructureError(
          `Embedding API returned ${ordered.length} vectors for ${inputs.length} inputs`,
          502
        );
      }

      const vectors = ordered.map((item) => item.embedding);
      const wrong = vectors.find((v) => v.length !== dimension);
      if (wrong) {
        throw new InfrastructureError(
          `Embedding API returned ${wrong.length} dimensions, expected ${dimension}`,
          502,
          { model }
        );
      }

      logEvent("EMBEDDING_SUCCESS", {
        model,
        operation,
        durationMs: Date.now() - startedAt,
        batchSize: inputs.length,
        vectorLength: dimension,
      });

      return vectors;
    } catch (error: unknown) {
      logEvent("EMBEDDING_FAILURE", {
        model,
        operation,
        durationMs: Date.now() - startedAt,
        batchSize: inputs.length,
        ...describeError(error),
      });

      if (error instanceof AppError) {
        throw error;
      }
      throw new InfrastructureError("Embedding request failed", 502, {
        operation,
        cause: describeError(error).message,
      });
    }
  }
}

/**
 * Provider for the configured OpenAI account, or null when no API key is set.
 */
export function createEmbeddingProvider(
  cfg: AppConfig
): EmbeddingProvider | null {
  if (!cfg.openai.key) {
    return null;
  }

  const client = createOpenAIClient(cfg.openai);
  return new OpenAIEmbeddingProvider(client.embeddings, {
    model: cfg.openai.embeddingModel,
    dimension: cfg.embedding.dimension,
  });
}
