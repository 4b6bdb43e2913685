/**
 * Embedding generation port.
 *
 * Producers must return vectors of exactly `dimension` numbers, one per input,
 * in input order.
 */
export interface EmbeddingProvider {
  readonly dimension: number;

  embed(text: string): Promise<number[]>;

  embedBatch(texts: string[]): Promise<number[][]>;
}
