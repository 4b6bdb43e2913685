/**
 * Vector helpers for pgvector text literals and cosine math.
 *
 * pgvector accepts and returns vectors as `[x1,x2,...]`; the in-memory store
 * uses the cosine functions to reproduce the `<=>` operator exactly.
 */
export function toPgVectorLiteral(vector: number[]): string {
  if (!Array.isArray(vector)) {
    throw new TypeError("toPgVectorLiteral expected an array");
  }

  if (vector.length === 0) {
    throw new Error("toPgVectorLiteral received an empty vector");
  }

  if (!vector.every((v) => Number.isFinite(v))) {
    throw new Error("toPgVectorLiteral received a non-finite value");
  }

  return `[${vector.join(",")}]`;
}

export function fromPgVectorLiteral(literal: string): number[] {
  const trimmed = literal.trim();

  if (!trimmed.startsWith("[") || !trimmed.endsWith("]")) {
    throw new Error("fromPgVectorLiteral expected a bracketed vector literal");
  }

  const body = trimmed.slice(1, -1).trim();
  if (body.length === 0) {
    return [];
  }

  return body.split(",").map((part) => {
    const value = Number(part);
    if (!Number.isFinite(value)) {
      throw new Error(`fromPgVectorLiteral received a non-finite value: ${part}`);
    }
    return value;
  });
}

/**
 * Cosine similarity in [-1, 1]. NaN when either vector has zero magnitude,
 * matching pgvector's cosine distance for zero vectors.
 */
export function cosineSimilarity(a: number[], b: number[]): number {
  if (a.length !== b.length) {
    throw new Error(
      `cosineSimilarity expected equal lengths, got ${a.length} and ${b.length}`
    );
  }

  let dot = 0;
  let normA = 0;
  let normB = 0;

  for (let i = 0; i < a.length; i++) {
    const x = a[i] ?? 0;
    const y = b[i] ?? 0;
    dot += x * y;
    normA += x * x;
    normB += y * y;
  }

  return dot / Math.sqrt(normA * normB);
}

export function cosineDistance(a: number[], b: number[]): number {
  return 1 - cosineSimilarity(a, b);
}
