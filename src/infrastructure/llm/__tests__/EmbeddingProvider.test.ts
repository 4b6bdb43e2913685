import { describe, expect, it, vi } from "vitest";

import { unitVector, vector } from "../../../__tests__/helpers";
import {
  OpenAIEmbeddingProvider,
  type EmbeddingsApi,
} from "@infrastructure/llm/EmbeddingProvider";
import { InfrastructureError, ValidationError } from "@typesLocal/errors";

type CreateBody = Parameters<EmbeddingsApi["create"]>[0];
type CreateResult = Awaited<ReturnType<EmbeddingsApi["create"]>>;

const OPTIONS = { model: "test-embedding-model", dimension: 384, backoffDelays: [0] };

function fakeApi(reply: (body: CreateBody) => CreateResult) {
  return { create: vi.fn(async (body: CreateBody) => reply(body)) };
}

describe("OpenAIEmbeddingProvider", () => {
  it("should request the configured model and width for trimmed text", async () => {
    const api = fakeApi(() => ({ data: [{ index: 0, embedding: unitVector(0) }] }));
    const provider = new OpenAIEmbeddingProvider(api, OPTIONS);

    const embedding = await provider.embed("  ship it  ");

    expect(embedding).toEqual(unitVector(0));
    expect(api.create).toHaveBeenCalledWith({
      model: "test-embedding-model",
      input: "ship it",
      dimensions: 384,
    });
  });

  it("should return batch vectors in input order", async () => {
    const api = fakeApi(() => ({
      data: [
        { index: 1, embedding: unitVector(1) },
        { index: 0, embedding: unitVector(0) },
      ],
    }));
    const provider = new OpenAIEmbeddingProvider(api, OPTIONS);

    expect(await provider.embedBatch(["first", "second"])).toEqual([
      unitVector(0),
      unitVector(1),
    ]);
    expect(api.create).toHaveBeenCalledWith(
      expect.objectContaining({ input: ["first", "second"] })
    );
  });

  it("should reject empty text without calling the API", async () => {
    const api = fakeApi(() => ({ data: [] }));
    const provider = new OpenAIEmbeddingProvider(api, OPTIONS);

    await expect(provider.embed("   ")).rejects.toBeInstanceOf(ValidationError);
    await expect(provider.embedBatch(["ok", ""])).rejects.toMatchObject({
      metadata: { emptyIndexes: [1] },
    });
    expect(await provider.embedBatch([])).toEqual([]);
    expect(api.create).not.toHaveBeenCalled();
  });

  it("should reject vectors of another width", async () => {
    const api = fakeApi(() => ({ data: [{ index: 0, embedding: [0.1, 0.2, 0.3] }] }));
    const provider = new OpenAIEmbeddingProvider(api, OPTIONS);

    await expect(provider.embed("hello")).rejects.toMatchObject({
      message: "Embedding API returned 3 dimensions, expected 384",
      statusCode: 502,
    });
  });

  it("should reject a response with a missing vector", async () => {
    const api = fakeApi(() => ({ data: [{ index: 0, embedding: vector(1) }] }));
    const provider = new OpenAIEmbeddingProvider(api, OPTIONS);

    await expect(provider.embedBatch(["a", "b"])).rejects.toThrow(
      "Embedding API returned 1 vectors for 2 inputs"
    );
  });

  it("should wrap API failures as a 502", async () => {
    const api = {
      create: vi.fn(async (): Promise<CreateResult> => {
        throw new Error("invalid api key");
      }),
    };
    const provider = new OpenAIEmbeddingProvider(api, OPTIONS);

    const error: unknown = await provider.embed("hello").catch((e: unknown) => e);

    expect(error).toBeInstanceOf(InfrastructureError);
    expect(error).toMatchObject({
      message: "Embedding request failed",
      statusCode: 502,
      metadata: { cause: "invalid api key" },
    });
  });
});
