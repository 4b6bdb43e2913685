import { EMBEDDING_DIMENSION } from "@config/index";
import type { EmbeddingProvider } from "@domain/llm/ports";
import type { NewMessage } from "@domain/messages/types";

/** A full-width vector whose first components are `leading`, rest zero. */
export function vector(...leading: number[]): number[] {
  return [
    ...leading,
    ...Array.from({ length: EMBEDDING_DIMENSION - leading.length }, () => 0),
  ];
}

export function unitVector(index: number): number[] {
  return Array.from({ length: EMBEDDING_DIMENSION }, (_, i) =>
    i === index ? 1 : 0
  );
}

export function newMessage(overrides: Partial<NewMessage> = {}): NewMessage {
  return {
    slackMessageId: "M1",
    channelId: "C1",
    channelName: "general",
    userId: "U1",
    userName: "alice",
    messageText: "hello team",
    slackTimestamp: "1700000000.000100",
    ...overrides,
  };
}

/** Clock that advances by `stepMs` on every reading. */
export function steppingClock(
  startIso = "2024-01-01T00:00:00.000Z",
  stepMs = 1000
): () => Date {
  let now = Date.parse(startIso);
  return () => {
    const reading = new Date(now);
    now += stepMs;
    return reading;
  };
}

/** Embeds every text as the same vector and records what it was asked. */
export class FakeEmbeddingProvider implements EmbeddingProvider {
  readonly dimension = EMBEDDING_DIMENSION;
  readonly calls: string[] = [];

  constructor(private readonly output: number[] = unitVector(0)) {}

  async embed(text: string): Promise<number[]> {
    this.calls.push(text);
    return [...this.output];
  }

  async embedBatch(texts: string[]): Promise<number[][]> {
    this.calls.push(...texts);
    return texts.map(() => [...this.output]);
  }
}
