import type { Server } from "http";
import type { AddressInfo } from "net";

import { afterAll, beforeAll, describe, expect, it } from "vitest";
import { z } from "zod";

import {
  FakeEmbeddingProvider,
  unitVector,
  vector,
} from "../../../__tests__/helpers";
import { createServices } from "@app/services";
import { InMemoryMessageStore } from "@infrastructure/memory/InMemoryMessageStore";
import { createHttpApp } from "@interfaces/http/createHttpApp";

const CreatedSchema = z.object({
  status: z.literal("created"),
  message: z.object({ id: z.string() }),
});

function payload(overrides: Record<string, unknown> = {}): Record<string, unknown> {
  return {
    slackMessageId: "M1",
    channelId: "C1",
    channelName: "general",
    userId: "U1",
    userName: "alice",
    messageText: "deploy is done",
    slackTimestamp: "1700000000.0001",
    embedding: unitVector(0),
    ...overrides,
  };
}

describe("HTTP API", () => {
  let server: Server;
  let baseUrl: string;

  beforeAll(async () => {
    const services = createServices(
      new InMemoryMessageStore(),
      new FakeEmbeddingProvider(unitVector(0)),
      { search: { topK: 5, minSimilarity: 0.7 } }
    );
    const app = createHttpApp(services);

    server = await new Promise<Server>((resolve) => {
      const listening = app.listen(0, "127.0.0.1", () => resolve(listening));
    });
    const address: AddressInfo | string | null = server.address();
    if (!address || typeof address === "string") {
      throw new Error("server is not listening on a TCP port");
    }
    baseUrl = `http://127.0.0.1:${address.port}`;
  });

  afterAll(async () => {
    await new Promise<void>((resolve, reject) =>
      server.close((err) => (err ? reject(err) : resolve()))
    );
  });

  function send(method: string, path: string, body?: unknown): Promise<Response> {
    return fetch(`${baseUrl}${path}`, {
      method,
      headers: { "content-type": "application/json" },
      body: body === undefined ? undefined : JSON.stringify(body),
    });
  }

  async function createMessage(overrides: Record<string, unknown> = {}): Promise<string> {
    const res = await send("POST", "/api/messages", payload(overrides));
    expect(res.status).toBe(201);
    return CreatedSchema.parse(await res.json()).message.id;
  }

  it("should report health", async () => {
    const res = await send("GET", "/api/health");

    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({ status: "ok", database: true, driver: "memory" });
  });

  it("should ingest once and report the replay as a duplicate", async () => {
    const res = await send("POST", "/api/messages", payload({ slackMessageId: "dup" }));
    const body: unknown = await res.json();

    expect(res.status).toBe(201);
    expect(body).toMatchObject({
      status: "created",
      message: {
        slackMessageId: "dup",
        slackTimestamp: "1700000000.000100",
        hasEmbedding: true,
        isDeleted: false,
      },
    });
    expect(body).not.toHaveProperty("message.embedding");

    const replay = await send("POST", "/api/messages", payload({ slackMessageId: "dup" }));
    expect(replay.status).toBe(200);
    expect(await replay.json()).toEqual({ status: "duplicate", slackMessageId: "dup" });
  });

  it("should reject an embedding of the wrong width with 400", async () => {
    const res = await send(
      "POST",
      "/api/messages",
      payload({ slackMessageId: "short", embedding: [1, 2, 3] })
    );

    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({
      error: {
        message: "embedding must have exactly 384 dimensions, got 3",
        code: "ValidationError",
        details: { field: "embedding", expected: 384, received: 3 },
      },
    });
  });

  it("should reject a body missing required fields", async () => {
    const res = await send("POST", "/api/messages", { messageText: "no ids" });
    const body: unknown = await res.json();

    expect(res.status).toBe(400);
    expect(body).toMatchObject({
      error: { message: "Invalid request body", code: "ValidationError" },
    });
  });

  it("should search by vector and stop matching after a soft delete", async () => {
    const id = await createMessage({ slackMessageId: "S1", embedding: unitVector(9) });

    const before = await send("POST", "/api/search", {
      embedding: unitVector(9),
      similarityThreshold: 0.9,
    });
    expect(await before.json()).toEqual({
      results: [
        {
          messageId: id,
          messageText: "deploy is done",
          userName: "alice",
          channelName: "general",
          similarity: 1,
          slackTimestamp: "1700000000.000100",
        },
      ],
    });

    const deleted = await send("DELETE", `/api/messages/${id}`);
    expect(deleted.status).toBe(204);
    expect((await send("DELETE", `/api/messages/${id}`)).status).toBe(204);

    const after = await send("POST", "/api/search", {
      embedding: unitVector(9),
      similarityThreshold: 0.9,
    });
    expect(await after.json()).toEqual({ results: [] });

    const fetched = await send("GET", `/api/messages/${id}`);
    expect(await fetched.json()).toMatchObject({ message: { id, isDeleted: true } });
  });

  it("should search by text through the embedding provider", async () => {
    await createMessage({ slackMessageId: "T1", embedding: vector(1) });

    const res = await send("POST", "/api/search", { query: " deploy ", limit: 1 });
    const body: unknown = await res.json();

    expect(res.status).toBe(200);
    expect(body).toMatchObject({ query: "deploy" });
    expect(z.object({ results: z.array(z.unknown()) }).parse(body).results).toHaveLength(1);
  });

  it("should require exactly one of embedding or query", async () => {
    const res = await send("POST", "/api/search", {});

    expect(res.status).toBe(400);
    expect(await res.json()).toMatchObject({
      error: {
        message: "Invalid request body",
        details: { issues: [{ path: "", message: "Provide exactly one of embedding or query" }] },
      },
    });
  });

  it("should return 404 for unknown messages and routes", async () => {
    const missing = await send("DELETE", "/api/messages/0b6f6c7e-2a35-4c8e-9c39-4f7d8f0e2a11");
    expect(missing.status).toBe(404);
    expect(await missing.json()).toMatchObject({ error: { code: "NotFoundError" } });

    const route = await send("GET", "/api/nowhere");
    expect(route.status).toBe(404);
    expect(await route.json()).toMatchObject({ error: { message: "Route not found" } });
  });

  it("should attach an embedding computed from text", async () => {
    const id = await createMessage({ slackMessageId: "E1", embedding: null });

    const res = await send("PUT", `/api/messages/${id}/embedding`, { text: "deploy" });

    expect(res.status).toBe(200);
    expect(await res.json()).toMatchObject({ message: { id, hasEmbedding: true } });
  });

  it("should list and count an author's messages", async () => {
    await createMessage({ slackMessageId: "L1", userId: "U-list", slackTimestamp: "1700000100" });
    await createMessage({ slackMessageId: "L2", userId: "U-list", slackTimestamp: "1700000200" });

    const listed = await send("GET", "/api/messages?userId=U-list&limit=10");
    const body = z
      .object({ messages: z.array(z.object({ slackMessageId: z.string() })) })
      .parse(await listed.json());
    expect(body.messages.map((m) => m.slackMessageId)).toEqual(["L2", "L1"]);

    const counted = await send("GET", "/api/messages/count?userId=U-list");
    expect(await counted.json()).toEqual({ count: 2 });

    expect((await send("GET", "/api/messages")).status).toBe(400);
  });

  it("should expose and update user contexts", async () => {
    await createMessage({ slackMessageId: "P1", userId: "U-profile", userName: "carol" });

    const context = await send("GET", "/api/users/U-profile/context");
    expect(await context.json()).toMatchObject({
      context: { userId: "U-profile", userName: "carol", totalMessages: 1 },
    });

    const patched = await send("PATCH", "/api/users/U-profile/context", {
      communicationStyle: "direct",
    });
    expect(await patched.json()).toMatchObject({
      context: { communicationStyle: "direct", topicsOfInterest: [] },
    });

    expect((await send("GET", "/api/users/U-nobody/context")).status).toBe(404);
  });

  it("should track threads and their summaries", async () => {
    await createMessage({ slackMessageId: "R1", threadTs: "1700000500.000001", slackTimestamp: "1700000501" });
    await createMessage({
      slackMessageId: "R2",
      userId: "U2",
      threadTs: "1700000500.000001",
      slackTimestamp: "1700000502",
    });

    const thread = await send("GET", "/api/threads/1700000500.000001");
    expect(await thread.json()).toMatchObject({
      thread: { threadTs: "1700000500.000001", messageCount: 2, participantCount: 2 },
    });

    const summarized = await send("PATCH", "/api/threads/1700000500.000001/summary", {
      summary: "Release checklist",
    });
    expect(await summarized.json()).toMatchObject({
      thread: { summary: "Release checklist" },
    });
  });

  it("should ingest a batch and count duplicates", async () => {
    const res = await send("POST", "/api/messages/bulk", {
      messages: [
        payload({ slackMessageId: "B1" }),
        payload({ slackMessageId: "B2" }),
        payload({ slackMessageId: "B1" }),
      ],
    });

    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({ created: 2, duplicates: 1 });
  });

  it("should answer malformed JSON with 400", async () => {
    const res = await fetch(`${baseUrl}/api/messages`, {
      method: "POST",
      headers: { "content-type": "application/json" },
      body: "{not json",
    });

    expect(res.status).toBe(400);
  });
});
