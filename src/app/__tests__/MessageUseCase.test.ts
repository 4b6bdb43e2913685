import { describe, expect, it } from "vitest";

import {
  FakeEmbeddingProvider,
  newMessage,
  unitVector,
} from "../../__tests__/helpers";
import { MessageUseCase } from "@app/messages/MessageUseCase";
import { ProfileUseCase } from "@app/profiles/ProfileUseCase";
import { InMemoryMessageStore } from "@infrastructure/memory/InMemoryMessageStore";
import { NotFoundError, ValidationError } from "@typesLocal/errors";

const UNKNOWN_ID = "0b6f6c7e-2a35-4c8e-9c39-4f7d8f0e2a11";

describe("MessageUseCase", () => {
  it("should raise NotFoundError for unknown messages", async () => {
    const messages = new MessageUseCase(new InMemoryMessageStore().messages, null);

    await expect(messages.getMessage(UNKNOWN_ID)).rejects.toBeInstanceOf(NotFoundError);
    await expect(messages.softDeleteMessage(UNKNOWN_ID)).rejects.toMatchObject({
      statusCode: 404,
      metadata: { id: UNKNOWN_ID },
    });
    await expect(
      messages.attachEmbedding(UNKNOWN_ID, { embedding: unitVector(0) })
    ).rejects.toBeInstanceOf(NotFoundError);
  });

  it("should soft delete a known message twice without error", async () => {
    const store = new InMemoryMessageStore();
    const created = await store.messages.insert(newMessage());
    const messages = new MessageUseCase(store.messages, null);

    await messages.softDeleteMessage(created.id);
    await messages.softDeleteMessage(created.id);

    expect((await messages.getMessage(created.id)).isDeleted).toBe(true);
  });

  it("should attach a computed embedding", async () => {
    const store = new InMemoryMessageStore();
    const created = await store.messages.insert(newMessage());
    const embedder = new FakeEmbeddingProvider(unitVector(4));
    const messages = new MessageUseCase(store.messages, embedder);

    const updated = await messages.attachEmbedding(created.id, { text: "hello team" });

    expect(updated.embedding).toEqual(unitVector(4));
    expect(embedder.calls).toEqual(["hello team"]);
  });

  it("should list by exactly one of user or channel", async () => {
    const store = new InMemoryMessageStore();
    await store.messages.insert(newMessage({ slackMessageId: "a", userId: "U1" }));
    await store.messages.insert(newMessage({ slackMessageId: "b", userId: "U2" }));
    const messages = new MessageUseCase(store.messages, null);

    expect(await messages.listMessages({ userId: "U2" })).toHaveLength(1);
    expect(await messages.listMessages({ channelId: "C1", limit: 1 })).toHaveLength(1);
    await expect(messages.listMessages({})).rejects.toBeInstanceOf(ValidationError);
    await expect(
      messages.listMessages({ userId: "U1", channelId: "C1" })
    ).rejects.toBeInstanceOf(ValidationError);
    expect(await messages.countMessages({ userId: "U1" })).toBe(1);
  });
});

describe("ProfileUseCase", () => {
  it("should read and update user profiles", async () => {
    const store = new InMemoryMessageStore();
    await store.users.recordMessage("U1", "alice", new Date(1700000000000));
    const profiles = new ProfileUseCase(store.users, store.threads);

    const updated = await profiles.updateUserProfile("U1", {
      topicsOfInterest: ["search", "postgres"],
    });

    expect(updated.topicsOfInterest).toEqual(["search", "postgres"]);
    expect((await profiles.getUserContext("U1")).totalMessages).toBe(1);
    await expect(profiles.getUserContext("U404")).rejects.toBeInstanceOf(NotFoundError);
    await expect(
      profiles.updateUserProfile("U404", { communicationStyle: "brief" })
    ).rejects.toBeInstanceOf(NotFoundError);
  });

  it("should look threads up by any spelling of their timestamp", async () => {
    const store = new InMemoryMessageStore();
    await store.threads.create("1700000000.000100", "C1", new Date(1700000000000));
    const profiles = new ProfileUseCase(store.users, store.threads);

    expect((await profiles.getThread("1700000000.0001")).channelId).toBe("C1");
    expect(
      (await profiles.updateThreadSummary("1700000000.0001", "Deploy on Friday")).summary
    ).toBe("Deploy on Friday");
    await expect(profiles.getThread("1700000001")).rejects.toBeInstanceOf(NotFoundError);
    await expect(profiles.getThread("not-a-ts")).rejects.toBeInstanceOf(ValidationError);
  });
});
