import type { Message } from "@domain/messages/types";

/** Wire shape of a message: vectors stay server-side. */
export type MessageDto = Omit<Message, "embedding"> & { hasEmbedding: boolean };

export function toMessageDto(message: Message): MessageDto {
  const { embedding, ...rest } = message;
  return { ...rest, hasEmbedding: embedding !== null };
}
