import type { AppConfig } from "@config/index";
import { IngestUseCase } from "@app/ingest/IngestUseCase";
import { MessageUseCase } from "@app/messages/MessageUseCase";
import { ProfileUseCase } from "@app/profiles/ProfileUseCase";
import { SearchUseCase, searchDefaults } from "@app/search/SearchUseCase";
import type { EmbeddingProvider } from "@domain/llm/ports";
import type { MessageStore } from "@domain/messages/ports";

export interface AppServices {
  store: MessageStore;
  ingest: IngestUseCase;
  messages: MessageUseCase;
  search: SearchUseCase;
  profiles: ProfileUseCase;
}

/** Wires every use case over one store and an optional embedder. */
export function createServices(
  store: MessageStore,
  embedder: EmbeddingProvider | null,
  cfg: Pick<AppConfig, "search">
): AppServices {
  return {
    store,
    ingest: new IngestUseCase(store, embedder),
    messages: new MessageUseCase(store.messages, embedder),
    search: new SearchUseCase(store.messages, embedder, searchDefaults(cfg)),
    profiles: new ProfileUseCase(store.users, store.threads),
  };
}
