/**
 * Application entry point.
 *
 * Builds the store and embedding provider from the environment, serves the
 * JSON API and closes the pool on SIGINT/SIGTERM.
 */
import { createServices } from "@app/services";
import { config, describeConfig } from "@config/index";
import { createEmbeddingProvider } from "@infrastructure/llm/EmbeddingProvider";
import { describeError, logger } from "@infrastructure/logging/Logger";
import { createStore } from "@infrastructure/storeFactory";
import { createHttpApp } from "@interfaces/http/createHttpApp";

const store = createStore(config);
const embedder = createEmbeddingProvider(config);

if (!embedder) {
  logger.log("warn", "OPENAI_API_KEY not set; text embedding and text search are disabled");
}

const app = createHttpApp(createServices(store, embedder, config));

const server = app.listen(config.port, () => {
  logger.log("info", `Server running on http://localhost:${config.port}`, {
    config: describeConfig(config),
  });
});

let shuttingDown = false;

function shutdown(signal: string): void {
  if (shuttingDown) {
    return;
  }
  shuttingDown = true;
  logger.log("info", "Shutting down", { signal });

  server.close(() => {
    store
      .close()
      .then(() => {
        process.exitCode = 0;
      })
      .catch((error: unknown) => {
        logger.log("error", "Failed to close store", describeError(error));
        process.exitCode = 1;
      });
  });
}

process.on("SIGINT", () => shutdown("SIGINT"));
process.on("SIGTERM", () => shutdown("SIGTERM"));
