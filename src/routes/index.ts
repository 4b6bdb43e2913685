/**
 * Express route registration.
 *
 * - /api/health: store reachability
 * - /api/messages: ingestion, lookup, listing, soft delete, embeddings
 * - /api/search: similarity search by vector or text
 * - /api/users, /api/threads: author profiles and thread summaries
 */
import type { AppServices } from "@app/services";
import { healthRouter } from "@routes/public/health";
import { messagesRouter } from "@routes/public/messages";
import { threadsRouter, usersRouter } from "@routes/public/profiles";
import { searchRouter } from "@routes/public/search";
import type { Express } from "express";

export function registerRoutes(app: Express, services: AppServices): void {
  app.use("/api/health", healthRouter(services));
  app.use("/api/messages", messagesRouter(services));
  app.use("/api/search", searchRouter(services));
  app.use("/api/users", usersRouter(services));
  app.use("/api/threads", threadsRouter(services));
}
