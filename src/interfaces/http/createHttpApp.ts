import type { AppServices } from "@app/services";
import { errorHandler, notFoundHandler } from "@middleware/errorHandler";
import { registerRoutes } from "@routes/index";
import express, { type Express } from "express";

/** Bulk requests carry up to 500 vectors of 384 floats. */
const JSON_BODY_LIMIT = "10mb";

export function createHttpApp(services: AppServices): Express {
  const app = express();
  app.use(express.json({ limit: JSON_BODY_LIMIT }));

  registerRoutes(app, services);

  app.use(notFoundHandler);
  app.use(errorHandler);

  return app;
}
