import type { AppServices } from "@app/services";
import { createSearchController } from "@interfaces/http/SearchController";
import { Router } from "express";

/**
 * POST /api/search { embedding | query, similarityThreshold?, limit?, userId?, channelId? }
 *   -> { results }
 */
export function searchRouter(services: AppServices): Router {
  const router = Router();
  router.post("/", createSearchController(services));
  return router;
}
