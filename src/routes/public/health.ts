/**
 * GET /api/health: database reachability, 503 when the store is down.
 */
import type { AppServices } from "@app/services";
import { Router } from "express";

export function healthRouter(services: AppServices): Router {
  const router = Router();

  router.get("/", async (_req, res, next) => {
    try {
      const database = await services.store.healthCheck();

      res.status(database ? 200 : 503).json({
        status: database ? "ok" : "error",
        database,
        driver: services.store.driver,
      });
    } catch (err: unknown) {
      next(err);
    }
  });

  return router;
}
