import type { AppServices } from "@app/services";
import { createProfileController } from "@interfaces/http/ProfileController";
import { Router } from "express";

export function usersRouter(services: AppServices): Router {
  const router = Router();
  const controller = createProfileController(services);

  router.get("/:userId/context", controller.getUserContext);
  router.patch("/:userId/context", controller.updateUserProfile);

  return router;
}

export function threadsRouter(services: AppServices): Router {
  const router = Router();
  const controller = createProfileController(services);

  router.get("/:threadTs", controller.getThread);
  router.patch("/:threadTs/summary", controller.updateThreadSummary);

  return router;
}
