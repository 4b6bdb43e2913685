import type { AppServices } from "@app/services";
import { createMessageController } from "@interfaces/http/MessageController";
import { Router } from "express";

export function messagesRouter(services: AppServices): Router {
  const router = Router();
  const controller = createMessageController(services);

  router.post("/", controller.create);
  router.post("/bulk", controller.createBulk);
  router.get("/", controller.list);
  // Registered before /:id so "count" is not taken for an id.
  router.get("/count", controller.count);
  router.get("/:id", controller.get);
  router.delete("/:id", controller.remove);
  router.put("/:id/embedding", controller.attachEmbedding);

  return router;
}
