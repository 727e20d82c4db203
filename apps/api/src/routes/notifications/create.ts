import type express from "express";
import type { CallerRequest } from "../../auth/middleware.js";
import { toNotificationDto } from "../../data/repositories/notificationRepository.js";
import { unauthorizedError } from "../../errors.js";
import type { NotificationPipeline } from "../../services/notificationPipeline.js";

export function registerNotificationCreateRoute(args: {
  router: express.Router;
  pipeline: NotificationPipeline;
}): void {
  const { router, pipeline } = args;

  // Internal endpoint: producer services push domain events here.
  router.post("/", async (req: CallerRequest, res, next) => {
    try {
      if (!req.forwarded) throw unauthorizedError();
      const record = await pipeline.ingest(req.body, req.caller, req.forwarded);
      return res.status(200).json(toNotificationDto(record));
    } catch (err) {
      next(err);
    }
  });
}
