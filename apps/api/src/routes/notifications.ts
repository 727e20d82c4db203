import express from "express";
import type { Router } from "express";
import { requireCaller } from "../auth/middleware.js";
import type { SequenceStore } from "../data/repositories/notificationRepository.js";
import type { NotificationHub } from "../realtime/notificationHub.js";
import type { NotificationPipeline } from "../services/notificationPipeline.js";
import { registerNotificationCreateRoute } from "./notifications/create.js";
import { registerNotificationListRoutes } from "./notifications/list.js";
import { registerNotificationMarkReadRoute } from "./notifications/markRead.js";
import { registerNotificationStreamRoute } from "./notifications/stream.js";

export function createNotificationsRouter(deps: {
  store: SequenceStore;
  hub: NotificationHub;
  pipeline: NotificationPipeline;
  keepAliveMs: number;
}): Router {
  const router = express.Router();
  router.use(requireCaller());

  registerNotificationCreateRoute({ router, pipeline: deps.pipeline });
  // The stream path must be registered before the "/:userId" history route.
  registerNotificationStreamRoute({ router, hub: deps.hub, keepAliveMs: deps.keepAliveMs });
  registerNotificationListRoutes({ router, store: deps.store });
  registerNotificationMarkReadRoute({ router, store: deps.store });

  return router;
}
