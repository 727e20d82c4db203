import express from "express";
import type { Router } from "express";
import type { NotificationHub } from "../realtime/notificationHub.js";

export function healthHandler(hub: Pick<NotificationHub, "isClosed" | "subscriberCount">) {
  return (_req: unknown, res: { json: (body: unknown) => void }) => {
    res.json({
      ok: !hub.isClosed,
      service: "notifications",
      status: hub.isClosed ? "draining" : "healthy",
      live_subscribers: hub.subscriberCount
    });
  };
}

export function createHealthRouter(hub: NotificationHub): Router {
  const router = express.Router();
  router.get("/", healthHandler(hub));
  return router;
}
