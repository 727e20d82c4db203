import type express from "express";
import { requireAdmin, type CallerRequest } from "../../auth/middleware.js";
import { canAccessRecipient } from "../../auth/roles.js";
import {
  toNotificationDto,
  type SequenceStore
} from "../../data/repositories/notificationRepository.js";
import { forbiddenError, validationError } from "../../errors.js";

export function registerNotificationListRoutes(args: {
  router: express.Router;
  store: SequenceStore;
}): void {
  const { router, store } = args;

  router.get(
    "/",
    requireAdmin("Only ADMIN users can list all notifications."),
    async (_req: CallerRequest, res, next) => {
      try {
        const records = await store.listAll();
        return res.json({ notifications: records.map(toNotificationDto) });
      } catch (err) {
        next(err);
      }
    }
  );

  router.get("/:userId", async (req: CallerRequest, res, next) => {
    try {
      const userId = String(req.params.userId ?? "").trim();
      if (!userId) throw validationError("Invalid user id", ["userId"]);
      if (!canAccessRecipient(req.caller, userId)) {
        throw forbiddenError("You are not authorized to view these notifications.");
      }
      const records = await store.listByRecipient(userId);
      return res.json({ notifications: records.map(toNotificationDto) });
    } catch (err) {
      next(err);
    }
  });
}
