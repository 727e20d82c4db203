import type express from "express";
import { parseNotificationId } from "@tasknotify/shared";
import type { CallerRequest } from "../../auth/middleware.js";
import { canAccessRecipient } from "../../auth/roles.js";
import {
  toNotificationDto,
  type NotificationRecord,
  type SequenceStore
} from "../../data/repositories/notificationRepository.js";
import { forbiddenError, notFoundError, persistenceError } from "../../errors.js";
import { log } from "../../logger.js";

async function markReadOrFail(
  store: SequenceStore,
  sequence: number
): Promise<NotificationRecord | null> {
  try {
    return await store.markRead(sequence);
  } catch (err) {
    log({
      level: "error",
      msg: "notification_mark_read_failed",
      sequence_id: sequence,
      error: err instanceof Error ? err.message : String(err)
    });
    throw persistenceError("mark_read");
  }
}

export function registerNotificationMarkReadRoute(args: {
  router: express.Router;
  store: SequenceStore;
}): void {
  const { router, store } = args;

  router.put("/:id/read", async (req: CallerRequest, res, next) => {
    try {
      const sequence = parseNotificationId(String(req.params.id ?? ""));
      if (sequence === null) throw notFoundError();

      const existing = await store.get(sequence);
      if (!existing) throw notFoundError();
      if (!canAccessRecipient(req.caller, existing.user_id)) {
        throw forbiddenError("You are not authorized to modify this notification.");
      }

      const updated = await markReadOrFail(store, sequence);
      if (!updated) throw notFoundError();
      return res.json(toNotificationDto(updated));
    } catch (err) {
      next(err);
    }
  });
}
