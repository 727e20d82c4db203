import type express from "express";
import type { NotificationDto } from "@tasknotify/shared";
import type { CallerRequest } from "../../auth/middleware.js";
import { toNotificationDto } from "../../data/repositories/notificationRepository.js";
import { log } from "../../logger.js";
import { waitForDrain } from "../../realtime/backpressure.js";
import type {
  NotificationHub,
  NotificationSubscription
} from "../../realtime/notificationHub.js";
import { subscribeForRecipient } from "../../realtime/subscriptionFilter.js";

export function formatSseFrame(dto: NotificationDto): string {
  return `id: ${dto.id}\nevent: notification\ndata: ${JSON.stringify(dto)}\n\n`;
}

export function registerNotificationStreamRoute(args: {
  router: express.Router;
  hub: NotificationHub;
  keepAliveMs: number;
}): void {
  const { router, hub, keepAliveMs } = args;

  router.get("/stream/:userId", (req: CallerRequest, res, next) => {
    let subscription: NotificationSubscription;
    try {
      subscription = subscribeForRecipient(hub, req.caller, String(req.params.userId ?? ""));
    } catch (err) {
      return next(err);
    }

    res.status(200);
    res.setHeader("Content-Type", "text/event-stream");
    res.setHeader("Cache-Control", "no-cache");
    res.setHeader("Connection", "keep-alive");
    res.flushHeaders();
    res.write(": connected\n\n");

    const keepAlive = setInterval(() => {
      res.write(": keep-alive\n\n");
    }, keepAliveMs);

    const stop = () => {
      clearInterval(keepAlive);
      subscription.cancel();
    };
    // `close` on the response fires once the client connection goes away.
    res.on("close", stop);

    const pump = async () => {
      for await (const record of subscription) {
        if (!res.write(formatSseFrame(toNotificationDto(record)))) {
          await waitForDrain(res, subscription);
        }
      }
    };

    pump()
      .catch((err: unknown) => {
        log({
          level: "error",
          msg: "notification_stream_failed",
          recipient_id: subscription.label,
          error: err instanceof Error ? err.message : String(err)
        });
      })
      .finally(() => {
        stop();
        if (res.writableEnded || res.destroyed) return;
        // A client that stopped reading would never let end() flush.
        if (res.writableNeedDrain) res.destroy();
        else res.end();
      });
  });
}
