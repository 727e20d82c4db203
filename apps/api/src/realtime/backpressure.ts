import type { EventEmitter } from "events";
import type { NotificationSubscription } from "./notificationHub.js";

/**
 * Resolves once `transport` emits `drain`, or once either side goes away.
 * While a pump waits here, new records stay in the subscription's bounded
 * buffer, where the hub's overflow policy applies to them.
 */
export function waitForDrain(
  transport: EventEmitter,
  subscription: NotificationSubscription
): Promise<void> {
  return new Promise((resolve) => {
    let detachFromSubscription: () => void = () => undefined;
    const done = () => {
      transport.off("drain", done);
      transport.off("close", done);
      detachFromSubscription();
      resolve();
    };
    transport.once("drain", done);
    transport.once("close", done);
    detachFromSubscription = subscription.onClose(done);
  });
}
