import type { Caller } from "../auth/roles.js";
import { forbiddenError } from "../errors.js";
import type {
  NotificationFilter,
  NotificationHub,
  NotificationSubscription
} from "./notificationHub.js";

export const LIVE_STREAM_DENIED = "You are not authorized to stream these notifications.";

export function recipientFilter(subjectId: string): NotificationFilter {
  return (record) => record.user_id === subjectId;
}

/**
 * Live delivery is owner-only. Unlike the history endpoints, administrators
 * get no wider view of the stream.
 */
export function authorizeLiveStream(caller: Caller | undefined, userId: string): Caller {
  if (!caller || caller.subjectId !== userId) {
    throw forbiddenError(LIVE_STREAM_DENIED);
  }
  return caller;
}

export function subscribeForRecipient(
  hub: NotificationHub,
  caller: Caller | undefined,
  userId: string
): NotificationSubscription {
  const owner = authorizeLiveStream(caller, userId);
  return hub.subscribe({
    filter: recipientFilter(owner.subjectId),
    label: owner.subjectId
  });
}
