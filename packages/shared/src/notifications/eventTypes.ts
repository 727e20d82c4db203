export const notificationEventTypes = [
  "TASK_CREATED",
  "TASK_UPDATED",
  "TASK_ASSIGNED",
  "TASK_STATUS_CHANGED",
  "PROJECT_CREATED",
  "PROJECT_MEMBER_ADDED",
  "PROJECT_MEMBER_REMOVED",
  "PROJECT_UPDATED",
  "PROJECT_DELETED",
  "GENERIC"
] as const;
export type NotificationEventType = (typeof notificationEventTypes)[number];

export function isNotificationEventType(value: string): value is NotificationEventType {
  return notificationEventTypes.some((type) => type === value);
}

// Producers may send kinds this service doesn't know yet; those degrade to GENERIC.
export function normalizeEventType(value: string | null | undefined): NotificationEventType {
  if (!value) return "GENERIC";
  const upper = value.trim().toUpperCase();
  return isNotificationEventType(upper) ? upper : "GENERIC";
}
