import { normalizeEventType, type NotificationEventType } from "./eventTypes.js";

export type NotificationPayload = Record<string, unknown>;

export type NotificationRequest = {
  eventType: NotificationEventType;
  taskId?: string;
  projectId?: string;
  recipientUserId: string;
  initiatorUserId: string;
  title?: string;
  payload?: NotificationPayload;
  occurredAt?: Date;
};

export type RequestField =
  | "body"
  | "eventType"
  | "taskId"
  | "projectId"
  | "recipientUserId"
  | "initiatorUserId"
  | "title"
  | "payload"
  | "occurredAt";

export type RequestIssueCode = "REQUIRED" | "INVALID_TYPE" | "INVALID_FORMAT";

export type RequestValidationIssue = {
  field: RequestField;
  code: RequestIssueCode;
};

export type ParsedNotificationRequest =
  | { ok: true; value: NotificationRequest }
  | { ok: false; issues: RequestValidationIssue[] };

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

type ReadResult<T> = { ok: true; value: T | undefined } | { ok: false; code: RequestIssueCode };
type Reader<T> = (value: unknown) => ReadResult<T>;

const absent = { ok: true, value: undefined } as const;

// Ids arrive from several services; some of them still use numeric keys.
const readId: Reader<string> = (value) => {
  if (value === undefined || value === null) return absent;
  if (typeof value === "number" && Number.isFinite(value)) {
    return { ok: true, value: String(value) };
  }
  if (typeof value !== "string") return { ok: false, code: "INVALID_TYPE" };
  const trimmed = value.trim();
  return { ok: true, value: trimmed || undefined };
};

/** Matches the width of the stored recipient column. */
export const MAX_RECIPIENT_ID_LENGTH = 50;

const readRecipientId: Reader<string> = (value) => {
  const result = readId(value);
  if (result.ok && result.value !== undefined && result.value.length > MAX_RECIPIENT_ID_LENGTH) {
    return { ok: false, code: "INVALID_FORMAT" };
  }
  return result;
};

const readText: Reader<string> = (value) => {
  if (value === undefined || value === null) return absent;
  if (typeof value !== "string") return { ok: false, code: "INVALID_TYPE" };
  return { ok: true, value: value.trim() ? value : undefined };
};

const readPayload: Reader<NotificationPayload> = (value) => {
  if (value === undefined || value === null) return absent;
  return isPlainObject(value) ? { ok: true, value } : { ok: false, code: "INVALID_TYPE" };
};

const readTimestamp: Reader<Date> = (value) => {
  if (value === undefined || value === null) return absent;
  if (typeof value !== "string") return { ok: false, code: "INVALID_TYPE" };
  const parsed = new Date(value);
  if (Number.isNaN(parsed.getTime())) return { ok: false, code: "INVALID_FORMAT" };
  return { ok: true, value: parsed };
};

export function parseNotificationRequest(body: unknown): ParsedNotificationRequest {
  if (!isPlainObject(body)) {
    return { ok: false, issues: [{ field: "body", code: "INVALID_TYPE" }] };
  }

  const record: Record<string, unknown> = body;
  const issues: RequestValidationIssue[] = [];

  function take<T>(field: RequestField, reader: Reader<T>, required = false): T | undefined {
    const result = reader(record[field]);
    if (!result.ok) {
      issues.push({ field, code: result.code });
      return undefined;
    }
    if (result.value === undefined && required) {
      issues.push({ field, code: "REQUIRED" });
    }
    return result.value;
  }

  const rawEventType = record.eventType;
  let eventType: NotificationEventType = "GENERIC";
  if (rawEventType !== undefined && rawEventType !== null) {
    if (typeof rawEventType === "string") {
      eventType = normalizeEventType(rawEventType);
    } else {
      issues.push({ field: "eventType", code: "INVALID_TYPE" });
    }
  }

  const taskId = take("taskId", readId);
  const projectId = take("projectId", readId);
  const recipientUserId = take("recipientUserId", readRecipientId, true);
  const initiatorUserId = take("initiatorUserId", readId, true);
  const title = take("title", readText);
  const payload = take("payload", readPayload);
  const occurredAt = take("occurredAt", readTimestamp);

  if (issues.length > 0 || !recipientUserId || !initiatorUserId) {
    return { ok: false, issues };
  }

  return {
    ok: true,
    value: {
      eventType,
      recipientUserId,
      initiatorUserId,
      ...(taskId ? { taskId } : {}),
      ...(projectId ? { projectId } : {}),
      ...(title ? { title } : {}),
      ...(payload ? { payload } : {}),
      ...(occurredAt ? { occurredAt } : {})
    }
  };
}
