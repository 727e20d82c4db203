import type { NotificationEventType, NotificationRequest } from "@tasknotify/shared";
import type { EnrichmentRecord, EnrichmentResult } from "../lib/enrichment.js";

export const MAX_MESSAGE_LENGTH = 255;

const GENERIC_MESSAGE = "You have a new notification";

/** First non-blank value wins. */
export function coalesce(...values: Array<string | undefined>): string {
  for (const value of values) {
    if (value !== undefined && value.trim() !== "") return value;
  }
  return "";
}

// Producer bodies are untyped; numbers are accepted so numeric names/titles still render.
function readField(record: EnrichmentRecord, ...keys: string[]): string | undefined {
  for (const key of keys) {
    const value = record[key];
    if (typeof value === "string" && value.trim() !== "") return value;
    if (typeof value === "number" && Number.isFinite(value)) return String(value);
  }
  return undefined;
}

type MessageContext = {
  request: NotificationRequest;
  taskLabel: string;
  projectLabel: string;
};

const templates: Record<NotificationEventType, (ctx: MessageContext) => string> = {
  TASK_CREATED: (ctx) =>
    // The producer's project id names the project here; the fetched name is only a fallback.
    `Task '${ctx.taskLabel}' created in project ${coalesce(ctx.request.projectId, ctx.projectLabel)}`,
  TASK_ASSIGNED: (ctx) =>
    `You were assigned to '${ctx.taskLabel}' by ${ctx.request.initiatorUserId}`,
  TASK_UPDATED: (ctx) => `Task '${ctx.taskLabel}' updated`,
  TASK_STATUS_CHANGED: (ctx) => {
    const to = ctx.request.payload ? readField(ctx.request.payload, "to") : undefined;
    return to ? `Task '${ctx.taskLabel}' status changed to ${to}` : "Task status updated";
  },
  PROJECT_CREATED: (ctx) => `Project ${ctx.projectLabel} has been created`,
  PROJECT_MEMBER_ADDED: (ctx) => `You were added to project ${ctx.projectLabel}`,
  PROJECT_MEMBER_REMOVED: (ctx) => `You were removed from project ${ctx.projectLabel}`,
  PROJECT_UPDATED: (ctx) => `Project ${ctx.projectLabel} has been updated`,
  PROJECT_DELETED: (ctx) =>
    // A deleted project can no longer be looked up, so the producer's title comes first.
    `Project ${coalesce(ctx.request.title, ctx.projectLabel)} has been deleted`,
  GENERIC: (ctx) => coalesce(ctx.request.title, GENERIC_MESSAGE)
};

function truncate(message: string): string {
  if (message.length <= MAX_MESSAGE_LENGTH) return message;
  let end = MAX_MESSAGE_LENGTH - 1;
  // Never keep half of a surrogate pair.
  const last = message.charCodeAt(end - 1);
  if (last >= 0xd800 && last <= 0xdbff) end -= 1;
  return `${message.slice(0, end)}…`;
}

export function composeMessage(
  request: NotificationRequest,
  enrichment: EnrichmentResult
): string {
  const taskLabel = coalesce(request.title, readField(enrichment.task, "title"), "Task");
  const projectLabel = coalesce(
    readField(enrichment.project, "name"),
    request.projectId,
    "Unknown"
  );
  return truncate(templates[request.eventType]({ request, taskLabel, projectLabel }));
}

/**
 * Compact key/value snapshot for client-side deep links. Key order is fixed and
 * absent identifiers are omitted.
 */
export function composeMetadata(
  request: NotificationRequest,
  enrichment: EnrichmentResult
): string {
  const recipientName = readField(enrichment.recipient, "displayName", "name", "username");
  return JSON.stringify({
    ...(request.taskId ? { taskId: request.taskId } : {}),
    ...(request.projectId ? { projectId: request.projectId } : {}),
    initiator: request.initiatorUserId,
    ...(recipientName ? { recipientName } : {}),
    event: request.eventType,
    rawPayloadPresent: request.payload !== undefined
  });
}
