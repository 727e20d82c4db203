import { describe, expect, it } from "vitest";
import { normalizeEventType } from "./eventTypes.js";
import { MAX_RECIPIENT_ID_LENGTH, parseNotificationRequest } from "./request.js";

describe("normalizeEventType", () => {
  it("falls back to GENERIC for missing or unknown kinds", () => {
    expect(normalizeEventType(undefined)).toBe("GENERIC");
    expect(normalizeEventType("")).toBe("GENERIC");
    expect(normalizeEventType("TASK_ARCHIVED")).toBe("GENERIC");
  });

  it("accepts known kinds regardless of case", () => {
    expect(normalizeEventType("task_assigned")).toBe("TASK_ASSIGNED");
    expect(normalizeEventType(" PROJECT_DELETED ")).toBe("PROJECT_DELETED");
  });
});

describe("parseNotificationRequest", () => {
  it("parses a full request", () => {
    const result = parseNotificationRequest({
      eventType: "TASK_STATUS_CHANGED",
      taskId: "T1",
      projectId: 12,
      recipientUserId: "U2",
      initiatorUserId: "U5",
      title: "Fix bug",
      payload: { to: "DONE" },
      occurredAt: "2026-03-01T10:00:00.000Z"
    });
    expect(result).toEqual({
      ok: true,
      value: {
        eventType: "TASK_STATUS_CHANGED",
        taskId: "T1",
        projectId: "12",
        recipientUserId: "U2",
        initiatorUserId: "U5",
        title: "Fix bug",
        payload: { to: "DONE" },
        occurredAt: new Date("2026-03-01T10:00:00.000Z")
      }
    });
  });

  it("drops blank optional fields and defaults the kind", () => {
    const result = parseNotificationRequest({
      recipientUserId: " U2 ",
      initiatorUserId: "U5",
      taskId: "   ",
      title: "",
      payload: null
    });
    expect(result).toEqual({
      ok: true,
      value: { eventType: "GENERIC", recipientUserId: "U2", initiatorUserId: "U5" }
    });
  });

  it("rejects bodies that are not objects", () => {
    expect(parseNotificationRequest(null)).toEqual({
      ok: false,
      issues: [{ field: "body", code: "INVALID_TYPE" }]
    });
    expect(parseNotificationRequest(["U2"])).toEqual({
      ok: false,
      issues: [{ field: "body", code: "INVALID_TYPE" }]
    });
  });

  it("reports every offending field", () => {
    const result = parseNotificationRequest({
      eventType: 3,
      taskId: { id: "T1" },
      initiatorUserId: "U5",
      payload: "to=DONE",
      occurredAt: "yesterday"
    });
    expect(result).toEqual({
      ok: false,
      issues: [
        { field: "eventType", code: "INVALID_TYPE" },
        { field: "taskId", code: "INVALID_TYPE" },
        { field: "recipientUserId", code: "REQUIRED" },
        { field: "payload", code: "INVALID_TYPE" },
        { field: "occurredAt", code: "INVALID_FORMAT" }
      ]
    });
  });

  it("rejects a recipient id wider than the stored column", () => {
    expect(
      parseNotificationRequest({ recipientUserId: "U".repeat(51), initiatorUserId: "U5" })
    ).toEqual({ ok: false, issues: [{ field: "recipientUserId", code: "INVALID_FORMAT" }] });

    const widest = "U".repeat(MAX_RECIPIENT_ID_LENGTH);
    const accepted = parseNotificationRequest({
      recipientUserId: ` ${widest} `,
      initiatorUserId: "U5"
    });
    expect(accepted.ok && accepted.value.recipientUserId).toBe(widest);
  });
});
