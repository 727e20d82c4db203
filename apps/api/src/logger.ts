type Level = "info" | "warn" | "error";

export type NotificationContext = {
  recipient_id?: string | number;
  initiator_id?: string | number;
  event_type?: string | number;
};

export type LogEntry = {
  level: Level;
  msg: string;
  [key: string]: unknown;
};

type LogLevelSetting = "silent" | "error" | "warn" | "info";

function isTestRuntime(): boolean {
  // Vitest sets NODE_ENV="test" in many setups, but don't rely on it.
  return (
    process.env.NODE_ENV === "test" ||
    process.env.VITEST === "true" ||
    typeof process.env.VITEST_WORKER_ID === "string"
  );
}

function getConfiguredLevel(): LogLevelSetting {
  const raw = String(process.env.LOG_LEVEL || "").toLowerCase();
  if (raw === "silent" || raw === "error" || raw === "warn" || raw === "info") return raw;
  if (isTestRuntime()) return "silent";
  return "info";
}

function shouldLog(entryLevel: Level): boolean {
  const configured = getConfiguredLevel();
  if (configured === "silent") return false;
  if (configured === "error") return entryLevel === "error";
  if (configured === "warn") return entryLevel !== "info";
  return true;
}

function wantsPrettyOutput(): boolean {
  const raw = String(process.env.LOG_FORMAT || "").toLowerCase();
  if (raw === "json") return false;
  if (raw === "pretty") return true;
  // Default: in tests, keep output readable; elsewhere keep structured JSON.
  return isTestRuntime();
}

function formatKeyValue(key: string, value: unknown): string {
  if (value === undefined) return "";
  if (value === null) return `${key}=null`;
  if (typeof value === "string") return `${key}="${value}"`;
  if (typeof value === "number" || typeof value === "boolean") return `${key}=${value}`;
  try {
    return `${key}=${JSON.stringify(value)}`;
  } catch {
    return `${key}=[unserializable]`;
  }
}

function toPrettyLine(entry: LogEntry): string {
  const { level, msg, ...rest } = entry;

  if (msg === "request") {
    const method = rest.method ? String(rest.method) : "?";
    const p = rest.path ? String(rest.path) : "?";
    const status = rest.status ? String(rest.status) : "?";
    const duration =
      typeof rest.duration_ms === "number" ? `${rest.duration_ms}ms` : "?ms";

    const extras: string[] = [];
    for (const key of ["recipient_id", "event_type"]) {
      if (rest[key] !== undefined) extras.push(formatKeyValue(key, rest[key]));
    }
    return `${level.toUpperCase()} ${method} ${p} -> ${status} (${duration})${extras.length ? ` ${extras.join(" ")}` : ""}`;
  }

  if (msg === "request_error") {
    const method = rest.method ? String(rest.method) : "?";
    const p = rest.path ? String(rest.path) : "?";
    const status = rest.status ? String(rest.status) : "?";
    const code = rest.code ? String(rest.code) : "UNKNOWN";
    const error = rest.error ? String(rest.error) : "Unknown error";
    return `${level.toUpperCase()} ${method} ${p} -> ${status} code=${code} error="${error}"`;
  }

  const extras = Object.keys(rest)
    .sort()
    .map((k) => formatKeyValue(k, rest[k]))
    .filter(Boolean)
    .join(" ");
  return `${level.toUpperCase()} ${msg}${extras ? ` ${extras}` : ""}`;
}

export function log(entry: LogEntry) {
  if (!shouldLog(entry.level)) return;
  // Structured console logging; stdout is shipped by the platform collector.
  console.log(wantsPrettyOutput() ? toPrettyLine(entry) : JSON.stringify(entry));
}

function pickFirst(
  obj: Record<string, unknown>,
  keys: string[]
): string | number | undefined {
  for (const key of keys) {
    const value = obj[key];
    if (typeof value === "number") return value;
    if (typeof value === "string" && value) return value;
  }
  return undefined;
}

export function deriveNotificationContext(body: unknown): NotificationContext {
  if (!body || typeof body !== "object" || Array.isArray(body)) return {};
  const record: Record<string, unknown> = { ...body };
  const context: NotificationContext = {};
  const recipient = pickFirst(record, ["recipientUserId", "recipient_user_id", "userId"]);
  const initiator = pickFirst(record, ["initiatorUserId", "initiator_user_id"]);
  const eventType = pickFirst(record, ["eventType", "event_type"]);
  if (recipient !== undefined) context.recipient_id = recipient;
  if (initiator !== undefined) context.initiator_id = initiator;
  if (eventType !== undefined) context.event_type = eventType;
  return context;
}

export function buildRequestLog(input: {
  method: string;
  path: string;
  status: number;
  duration_ms: number;
  request_id?: string;
  body?: unknown;
}): LogEntry {
  const context = deriveNotificationContext(input.body);
  return {
    level: "info",
    msg: "request",
    method: input.method,
    path: input.path,
    status: input.status,
    duration_ms: input.duration_ms,
    request_id: input.request_id,
    ...context
  };
}
