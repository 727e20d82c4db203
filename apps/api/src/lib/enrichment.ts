import type { ForwardedAuth } from "../auth/middleware.js";
import { log } from "../logger.js";

/** Schema-loose body returned by a producer service; `{}` when unavailable. */
export type EnrichmentRecord = Record<string, unknown>;

export type EnrichmentKind = "task" | "recipient" | "project";

export type EnrichmentResult = Record<EnrichmentKind, EnrichmentRecord>;

export type EnrichmentRefs = {
  taskId?: string;
  recipientUserId?: string;
  projectId?: string;
};

export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

export type EnrichmentClientOptions = {
  taskServiceUrl: string;
  projectServiceUrl: string;
  userServiceUrl: string;
  timeoutMs: number;
  fetch?: FetchLike;
};

export type EnrichmentClients = {
  fetchTask(taskId: string, forwarded: ForwardedAuth): Promise<EnrichmentRecord>;
  fetchUser(userId: string, forwarded: ForwardedAuth): Promise<EnrichmentRecord>;
  fetchProject(projectId: string, forwarded: ForwardedAuth): Promise<EnrichmentRecord>;
};

export class DownstreamError extends Error {
  constructor(
    public kind: EnrichmentKind,
    public reason: "timeout" | "status" | "invalid_body",
    message: string
  ) {
    super(message);
    this.name = "DownstreamError";
  }
}

function isRecord(value: unknown): value is EnrichmentRecord {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function buildHeaders(forwarded: ForwardedAuth): Record<string, string> {
  const headers: Record<string, string> = {
    Accept: "application/json",
    "X-User-Id": forwarded.userId
  };
  if (forwarded.role) headers["X-User-Role"] = forwarded.role;
  if (forwarded.authorization) headers.Authorization = forwarded.authorization;
  return headers;
}

async function getJsonWithTimeout(
  fetchImpl: FetchLike,
  kind: EnrichmentKind,
  url: string,
  forwarded: ForwardedAuth,
  timeoutMs: number
): Promise<EnrichmentRecord> {
  const controller = new AbortController();
  let timer: NodeJS.Timeout | undefined;
  // The race keeps the bound even when a fetch implementation ignores the signal.
  const timeout = new Promise<never>((_resolve, reject) => {
    timer = setTimeout(() => {
      reject(new DownstreamError(kind, "timeout", `Timed out after ${timeoutMs}ms`));
      controller.abort();
    }, timeoutMs);
  });

  const request = (async () => {
    const res = await fetchImpl(url, {
      method: "GET",
      headers: buildHeaders(forwarded),
      signal: controller.signal
    });
    if (!res.ok) {
      throw new DownstreamError(kind, "status", `Request failed (${res.status})`);
    }
    const body: unknown = await res.json();
    if (!isRecord(body)) {
      throw new DownstreamError(kind, "invalid_body", "Expected a JSON object");
    }
    return body;
  })();

  try {
    return await Promise.race([request, timeout]);
  } finally {
    clearTimeout(timer);
  }
}

export function createEnrichmentClients(options: EnrichmentClientOptions): EnrichmentClients {
  const fetchImpl: FetchLike = options.fetch ?? ((input, init) => fetch(input, init));
  const lookup = (kind: EnrichmentKind, url: string, forwarded: ForwardedAuth) =>
    getJsonWithTimeout(fetchImpl, kind, url, forwarded, options.timeoutMs);

  return {
    fetchTask: (taskId, forwarded) =>
      lookup(
        "task",
        `${options.taskServiceUrl}/tasks/${encodeURIComponent(taskId)}`,
        forwarded
      ),
    fetchUser: (userId, forwarded) =>
      lookup(
        "recipient",
        `${options.userServiceUrl}/users/${encodeURIComponent(userId)}`,
        forwarded
      ),
    fetchProject: (projectId, forwarded) =>
      lookup(
        "project",
        `${options.projectServiceUrl}/projects/${encodeURIComponent(projectId)}`,
        forwarded
      )
  };
}

function describeFailure(reason: unknown): string {
  if (reason instanceof DownstreamError) return `${reason.reason}: ${reason.message}`;
  if (reason instanceof Error) return reason.message;
  return String(reason);
}

/**
 * Runs every applicable lookup concurrently and waits for all of them to
 * settle. A failed lookup contributes an empty record; nothing is rethrown.
 */
export async function enrichEvent(
  clients: EnrichmentClients,
  refs: EnrichmentRefs,
  forwarded: ForwardedAuth
): Promise<EnrichmentResult> {
  const lookups: Array<{
    kind: EnrichmentKind;
    id: string;
    run: () => Promise<EnrichmentRecord>;
  }> = [];
  const { taskId, recipientUserId, projectId } = refs;
  if (taskId) {
    lookups.push({ kind: "task", id: taskId, run: () => clients.fetchTask(taskId, forwarded) });
  }
  if (recipientUserId) {
    lookups.push({
      kind: "recipient",
      id: recipientUserId,
      run: () => clients.fetchUser(recipientUserId, forwarded)
    });
  }
  if (projectId) {
    lookups.push({
      kind: "project",
      id: projectId,
      run: () => clients.fetchProject(projectId, forwarded)
    });
  }

  const settled = await Promise.allSettled(lookups.map((lookup) => lookup.run()));

  const result: EnrichmentResult = { task: {}, recipient: {}, project: {} };
  settled.forEach((outcome, index) => {
    const { kind, id } = lookups[index];
    if (outcome.status === "fulfilled") {
      result[kind] = outcome.value;
      return;
    }
    log({
      level: "warn",
      msg: "enrichment_lookup_failed",
      entity: kind,
      entity_id: id,
      reason: describeFailure(outcome.reason)
    });
  });
  return result;
}
