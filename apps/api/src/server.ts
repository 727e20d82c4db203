import express from "express";
import type { Pool } from "pg";
import { createHealthRouter } from "./routes/health.js";
import { createNotificationsRouter } from "./routes/notifications.js";
import { createPool } from "./data/db.js";
import {
  createSequenceStore,
  type SequenceStore
} from "./data/repositories/notificationRepository.js";
import { AppError, errorBody, internalError, validationError } from "./errors.js";
import { buildRequestLog, deriveNotificationContext, log } from "./logger.js";
import { type ApiConfig, loadConfig } from "./config/env.js";
import { createEnrichmentClients, type EnrichmentClients } from "./lib/enrichment.js";
import { NotificationHub } from "./realtime/notificationHub.js";
import {
  NotificationPipeline,
  type PipelineDeps
} from "./services/notificationPipeline.js";

function isTestRuntime(): boolean {
  return (
    process.env.NODE_ENV === "test" ||
    process.env.VITEST === "true" ||
    typeof process.env.VITEST_WORKER_ID === "string"
  );
}

function sanitizeBody(value: unknown): unknown {
  if (Array.isArray(value)) {
    return value.map((item) => sanitizeBody(item));
  }
  if (value && typeof value === "object") {
    const entries = Object.entries(value).map(([key, val]) => {
      const lower = key.toLowerCase();
      if (
        lower.includes("password") ||
        lower.includes("token") ||
        lower.includes("secret") ||
        lower.includes("authorization")
      ) {
        return [key, "[REDACTED]"];
      }
      return [key, sanitizeBody(val)];
    });
    return Object.fromEntries(entries);
  }
  return value;
}

export type ServerDeps = {
  config?: ApiConfig;
  db?: Pool;
  store?: SequenceStore;
  hub?: NotificationHub;
  enrichment?: EnrichmentClients;
  onTransition?: PipelineDeps["onTransition"];
};

// express.json() rejects unparsable bodies with a status-carrying SyntaxError.
function isMalformedBody(err: unknown): boolean {
  return err instanceof SyntaxError && "status" in err && err.status === 400;
}

export function createServer(deps: ServerDeps = {}) {
  const app = express();
  const config = deps.config ?? loadConfig();
  const store = deps.store ?? createSequenceStore(deps.db ?? createPool(config.databaseUrl));
  const hub = deps.hub ?? new NotificationHub(config.stream);
  const enrichment =
    deps.enrichment ??
    createEnrichmentClients({ ...config.services, timeoutMs: config.enrichmentTimeoutMs });
  const pipeline = new NotificationPipeline({
    store,
    hub,
    enrichment,
    onTransition: deps.onTransition
  });

  app.use(express.json());

  // Allow-list CORS for browser clients of the history and stream endpoints
  app.use((req, res, next) => {
    const origin = req.headers.origin;
    const isAllowed = origin ? config.corsAllowedOrigins.includes(origin) : false;

    if (isAllowed && origin) {
      res.header("Access-Control-Allow-Origin", origin);
      res.header("Access-Control-Allow-Credentials", "true");
      res.header(
        "Access-Control-Allow-Headers",
        "Content-Type, Authorization, X-Requested-With, X-User-Id, X-User-Role"
      );
      res.header("Access-Control-Allow-Methods", "GET,POST,PUT,OPTIONS");
    }
    res.header("Vary", "Origin");

    if (req.method === "OPTIONS") {
      res.sendStatus(200);
      return;
    }
    next();
  });

  app.use((req, res, next) => {
    const start = Date.now();
    res.on("finish", () => {
      const sanitizedBody = sanitizeBody(req.body);
      log(
        buildRequestLog({
          method: req.method,
          path: req.originalUrl ?? req.url,
          status: res.statusCode,
          duration_ms: Date.now() - start,
          body: sanitizedBody
        })
      );
    });
    next();
  });

  app.use("/health", createHealthRouter(hub));
  app.use(
    "/notifications",
    createNotificationsRouter({
      store,
      hub,
      pipeline,
      keepAliveMs: config.stream.keepAliveMs
    })
  );
  app.use((_req, res) => {
    res.status(404).json(errorBody(new AppError("NOT_FOUND", 404, "Not found")));
  });

  app.use(
    (
      err: unknown,
      _req: express.Request,
      res: express.Response,
      _next: express.NextFunction
    ) => {
      void _next;
      const appErr =
        err instanceof AppError
          ? err
          : isMalformedBody(err)
            ? validationError("Malformed JSON body", ["body"])
            : undefined;
      const status = appErr?.status ?? 500;
      const message =
        appErr?.message ?? (err instanceof Error ? err.message : "Unexpected error");
      const sanitizedBody = sanitizeBody(_req.body);
      const context = deriveNotificationContext(sanitizedBody);
      // 4xx are client errors (expected sometimes); 5xx are server errors.
      const level = status >= 500 ? "error" : "info";
      log({
        level,
        msg: "request_error",
        method: _req.method,
        path: _req.originalUrl ?? _req.url,
        status,
        code: appErr?.code ?? "INTERNAL_ERROR",
        error: message,
        error_name: err instanceof Error ? err.name : undefined,
        error_stack:
          (status >= 500 && !isTestRuntime()) || process.env.LOG_STACK === "1"
            ? err instanceof Error
              ? err.stack
              : undefined
            : undefined,
        ...context
      });
      if (!appErr && err instanceof Error) {
        // Emit stack to stderr during dev for quicker debugging.
        // (In tests, this is usually noise; use LOG_STACK=1 to force it.)
        if (!isTestRuntime() || process.env.LOG_STACK === "1") {
          // eslint-disable-next-line no-console
          console.error(err);
        }
      }
      if (res.headersSent) return;
      res.status(status).json(errorBody(appErr ?? internalError()));
    }
  );
  return { app, hub, store, config };
}
