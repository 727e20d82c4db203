export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

export const overflowPolicies = ["drop-oldest", "close-subscriber"] as const;
export type OverflowPolicy = (typeof overflowPolicies)[number];

function requireEnv(env: NodeJS.ProcessEnv, key: string): string {
  const value = env[key];
  if (!value || value.trim() === "") {
    throw new ConfigError(`Missing required environment variable: ${key}`);
  }
  return value;
}

function parsePort(portValue: string): number {
  const parsed = Number(portValue);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new ConfigError(`PORT must be a positive integer, received: ${portValue}`);
  }
  return parsed;
}

export type ApiConfig = {
  port: number;
  databaseUrl: string;
  realtimeEnabled: boolean;
  corsAllowedOrigins: string[];
  services: {
    taskServiceUrl: string;
    projectServiceUrl: string;
    userServiceUrl: string;
  };
  enrichmentTimeoutMs: number;
  stream: {
    bufferSize: number;
    overflowPolicy: OverflowPolicy;
    keepAliveMs: number;
  };
};

const DEFAULT_SERVICE_URL = "http://localhost:8080";

export function loadConfig(env: NodeJS.ProcessEnv = process.env): ApiConfig {
  const port = parsePort(requireEnv(env, "PORT"));
  const databaseUrl = requireEnv(env, "DATABASE_URL");
  const realtimeEnabled = parseOptionalBool(env, "REALTIME_ENABLED", true);
  const corsAllowedOrigins = (
    env.CORS_ALLOWED_ORIGINS ?? "http://localhost:5173,http://127.0.0.1:5173"
  )
    .split(",")
    .map((s) => s.trim())
    .filter(Boolean);
  return {
    port,
    databaseUrl,
    realtimeEnabled,
    corsAllowedOrigins,
    services: {
      taskServiceUrl: parseOptionalUrl(env, "TASK_SERVICE_URL"),
      projectServiceUrl: parseOptionalUrl(env, "PROJECT_SERVICE_URL"),
      userServiceUrl: parseOptionalUrl(env, "USER_SERVICE_URL")
    },
    enrichmentTimeoutMs: parseOptionalInt(env, "ENRICHMENT_TIMEOUT_MS", 2000),
    stream: {
      bufferSize: parseOptionalInt(env, "STREAM_BUFFER_SIZE", 100),
      overflowPolicy: parseOverflowPolicy(env.STREAM_OVERFLOW_POLICY),
      keepAliveMs: parseOptionalInt(env, "STREAM_KEEPALIVE_MS", 30_000)
    }
  };
}

function parseOptionalBool(
  env: NodeJS.ProcessEnv,
  key: string,
  fallback: boolean
): boolean {
  const value = env[key];
  if (value === undefined || value.trim() === "") return fallback;
  const normalized = value.trim().toLowerCase();
  if (["true", "1", "yes", "on"].includes(normalized)) return true;
  if (["false", "0", "no", "off"].includes(normalized)) return false;
  throw new ConfigError(`${key} must be a boolean (true/false), received: ${value}`);
}

function parseOptionalInt(env: NodeJS.ProcessEnv, key: string, fallback: number): number {
  const value = env[key];
  if (value === undefined || value.trim() === "") return fallback;
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new ConfigError(`${key} must be a positive integer, received: ${value}`);
  }
  return parsed;
}

function parseOptionalUrl(env: NodeJS.ProcessEnv, key: string): string {
  const value = env[key];
  if (value === undefined || value.trim() === "") return DEFAULT_SERVICE_URL;
  try {
    const url = new URL(value.trim());
    return url.toString().replace(/\/+$/, "");
  } catch {
    throw new ConfigError(`${key} must be an absolute URL, received: ${value}`);
  }
}

function parseOverflowPolicy(value: string | undefined): OverflowPolicy {
  if (value === undefined || value.trim() === "") return "drop-oldest";
  const normalized = value.trim().toLowerCase();
  const match = overflowPolicies.find((policy) => policy === normalized);
  if (!match) {
    throw new ConfigError(
      `STREAM_OVERFLOW_POLICY must be one of ${overflowPolicies.join(", ")}, received: ${value}`
    );
  }
  return match;
}
