import { describe, expect, it } from "vitest";
import { ConfigError, loadConfig } from "../../src/config/env.js";

const base = { PORT: "4000", DATABASE_URL: "postgres://localhost/notifications" };

describe("loadConfig", () => {
  it("loads required values and applies defaults", () => {
    const cfg = loadConfig(base);
    expect(cfg.port).toBe(4000);
    expect(cfg.databaseUrl).toBe("postgres://localhost/notifications");
    expect(cfg.realtimeEnabled).toBe(true);
    expect(cfg.services).toEqual({
      taskServiceUrl: "http://localhost:8080",
      projectServiceUrl: "http://localhost:8080",
      userServiceUrl: "http://localhost:8080"
    });
    expect(cfg.enrichmentTimeoutMs).toBe(2000);
    expect(cfg.stream).toEqual({
      bufferSize: 100,
      overflowPolicy: "drop-oldest",
      keepAliveMs: 30_000
    });
    expect(cfg.corsAllowedOrigins).toEqual([
      "http://localhost:5173",
      "http://127.0.0.1:5173"
    ]);
  });

  it("throws when required vars are missing", () => {
    expect(() => loadConfig({ ...base, PORT: "" })).toThrow(ConfigError);
    expect(() => loadConfig({ PORT: "4000" })).toThrow(
      "Missing required environment variable: DATABASE_URL"
    );
  });

  it("validates port as positive integer", () => {
    expect(() => loadConfig({ ...base, PORT: "not-a-number" })).toThrow(ConfigError);
    expect(() => loadConfig({ ...base, PORT: "-1" })).toThrow(ConfigError);
  });

  it("reads service urls without a trailing slash", () => {
    const cfg = loadConfig({
      ...base,
      TASK_SERVICE_URL: "http://tasks.internal:9000/",
      USER_SERVICE_URL: "http://users.internal"
    });
    expect(cfg.services.taskServiceUrl).toBe("http://tasks.internal:9000");
    expect(cfg.services.userServiceUrl).toBe("http://users.internal");
    expect(cfg.services.projectServiceUrl).toBe("http://localhost:8080");
  });

  it("rejects relative service urls", () => {
    expect(() => loadConfig({ ...base, PROJECT_SERVICE_URL: "projects" })).toThrow(
      ConfigError
    );
  });

  it("parses stream and realtime settings", () => {
    const cfg = loadConfig({
      ...base,
      REALTIME_ENABLED: "off",
      STREAM_BUFFER_SIZE: "8",
      STREAM_OVERFLOW_POLICY: "Close-Subscriber",
      STREAM_KEEPALIVE_MS: "1000",
      ENRICHMENT_TIMEOUT_MS: "250",
      CORS_ALLOWED_ORIGINS: "https://app.example.test, https://admin.example.test"
    });
    expect(cfg.realtimeEnabled).toBe(false);
    expect(cfg.stream).toEqual({
      bufferSize: 8,
      overflowPolicy: "close-subscriber",
      keepAliveMs: 1000
    });
    expect(cfg.enrichmentTimeoutMs).toBe(250);
    expect(cfg.corsAllowedOrigins).toEqual([
      "https://app.example.test",
      "https://admin.example.test"
    ]);
  });

  it("rejects invalid stream settings", () => {
    expect(() => loadConfig({ ...base, STREAM_BUFFER_SIZE: "0" })).toThrow(ConfigError);
    expect(() => loadConfig({ ...base, STREAM_OVERFLOW_POLICY: "block" })).toThrow(
      ConfigError
    );
    expect(() => loadConfig({ ...base, REALTIME_ENABLED: "maybe" })).toThrow(ConfigError);
  });
});
