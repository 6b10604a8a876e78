import { describe, expect, it } from "vitest";
import { loadConfig } from "../../src/config/env.js";
import { AppError } from "../../src/utils/errors.js";

const REQUIRED = { IMMICH_BASE_URL: "http://photos.local:2283/", IMMICH_API_KEY: "test-secret" };

describe("loadConfig", () => {
  it("applies defaults around the required settings", () => {
    const config = loadConfig({ ...REQUIRED });

    expect(config).toEqual({
      immich: {
        baseUrl: "http://photos.local:2283",
        apiKey: "test-secret",
        timeoutMs: 120_000,
        maxAttempts: 3,
        retryBaseDelayMs: 1000
      },
      maxPageSize: 100,
      uploads: {
        sessionTimeoutMs: 30 * 60_000,
        sweepIntervalMs: 60_000,
        publicBaseUrl: "http://localhost:5000"
      },
      transport: {
        kind: "http",
        host: "0.0.0.0",
        port: 5000,
        path: "/mcp",
        allowedHosts: [],
        allowedOrigins: []
      }
    });
  });

  it("accepts the legacy variable names", () => {
    const config = loadConfig({
      IMMICH_URL: "https://photos.example.com",
      IMMICH_TOKEN: "test-secret",
      MCP_BASE_URL: "https://gateway.example.com/"
    });

    expect(config.immich.baseUrl).toBe("https://photos.example.com");
    expect(config.immich.apiKey).toBe("test-secret");
    expect(config.uploads.publicBaseUrl).toBe("https://gateway.example.com");
  });

  it("prefers the primary names over the aliases", () => {
    const config = loadConfig({ ...REQUIRED, IMMICH_URL: "http://other.local" });

    expect(config.immich.baseUrl).toBe("http://photos.local:2283");
  });

  it("reads numeric overrides and lists", () => {
    const config = loadConfig({
      ...REQUIRED,
      MAX_PAGE_SIZE: "50",
      UPLOAD_SESSION_TIMEOUT_MINUTES: "5",
      UPLOAD_SWEEP_INTERVAL_SECONDS: "15",
      MCP_PORT: "8080",
      MCP_TRANSPORT: "stdio",
      MCP_ALLOWED_HOSTS: "localhost, 127.0.0.1,,"
    });

    expect(config.maxPageSize).toBe(50);
    expect(config.uploads.sessionTimeoutMs).toBe(300_000);
    expect(config.uploads.sweepIntervalMs).toBe(15_000);
    expect(config.uploads.publicBaseUrl).toBe("http://localhost:8080");
    expect(config.transport.kind).toBe("stdio");
    expect(config.transport.allowedHosts).toEqual(["localhost", "127.0.0.1"]);
  });

  it("reports a missing upstream url", () => {
    expect(() => loadConfig({ IMMICH_API_KEY: "test-secret" })).toThrowError(/IMMICH_BASE_URL/);
  });

  it("lists every invalid variable in the error details", () => {
    let caught: unknown;
    try {
      loadConfig({ IMMICH_BASE_URL: "not a url", MAX_PAGE_SIZE: "-1" });
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(AppError);
    const issues = caught instanceof AppError ? caught.details?.["issues"] : undefined;
    expect(issues).toEqual([
      { variable: "IMMICH_BASE_URL", message: "IMMICH_BASE_URL must be an absolute URL" },
      { variable: "IMMICH_API_KEY", message: "Required" },
      { variable: "MAX_PAGE_SIZE", message: "Number must be greater than 0" }
    ]);
  });
});
