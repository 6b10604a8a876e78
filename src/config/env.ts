import dotenv from "dotenv";
import { z } from "zod";
import { validationError } from "../utils/errors.js";

export interface GatewayConfig {
  immich: {
    baseUrl: string;
    apiKey: string;
    timeoutMs: number;
    maxAttempts: number;
    retryBaseDelayMs: number;
  };
  maxPageSize: number;
  uploads: {
    sessionTimeoutMs: number;
    sweepIntervalMs: number;
    publicBaseUrl: string;
  };
  transport: {
    kind: "http" | "stdio";
    host: string;
    port: number;
    path: string;
    allowedHosts: string[];
    allowedOrigins: string[];
  };
}

const positiveInt = (fallback: number) => z.coerce.number().int().positive().default(fallback);

const envSchema = z.object({
  IMMICH_BASE_URL: z.string().url({ message: "IMMICH_BASE_URL must be an absolute URL" }),
  IMMICH_API_KEY: z.string().min(1, { message: "IMMICH_API_KEY is required" }),
  MAX_PAGE_SIZE: positiveInt(100),
  UPLOAD_SESSION_TIMEOUT_MINUTES: positiveInt(30),
  UPLOAD_SWEEP_INTERVAL_SECONDS: positiveInt(60),
  UPSTREAM_TIMEOUT_MS: positiveInt(120_000),
  UPSTREAM_MAX_ATTEMPTS: positiveInt(3),
  UPSTREAM_RETRY_BASE_MS: z.coerce.number().int().nonnegative().default(1000),
  MCP_TRANSPORT: z.enum(["http", "stdio"]).default("http"),
  MCP_HTTP_HOST: z.string().min(1).default("0.0.0.0"),
  MCP_PORT: z.coerce.number().int().min(0).max(65535).default(5000),
  MCP_HTTP_PATH: z.string().startsWith("/").default("/mcp"),
  MCP_PUBLIC_URL: z.string().url().optional(),
  MCP_ALLOWED_HOSTS: z.string().optional(),
  MCP_ALLOWED_ORIGINS: z.string().optional()
});

function splitList(value: string | undefined): string[] {
  return (value ?? "")
    .split(",")
    .map((entry) => entry.trim())
    .filter((entry) => entry.length > 0);
}

function firstNonEmpty(...values: Array<string | undefined>): string | undefined {
  return values.find((value) => value !== undefined && value.trim().length > 0)?.trim();
}

export function trimTrailingSlash(url: string): string {
  return url.replace(/\/+$/, "");
}

/**
 * Loads `.env` into `process.env` without overriding variables already set.
 * `--env-file <path>` selects a file other than `./.env`.
 */
export function loadDotenv(argv: string[] = process.argv): void {
  const index = argv.indexOf("--env-file");
  const path = index === -1 ? undefined : argv[index + 1];
  dotenv.config(path ? { path, override: false } : { override: false });
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): GatewayConfig {
  const parsed = envSchema.safeParse({
    ...env,
    IMMICH_BASE_URL: firstNonEmpty(env["IMMICH_BASE_URL"], env["IMMICH_URL"]),
    IMMICH_API_KEY: firstNonEmpty(env["IMMICH_API_KEY"], env["IMMICH_TOKEN"]),
    MCP_PUBLIC_URL: firstNonEmpty(env["MCP_PUBLIC_URL"], env["MCP_BASE_URL"])
  });

  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => ({
      variable: issue.path.join("."),
      message: issue.message
    }));
    throw validationError(
      `Invalid configuration: ${issues.map((issue) => `${issue.variable} (${issue.message})`).join(", ")}`,
      { issues }
    );
  }

  const values = parsed.data;

  return {
    immich: {
      baseUrl: trimTrailingSlash(values.IMMICH_BASE_URL),
      apiKey: values.IMMICH_API_KEY,
      timeoutMs: values.UPSTREAM_TIMEOUT_MS,
      maxAttempts: values.UPSTREAM_MAX_ATTEMPTS,
      retryBaseDelayMs: values.UPSTREAM_RETRY_BASE_MS
    },
    maxPageSize: values.MAX_PAGE_SIZE,
    uploads: {
      sessionTimeoutMs: values.UPLOAD_SESSION_TIMEOUT_MINUTES * 60_000,
      sweepIntervalMs: values.UPLOAD_SWEEP_INTERVAL_SECONDS * 1000,
      publicBaseUrl: trimTrailingSlash(values.MCP_PUBLIC_URL ?? `http://localhost:${values.MCP_PORT}`)
    },
    transport: {
      kind: values.MCP_TRANSPORT,
      host: values.MCP_HTTP_HOST,
      port: values.MCP_PORT,
      path: values.MCP_HTTP_PATH,
      allowedHosts: splitList(values.MCP_ALLOWED_HOSTS),
      allowedOrigins: splitList(values.MCP_ALLOWED_ORIGINS)
    }
  };
}
