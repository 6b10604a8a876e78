/**
 * Scoped structured logger.
 * - Output goes to stderr; stdout carries the MCP stdio channel.
 * - Level from IMMICH_MCP_LOG_LEVEL, JSON lines when IMMICH_MCP_LOG_FORMAT=json.
 * - Credential-like keys in structured data are masked before serialization.
 */

export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

const LEVELS: Record<LogLevel, number> = { debug: 0, info: 1, warn: 2, error: 3, silent: 4 };

const PREFIX = "immich-gateway-mcp";

const MASKED_KEYS = new Set(["apikey", "api_key", "x-api-key", "password", "token", "authorization"]);

function isLogLevel(value: string): value is LogLevel {
  return Object.hasOwn(LEVELS, value);
}

export function parseLogLevel(raw: string | undefined): LogLevel {
  const normalized = raw?.trim().toLowerCase();
  if (normalized && isLogLevel(normalized)) return normalized;
  return "info";
}

function minLevel(): number {
  return LEVELS[parseLogLevel(process.env["IMMICH_MCP_LOG_LEVEL"])];
}

function isJsonFormat(): boolean {
  return process.env["IMMICH_MCP_LOG_FORMAT"] === "json";
}

function maskSecret(value: unknown): unknown {
  if (typeof value !== "string") return "<masked>";
  if (value.length <= 8) return "***";
  return `${value.slice(0, 2)}...${value.slice(-2)}`;
}

function sanitize(value: unknown): unknown {
  if (value instanceof Error) {
    return { name: value.name, message: value.message, stack: value.stack };
  }
  if (Array.isArray(value)) return value.map((item) => sanitize(item));
  if (value === null || typeof value !== "object") return value;

  const result: Record<string, unknown> = {};
  for (const [key, inner] of Object.entries(value)) {
    result[key] = MASKED_KEYS.has(key.toLowerCase()) ? maskSecret(inner) : sanitize(inner);
  }
  return result;
}

export function formatLogLine(lvl: LogLevel, scope: string, msg: string, data?: Record<string, unknown>): string {
  const serialized = data ? sanitize(data) : undefined;
  if (isJsonFormat()) {
    const fields = serialized && typeof serialized === "object" ? serialized : {};
    return JSON.stringify({ ts: new Date().toISOString(), level: lvl, scope, msg, ...fields });
  }
  const prefix = `[${PREFIX}] [${lvl.toUpperCase()}]${scope ? ` [${scope}]` : ""}`;
  const suffix = serialized ? ` ${JSON.stringify(serialized)}` : "";
  return `${prefix} ${msg}${suffix}`;
}

function write(lvl: LogLevel, scope: string, msg: string, data?: Record<string, unknown>): void {
  if (LEVELS[lvl] < minLevel()) return;
  console.error(formatLogLine(lvl, scope, msg, data));
}

export interface Logger {
  debug(msg: string, data?: Record<string, unknown>): void;
  info(msg: string, data?: Record<string, unknown>): void;
  warn(msg: string, data?: Record<string, unknown>): void;
  error(msg: string, data?: Record<string, unknown>): void;
  child(scope: string): Logger;
}

function createLogger(scope = ""): Logger {
  return {
    debug: (msg, data) => write("debug", scope, msg, data),
    info: (msg, data) => write("info", scope, msg, data),
    warn: (msg, data) => write("warn", scope, msg, data),
    error: (msg, data) => write("error", scope, msg, data),
    child: (childScope) => createLogger(scope ? `${scope}:${childScope}` : childScope)
  };
}

export const log = createLogger();
