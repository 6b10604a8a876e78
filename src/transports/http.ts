import { randomUUID } from "node:crypto";
import { createServer, type IncomingMessage, type Server, type ServerResponse } from "node:http";
import { URL } from "node:url";
import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { StreamableHTTPServerTransport } from "@modelcontextprotocol/sdk/server/streamableHttp.js";
import { isInitializeRequest } from "@modelcontextprotocol/sdk/types.js";
import { createGatewayMcpServer, type GatewayServices } from "../server/createServer.js";
import { handleUpload } from "../upload/uploadHandler.js";
import { log } from "../utils/logger.js";

const logger = log.child("http");

const UPLOAD_ROUTE = /^\/upload\/([^/]+)\/?$/;

interface SessionEntry {
  server: McpServer;
  transport: StreamableHTTPServerTransport;
}

export interface HttpTransportOptions {
  host: string;
  port: number;
  path: string;
  services: GatewayServices;
  version?: string;
  /** Host header allow-list for the MCP endpoint; unset accepts any host. */
  allowedHosts?: string[];
  allowedOrigins?: string[];
  /** When false only the upload and health routes are served, as alongside a stdio session. */
  serveMcp?: boolean;
}

export interface HttpGateway {
  server: Server;
  /** Base URL the listener is reachable at, with the bound port. */
  url: string;
  close(): Promise<void>;
}

function sendJson(res: ServerResponse, statusCode: number, payload: Record<string, unknown>): void {
  res.statusCode = statusCode;
  res.setHeader("content-type", "application/json");
  res.end(JSON.stringify(payload));
}

function parseHostHeader(value: string | undefined): string {
  if (!value) {
    return "";
  }

  const lower = value.toLowerCase();
  if (lower.startsWith("[")) {
    const end = lower.indexOf("]");
    return end > -1 ? lower.slice(0, end + 1) : lower;
  }

  return lower.split(":")[0] ?? "";
}

function parseOriginHost(origin: string | undefined): string {
  if (!origin) {
    return "";
  }

  try {
    const parsed = new URL(origin);
    return parsed.host.toLowerCase();
  } catch {
    return "";
  }
}

async function readBody(req: IncomingMessage): Promise<Buffer> {
  const chunks: Buffer[] = [];

  for await (const chunk of req) {
    chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(chunk));
  }

  return Buffer.concat(chunks);
}

async function parseJsonBody(req: IncomingMessage): Promise<unknown> {
  const text = (await readBody(req)).toString("utf8");
  if (!text.trim()) {
    return undefined;
  }

  return JSON.parse(text);
}

async function toWebRequest(req: IncomingMessage, url: URL): Promise<Request> {
  const body = await readBody(req);
  const headers = new Headers();
  const contentType = req.headers["content-type"];
  if (contentType) {
    headers.set("content-type", contentType);
  }

  return new Request(url, { method: "POST", headers, body: new Uint8Array(body) });
}

async function closeSession(entry: SessionEntry): Promise<void> {
  await entry.transport.close();
  await entry.server.close();
}

/**
 * Streamable HTTP MCP endpoint plus the out-of-band upload and liveness routes.
 * Every MCP session gets its own `McpServer`; all of them share `options.services`.
 */
export async function startHttpTransport(options: HttpTransportOptions): Promise<HttpGateway> {
  const sessions = new Map<string, SessionEntry>();
  const allowedHosts = new Set((options.allowedHosts ?? []).map((host) => host.toLowerCase()));
  const allowedOrigins = new Set((options.allowedOrigins ?? []).map((origin) => origin.toLowerCase()));

  async function handleMcp(req: IncomingMessage, res: ServerResponse): Promise<void> {
    const host = parseHostHeader(req.headers.host);
    if (allowedHosts.size > 0 && host && !allowedHosts.has(host)) {
      sendJson(res, 403, { error: "Host not allowed" });
      return;
    }

    const originHost = parseOriginHost(req.headers.origin);
    if (originHost && allowedOrigins.size > 0 && !allowedOrigins.has(originHost)) {
      sendJson(res, 403, { error: "Origin not allowed" });
      return;
    }

    res.setHeader("access-control-allow-methods", "GET, POST, DELETE, OPTIONS");
    res.setHeader("access-control-allow-headers", "content-type, mcp-session-id");
    res.setHeader("access-control-allow-origin", req.headers.origin ?? "*");

    if (req.method === "OPTIONS") {
      res.statusCode = 204;
      res.end();
      return;
    }

    const sessionIdHeader = req.headers["mcp-session-id"];
    const sessionId = Array.isArray(sessionIdHeader) ? sessionIdHeader[0] : sessionIdHeader;

    if (req.method === "POST") {
      let parsedBody: unknown;
      try {
        parsedBody = await parseJsonBody(req);
      } catch {
        sendJson(res, 400, { error: "Request body is not valid JSON" });
        return;
      }

      let entry: SessionEntry | undefined;
      if (!sessionId) {
        if (!isInitializeRequest(parsedBody)) {
          sendJson(res, 400, {
            error: "Missing Mcp-Session-Id. New sessions can only be created via initialize request."
          });
          return;
        }

        const createdServer = createGatewayMcpServer({ ...options.services, version: options.version });

        const transport = new StreamableHTTPServerTransport({
          sessionIdGenerator: () => randomUUID(),
          onsessioninitialized: (generatedSessionId) => {
            sessions.set(generatedSessionId, {
              server: createdServer,
              transport
            });
            logger.debug("mcp session opened", { sessionId: generatedSessionId });
          },
          onsessionclosed: async (generatedSessionId) => {
            const existing = sessions.get(generatedSessionId);
            if (existing) {
              sessions.delete(generatedSessionId);
              await closeSession(existing);
              logger.debug("mcp session closed", { sessionId: generatedSessionId });
            }
          }
        });

        await createdServer.connect(transport);
        entry = {
          server: createdServer,
          transport
        };
      } else {
        entry = sessions.get(sessionId);
        if (!entry) {
          sendJson(res, 404, { error: "Unknown session" });
          return;
        }
      }

      await entry.transport.handleRequest(req, res, parsedBody);
      return;
    }

    if (req.method === "GET" || req.method === "DELETE") {
      if (!sessionId) {
        sendJson(res, 400, { error: "Missing Mcp-Session-Id header" });
        return;
      }

      const entry = sessions.get(sessionId);
      if (!entry) {
        sendJson(res, 404, { error: "Unknown session" });
        return;
      }

      await entry.transport.handleRequest(req, res);

      if (req.method === "DELETE" && sessions.get(sessionId) === entry) {
        sessions.delete(sessionId);
        await closeSession(entry);
      }

      return;
    }

    sendJson(res, 405, {
      error: `Method ${req.method ?? "UNKNOWN"} not allowed`
    });
  }

  const server = createServer(async (req, res) => {
    try {
      const requestUrl = new URL(req.url ?? "", `http://${req.headers.host ?? `${options.host}:${options.port}`}`);

      if (requestUrl.pathname === "/health") {
        if (req.method !== "GET") {
          sendJson(res, 405, { error: `Method ${req.method ?? "UNKNOWN"} not allowed` });
          return;
        }
        sendJson(res, 200, { status: "healthy", timestamp: new Date().toISOString() });
        return;
      }

      const uploadMatch = UPLOAD_ROUTE.exec(requestUrl.pathname);
      if (uploadMatch) {
        if (req.method !== "POST") {
          sendJson(res, 405, { error: `Method ${req.method ?? "UNKNOWN"} not allowed` });
          return;
        }
        const sessionId = decodeURIComponent(uploadMatch[1] ?? "");
        const outcome = await handleUpload(sessionId, await toWebRequest(req, requestUrl), {
          sessions: options.services.sessions,
          client: options.services.client
        });
        sendJson(res, outcome.status, outcome.body);
        return;
      }

      if (options.serveMcp === false || requestUrl.pathname !== options.path) {
        sendJson(res, 404, { error: "Not Found" });
        return;
      }

      await handleMcp(req, res);
    } catch (error) {
      logger.error("http request failed", { method: req.method, url: req.url, error });
      if (!res.headersSent) {
        sendJson(res, 500, {
          error: error instanceof Error ? error.message : "Internal server error"
        });
      }
    }
  });

  await new Promise<void>((resolve, reject) => {
    server.once("error", reject);
    server.listen(options.port, options.host, () => {
      server.off("error", reject);
      resolve();
    });
  });

  const address = server.address();
  const port = typeof address === "object" && address !== null ? address.port : options.port;
  const url = `http://${options.host === "0.0.0.0" ? "127.0.0.1" : options.host}:${port}`;
  logger.info("http transport listening", { url, mcpPath: options.serveMcp === false ? null : options.path });

  return {
    server,
    url,
    close: async () => {
      for (const entry of sessions.values()) {
        await closeSession(entry);
      }
      sessions.clear();
      server.closeAllConnections();
      await new Promise<void>((resolve, reject) => {
        server.close((error) => (error ? reject(error) : resolve()));
      });
    }
  };
}
