#!/usr/bin/env node
import { readFile } from "node:fs/promises";
import { z } from "zod";
import { loadConfig, loadDotenv, type GatewayConfig } from "./config/env.js";
import { UploadSessionManager } from "./domain/uploadSessionManager.js";
import { createGatewayMcpServer, type GatewayServices } from "./server/createServer.js";
import { startHttpTransport } from "./transports/http.js";
import { startStdioTransport } from "./transports/stdio.js";
import { ImmichClient } from "./upstream/immichClient.js";
import { conciseErrorText, validationError } from "./utils/errors.js";
import { log } from "./utils/logger.js";

const logger = log.child("main");

const packageJsonSchema = z.object({ version: z.string().optional() });

function parseArg(flag: string): string | undefined {
  const index = process.argv.findIndex((value) => value === flag);
  if (index === -1) {
    return undefined;
  }

  return process.argv[index + 1];
}

async function resolvePackageVersion(): Promise<string> {
  try {
    const raw = await readFile(new URL("../package.json", import.meta.url), "utf8");
    const parsed = packageJsonSchema.safeParse(JSON.parse(raw));
    return (parsed.success ? parsed.data.version : undefined) ?? "0.1.0";
  } catch {
    return "0.1.0";
  }
}

function applyCliOverrides(config: GatewayConfig): GatewayConfig["transport"] {
  const transport = parseArg("--transport") ?? config.transport.kind;
  const port = parseArg("--port");
  if (port !== undefined && !/^\d+$/.test(port)) {
    throw validationError(`Invalid --port value: ${port}`);
  }

  return {
    ...config.transport,
    kind: transport === "stdio" ? "stdio" : "http",
    host: parseArg("--host") ?? config.transport.host,
    port: port === undefined ? config.transport.port : Number(port),
    path: parseArg("--path") ?? config.transport.path
  };
}

function buildServices(config: GatewayConfig, sessions: UploadSessionManager): GatewayServices {
  return {
    client: new ImmichClient({
      baseUrl: config.immich.baseUrl,
      apiKey: config.immich.apiKey,
      timeoutMs: config.immich.timeoutMs,
      retry: { maxAttempts: config.immich.maxAttempts, baseDelayMs: config.immich.retryBaseDelayMs }
    }),
    sessions,
    maxPageSize: config.maxPageSize,
    publicBaseUrl: config.uploads.publicBaseUrl
  };
}

async function main(): Promise<void> {
  loadDotenv(process.argv);
  const config = loadConfig();
  const transport = applyCliOverrides(config);
  const version = await resolvePackageVersion();

  const sessions = new UploadSessionManager({
    timeoutMs: config.uploads.sessionTimeoutMs,
    sweepIntervalMs: config.uploads.sweepIntervalMs
  });
  sessions.start();
  const services = buildServices(config, sessions);

  let close: () => Promise<void>;

  if (transport.kind === "http") {
    const gateway = await startHttpTransport({
      host: transport.host,
      port: transport.port,
      path: transport.path,
      services,
      version,
      allowedHosts: transport.allowedHosts,
      allowedOrigins: transport.allowedOrigins
    });
    logger.info("immich-gateway-mcp ready", {
      transport: "http",
      mcp: `http://${transport.host}:${transport.port}${transport.path}`,
      upstream: config.immich.baseUrl
    });
    close = gateway.close;
  } else {
    const uploads = await startHttpTransport({
      host: transport.host,
      port: transport.port,
      path: transport.path,
      services,
      version,
      serveMcp: false
    });
    const server = createGatewayMcpServer({ ...services, version });
    await startStdioTransport(server);
    logger.info("immich-gateway-mcp ready", {
      transport: "stdio",
      uploads: `http://${transport.host}:${transport.port}/upload/{session_id}`,
      upstream: config.immich.baseUrl
    });
    close = async () => {
      await server.close();
      await uploads.close();
    };
  }

  const shutdown = async () => {
    sessions.stop();
    try {
      await close();
    } catch (error) {
      logger.error("shutdown failed", { error });
      process.exit(1);
    }
    process.exit(0);
  };

  process.once("SIGINT", () => {
    void shutdown();
  });
  process.once("SIGTERM", () => {
    void shutdown();
  });
}

main().catch((error: unknown) => {
  logger.error(`Failed to start immich-gateway-mcp: ${conciseErrorText(error)}`, { error });
  process.exit(1);
});
