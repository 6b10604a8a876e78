import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import type { UploadSessionManager } from "../domain/uploadSessionManager.js";
import type { ImmichClient } from "../upstream/immichClient.js";
import { createToolRunner } from "./envelope.js";
import { registerTools } from "./registerTools.js";

/** Long-lived services shared by every MCP session and the upload route. */
export interface GatewayServices {
  client: ImmichClient;
  sessions: UploadSessionManager;
  maxPageSize: number;
  publicBaseUrl: string;
}

export interface CreateGatewayServerOptions extends GatewayServices {
  version?: string;
}

export function createGatewayMcpServer(options: CreateGatewayServerOptions): McpServer {
  const server = new McpServer(
    {
      name: "immich-gateway-mcp",
      version: options.version ?? "0.1.0"
    },
    {
      capabilities: {
        tools: { listChanged: true }
      },
      instructions:
        "Every tool returns an envelope {ok, result|error, meta}. Deletes, merges and bulk updates are gated: " +
        "call once to preview, then repeat with confirm=true (and dry_run=false for bulk tools). " +
        "To upload a file you cannot pass inline, call immich.assets.upload_init and POST it to the returned URL."
    }
  );

  registerTools(server, {
    client: options.client,
    sessions: options.sessions,
    maxPageSize: options.maxPageSize,
    publicBaseUrl: options.publicBaseUrl,
    run: createToolRunner(options.client.baseUrl)
  });

  return server;
}
