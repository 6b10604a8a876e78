import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { envelopeOutputShape, success } from "../envelope.js";
import { readOnlyAnnotations } from "../../types/contracts.js";
import { unwrap, type ToolDependencies } from "./toolSupport.js";

const ADVERTISED_TOOL_GROUPS = {
  assets: [
    "list",
    "get",
    "exif",
    "download.original",
    "download.thumbnail",
    "upload",
    "upload_from_path",
    "upload_init",
    "upload_status",
    "update",
    "bulk_update",
    "delete",
    "statistics"
  ],
  search: ["metadata", "smart", "explore"],
  albums: ["list", "get", "create", "update", "assets.add", "assets.remove", "delete", "statistics"],
  people: ["list", "get", "update", "merge", "assets"],
  tags: ["list", "get", "create", "update", "delete", "assets.add", "assets.remove"],
  shared_links: ["list", "get", "create", "update", "delete", "assets.add", "assets.remove"],
  activities: ["list", "create", "delete", "statistics"]
} as const;

export function registerHealthTools(server: McpServer, deps: ToolDependencies): void {
  const { client, run } = deps;

  server.registerTool(
    "immich.ping",
    {
      description: "Verify connectivity and authentication with the photo library. Returns the server version.",
      inputSchema: {},
      outputSchema: envelopeOutputShape,
      annotations: readOnlyAnnotations
    },
    async (_args, extra) =>
      run(extra, async (ctx) => {
        const about = unwrap(await client.ping(ctx.signal), "Ping failed");
        return success(ctx, {
          connected: true,
          version: about.version,
          build: about.build ?? null,
          nodejs: about.nodejs ?? null,
          ffmpeg: about.ffmpeg ?? null,
          exiftool: about.exiftool ?? null
        });
      })
  );

  server.registerTool(
    "immich.capabilities",
    {
      description: "Report upstream server features and the tool groups this gateway exposes.",
      inputSchema: {},
      outputSchema: envelopeOutputShape,
      annotations: readOnlyAnnotations
    },
    async (_args, extra) =>
      run(extra, async (ctx) => {
        const [about, features] = await Promise.all([client.ping(ctx.signal), client.getFeatures(ctx.signal)]);
        const warnings: string[] = [];
        if (!about.ok) warnings.push(`Server info unavailable: ${about.message}`);
        if (!features.ok) warnings.push(`Feature list unavailable: ${features.message}`);

        return success(
          ctx,
          {
            connected: about.ok,
            version: about.ok ? about.value.version : null,
            features: features.ok ? features.value : null,
            max_page_size: deps.maxPageSize,
            tools: ADVERTISED_TOOL_GROUPS
          },
          { warnings }
        );
      })
  );
}
