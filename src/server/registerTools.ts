import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { registerActivityTools } from "./tools/activityTools.js";
import { registerAlbumTools } from "./tools/albumTools.js";
import { registerAssetTools } from "./tools/assetTools.js";
import { registerHealthTools } from "./tools/healthTools.js";
import { registerPeopleTools } from "./tools/peopleTools.js";
import { registerSearchTools } from "./tools/searchTools.js";
import { registerSharedLinkTools } from "./tools/sharedLinkTools.js";
import { registerTagTools } from "./tools/tagTools.js";
import { registerUploadTools } from "./tools/uploadTools.js";
import type { ToolDependencies, ToolRegistrar } from "./tools/toolSupport.js";

const TOOL_GROUPS: readonly ToolRegistrar[] = [
  registerHealthTools,
  registerAssetTools,
  registerUploadTools,
  registerSearchTools,
  registerAlbumTools,
  registerPeopleTools,
  registerTagTools,
  registerSharedLinkTools,
  registerActivityTools
];

export function registerTools(server: McpServer, deps: ToolDependencies): void {
  for (const register of TOOL_GROUPS) {
    register(server, deps);
  }
}
