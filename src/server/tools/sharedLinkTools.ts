import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import { paginate } from "../../domain/pagination.js";
import { runGated } from "../../domain/safetyGate.js";
import {
  confirmSchema,
  destructiveAnnotations,
  idListSchema,
  idSchema,
  isoDateSchema,
  mutatingAnnotations,
  pagingShape,
  readOnlyAnnotations
} from "../../types/contracts.js";
import { mapResult } from "../../upstream/immichClient.js";
import type { SharedLink } from "../../upstream/schemas.js";
import { validationError } from "../../utils/errors.js";
import {
  boundedText,
  compact,
  optionalId,
  parseIdList,
  parseIsoDate,
  requireId
} from "../../utils/parsing.js";
import { envelopeOutputShape, gateEnvelope, success } from "../envelope.js";
import { summarizeBulkIds, unwrap, type ToolDependencies } from "./toolSupport.js";

const permissionShape = {
  allow_upload: z.boolean().optional(),
  allow_download: z.boolean().optional(),
  show_metadata: z.boolean().optional(),
  password: z.string().optional().describe("Password protection; an empty string removes it on update"),
  description: z.string().optional()
};

export function registerSharedLinkTools(server: McpServer, deps: ToolDependencies): void {
  const { client, run, maxPageSize } = deps;

  const summarizeLink = (link: SharedLink) => ({
    id: link.id,
    type: link.type,
    description: link.description ?? null,
    share_url: link.key ? `${client.baseUrl}/share/${link.key}` : null,
    expires_at: link.expiresAt ?? null,
    allow_upload: link.allowUpload ?? null,
    allow_download: link.allowDownload ?? null,
    show_metadata: link.showMetadata ?? null,
    album_id: link.album?.id ?? null,
    asset_count: link.assets?.length ?? 0
  });

  server.registerTool(
    "immich.shared_links.list",
    {
      description: "List shared links.",
      inputSchema: { ...pagingShape },
      outputSchema: envelopeOutputShape,
      annotations: readOnlyAnnotations
    },
    async (args, extra) =>
      run(extra, async (ctx) => {
        const links = unwrap(await client.listSharedLinks(ctx.signal), "Failed to list shared links");
        const page = paginate(links.map(summarizeLink), args, maxPageSize);
        return success(ctx, page.items, page.meta);
      })
  );

  server.registerTool(
    "immich.shared_links.get",
    {
      description: "Get a shared link by id.",
      inputSchema: { id: idSchema },
      outputSchema: envelopeOutputShape,
      annotations: readOnlyAnnotations
    },
    async (args, extra) =>
      run(extra, async (ctx) => {
        const id = requireId(args.id, "id");
        return success(ctx, summarizeLink(unwrap(await client.getSharedLink(id, ctx.signal), `Shared link ${id}`)));
      })
  );

  server.registerTool(
    "immich.shared_links.create",
    {
      description: "Create a shared link for an album (type ALBUM) or a set of assets (type INDIVIDUAL).",
      inputSchema: {
        type: z.enum(["ALBUM", "INDIVIDUAL"]).default("INDIVIDUAL"),
        album_id: idSchema.describe("Required when type is ALBUM"),
        asset_ids: idListSchema.describe("Required when type is INDIVIDUAL"),
        expires_at: isoDateSchema,
        ...permissionShape
      },
      outputSchema: envelopeOutputShape,
      annotations: mutatingAnnotations
    },
    async (args, extra) =>
      run(extra, async (ctx) => {
        const albumId = optionalId(args.album_id, "album_id");
        if (args.type === "ALBUM" && !albumId) {
          throw validationError("album_id is required for ALBUM links", { field: "album_id" });
        }
        const input = compact({
          type: args.type,
          albumId: args.type === "ALBUM" ? albumId : undefined,
          assetIds: args.type === "INDIVIDUAL" ? parseIdList(args.asset_ids, "asset_ids") : undefined,
          expiresAt: parseIsoDate(args.expires_at, "expires_at"),
          allowUpload: args.allow_upload,
          allowDownload: args.allow_download,
          showMetadata: args.show_metadata,
          password: args.password,
          description: boundedText(args.description, "description")
        });
        const link = unwrap(await client.createSharedLink(input, ctx.signal), "Failed to create shared link");
        return success(ctx, summarizeLink(link));
      })
  );

  server.registerTool(
    "immich.shared_links.update",
    {
      description: "Update a shared link's expiry, permissions, password or description.",
      inputSchema: {
        id: idSchema,
        expires_at: isoDateSchema,
        ...permissionShape
      },
      outputSchema: envelopeOutputShape,
      annotations: mutatingAnnotations
    },
    async (args, extra) =>
      run(extra, async (ctx) => {
        const id = requireId(args.id, "id");
        const expiresAt = parseIsoDate(args.expires_at, "expires_at");
        const changes = compact({
          expiresAt,
          changeExpiryTime: expiresAt === undefined ? undefined : true,
          allowUpload: args.allow_upload,
          allowDownload: args.allow_download,
          showMetadata: args.show_metadata,
          password: args.password,
          description: boundedText(args.description, "description")
        });
        if (Object.keys(changes).length === 0) {
          throw validationError("No changes provided");
        }
        const link = unwrap(await client.updateSharedLink(id, changes, ctx.signal), `Shared link ${id}`);
        return success(ctx, summarizeLink(link));
      })
  );

  server.registerTool(
    "immich.shared_links.delete",
    {
      description: "Delete a shared link. Without confirm=true returns a preview.",
      inputSchema: { id: idSchema, confirm: confirmSchema },
      outputSchema: envelopeOutputShape,
      annotations: destructiveAnnotations
    },
    async (args, extra) =>
      run(extra, async (ctx) => {
        const id = requireId(args.id, "id");
        const outcome = await runGated({
          kind: "single",
          action: `Shared link ${id} deletion`,
          confirm: args.confirm,
          prompt: "Deletion requires confirm=true. The preview shows the link that would stop working.",
          preview: async () =>
            mapResult(await client.getSharedLink(id, ctx.signal), (link) => ({
              shared_link_id: link.id,
              type: link.type,
              description: link.description ?? null,
              album_id: link.album?.id ?? null,
              asset_count: link.assets?.length ?? 0
            })),
          execute: () => client.deleteSharedLink(id, ctx.signal)
        });

        return gateEnvelope(ctx, outcome, () => ({ deleted: true, shared_link_id: id }));
      })
  );

  server.registerTool(
    "immich.shared_links.assets.add",
    {
      description: "Add assets to an INDIVIDUAL shared link.",
      inputSchema: { id: idSchema, asset_ids: idListSchema },
      outputSchema: envelopeOutputShape,
      annotations: mutatingAnnotations
    },
    async (args, extra) =>
      run(extra, async (ctx) => {
        const id = requireId(args.id, "id");
        const assetIds = parseIdList(args.asset_ids, "asset_ids");
        const results = unwrap(await client.addAssetsToSharedLink(id, assetIds, ctx.signal), `Shared link ${id}`);
        return success(ctx, { shared_link_id: id, ...summarizeBulkIds(results) });
      })
  );

  server.registerTool(
    "immich.shared_links.assets.remove",
    {
      description: "Remove assets from an INDIVIDUAL shared link.",
      inputSchema: { id: idSchema, asset_ids: idListSchema },
      outputSchema: envelopeOutputShape,
      annotations: mutatingAnnotations
    },
    async (args, extra) =>
      run(extra, async (ctx) => {
        const id = requireId(args.id, "id");
        const assetIds = parseIdList(args.asset_ids, "asset_ids");
        const results = unwrap(await client.removeAssetsFromSharedLink(id, assetIds, ctx.signal), `Shared link ${id}`);
        return success(ctx, { shared_link_id: id, ...summarizeBulkIds(results) });
      })
  );
}
