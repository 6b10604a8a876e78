import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import { paginate } from "../../domain/pagination.js";
import { runGated } from "../../domain/safetyGate.js";
import {
  confirmSchema,
  destructiveAnnotations,
  idListSchema,
  idSchema,
  mutatingAnnotations,
  pagingShape,
  readOnlyAnnotations
} from "../../types/contracts.js";
import { mapResult } from "../../upstream/immichClient.js";
import { summarizeAsset, type Album } from "../../upstream/schemas.js";
import { validationError } from "../../utils/errors.js";
import { boundedText, compact, optionalId, parseIdList, requireId, requireText } from "../../utils/parsing.js";
import { envelopeOutputShape, gateEnvelope, success } from "../envelope.js";
import { summarizeBulkIds, unwrap, type ToolDependencies } from "./toolSupport.js";

function summarizeAlbum(album: Album) {
  return {
    id: album.id,
    album_name: album.albumName,
    description: album.description ?? null,
    asset_count: album.assetCount ?? null,
    shared: album.shared ?? null,
    created_at: album.createdAt ?? null,
    updated_at: album.updatedAt ?? null
  };
}

export function registerAlbumTools(server: McpServer, deps: ToolDependencies): void {
  const { client, run, maxPageSize } = deps;

  server.registerTool(
    "immich.albums.list",
    {
      description: "List albums, optionally only shared ones or those containing an asset.",
      inputSchema: {
        ...pagingShape,
        shared: z.boolean().optional(),
        asset_id: idSchema.describe("Only albums that contain this asset")
      },
      outputSchema: envelopeOutputShape,
      annotations: readOnlyAnnotations
    },
    async (args, extra) =>
      run(extra, async (ctx) => {
        const albums = unwrap(
          await client.listAlbums({ shared: args.shared, assetId: optionalId(args.asset_id, "asset_id") }, ctx.signal),
          "Failed to list albums"
        );
        const page = paginate(albums.map(summarizeAlbum), args, maxPageSize);
        return success(ctx, page.items, page.meta);
      })
  );

  server.registerTool(
    "immich.albums.get",
    {
      description: "Get an album with (optionally) its assets.",
      inputSchema: {
        id: idSchema,
        without_assets: z.boolean().default(false)
      },
      outputSchema: envelopeOutputShape,
      annotations: readOnlyAnnotations
    },
    async (args, extra) =>
      run(extra, async (ctx) => {
        const id = requireId(args.id, "id");
        const album = unwrap(await client.getAlbum(id, args.without_assets, ctx.signal), `Album ${id}`);
        return success(ctx, {
          ...summarizeAlbum(album),
          assets: args.without_assets ? undefined : (album.assets ?? []).map(summarizeAsset)
        });
      })
  );

  server.registerTool(
    "immich.albums.create",
    {
      description: "Create an album, optionally seeded with assets.",
      inputSchema: {
        album_name: z.string().optional(),
        description: z.string().optional(),
        asset_ids: idListSchema
      },
      outputSchema: envelopeOutputShape,
      annotations: mutatingAnnotations
    },
    async (args, extra) =>
      run(extra, async (ctx) => {
        const input = compact({
          albumName: requireText(args.album_name, "album_name"),
          description: boundedText(args.description, "description"),
          assetIds: args.asset_ids?.trim() ? parseIdList(args.asset_ids, "asset_ids") : undefined
        });
        const album = unwrap(await client.createAlbum(input, ctx.signal), "Failed to create album");
        return success(ctx, summarizeAlbum(album));
      })
  );

  server.registerTool(
    "immich.albums.update",
    {
      description: "Rename an album or change its description, activity setting or sort order.",
      inputSchema: {
        id: idSchema,
        album_name: z.string().optional(),
        description: z.string().optional(),
        is_activity_enabled: z.boolean().optional(),
        order: z.enum(["asc", "desc"]).optional()
      },
      outputSchema: envelopeOutputShape,
      annotations: mutatingAnnotations
    },
    async (args, extra) =>
      run(extra, async (ctx) => {
        const id = requireId(args.id, "id");
        const changes = compact({
          albumName: args.album_name === undefined ? undefined : requireText(args.album_name, "album_name"),
          description: boundedText(args.description, "description"),
          isActivityEnabled: args.is_activity_enabled,
          order: args.order
        });
        if (Object.keys(changes).length === 0) {
          throw validationError("No changes provided");
        }
        const album = unwrap(await client.updateAlbum(id, changes, ctx.signal), `Album ${id}`);
        return success(ctx, summarizeAlbum(album));
      })
  );

  server.registerTool(
    "immich.albums.assets.add",
    {
      description: "Add assets to an album.",
      inputSchema: { id: idSchema, asset_ids: idListSchema },
      outputSchema: envelopeOutputShape,
      annotations: mutatingAnnotations
    },
    async (args, extra) =>
      run(extra, async (ctx) => {
        const id = requireId(args.id, "id");
        const assetIds = parseIdList(args.asset_ids, "asset_ids");
        const results = unwrap(await client.addAssetsToAlbum(id, assetIds, ctx.signal), `Album ${id}`);
        return success(ctx, { album_id: id, ...summarizeBulkIds(results) });
      })
  );

  server.registerTool(
    "immich.albums.assets.remove",
    {
      description: "Remove assets from an album. The assets themselves are kept.",
      inputSchema: { id: idSchema, asset_ids: idListSchema },
      outputSchema: envelopeOutputShape,
      annotations: mutatingAnnotations
    },
    async (args, extra) =>
      run(extra, async (ctx) => {
        const id = requireId(args.id, "id");
        const assetIds = parseIdList(args.asset_ids, "asset_ids");
        const results = unwrap(await client.removeAssetsFromAlbum(id, assetIds, ctx.signal), `Album ${id}`);
        return success(ctx, { album_id: id, ...summarizeBulkIds(results) });
      })
  );

  server.registerTool(
    "immich.albums.delete",
    {
      description: "Delete an album (its assets are kept). Without confirm=true returns a preview.",
      inputSchema: { id: idSchema, confirm: confirmSchema },
      outputSchema: envelopeOutputShape,
      annotations: destructiveAnnotations
    },
    async (args, extra) =>
      run(extra, async (ctx) => {
        const id = requireId(args.id, "id");
        const outcome = await runGated({
          kind: "single",
          action: `Album ${id} deletion`,
          confirm: args.confirm,
          prompt: "Deletion requires confirm=true. The preview shows the album that would be deleted.",
          preview: async () =>
            mapResult(await client.getAlbum(id, true, ctx.signal), (album) => ({
              album_id: album.id,
              album_name: album.albumName,
              asset_count: album.assetCount ?? null,
              shared: album.shared ?? null
            })),
          execute: () => client.deleteAlbum(id, ctx.signal)
        });

        return gateEnvelope(ctx, outcome, () => ({ deleted: true, album_id: id }));
      })
  );

  server.registerTool(
    "immich.albums.statistics",
    {
      description: "Get album counts (owned, shared, not shared).",
      inputSchema: {},
      outputSchema: envelopeOutputShape,
      annotations: readOnlyAnnotations
    },
    async (_args, extra) =>
      run(extra, async (ctx) =>
        success(ctx, unwrap(await client.getAlbumStatistics(ctx.signal), "Failed to load album statistics"))
      )
  );
}
