import type { Stats } from "node:fs";
import { readFile, stat } from "node:fs/promises";
import { homedir } from "node:os";
import { basename, isAbsolute, join } from "node:path";
import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import { paginate } from "../../domain/pagination.js";
import { runGated } from "../../domain/safetyGate.js";
import {
  assetFlagsShape,
  confirmSchema,
  destructiveAnnotations,
  dryRunSchema,
  idListSchema,
  idSchema,
  isoDateSchema,
  mutatingAnnotations,
  pagingShape,
  ratingSchema,
  readOnlyAnnotations
} from "../../types/contracts.js";
import { summarizeAsset, type Asset } from "../../upstream/schemas.js";
import { notFound, validationError } from "../../utils/errors.js";
import { log } from "../../utils/logger.js";
import {
  boundedText,
  compact,
  integerInRange,
  numberInRange,
  parseIdList,
  parseIsoDate,
  requireId,
  requireText
} from "../../utils/parsing.js";
import { envelopeOutputShape, gateEnvelope, success } from "../envelope.js";
import { sampleExisting, unwrap, type ToolDependencies } from "./toolSupport.js";

const logger = log.child("asset-tools");

const DELETE_PREVIEW_LIMIT = 10;

function deletePreviewEntry(asset: Asset) {
  return {
    id: asset.id,
    original_file_name: asset.originalFileName ?? null,
    type: asset.type ?? null,
    created: asset.fileCreatedAt ?? null
  };
}

export function decodeBase64Content(content: string): Buffer {
  const normalized = content.replace(/^data:[^;,]+;base64,/, "").replace(/\s+/g, "");
  if (normalized.length === 0 || normalized.length % 4 !== 0 || !/^[A-Za-z0-9+/]+={0,2}$/.test(normalized)) {
    throw validationError("file_content must be non-empty base64", { field: "file_content" });
  }
  return Buffer.from(normalized, "base64");
}

export function resolveLocalPath(filePath: string): string {
  const expanded = filePath.startsWith("~/") ? join(homedir(), filePath.slice(2)) : filePath;
  if (!isAbsolute(expanded)) {
    throw validationError("File path must be absolute", { field: "file_path", value: filePath });
  }
  return expanded;
}

async function statLocalFile(path: string): Promise<Stats> {
  const info = await stat(path).catch((error: unknown) => {
    throw notFound(`File not found: ${path}`, { cause: error instanceof Error ? error.message : String(error) });
  });
  if (!info.isFile()) {
    throw validationError(`Not a regular file: ${path}`, { field: "file_path" });
  }
  return info;
}

function uploadedAssetResult(asset: Asset, fileSizeBytes: number) {
  return {
    asset_id: asset.id,
    type: asset.type ?? null,
    original_file_name: asset.originalFileName ?? null,
    file_size: fileSizeBytes,
    status: "uploaded"
  };
}

export function registerAssetTools(server: McpServer, deps: ToolDependencies): void {
  const { client, run, maxPageSize } = deps;

  server.registerTool(
    "immich.assets.list",
    {
      description: "List assets with optional filters and pagination.",
      inputSchema: {
        ...pagingShape,
        is_favorite: z.boolean().optional(),
        is_archived: z.boolean().optional(),
        is_trashed: z.boolean().optional(),
        updated_after: isoDateSchema,
        updated_before: isoDateSchema
      },
      outputSchema: envelopeOutputShape,
      annotations: readOnlyAnnotations
    },
    async (args, extra) =>
      run(extra, async (ctx) => {
        const filters = {
          isFavorite: args.is_favorite,
          isArchived: args.is_archived,
          isTrashed: args.is_trashed,
          updatedAfter: parseIsoDate(args.updated_after, "updated_after"),
          updatedBefore: parseIsoDate(args.updated_before, "updated_before")
        };
        const assets = unwrap(await client.listAssets(filters, ctx.signal), "Failed to list assets");
        const page = paginate(assets.map(summarizeAsset), args, maxPageSize);
        return success(ctx, page.items, page.meta);
      })
  );

  server.registerTool(
    "immich.assets.get",
    {
      description: "Get full asset metadata by id.",
      inputSchema: { id: idSchema },
      outputSchema: envelopeOutputShape,
      annotations: readOnlyAnnotations
    },
    async (args, extra) =>
      run(extra, async (ctx) => {
        const id = requireId(args.id, "id");
        return success(ctx, unwrap(await client.getAsset(id, ctx.signal), `Asset ${id}`));
      })
  );

  server.registerTool(
    "immich.assets.exif",
    {
      description: "Get EXIF metadata for an asset.",
      inputSchema: { id: idSchema },
      outputSchema: envelopeOutputShape,
      annotations: readOnlyAnnotations
    },
    async (args, extra) =>
      run(extra, async (ctx) => {
        const id = requireId(args.id, "id");
        const asset = unwrap(await client.getAsset(id, ctx.signal), `Asset ${id}`);
        return success(ctx, { asset_id: asset.id, exif: asset.exifInfo ?? null });
      })
  );

  server.registerTool(
    "immich.assets.download.original",
    {
      description: "Get the download URL of an asset's original file. Fetching it requires the x-api-key header.",
      inputSchema: { id: idSchema },
      outputSchema: envelopeOutputShape,
      annotations: readOnlyAnnotations
    },
    async (args, extra) =>
      run(extra, async (ctx) => {
        const id = requireId(args.id, "id");
        const asset = unwrap(await client.getAsset(id, ctx.signal), `Asset ${id}`);
        const urls = client.assetDownloadInfo(asset.id);
        return success(ctx, {
          asset_id: asset.id,
          original_file_name: asset.originalFileName ?? null,
          mime_type: asset.originalMimeType ?? null,
          download_url: urls.originalUrl,
          requires_header: "x-api-key"
        });
      })
  );

  server.registerTool(
    "immich.assets.download.thumbnail",
    {
      description: "Get thumbnail and preview URLs for an asset.",
      inputSchema: { id: idSchema },
      outputSchema: envelopeOutputShape,
      annotations: readOnlyAnnotations
    },
    async (args, extra) =>
      run(extra, async (ctx) => {
        const id = requireId(args.id, "id");
        const asset = unwrap(await client.getAsset(id, ctx.signal), `Asset ${id}`);
        const urls = client.assetDownloadInfo(asset.id);
        return success(ctx, {
          asset_id: asset.id,
          thumbnail_url: urls.thumbnailUrl,
          preview_url: urls.previewUrl,
          thumbhash: asset.thumbhash ?? null,
          requires_header: "x-api-key"
        });
      })
  );

  server.registerTool(
    "immich.assets.upload",
    {
      description:
        "Upload a new asset from base64 content. For large files use immich.assets.upload_init or immich.assets.upload_from_path.",
      inputSchema: {
        file_content: z.string().optional().describe("Base64-encoded file content"),
        file_name: z.string().optional().describe("Original file name with extension"),
        ...assetFlagsShape
      },
      outputSchema: envelopeOutputShape,
      annotations: mutatingAnnotations
    },
    async (args, extra) =>
      run(extra, async (ctx) => {
        const fileName = requireText(args.file_name, "file_name");
        const bytes = decodeBase64Content(args.file_content ?? "");
        const asset = unwrap(
          await client.uploadAsset(
            {
              fileName,
              read: async () => bytes,
              isFavorite: args.is_favorite,
              isArchived: args.is_archived
            },
            ctx.signal
          ),
          "Upload failed"
        );
        logger.info("asset uploaded", { assetId: asset.id, bytes: bytes.length });
        return success(ctx, uploadedAssetResult(asset, bytes.length));
      })
  );

  server.registerTool(
    "immich.assets.upload_from_path",
    {
      description:
        "Upload a file that is readable by the gateway process. Each retry re-reads the file from disk.",
      inputSchema: {
        file_path: z.string().optional().describe("Absolute path (or ~/...) on the gateway host"),
        ...assetFlagsShape
      },
      outputSchema: envelopeOutputShape,
      annotations: mutatingAnnotations
    },
    async (args, extra) =>
      run(extra, async (ctx) => {
        const path = resolveLocalPath(requireText(args.file_path, "file_path", 4096));
        const info = await statLocalFile(path);
        const asset = unwrap(
          await client.uploadAsset(
            {
              fileName: basename(path),
              read: () => readFile(path),
              deviceModifiedAt: info.mtime,
              isFavorite: args.is_favorite,
              isArchived: args.is_archived
            },
            ctx.signal
          ),
          "Upload failed"
        );
        logger.info("asset uploaded from path", { assetId: asset.id, bytes: info.size });
        return success(ctx, uploadedAssetResult(asset, info.size));
      })
  );

  server.registerTool(
    "immich.assets.update",
    {
      description: "Update asset metadata (favorite, archived, description, date, location, rating).",
      inputSchema: {
        id: idSchema,
        ...assetFlagsShape,
        description: z.string().optional(),
        date_time_original: isoDateSchema,
        latitude: z.number().optional(),
        longitude: z.number().optional(),
        rating: ratingSchema
      },
      outputSchema: envelopeOutputShape,
      annotations: mutatingAnnotations
    },
    async (args, extra) =>
      run(extra, async (ctx) => {
        const id = requireId(args.id, "id");
        const changes = compact({
          isFavorite: args.is_favorite,
          isArchived: args.is_archived,
          description: boundedText(args.description, "description"),
          dateTimeOriginal: parseIsoDate(args.date_time_original, "date_time_original"),
          latitude: numberInRange(args.latitude, "latitude", -90, 90),
          longitude: numberInRange(args.longitude, "longitude", -180, 180),
          rating: integerInRange(args.rating, "rating", 0, 5)
        });
        if (Object.keys(changes).length === 0) {
          throw validationError("No changes provided");
        }

        const asset = unwrap(await client.updateAsset(id, changes, ctx.signal), `Asset ${id}`);
        return success(ctx, summarizeAsset(asset));
      })
  );

  server.registerTool(
    "immich.assets.bulk_update",
    {
      description:
        "Apply the same change to several assets. Runs only with dry_run=false and confirm=true; otherwise previews the affected ids.",
      inputSchema: {
        ids: idListSchema,
        ...assetFlagsShape,
        rating: ratingSchema,
        dry_run: dryRunSchema,
        confirm: confirmSchema
      },
      outputSchema: envelopeOutputShape,
      annotations: destructiveAnnotations
    },
    async (args, extra) =>
      run(extra, async (ctx) => {
        const ids = parseIdList(args.ids, "ids");
        const changes = compact({
          isFavorite: args.is_favorite,
          isArchived: args.is_archived,
          rating: integerInRange(args.rating, "rating", 0, 5)
        });
        if (Object.keys(changes).length === 0) {
          throw validationError("No changes provided");
        }

        const outcome = await runGated({
          kind: "bulk",
          action: "Bulk asset update",
          targetIds: ids,
          dryRun: args.dry_run,
          confirm: args.confirm,
          describe: async () => changes,
          execute: () => client.bulkUpdateAssets(ids, changes, ctx.signal)
        });

        return gateEnvelope(
          ctx,
          outcome,
          () => ({ executed: true, updated_count: ids.length, asset_ids: ids, changes }),
          (preview) => ({ changes: preview })
        );
      })
  );

  server.registerTool(
    "immich.assets.delete",
    {
      description:
        "Delete assets (to trash, or permanently with force). Runs only with dry_run=false and confirm=true; otherwise answers CONFIRMATION_REQUIRED with a preview of what would be deleted.",
      inputSchema: {
        ids: idListSchema,
        force: z.boolean().default(false).describe("Bypass the trash"),
        dry_run: dryRunSchema,
        confirm: confirmSchema
      },
      outputSchema: envelopeOutputShape,
      annotations: destructiveAnnotations
    },
    async (args, extra) =>
      run(extra, async (ctx) => {
        const ids = parseIdList(args.ids, "ids");

        const outcome = await runGated({
          kind: "bulk",
          action: "Asset deletion",
          targetIds: ids,
          dryRun: args.dry_run,
          confirm: args.confirm,
          refuseOnPreview: true,
          describe: () =>
            sampleExisting(ids, DELETE_PREVIEW_LIMIT, (id) => client.getAsset(id, ctx.signal), deletePreviewEntry),
          execute: () => client.deleteAssets(ids, args.force, ctx.signal)
        });

        return gateEnvelope(
          ctx,
          outcome,
          () => ({ executed: true, deleted: true, asset_count: ids.length, asset_ids: ids, force: args.force }),
          (samples) => ({ asset_count: ids.length, force: args.force, preview: samples })
        );
      })
  );

  server.registerTool(
    "immich.assets.statistics",
    {
      description: "Get asset counts (images, videos, total).",
      inputSchema: {},
      outputSchema: envelopeOutputShape,
      annotations: readOnlyAnnotations
    },
    async (_args, extra) =>
      run(extra, async (ctx) =>
        success(ctx, unwrap(await client.getAssetStatistics(ctx.signal), "Failed to load asset statistics"))
      )
  );
}
