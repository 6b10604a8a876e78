import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import { nextCursor, normalizePageRequest } from "../../domain/pagination.js";
import { idListSchema, isoDateSchema, pagingShape, readOnlyAnnotations } from "../../types/contracts.js";
import { summarizeAsset, type SearchAssetPage } from "../../upstream/schemas.js";
import { compact, parseIdList, parseIsoDate, requireText } from "../../utils/parsing.js";
import { envelopeOutputShape, success, type Envelope, type ToolContext } from "../envelope.js";
import { unwrap, type ToolDependencies } from "./toolSupport.js";

const assetTypeSchema = z.enum(["IMAGE", "VIDEO", "ALL"]).optional();

const sharedFilterShape = {
  ...pagingShape,
  type: assetTypeSchema,
  is_favorite: z.boolean().optional(),
  is_archived: z.boolean().optional(),
  taken_after: isoDateSchema,
  taken_before: isoDateSchema,
  city: z.string().optional(),
  state: z.string().optional(),
  country: z.string().optional(),
  make: z.string().optional(),
  model: z.string().optional(),
  person_ids: idListSchema
};

interface SharedFilters {
  type?: "IMAGE" | "VIDEO" | "ALL";
  is_favorite?: boolean;
  is_archived?: boolean;
  taken_after?: string;
  taken_before?: string;
  city?: string;
  state?: string;
  country?: string;
  make?: string;
  model?: string;
  person_ids?: string;
}

function sharedCriteria(args: SharedFilters, page: number, size: number): Record<string, unknown> {
  return compact({
    page,
    size,
    type: args.type === "ALL" ? undefined : args.type,
    isFavorite: args.is_favorite,
    isArchived: args.is_archived,
    takenAfter: parseIsoDate(args.taken_after, "taken_after"),
    takenBefore: parseIsoDate(args.taken_before, "taken_before"),
    city: args.city,
    state: args.state,
    country: args.country,
    make: args.make,
    model: args.model,
    personIds: args.person_ids?.trim() ? parseIdList(args.person_ids, "person_ids") : undefined
  });
}

function searchEnvelope(ctx: ToolContext, result: SearchAssetPage, page: number, size: number): Envelope {
  return success(ctx, result.assets.items.map(summarizeAsset), {
    page,
    page_size: size,
    total: result.assets.total,
    next: result.assets.nextPage ? nextCursor(page, size) : null
  });
}

export function registerSearchTools(server: McpServer, deps: ToolDependencies): void {
  const { client, run, maxPageSize } = deps;

  server.registerTool(
    "immich.search.metadata",
    {
      description: "Search assets by metadata filters (dates, type, location, camera, people, file name).",
      inputSchema: {
        ...sharedFilterShape,
        is_trashed: z.boolean().optional(),
        lens_model: z.string().optional(),
        original_file_name: z.string().optional().describe("Partial file name match"),
        order: z.enum(["asc", "desc"]).optional()
      },
      outputSchema: envelopeOutputShape,
      annotations: readOnlyAnnotations
    },
    async (args, extra) =>
      run(extra, async (ctx) => {
        const { page, size } = normalizePageRequest(args, maxPageSize);
        const criteria = {
          ...sharedCriteria(args, page, size),
          ...compact({
            isTrashed: args.is_trashed,
            lensModel: args.lens_model,
            originalFileName: args.original_file_name,
            order: args.order
          })
        };
        const result = unwrap(await client.searchMetadata(criteria, ctx.signal), "Metadata search failed");
        return searchEnvelope(ctx, result, page, size);
      })
  );

  server.registerTool(
    "immich.search.smart",
    {
      description: "Semantic search with a natural-language query such as 'sunset at the beach'.",
      inputSchema: {
        query: z.string().optional().describe("Natural-language search query"),
        ...sharedFilterShape
      },
      outputSchema: envelopeOutputShape,
      annotations: readOnlyAnnotations
    },
    async (args, extra) =>
      run(extra, async (ctx) => {
        const query = requireText(args.query, "query", 1024);
        const { page, size } = normalizePageRequest(args, maxPageSize);
        const criteria = { query, ...sharedCriteria(args, page, size) };
        const result = unwrap(await client.searchSmart(criteria, ctx.signal), "Smart search failed");
        return searchEnvelope(ctx, result, page, size);
      })
  );

  server.registerTool(
    "immich.search.explore",
    {
      description: "Get discovery data: popular places, things and people in the library.",
      inputSchema: {},
      outputSchema: envelopeOutputShape,
      annotations: readOnlyAnnotations
    },
    async (_args, extra) =>
      run(extra, async (ctx) => {
        const sections = unwrap(await client.searchExplore(ctx.signal), "Failed to load explore data");
        return success(
          ctx,
          sections.map((section) => ({
            field_name: section.fieldName,
            items: section.items.map((item) => ({ value: item.value, asset: summarizeAsset(item.data) }))
          }))
        );
      })
  );
}
