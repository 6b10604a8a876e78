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
import type { Tag } from "../../upstream/schemas.js";
import { validationError } from "../../utils/errors.js";
import { compact, optionalId, parseIdList, requireId, requireText } from "../../utils/parsing.js";
import { envelopeOutputShape, gateEnvelope, success } from "../envelope.js";
import { summarizeBulkIds, unwrap, type ToolDependencies } from "./toolSupport.js";

const colorSchema = z.string().optional().describe("Hex color such as #ff8800");

const HEX_COLOR = /^#?[0-9a-fA-F]{3}(?:[0-9a-fA-F]{3})?$/;

function parseColor(input: string | undefined): string | undefined {
  if (input !== undefined && !HEX_COLOR.test(input)) {
    throw validationError("color must be a hex color such as #ff8800", { field: "color", value: input });
  }
  return input;
}

function summarizeTag(tag: Tag) {
  return {
    id: tag.id,
    name: tag.name,
    value: tag.value ?? null,
    color: tag.color ?? null
  };
}

export function registerTagTools(server: McpServer, deps: ToolDependencies): void {
  const { client, run, maxPageSize } = deps;

  server.registerTool(
    "immich.tags.list",
    {
      description: "List tags.",
      inputSchema: { ...pagingShape },
      outputSchema: envelopeOutputShape,
      annotations: readOnlyAnnotations
    },
    async (args, extra) =>
      run(extra, async (ctx) => {
        const tags = unwrap(await client.listTags(ctx.signal), "Failed to list tags");
        const page = paginate(tags.map(summarizeTag), args, maxPageSize);
        return success(ctx, page.items, page.meta);
      })
  );

  server.registerTool(
    "immich.tags.get",
    {
      description: "Get a tag by id.",
      inputSchema: { id: idSchema },
      outputSchema: envelopeOutputShape,
      annotations: readOnlyAnnotations
    },
    async (args, extra) =>
      run(extra, async (ctx) => {
        const id = requireId(args.id, "id");
        return success(ctx, summarizeTag(unwrap(await client.getTag(id, ctx.signal), `Tag ${id}`)));
      })
  );

  server.registerTool(
    "immich.tags.create",
    {
      description: "Create a tag, optionally nested under a parent tag.",
      inputSchema: {
        name: z.string().optional(),
        color: colorSchema,
        parent_id: idSchema
      },
      outputSchema: envelopeOutputShape,
      annotations: mutatingAnnotations
    },
    async (args, extra) =>
      run(extra, async (ctx) => {
        const input = compact({
          name: requireText(args.name, "name"),
          color: parseColor(args.color),
          parentId: optionalId(args.parent_id, "parent_id")
        });
        return success(ctx, summarizeTag(unwrap(await client.createTag(input, ctx.signal), "Failed to create tag")));
      })
  );

  server.registerTool(
    "immich.tags.update",
    {
      description: "Change a tag's color.",
      inputSchema: { id: idSchema, color: colorSchema },
      outputSchema: envelopeOutputShape,
      annotations: mutatingAnnotations
    },
    async (args, extra) =>
      run(extra, async (ctx) => {
        const id = requireId(args.id, "id");
        const changes = compact({ color: parseColor(args.color) });
        if (Object.keys(changes).length === 0) {
          throw validationError("No changes provided");
        }
        return success(ctx, summarizeTag(unwrap(await client.updateTag(id, changes, ctx.signal), `Tag ${id}`)));
      })
  );

  server.registerTool(
    "immich.tags.delete",
    {
      description: "Delete a tag (tagged assets are kept). Without confirm=true returns a preview.",
      inputSchema: { id: idSchema, confirm: confirmSchema },
      outputSchema: envelopeOutputShape,
      annotations: destructiveAnnotations
    },
    async (args, extra) =>
      run(extra, async (ctx) => {
        const id = requireId(args.id, "id");
        const outcome = await runGated({
          kind: "single",
          action: `Tag ${id} deletion`,
          confirm: args.confirm,
          prompt: "Deletion requires confirm=true. The preview shows the tag that would be deleted.",
          preview: async () =>
            mapResult(await client.getTag(id, ctx.signal), (tag) => ({
              tag_id: tag.id,
              name: tag.name,
              value: tag.value ?? null
            })),
          execute: () => client.deleteTag(id, ctx.signal)
        });

        return gateEnvelope(ctx, outcome, () => ({ deleted: true, tag_id: id }));
      })
  );

  server.registerTool(
    "immich.tags.assets.add",
    {
      description: "Tag assets.",
      inputSchema: { id: idSchema, asset_ids: idListSchema },
      outputSchema: envelopeOutputShape,
      annotations: mutatingAnnotations
    },
    async (args, extra) =>
      run(extra, async (ctx) => {
        const id = requireId(args.id, "id");
        const assetIds = parseIdList(args.asset_ids, "asset_ids");
        const results = unwrap(await client.tagAssets(id, assetIds, ctx.signal), `Tag ${id}`);
        return success(ctx, { tag_id: id, ...summarizeBulkIds(results) });
      })
  );

  server.registerTool(
    "immich.tags.assets.remove",
    {
      description: "Remove a tag from assets.",
      inputSchema: { id: idSchema, asset_ids: idListSchema },
      outputSchema: envelopeOutputShape,
      annotations: mutatingAnnotations
    },
    async (args, extra) =>
      run(extra, async (ctx) => {
        const id = requireId(args.id, "id");
        const assetIds = parseIdList(args.asset_ids, "asset_ids");
        const results = unwrap(await client.untagAssets(id, assetIds, ctx.signal), `Tag ${id}`);
        return success(ctx, { tag_id: id, ...summarizeBulkIds(results) });
      })
  );
}
