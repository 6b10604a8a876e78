import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import { paginate } from "../../domain/pagination.js";
import { runGated } from "../../domain/safetyGate.js";
import {
  confirmSchema,
  destructiveAnnotations,
  idSchema,
  mutatingAnnotations,
  pagingShape,
  readOnlyAnnotations
} from "../../types/contracts.js";
import { ok } from "../../upstream/immichClient.js";
import type { Activity } from "../../upstream/schemas.js";
import { validationError } from "../../utils/errors.js";
import { boundedText, compact, optionalId, requireId } from "../../utils/parsing.js";
import { envelopeOutputShape, gateEnvelope, success } from "../envelope.js";
import { unwrap, type ToolDependencies } from "./toolSupport.js";

const activityTypeSchema = z.enum(["comment", "like"]);

function summarizeActivity(activity: Activity) {
  return {
    id: activity.id,
    type: activity.type,
    comment: activity.comment ?? null,
    asset_id: activity.assetId ?? null,
    created_at: activity.createdAt ?? null
  };
}

export function registerActivityTools(server: McpServer, deps: ToolDependencies): void {
  const { client, run, maxPageSize } = deps;

  server.registerTool(
    "immich.activities.list",
    {
      description: "List comments and likes on an album, or on one asset within it.",
      inputSchema: {
        album_id: idSchema,
        asset_id: idSchema,
        type: activityTypeSchema.optional(),
        level: z.enum(["album", "asset"]).optional(),
        ...pagingShape
      },
      outputSchema: envelopeOutputShape,
      annotations: readOnlyAnnotations
    },
    async (args, extra) =>
      run(extra, async (ctx) => {
        const albumId = requireId(args.album_id, "album_id");
        const activities = unwrap(
          await client.listActivities(
            { albumId, assetId: optionalId(args.asset_id, "asset_id"), type: args.type, level: args.level },
            ctx.signal
          ),
          `Album ${albumId} activities`
        );
        const page = paginate(activities.map(summarizeActivity), args, maxPageSize);
        return success(ctx, page.items, page.meta);
      })
  );

  server.registerTool(
    "immich.activities.create",
    {
      description: "Add a comment or a like to an album or to an asset within it.",
      inputSchema: {
        album_id: idSchema,
        type: activityTypeSchema.default("comment"),
        asset_id: idSchema,
        comment: z.string().optional().describe("Required for comments")
      },
      outputSchema: envelopeOutputShape,
      annotations: mutatingAnnotations
    },
    async (args, extra) =>
      run(extra, async (ctx) => {
        const albumId = requireId(args.album_id, "album_id");
        if (args.type === "comment" && !args.comment?.trim()) {
          throw validationError("Comment text is required for comment type", { field: "comment" });
        }
        const input = compact({
          albumId,
          assetId: optionalId(args.asset_id, "asset_id"),
          type: args.type,
          comment: args.type === "comment" ? boundedText(args.comment, "comment") : undefined
        });
        const activity = unwrap(await client.createActivity(input, ctx.signal), "Failed to create activity");
        return success(ctx, { ...summarizeActivity(activity), album_id: albumId });
      })
  );

  server.registerTool(
    "immich.activities.delete",
    {
      description: "Delete a comment or like. Without confirm=true returns a preview.",
      inputSchema: { id: idSchema, confirm: confirmSchema },
      outputSchema: envelopeOutputShape,
      annotations: destructiveAnnotations
    },
    async (args, extra) =>
      run(extra, async (ctx) => {
        const id = requireId(args.id, "id");
        // The upstream has no single-activity lookup; the id is the preview.
        const outcome = await runGated({
          kind: "single",
          action: `Activity ${id} deletion`,
          confirm: args.confirm,
          prompt: "Deletion requires confirm=true.",
          preview: async () => ok({ activity_id: id }),
          execute: () => client.deleteActivity(id, ctx.signal)
        });

        return gateEnvelope(ctx, outcome, () => ({ deleted: true, activity_id: id }));
      })
  );

  server.registerTool(
    "immich.activities.statistics",
    {
      description: "Count comments on an album or on one asset within it.",
      inputSchema: { album_id: idSchema, asset_id: idSchema },
      outputSchema: envelopeOutputShape,
      annotations: readOnlyAnnotations
    },
    async (args, extra) =>
      run(extra, async (ctx) => {
        const albumId = requireId(args.album_id, "album_id");
        const assetId = optionalId(args.asset_id, "asset_id");
        const stats = unwrap(
          await client.getActivityStatistics(albumId, assetId, ctx.signal),
          `Album ${albumId} activity statistics`
        );
        return success(ctx, { album_id: albumId, asset_id: assetId ?? null, comments: stats.comments });
      })
  );
}
