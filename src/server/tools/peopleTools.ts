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
import { summarizeAsset, type Person } from "../../upstream/schemas.js";
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
import { sampleExisting, summarizeBulkIds, unwrap, type ToolDependencies } from "./toolSupport.js";

const MERGE_PREVIEW_LIMIT = 5;

function summarizePerson(person: Person) {
  return {
    id: person.id,
    name: person.name,
    birth_date: person.birthDate ?? null,
    is_hidden: person.isHidden ?? false,
    thumbnail_path: person.thumbnailPath ?? null
  };
}

function briefPerson(person: Person) {
  return { id: person.id, name: person.name };
}

export function registerPeopleTools(server: McpServer, deps: ToolDependencies): void {
  const { client, run, maxPageSize } = deps;

  server.registerTool(
    "immich.people.list",
    {
      description: "List recognized people.",
      inputSchema: {
        ...pagingShape,
        with_hidden: z.boolean().default(false)
      },
      outputSchema: envelopeOutputShape,
      annotations: readOnlyAnnotations
    },
    async (args, extra) =>
      run(extra, async (ctx) => {
        const response = unwrap(await client.listPeople(args.with_hidden, ctx.signal), "Failed to list people");
        const page = paginate(response.people.map(summarizePerson), args, maxPageSize);
        return success(ctx, page.items, page.meta);
      })
  );

  server.registerTool(
    "immich.people.get",
    {
      description: "Get a person by id.",
      inputSchema: { id: idSchema },
      outputSchema: envelopeOutputShape,
      annotations: readOnlyAnnotations
    },
    async (args, extra) =>
      run(extra, async (ctx) => {
        const id = requireId(args.id, "id");
        return success(ctx, summarizePerson(unwrap(await client.getPerson(id, ctx.signal), `Person ${id}`)));
      })
  );

  server.registerTool(
    "immich.people.update",
    {
      description: "Rename a person, set their birth date, hide them or change the featured face.",
      inputSchema: {
        id: idSchema,
        name: z.string().optional(),
        birth_date: isoDateSchema,
        is_hidden: z.boolean().optional(),
        feature_face_asset_id: idSchema
      },
      outputSchema: envelopeOutputShape,
      annotations: mutatingAnnotations
    },
    async (args, extra) =>
      run(extra, async (ctx) => {
        const id = requireId(args.id, "id");
        const birthDate = parseIsoDate(args.birth_date, "birth_date");
        const changes = compact({
          name: boundedText(args.name, "name", 255),
          birthDate: birthDate?.slice(0, 10),
          isHidden: args.is_hidden,
          featureFaceAssetId: optionalId(args.feature_face_asset_id, "feature_face_asset_id")
        });
        if (Object.keys(changes).length === 0) {
          throw validationError("No changes provided");
        }
        const person = unwrap(await client.updatePerson(id, changes, ctx.signal), `Person ${id}`);
        return success(ctx, summarizePerson(person));
      })
  );

  server.registerTool(
    "immich.people.merge",
    {
      description:
        "Merge duplicate people into a target person. Without confirm=true returns the target and sample sources.",
      inputSchema: {
        id: idSchema.describe("Target person id to merge into"),
        source_ids: idListSchema.describe("Comma-separated person ids to merge into the target"),
        confirm: confirmSchema
      },
      outputSchema: envelopeOutputShape,
      annotations: destructiveAnnotations
    },
    async (args, extra) =>
      run(extra, async (ctx) => {
        const id = requireId(args.id, "id");
        const sourceIds = parseIdList(args.source_ids, "source_ids");
        if (sourceIds.includes(id)) {
          throw validationError("A person cannot be merged into itself", { id });
        }

        const outcome = await runGated({
          kind: "single",
          action: `Person ${id} merge`,
          confirm: args.confirm,
          prompt: "Merge requires confirm=true. The source people will be merged into the target person.",
          preview: async () => {
            const target = await client.getPerson(id, ctx.signal);
            const sources = target.ok
              ? await sampleExisting(sourceIds, MERGE_PREVIEW_LIMIT, (id) => client.getPerson(id, ctx.signal), briefPerson)
              : [];
            return mapResult(target, (person) => ({
              target: briefPerson(person),
              sources,
              source_count: sourceIds.length
            }));
          },
          execute: () => client.mergePeople(id, sourceIds, ctx.signal)
        });

        return gateEnvelope(ctx, outcome, (results) => ({
          target_id: id,
          merged_count: sourceIds.length,
          ...summarizeBulkIds(results)
        }));
      })
  );

  server.registerTool(
    "immich.people.assets",
    {
      description: "List assets in which a person appears.",
      inputSchema: { id: idSchema, ...pagingShape },
      outputSchema: envelopeOutputShape,
      annotations: readOnlyAnnotations
    },
    async (args, extra) =>
      run(extra, async (ctx) => {
        const id = requireId(args.id, "id");
        const assets = unwrap(await client.getPersonAssets(id, ctx.signal), `Person ${id}`);
        const page = paginate(assets.map(summarizeAsset), args, maxPageSize);
        return success(ctx, page.items, page.meta);
      })
  );
}
