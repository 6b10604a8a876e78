import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import type { UploadSession } from "../../domain/uploadSessionManager.js";
import { assetFlagsShape, mutatingAnnotations, readOnlyAnnotations } from "../../types/contracts.js";
import { notFound } from "../../utils/errors.js";
import { requireId, requireText } from "../../utils/parsing.js";
import { envelopeOutputShape, success } from "../envelope.js";
import type { ToolDependencies } from "./toolSupport.js";

export function uploadUrlFor(publicBaseUrl: string, sessionId: string): string {
  return `${publicBaseUrl.replace(/\/+$/, "")}/upload/${encodeURIComponent(sessionId)}`;
}

export function describeSession(session: UploadSession) {
  return {
    session_id: session.sessionId,
    status: session.status,
    asset_id: session.assetId ?? null,
    error: session.errorMessage ?? null,
    suggested_file_name: session.suggestedFileName ?? null,
    created_at: session.createdAt.toISOString(),
    expires_at: session.expiresAt.toISOString()
  };
}

export function registerUploadTools(server: McpServer, deps: ToolDependencies): void {
  const { sessions, run } = deps;

  server.registerTool(
    "immich.assets.upload_init",
    {
      description:
        "Open an out-of-band upload session. POST the file as multipart field 'file' to the returned upload_url, then poll immich.assets.upload_status.",
      inputSchema: {
        file_name: z.string().optional().describe("Suggested file name; the uploaded file's name wins"),
        ...assetFlagsShape
      },
      outputSchema: envelopeOutputShape,
      annotations: mutatingAnnotations
    },
    async (args, extra) =>
      run(extra, async (ctx) => {
        const session = sessions.createSession({
          suggestedFileName: args.file_name?.trim() ? requireText(args.file_name, "file_name") : undefined,
          favorite: args.is_favorite,
          archived: args.is_archived
        });
        const uploadUrl = uploadUrlFor(deps.publicBaseUrl, session.sessionId);

        return success(ctx, {
          session_id: session.sessionId,
          upload_url: uploadUrl,
          expires_at: session.expiresAt.toISOString(),
          instructions: {
            method: "POST",
            content_type: "multipart/form-data",
            form_field: "file",
            example_curl: `curl -X POST -F "file=@/path/to/image.jpg" "${uploadUrl}"`
          }
        });
      })
  );

  server.registerTool(
    "immich.assets.upload_status",
    {
      description: "Check the status of an out-of-band upload session.",
      inputSchema: {
        session_id: z.string().optional().describe("Upload session id from immich.assets.upload_init")
      },
      outputSchema: envelopeOutputShape,
      annotations: readOnlyAnnotations
    },
    async (args, extra) =>
      run(extra, async (ctx) => {
        const sessionId = requireId(args.session_id, "session_id");
        const session = sessions.getSession(sessionId);
        if (!session) {
          throw notFound(`Upload session ${sessionId} not found`);
        }
        return success(ctx, describeSession(session));
      })
  );
}
