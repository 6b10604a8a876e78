import type { TransitionRefusal, UploadSession, UploadSessionManager } from "../domain/uploadSessionManager.js";
import type { ImmichClient } from "../upstream/immichClient.js";
import { log } from "../utils/logger.js";

const logger = log.child("upload");

export interface UploadResponse {
  status: number;
  body: Record<string, unknown>;
}

export interface UploadHandlerDependencies {
  sessions: UploadSessionManager;
  client: ImmichClient;
  signal?: AbortSignal;
}

const FALLBACK_FILE_NAME = "upload.bin";

function reply(status: number, body: Record<string, unknown>): UploadResponse {
  return { status, body };
}

function refusal(sessionId: string, reason: TransitionRefusal, session?: UploadSession): UploadResponse {
  switch (reason) {
    case "not_found":
      return reply(404, { success: false, error: "Session not found", session_id: sessionId });
    case "expired":
      return reply(400, { success: false, error: "Session expired", session_id: sessionId });
    case "completed":
      return reply(400, {
        success: false,
        error: "Session already completed",
        asset_id: session?.assetId ?? null,
        session_id: sessionId
      });
    case "failed":
      return reply(400, { success: false, error: "Session already failed", session_id: sessionId });
    case "in_progress":
      return reply(409, { success: false, error: "Upload already in progress", session_id: sessionId });
    case "not_uploading":
      return reply(409, { success: false, error: "Upload has not started", session_id: sessionId });
  }
}

function preflightRefusal(session: UploadSession): TransitionRefusal | undefined {
  switch (session.status) {
    case "pending":
      return undefined;
    case "uploading":
      return "in_progress";
    default:
      return session.status;
  }
}

function isMultipart(request: Request): boolean {
  return (request.headers.get("content-type") ?? "").toLowerCase().startsWith("multipart/form-data");
}

async function pickFile(request: Request) {
  const form = await request.formData();
  const preferred = form.get("file");
  if (preferred !== null && typeof preferred !== "string") {
    return preferred;
  }

  for (const [, value] of form.entries()) {
    if (typeof value !== "string") {
      return value;
    }
  }
  return undefined;
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Receives the bytes for one upload session. Once the session has moved to
 * `uploading` every exit records a terminal state, so the outcome stays
 * visible to pollers even if this response is lost.
 */
export async function handleUpload(
  sessionId: string,
  request: Request,
  deps: UploadHandlerDependencies
): Promise<UploadResponse> {
  const { sessions, client } = deps;

  const existing = sessions.getSession(sessionId);
  if (!existing) {
    return refusal(sessionId, "not_found");
  }

  const blocked = preflightRefusal(existing);
  if (blocked) {
    return refusal(sessionId, blocked, existing);
  }

  if (!isMultipart(request)) {
    return reply(400, { success: false, error: "Expected a multipart/form-data body", session_id: sessionId });
  }

  const begun = sessions.apply(sessionId, { type: "begin" });
  if (!begun.ok) {
    return refusal(sessionId, begun.reason, begun.session);
  }
  const session = begun.session;

  const fail = (status: number, message: string): UploadResponse => {
    sessions.apply(sessionId, { type: "fail", message });
    logger.warn("upload failed", { sessionId, status, message });
    return reply(status, { success: false, error: message, session_id: sessionId });
  };

  try {
    const file = await pickFile(request);
    if (!file || file.size === 0) {
      return fail(400, "No file provided");
    }

    const bytes = Buffer.from(await file.arrayBuffer());
    const fileName = file.name || session.suggestedFileName || FALLBACK_FILE_NAME;

    const result = await client.uploadAsset(
      {
        fileName,
        read: async () => bytes,
        isFavorite: session.favorite,
        isArchived: session.archived
      },
      deps.signal
    );

    if (!result.ok) {
      return fail(502, `Upstream rejected the upload: ${result.message}`);
    }

    // The asset already exists upstream; its id is returned even when the session record is gone.
    const completed = sessions.apply(sessionId, { type: "complete", assetId: result.value.id });
    if (!completed.ok) {
      logger.warn("upload completed but the session could not record it", {
        sessionId,
        assetId: result.value.id,
        reason: completed.reason
      });
    } else {
      logger.info("upload completed", { sessionId, assetId: result.value.id, bytes: bytes.length });
    }

    return reply(200, {
      success: true,
      asset_id: result.value.id,
      original_file_name: result.value.originalFileName ?? fileName,
      type: result.value.type ?? null,
      session_id: sessionId
    });
  } catch (error) {
    logger.error("upload handler error", { sessionId, error });
    return fail(500, `Upload failed: ${errorMessage(error)}`);
  }
}
