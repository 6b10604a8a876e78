import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import type { UploadSessionManager } from "../../domain/uploadSessionManager.js";
import { upstreamError } from "../../domain/safetyGate.js";
import type { ImmichClient, UpstreamResult } from "../../upstream/immichClient.js";
import type { BulkIdResponse } from "../../upstream/schemas.js";
import type { ToolRunner } from "../envelope.js";

export interface ToolDependencies {
  client: ImmichClient;
  sessions: UploadSessionManager;
  maxPageSize: number;
  /** Base URL advertised to out-of-band uploaders. */
  publicBaseUrl: string;
  run: ToolRunner;
}

export type ToolRegistrar = (server: McpServer, deps: ToolDependencies) => void;

/** Returns the upstream value or throws the mapped `AppError`. */
export function unwrap<T>(result: UpstreamResult<T>, context: string): T {
  if (!result.ok) {
    throw upstreamError(result, context);
  }
  return result.value;
}

/** Samples up to `limit` entities for a preview, skipping any the upstream cannot return. */
export async function sampleExisting<T, S>(
  ids: readonly string[],
  limit: number,
  fetchOne: (id: string) => Promise<UpstreamResult<T>>,
  summarize: (value: T) => S
): Promise<S[]> {
  const samples: S[] = [];
  for (const id of ids.slice(0, limit)) {
    const result = await fetchOne(id);
    if (result.ok) {
      samples.push(summarize(result.value));
    }
  }
  return samples;
}

export function summarizeBulkIds(results: readonly BulkIdResponse[]) {
  const failed = results.filter((entry) => !entry.success);
  return {
    requested: results.length,
    succeeded: results.length - failed.length,
    failed: failed.map((entry) => ({ id: entry.id, error: entry.error ?? null }))
  };
}
