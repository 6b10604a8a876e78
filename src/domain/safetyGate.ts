import type { UpstreamResult } from "../upstream/immichClient.js";
import { AppError, confirmationRequired, notFound } from "../utils/errors.js";
import { log } from "../utils/logger.js";

const logger = log.child("safety-gate");

/**
 * Bulk mutations run only with `dryRun === false` and `confirm === true`.
 * `describe` may gather sample data for the preview; it must not mutate.
 */
export interface BulkOperation<P, R> {
  kind: "bulk";
  action: string;
  targetIds: string[];
  dryRun: boolean;
  confirm: boolean;
  /** Report the preview as a CONFIRMATION_REQUIRED refusal rather than a successful dry run. */
  refuseOnPreview?: boolean;
  describe?: () => Promise<P>;
  execute: () => Promise<UpstreamResult<R>>;
}

/** Single-target deletes and merges run only with `confirm === true`. */
export interface SingleOperation<P, R> {
  kind: "single";
  action: string;
  confirm: boolean;
  preview: () => Promise<UpstreamResult<P>>;
  execute: () => Promise<UpstreamResult<R>>;
  /** Message returned alongside the preview. */
  prompt?: string;
}

export type GatedOperation<P, R> = BulkOperation<P, R> | SingleOperation<P, R>;

export interface BulkPreview<P> {
  affectedIds: string[];
  warning: string;
  sample?: P;
  refused: boolean;
}

export type GateOutcome<P, R> =
  | { state: "executed"; value: R }
  | { state: "preview"; preview: BulkPreview<P> }
  | { state: "refused"; error: AppError }
  | { state: "failed"; error: AppError };

export function bulkWarning(dryRun: boolean, confirm: boolean): string {
  if (dryRun && !confirm) {
    return "This is a dry run. Set dry_run=false and confirm=true to execute.";
  }
  if (dryRun) {
    return "This is a dry run. Set dry_run=false to execute.";
  }
  return "Set confirm=true to execute the operation.";
}

/** Maps an upstream failure onto the surfaced error taxonomy. */
export function upstreamError<T>(result: Extract<UpstreamResult<T>, { ok: false }>, context: string): AppError {
  if (result.status === 404) {
    return notFound(`${context}: not found`, { status: result.status, body: result.body });
  }

  return new AppError("UPSTREAM_ERROR", `${context}: ${result.message}`, 502, {
    status: result.status,
    body: result.body
  });
}

async function settle<R>(
  action: string,
  execute: () => Promise<UpstreamResult<R>>
): Promise<{ state: "executed"; value: R } | { state: "failed"; error: AppError }> {
  const result = await execute();
  if (!result.ok) {
    logger.warn("gated operation failed upstream", { action, status: result.status });
    return { state: "failed", error: upstreamError(result, `${action} failed`) };
  }

  logger.info("gated operation executed", { action });
  return { state: "executed", value: result.value };
}

/**
 * Runs a destructive or bulk operation behind the two-phase dry-run/confirm protocol.
 * Without the required flags no mutating callback is invoked.
 */
export async function runGated<P, R>(operation: GatedOperation<P, R>): Promise<GateOutcome<P, R>> {
  if (operation.kind === "bulk") {
    if (operation.dryRun || !operation.confirm) {
      const sample = operation.describe ? await operation.describe() : undefined;
      return {
        state: "preview",
        preview: {
          affectedIds: [...operation.targetIds],
          warning: bulkWarning(operation.dryRun, operation.confirm),
          sample,
          refused: operation.refuseOnPreview === true
        }
      };
    }

    return settle(operation.action, operation.execute);
  }

  if (!operation.confirm) {
    const preview = await operation.preview();
    if (!preview.ok) {
      return { state: "failed", error: upstreamError(preview, `${operation.action} preview`) };
    }

    return {
      state: "refused",
      error: confirmationRequired(operation.prompt ?? `${operation.action} requires confirm=true.`, {
        preview: preview.value
      })
    };
  }

  return settle(operation.action, operation.execute);
}
