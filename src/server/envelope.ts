import { randomUUID } from "node:crypto";
import { z } from "zod";
import type { GateOutcome } from "../domain/safetyGate.js";
import type { PageMeta } from "../domain/pagination.js";
import { asAppError, confirmationRequired, type ErrorCode } from "../utils/errors.js";
import { log } from "../utils/logger.js";

const logger = log.child("tools");

export type EnvelopeMeta = {
  upstream_base_url: string;
  request_id: string;
  page?: number;
  page_size?: number;
  total?: number;
  next?: string | null;
  warnings?: string[];
};

export type EnvelopeError = {
  code: ErrorCode;
  message: string;
  details?: Record<string, unknown>;
};

export type Envelope =
  | { ok: true; result: unknown; meta: EnvelopeMeta }
  | { ok: false; error: EnvelopeError; meta: EnvelopeMeta };

export const envelopeOutputShape = {
  ok: z.boolean(),
  result: z.unknown().optional(),
  error: z
    .object({
      code: z.string(),
      message: z.string(),
      details: z.record(z.string(), z.unknown()).optional()
    })
    .optional(),
  meta: z
    .object({
      upstream_base_url: z.string(),
      request_id: z.string(),
      page: z.number().optional(),
      page_size: z.number().optional(),
      total: z.number().optional(),
      next: z.string().nullable().optional(),
      warnings: z.array(z.string()).optional()
    })
    .passthrough()
};

export interface ToolContext {
  baseUrl: string;
  requestId: string;
  signal: AbortSignal;
}

export interface ToolRequestExtra {
  signal: AbortSignal;
  requestId?: string | number;
}

export type MetaExtras = Partial<PageMeta> & { warnings?: string[] };

function buildMeta(ctx: ToolContext, extras?: MetaExtras): EnvelopeMeta {
  const meta: EnvelopeMeta = {
    upstream_base_url: ctx.baseUrl,
    request_id: ctx.requestId
  };

  if (extras) {
    if (extras.page !== undefined) meta.page = extras.page;
    if (extras.page_size !== undefined) meta.page_size = extras.page_size;
    if (extras.total !== undefined) meta.total = extras.total;
    if (extras.next !== undefined) meta.next = extras.next;
    if (extras.warnings && extras.warnings.length > 0) meta.warnings = extras.warnings;
  }

  return meta;
}

export function success(ctx: ToolContext, result: unknown, extras?: MetaExtras): Envelope {
  return { ok: true, result, meta: buildMeta(ctx, extras) };
}

export function failure(ctx: ToolContext, error: unknown, extras?: MetaExtras): Envelope {
  const appError = asAppError(error);
  const envelopeError: EnvelopeError = { code: appError.code, message: appError.message };
  if (appError.details) {
    envelopeError.details = appError.details;
  }

  return { ok: false, error: envelopeError, meta: buildMeta(ctx, extras) };
}

/**
 * Renders a gate outcome. Bulk previews are successful envelopes with
 * `executed: false` unless the operation refuses on preview; refusals carry
 * `CONFIRMATION_REQUIRED`.
 */
export function gateEnvelope<P, R>(
  ctx: ToolContext,
  outcome: GateOutcome<P, R>,
  renderExecuted: (value: R) => unknown,
  renderSample?: (sample: P) => Record<string, unknown>
): Envelope {
  switch (outcome.state) {
    case "executed":
      return success(ctx, renderExecuted(outcome.value));
    case "preview": {
      const { affectedIds, warning, sample, refused } = outcome.preview;
      const rendered = sample !== undefined && renderSample ? renderSample(sample) : {};
      if (refused) {
        return failure(ctx, confirmationRequired(warning, { affected_ids: affectedIds, warning, ...rendered }));
      }
      return success(ctx, {
        executed: false,
        affected_ids: affectedIds,
        warnings: [warning],
        ...rendered
      });
    }
    case "refused":
    case "failed":
      return failure(ctx, outcome.error);
  }
}

export function toToolResult(envelope: Envelope) {
  const isError = !envelope.ok && envelope.error.code !== "CONFIRMATION_REQUIRED";
  return {
    ...(isError ? { isError: true } : {}),
    content: [{ type: "text" as const, text: JSON.stringify(envelope) }],
    structuredContent: envelope
  };
}

/** Binds a tool invocation to its envelope context; handler faults become failure envelopes. */
export function createToolRunner(baseUrl: string) {
  return async (extra: ToolRequestExtra, handler: (ctx: ToolContext) => Promise<Envelope>) => {
    const ctx: ToolContext = {
      baseUrl,
      requestId: extra.requestId === undefined ? randomUUID() : String(extra.requestId),
      signal: extra.signal
    };

    try {
      return toToolResult(await handler(ctx));
    } catch (error) {
      logger.error("tool handler failed", { requestId: ctx.requestId, error });
      return toToolResult(failure(ctx, error));
    }
  };
}

export type ToolRunner = ReturnType<typeof createToolRunner>;
