import { z } from "zod";

// Input shapes carry types only. Handlers check presence, bounds and formats and reject with VALIDATION.

export const idSchema = z.string().optional().describe("Entity id (UUID)");

export const idListSchema = z.string().optional().describe("Comma-separated ids, e.g. \"id1,id2\"");

export const isoDateSchema = z.string().optional().describe("ISO-8601 date or date-time");

export const pageSchema = z.number().optional().describe("1-based page number (default 1)");

export const pageSizeSchema = z.number().optional().describe("Page size (default 25, capped by the server maximum)");

export const confirmSchema = z.boolean().default(false).describe("Must be true to execute");

export const dryRunSchema = z.boolean().default(true).describe("Preview only; set false together with confirm=true to execute");

export const ratingSchema = z.number().optional().describe("Star rating from 0 to 5");

export const pagingShape = {
  page: pageSchema,
  size: pageSizeSchema
};

export const assetFlagsShape = {
  is_favorite: z.boolean().optional(),
  is_archived: z.boolean().optional()
};

export const readOnlyAnnotations = {
  readOnlyHint: true,
  idempotentHint: true,
  destructiveHint: false,
  openWorldHint: true
} as const;

export const mutatingAnnotations = {
  readOnlyHint: false,
  idempotentHint: false,
  destructiveHint: false,
  openWorldHint: true
} as const;

export const destructiveAnnotations = {
  readOnlyHint: false,
  idempotentHint: false,
  destructiveHint: true,
  openWorldHint: true
} as const;
