import { validationError } from "./errors.js";

/** Splits a comma-separated id list, dropping blanks. Repeated ids are kept as given. */
export function parseIdList(input: string | undefined, field: string): string[] {
  const ids = (input ?? "")
    .split(",")
    .map((part) => part.trim())
    .filter((part) => part.length > 0);

  if (ids.length === 0) {
    throw validationError(`No valid ids provided in ${field}`, { field });
  }

  return ids;
}

const MAX_ID_LENGTH = 128;

export function requireId(input: string | undefined, field: string): string {
  const id = input?.trim() ?? "";
  if (id.length === 0) {
    throw validationError(`${field} is required`, { field });
  }
  if (id.length > MAX_ID_LENGTH) {
    throw validationError(`${field} must be at most ${MAX_ID_LENGTH} characters`, { field });
  }
  return id;
}

/** Like `requireId`, but a missing or blank value means "not set". */
export function optionalId(input: string | undefined, field: string): string | undefined {
  return input === undefined || input.trim() === "" ? undefined : requireId(input, field);
}

/** Trimmed, non-blank text of at most `maxLength` characters. */
export function requireText(input: string | undefined, field: string, maxLength = 255): string {
  const text = input?.trim() ?? "";
  if (text.length === 0) {
    throw validationError(`${field} is required`, { field });
  }
  if (text.length > maxLength) {
    throw validationError(`${field} must be at most ${maxLength} characters`, { field });
  }
  return text;
}

/** Passes free text through untouched, bounded by `maxLength`. */
export function boundedText(input: string | undefined, field: string, maxLength = 4096): string | undefined {
  if (input !== undefined && input.length > maxLength) {
    throw validationError(`${field} must be at most ${maxLength} characters`, { field });
  }
  return input;
}

export function numberInRange(input: number | undefined, field: string, min: number, max: number): number | undefined {
  if (input !== undefined && (!Number.isFinite(input) || input < min || input > max)) {
    throw validationError(`${field} must be between ${min} and ${max}`, { field, value: input });
  }
  return input;
}

const ISO_DATE = /^\d{4}-\d{2}-\d{2}(?:[T ]\d{2}:\d{2}(?::\d{2}(?:\.\d+)?)?(?:Z|[+-]\d{2}:?\d{2})?)?$/;

/** Normalizes an ISO-8601 date or date-time to a full ISO timestamp. */
export function parseIsoDate(input: string | undefined, field: string): string | undefined {
  if (input === undefined || input.trim() === "") {
    return undefined;
  }

  const trimmed = input.trim();
  const parsed = new Date(trimmed);
  if (!ISO_DATE.test(trimmed) || Number.isNaN(parsed.getTime())) {
    throw validationError(`${field} must be an ISO-8601 date`, { field, value: input });
  }

  return parsed.toISOString();
}

/** Drops undefined values so partial updates only send what the caller set. */
export function compact(input: Record<string, unknown>): Record<string, unknown> {
  return Object.fromEntries(Object.entries(input).filter(([, value]) => value !== undefined));
}

export function integerInRange(input: number | undefined, field: string, min: number, max: number): number | undefined {
  const value = numberInRange(input, field, min, max);
  if (value !== undefined && !Number.isInteger(value)) {
    throw validationError(`${field} must be an integer`, { field, value });
  }
  return value;
}
