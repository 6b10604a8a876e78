export interface PageRequest {
  page?: number;
  size?: number;
}

export interface PageMeta {
  page: number;
  page_size: number;
  total: number;
  next: string | null;
}

export interface Page<T> {
  items: T[];
  meta: PageMeta;
}

export const DEFAULT_PAGE_SIZE = 25;

function clampInt(value: number | undefined, fallback: number, min: number, max: number): number {
  const numeric = value === undefined || !Number.isFinite(value) ? fallback : Math.trunc(value);
  return Math.min(Math.max(numeric, min), max);
}

export function normalizePageRequest(request: PageRequest, maxPageSize: number): { page: number; size: number } {
  const ceiling = Math.max(1, maxPageSize);
  return {
    page: clampInt(request.page, 1, 1, Number.MAX_SAFE_INTEGER),
    size: clampInt(request.size, Math.min(DEFAULT_PAGE_SIZE, ceiling), 1, ceiling)
  };
}

export function nextCursor(page: number, size: number): string {
  return `page=${page + 1}&size=${size}`;
}

/** Slices an already-fetched list; `next` is set only while items remain past this page. */
export function paginate<T>(items: readonly T[], request: PageRequest, maxPageSize: number): Page<T> {
  const { page, size } = normalizePageRequest(request, maxPageSize);
  const skip = (page - 1) * size;
  const slice = items.slice(skip, skip + size);

  return {
    items: slice,
    meta: {
      page,
      page_size: size,
      total: items.length,
      next: skip + slice.length < items.length ? nextCursor(page, size) : null
    }
  };
}
