import { describe, expect, it } from "vitest";
import { DEFAULT_PAGE_SIZE, nextCursor, normalizePageRequest, paginate } from "../../src/domain/pagination.js";

const items = Array.from({ length: 7 }, (_, index) => `item-${index + 1}`);

describe("pagination", () => {
  it("defaults to the first page with the default size", () => {
    expect(normalizePageRequest({}, 100)).toEqual({ page: 1, size: DEFAULT_PAGE_SIZE });
  });

  it("clamps the page size to the configured maximum", () => {
    expect(normalizePageRequest({ page: 2, size: 500 }, 100)).toEqual({ page: 2, size: 100 });
    expect(normalizePageRequest({}, 10)).toEqual({ page: 1, size: 10 });
  });

  it("raises non-positive values to one", () => {
    expect(normalizePageRequest({ page: 0, size: 0 }, 100)).toEqual({ page: 1, size: 1 });
    expect(normalizePageRequest({ page: -3, size: -1 }, 100)).toEqual({ page: 1, size: 1 });
  });

  it("slices the requested page and points at the next one", () => {
    const page = paginate(items, { page: 1, size: 3 }, 100);

    expect(page.items).toEqual(["item-1", "item-2", "item-3"]);
    expect(page.meta).toEqual({ page: 1, page_size: 3, total: 7, next: "page=2&size=3" });
  });

  it("leaves next null on the last page", () => {
    const page = paginate(items, { page: 3, size: 3 }, 100);

    expect(page.items).toEqual(["item-7"]);
    expect(page.meta.next).toBeNull();
  });

  it("returns an empty page past the end", () => {
    const page = paginate(items, { page: 5, size: 3 }, 100);

    expect(page.items).toEqual([]);
    expect(page.meta).toEqual({ page: 5, page_size: 3, total: 7, next: null });
  });

  it("leaves next null when the last page is exactly full", () => {
    expect(paginate(items.slice(0, 6), { page: 2, size: 3 }, 100).meta.next).toBeNull();
  });

  it("formats the cursor as page and size", () => {
    expect(nextCursor(4, 20)).toBe("page=5&size=20");
  });

  it("returns the same page and cursor when a page is requested twice", () => {
    const first = paginate(items, { page: 2, size: 3 }, 100);
    const second = paginate(items, { page: 2, size: 3 }, 100);

    expect(first.items).toEqual(["item-4", "item-5", "item-6"]);
    expect(second.items).toEqual(first.items);
    expect(second.meta.next).toBe("page=3&size=3");
    expect(second.meta).toEqual(first.meta);
  });

  it("truncates fractional page and size values", () => {
    expect(normalizePageRequest({ page: 2.9, size: 3.2 }, 100)).toEqual({ page: 2, size: 3 });
  });
});
