import { describe, expect, it } from "vitest";
import { AppError } from "../../src/utils/errors.js";
import {
  boundedText,
  compact,
  integerInRange,
  numberInRange,
  optionalId,
  parseIdList,
  parseIsoDate,
  requireId,
  requireText
} from "../../src/utils/parsing.js";

describe("parseIdList", () => {
  it("trims entries and drops blanks, keeping repeats in order", () => {
    expect(parseIdList(" a, b ,,a , c,", "ids")).toEqual(["a", "b", "a", "c"]);
  });

  it("rejects a list with no usable ids", () => {
    expect(() => parseIdList(" , ,", "asset_ids")).toThrowError("No valid ids provided in asset_ids");

    try {
      parseIdList(undefined, "ids");
    } catch (error) {
      expect(error).toBeInstanceOf(AppError);
      expect(error instanceof AppError ? error.code : undefined).toBe("VALIDATION");
    }
  });
});

describe("parseIsoDate", () => {
  it("returns undefined for missing or blank input", () => {
    expect(parseIsoDate(undefined, "taken_after")).toBeUndefined();
    expect(parseIsoDate("  ", "taken_after")).toBeUndefined();
  });

  it("normalizes dates and date-times to ISO timestamps", () => {
    expect(parseIsoDate("2024-03-05", "taken_after")).toBe("2024-03-05T00:00:00.000Z");
    expect(parseIsoDate("2024-03-05T10:20:30Z", "taken_after")).toBe("2024-03-05T10:20:30.000Z");
    expect(parseIsoDate("2024-03-05T10:20:30+02:00", "taken_after")).toBe("2024-03-05T08:20:30.000Z");
  });

  it("rejects values that are not ISO-8601", () => {
    expect(() => parseIsoDate("March 5th", "taken_before")).toThrowError("taken_before must be an ISO-8601 date");
    expect(() => parseIsoDate("2024-13-45", "taken_before")).toThrowError("taken_before must be an ISO-8601 date");
  });
});

describe("compact", () => {
  it("drops undefined values but keeps falsy ones", () => {
    expect(compact({ a: undefined, b: false, c: 0, d: null, e: "" })).toEqual({ b: false, c: 0, d: null, e: "" });
  });
});

describe("requireId", () => {
  it("trims and returns the id", () => {
    expect(requireId("  al-1 ", "id")).toBe("al-1");
  });

  it("rejects missing, blank and overlong ids", () => {
    expect(() => requireId(undefined, "id")).toThrowError("id is required");
    expect(() => requireId("   ", "album_id")).toThrowError("album_id is required");
    expect(() => requireId("x".repeat(129), "id")).toThrowError("id must be at most 128 characters");
  });

  it("treats blank optional ids as unset", () => {
    expect(optionalId(undefined, "asset_id")).toBeUndefined();
    expect(optionalId(" ", "asset_id")).toBeUndefined();
    expect(optionalId(" a1", "asset_id")).toBe("a1");
  });
});

describe("text and number bounds", () => {
  it("requires non-blank text within the limit", () => {
    expect(requireText(" Summer ", "album_name")).toBe("Summer");
    expect(() => requireText("  ", "album_name")).toThrowError("album_name is required");
    expect(() => requireText("x".repeat(256), "album_name")).toThrowError("album_name must be at most 255 characters");
  });

  it("passes free text through untouched", () => {
    expect(boundedText(" keep spaces ", "description")).toBe(" keep spaces ");
    expect(boundedText(undefined, "description")).toBeUndefined();
    expect(() => boundedText("x".repeat(4097), "description")).toThrowError("description must be at most 4096 characters");
  });

  it("checks ranges and integers", () => {
    expect(numberInRange(-90, "latitude", -90, 90)).toBe(-90);
    expect(() => numberInRange(90.5, "latitude", -90, 90)).toThrowError("latitude must be between -90 and 90");
    expect(integerInRange(undefined, "rating", 0, 5)).toBeUndefined();
    expect(() => integerInRange(2.5, "rating", 0, 5)).toThrowError("rating must be an integer");
  });
});
