/**
 * Tests for pagination utilities: encodeCursor, decodeCursor, paginate.
 */

import { describe, it, expect } from "vitest";
import {
  encodeCursor,
  decodeCursor,
  paginate,
} from "../src/types/pagination.js";

// =============================================================================
// decodeCursor
// =============================================================================

describe("decodeCursor", () => {
  it("reads back what encodeCursor wrote", () => {
    expect(decodeCursor(encodeCursor("globalPosition", 42))).toEqual({
      field: "globalPosition",
      value: 42,
    });
  });

  it("returns undefined for valid base64 but invalid JSON", () => {
    const notJson = Buffer.from("not json at all").toString("base64url");
    expect(decodeCursor(notJson)).toBeUndefined();
  });

  it("returns undefined when fields are missing or mistyped", () => {
    const encode = (v: unknown) => Buffer.from(JSON.stringify(v)).toString("base64url");

    expect(decodeCursor(encode({ f: "version" }))).toBeUndefined();
    expect(decodeCursor(encode({ v: 3 }))).toBeUndefined();
    expect(decodeCursor(encode({ f: "version", v: "3" }))).toBeUndefined();
    expect(decodeCursor(encode([1, 2]))).toBeUndefined();
    expect(decodeCursor(encode(42))).toBeUndefined();
  });
});

// =============================================================================
// paginate
// =============================================================================

interface Item {
  position: number;
}

const items: Item[] = [2, 9, 10, 11, 100].map((position) => ({ position }));

const getPosition = (item: Item) => item.position;

describe("paginate", () => {
  it("returns the first page with a cursor when items exceed the limit", () => {
    const result = paginate(items, { limit: 2 }, getPosition, "position");

    expect(result.data).toEqual([{ position: 2 }, { position: 9 }]);
    expect(result.pagination.hasMore).toBe(true);
    expect(decodeCursor(result.pagination.cursor ?? "")).toEqual({
      field: "position",
      value: 9,
    });
  });

  it("returns all items when the limit exceeds the array length", () => {
    const result = paginate(items, { limit: 10 }, getPosition, "position");

    expect(result.data).toEqual(items);
    expect(result.pagination).toEqual({ cursor: null, hasMore: false });
  });

  it("compares keys as numbers", () => {
    const cursor = encodeCursor("position", 9);
    const result = paginate(items, { cursor, limit: 2 }, getPosition, "position");

    expect(result.data).toEqual([{ position: 10 }, { position: 11 }]);
    expect(result.pagination.hasMore).toBe(true);
  });

  it("ignores a cursor for another field", () => {
    const cursor = encodeCursor("version", 10);
    const result = paginate(items, { cursor, limit: 1 }, getPosition, "position");

    expect(result.data).toEqual([{ position: 2 }]);
  });

  it("ignores an invalid cursor and returns from the start", () => {
    const result = paginate(items, { cursor: "garbage", limit: 3 }, getPosition, "position");

    expect(result.data).toEqual([{ position: 2 }, { position: 9 }, { position: 10 }]);
  });

  it("returns an empty result for no items", () => {
    const result = paginate([], { limit: 5 }, getPosition, "position");

    expect(result).toEqual({ data: [], pagination: { cursor: null, hasMore: false } });
  });
});
