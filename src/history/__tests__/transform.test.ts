import { describe, expect, test } from "vitest";

import type { ReadingRow } from "../../storage/index.js";
import {
  filterByDevice,
  normalizeLimit,
  normalizePaging,
  pageNewestFirst,
  takeLast,
  toSeries,
  totalPages,
  uniqueDeviceIds,
} from "../transform.js";

const row = (deviceId: string, n: number): ReadingRow => ({
  serverTimestamp: `2025-04-01T10:00:0${n}.000Z`,
  deviceId,
  deviceTimestamp: null,
  deviceUptimeMs: null,
  distance: n,
  motion: n % 2 === 0 ? 0 : 1,
  servoPosition: 0,
  targetPosition: null,
  shouldActivateServo: 0,
  isFull: 0,
  fillStatus: "empty",
});

describe("normalizePaging", () => {
  test("keeps positive values", () => {
    expect(normalizePaging(3, 10)).toEqual({ page: 3, pageSize: 10 });
  });

  test("replaces non-positive values with defaults", () => {
    expect(normalizePaging(0, -5)).toEqual({ page: 1, pageSize: 25 });
  });
});

describe("normalizeLimit", () => {
  test("uses 100 for non-positive limits", () => {
    expect(normalizeLimit(0)).toBe(100);
    expect(normalizeLimit(7)).toBe(7);
  });
});

describe("totalPages", () => {
  test("rounds up partial pages", () => {
    expect(totalPages(0, 25)).toBe(0);
    expect(totalPages(26, 25)).toBe(2);
  });
});

describe("filterByDevice", () => {
  const rows = [row("a", 1), row("b", 2), row("a", 3)];

  test("keeps rows of the requested device", () => {
    expect(filterByDevice(rows, "a").map((r) => r.distance)).toEqual([1, 3]);
  });

  test("keeps every row without a device id", () => {
    expect(filterByDevice(rows, null)).toHaveLength(3);
  });
});

describe("takeLast", () => {
  test("returns the tail in insertion order", () => {
    expect(takeLast([1, 2, 3, 4], 2)).toEqual([3, 4]);
    expect(takeLast([1, 2], 5)).toEqual([1, 2]);
  });
});

describe("pageNewestFirst", () => {
  const rows = [1, 2, 3, 4, 5].map((n) => row("a", n));

  test("first page holds the newest rows", () => {
    expect(pageNewestFirst(rows, 1, 2).map((r) => r.distance)).toEqual([5, 4]);
  });

  test("last page may be short", () => {
    expect(pageNewestFirst(rows, 3, 2).map((r) => r.distance)).toEqual([1]);
  });

  test("pages past the end are empty", () => {
    expect(pageNewestFirst(rows, 4, 2)).toEqual([]);
  });
});

describe("uniqueDeviceIds", () => {
  test("skips blanks and keeps first-seen order", () => {
    const rows = [row("b", 1), row(" ", 2), row("a", 3), row("b", 4)];
    expect(uniqueDeviceIds(rows)).toEqual(["b", "a"]);
  });
});

describe("toSeries", () => {
  test("builds parallel arrays", () => {
    const series = toSeries("a", [row("a", 1), row("a", 2)]);

    expect(series).toEqual({
      deviceId: "a",
      timestamps: ["2025-04-01T10:00:01.000Z", "2025-04-01T10:00:02.000Z"],
      distance: [1, 2],
      servo: [0, 0],
      motion: [1, 0],
      fillStatus: ["empty", "empty"],
    });
  });
});
