import { describe, expect, test } from "vitest";

import { deviceIdParam, intParam } from "../query.js";

describe("intParam", () => {
  const limit = intParam(100);

  test("reads integer literals", () => {
    expect(limit.parse("25")).toBe(25);
    expect(limit.parse(" -3 ")).toBe(-3);
  });

  test("falls back for missing or non-integer values", () => {
    expect(limit.parse(undefined)).toBe(100);
    expect(limit.parse("2.5")).toBe(100);
    expect(limit.parse("10abc")).toBe(100);
    expect(limit.parse("")).toBe(100);
  });
});

describe("deviceIdParam", () => {
  test("trims the id", () => {
    expect(deviceIdParam.parse(" bin-1 ")).toBe("bin-1");
  });

  test("treats blank and missing as null", () => {
    expect(deviceIdParam.parse("   ")).toBeNull();
    expect(deviceIdParam.parse(undefined)).toBeNull();
  });
});
