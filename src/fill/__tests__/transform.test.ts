/**
 * Fill classification tests.
 */
import { describe, expect, it } from "vitest";
import {
  classify,
  classifyWith,
  isFullFlag,
  partialThresholdFor,
} from "../transform.js";

describe("classify", () => {
  const threshold = 10;
  const emptyThreshold = 30;

  it("returns unknown when the distance is missing", () => {
    expect(classify(null, threshold, emptyThreshold)).toBe("unknown");
  });

  it("never returns unknown for a present distance", () => {
    for (const distance of [0, 5, 10, 13, 20, 30, 100]) {
      expect(classify(distance, threshold, emptyThreshold)).not.toBe("unknown");
    }
  });

  it("returns full at or below the threshold", () => {
    expect(classify(0, threshold, emptyThreshold)).toBe("full");
    expect(classify(9.99, threshold, emptyThreshold)).toBe("full");
    expect(classify(10, threshold, emptyThreshold)).toBe("full");
  });

  it("returns partial above the threshold up to 1.33x", () => {
    expect(classify(10.01, threshold, emptyThreshold)).toBe("partial");
    expect(classify(13.2, threshold, emptyThreshold)).toBe("partial");
  });

  it("returns empty at or above the empty threshold", () => {
    expect(classify(30, threshold, emptyThreshold)).toBe("empty");
    expect(classify(120, threshold, emptyThreshold)).toBe("empty");
  });

  it("falls back to partial between the partial band and the empty threshold", () => {
    expect(classify(13.31, threshold, emptyThreshold)).toBe("partial");
    expect(classify(29.99, threshold, emptyThreshold)).toBe("partial");
  });

  it("checks the partial band before empty when the thresholds overlap", () => {
    // partial band reaches 13.3, empty threshold is 12
    expect(classify(12.5, 10, 12)).toBe("partial");
    expect(classify(13.5, 10, 12)).toBe("empty");
  });

  it("checks full before empty when the empty threshold is below the full one", () => {
    expect(classify(3, 5, 2)).toBe("full");
  });
});

describe("classifyWith", () => {
  it("reads thresholds from a settings-shaped record", () => {
    expect(classifyWith(4, { thresholdCm: 5, emptyThresholdCm: 15 })).toBe("full");
    expect(classifyWith(16, { thresholdCm: 5, emptyThresholdCm: 15 })).toBe("empty");
  });
});

describe("partialThresholdFor", () => {
  it("scales the threshold by 1.33", () => {
    expect(partialThresholdFor(100)).toBeCloseTo(133);
    expect(partialThresholdFor(0)).toBe(0);
  });
});

describe("isFullFlag", () => {
  it("is 1 at or below the threshold", () => {
    expect(isFullFlag(5, 5)).toBe(1);
    expect(isFullFlag(2, 5)).toBe(1);
  });

  it("is 0 above the threshold or without a reading", () => {
    expect(isFullFlag(5.1, 5)).toBe(0);
    expect(isFullFlag(null, 5)).toBe(0);
  });
});
