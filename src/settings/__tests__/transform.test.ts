import { describe, expect, it } from "vitest";
import { DEFAULT_SETTINGS } from "../schema.js";
import { applySettingsUpdate, parseStoredSettings } from "../transform.js";

describe("parseStoredSettings", () => {
  it("reads every field from a valid file", () => {
    expect(
      parseStoredSettings({ thresholdCm: 8, emptyThresholdCm: 40, alertSustainSec: 10 }),
    ).toEqual({ thresholdCm: 8, emptyThresholdCm: 40, alertSustainSec: 10 });
  });

  it("accepts numeric strings", () => {
    expect(parseStoredSettings({ thresholdCm: "6.5" }).thresholdCm).toBe(6.5);
  });

  it("defaults missing or unreadable fields independently", () => {
    expect(parseStoredSettings({ thresholdCm: "abc", alertSustainSec: 1 })).toEqual({
      thresholdCm: 5,
      emptyThresholdCm: 15,
      alertSustainSec: 1,
    });
  });

  it("clamps negative values to zero", () => {
    expect(parseStoredSettings({ thresholdCm: -3, emptyThresholdCm: 20, alertSustainSec: -1 })).toEqual({
      thresholdCm: 0,
      emptyThresholdCm: 20,
      alertSustainSec: 0,
    });
  });

  it("keeps an explicit zero sustain", () => {
    expect(parseStoredSettings({ alertSustainSec: 0 }).alertSustainSec).toBe(0);
  });

  it("returns the defaults for non-object content", () => {
    expect(parseStoredSettings([1, 2, 3])).toEqual(DEFAULT_SETTINGS);
    expect(parseStoredSettings(null)).toEqual(DEFAULT_SETTINGS);
    expect(parseStoredSettings("settings")).toEqual(DEFAULT_SETTINGS);
  });
});

describe("applySettingsUpdate", () => {
  it("updates only the supplied fields", () => {
    const result = applySettingsUpdate(DEFAULT_SETTINGS, { thresholdCm: 7 });

    expect(result._unsafeUnwrap()).toEqual({
      thresholdCm: 7,
      emptyThresholdCm: 15,
      alertSustainSec: 3,
    });
  });

  it("clamps negative values", () => {
    const result = applySettingsUpdate(DEFAULT_SETTINGS, { alertSustainSec: -5 });

    expect(result._unsafeUnwrap().alertSustainSec).toBe(0);
  });

  it("rejects a field that is not a number and names it", () => {
    const result = applySettingsUpdate(DEFAULT_SETTINGS, {
      thresholdCm: 6,
      emptyThresholdCm: "lots",
    });

    expect(result._unsafeUnwrapErr()).toEqual({
      type: "INVALID_FIELD",
      field: "emptyThresholdCm",
      message: "emptyThresholdCm must be a number",
    });
  });

  it("rejects a present but null field", () => {
    const result = applySettingsUpdate(DEFAULT_SETTINGS, { alertSustainSec: null });

    expect(result._unsafeUnwrapErr().type).toBe("INVALID_FIELD");
  });

  it("rejects updates with no known fields", () => {
    expect(applySettingsUpdate(DEFAULT_SETTINGS, { colour: "red" })._unsafeUnwrapErr().message).toBe(
      "No valid settings provided",
    );
    expect(applySettingsUpdate(DEFAULT_SETTINGS, null)._unsafeUnwrapErr().type).toBe("NO_FIELDS");
  });

  it("does not modify the current settings object", () => {
    const current = { ...DEFAULT_SETTINGS };

    applySettingsUpdate(current, { thresholdCm: 9 });

    expect(current.thresholdCm).toBe(5);
  });
});
