/**
 * Command transformation tests.
 */
import { describe, expect, it } from "vitest";
import {
  buildCommand,
  clampAngle,
  isNewerCommand,
  normalizeCommandRequest,
} from "../transform.js";

describe("clampAngle", () => {
  it("keeps angles inside the servo range", () => {
    expect(clampAngle(45)).toBe(45);
  });

  it("clamps below 0 and above 180", () => {
    expect(clampAngle(-20)).toBe(0);
    expect(clampAngle(270)).toBe(180);
  });
});

describe("normalizeCommandRequest", () => {
  it("defaults a missing action to setAngle", () => {
    const result = normalizeCommandRequest({ deviceId: "bin-1", targetPosition: 45 });

    expect(result._unsafeUnwrap()).toEqual({
      deviceId: "bin-1",
      payload: { action: "setAngle", targetPosition: 45 },
    });
  });

  it("maps open and activate to 90 degrees", () => {
    expect(normalizeCommandRequest({ deviceId: "bin-1", action: "open" })._unsafeUnwrap().payload).toEqual({
      action: "setAngle",
      targetPosition: 90,
    });
    expect(normalizeCommandRequest({ deviceId: "bin-1", action: "activate" })._unsafeUnwrap().payload).toEqual({
      action: "setAngle",
      targetPosition: 90,
    });
  });

  it("maps close and deactivate to 0 degrees", () => {
    expect(normalizeCommandRequest({ deviceId: "bin-1", action: "close" })._unsafeUnwrap().payload).toEqual({
      action: "setAngle",
      targetPosition: 0,
    });
    expect(normalizeCommandRequest({ deviceId: "bin-1", action: " deactivate " })._unsafeUnwrap().payload).toEqual({
      action: "setAngle",
      targetPosition: 0,
    });
  });

  it("uses an explicit target even for the open shortcut", () => {
    const result = normalizeCommandRequest({ deviceId: "bin-1", action: "open", targetPosition: 30 });

    expect(result._unsafeUnwrap().payload).toEqual({ action: "setAngle", targetPosition: 30 });
  });

  it("passes auto and notify through without a target", () => {
    expect(normalizeCommandRequest({ deviceId: "bin-1", action: "auto" })._unsafeUnwrap().payload).toEqual({
      action: "auto",
    });
    expect(normalizeCommandRequest({ deviceId: "bin-1", action: "notify" })._unsafeUnwrap().payload).toEqual({
      action: "notify",
    });
  });

  it("parses string targets and clamps them", () => {
    const result = normalizeCommandRequest({ deviceId: "bin-1", action: "setAngle", targetPosition: "200" });

    expect(result._unsafeUnwrap().payload).toEqual({ action: "setAngle", targetPosition: 180 });
  });

  it("treats unknown actions as setAngle", () => {
    const result = normalizeCommandRequest({ deviceId: "bin-1", action: "wiggle", targetPosition: 12.8 });

    expect(result._unsafeUnwrap().payload).toEqual({ action: "setAngle", targetPosition: 12 });
  });

  it("rejects setAngle without an integer target", () => {
    const missing = normalizeCommandRequest({ deviceId: "bin-1", action: "setAngle" });
    const fractional = normalizeCommandRequest({ deviceId: "bin-1", targetPosition: "12.5" });

    expect(missing._unsafeUnwrapErr().type).toBe("INVALID_TARGET_POSITION");
    expect(fractional._unsafeUnwrapErr().message).toBe("targetPosition required/int for setAngle");
  });

  it("rejects requests without a device id", () => {
    expect(normalizeCommandRequest({ action: "auto" })._unsafeUnwrapErr().type).toBe("DEVICE_ID_REQUIRED");
    expect(normalizeCommandRequest({ deviceId: "", action: "auto" })._unsafeUnwrapErr().type).toBe(
      "DEVICE_ID_REQUIRED",
    );
    expect(normalizeCommandRequest({ deviceId: 7, action: "auto" })._unsafeUnwrapErr().type).toBe(
      "DEVICE_ID_REQUIRED",
    );
    expect(normalizeCommandRequest(null)._unsafeUnwrapErr().type).toBe("DEVICE_ID_REQUIRED");
  });
});

describe("buildCommand", () => {
  it("merges payload with id, device and ISO timestamp", () => {
    const command = buildCommand("bin-1", 3, { action: "notifyFull" }, Date.UTC(2025, 0, 2, 3, 4, 5));

    expect(command).toEqual({
      deviceId: "bin-1",
      commandId: 3,
      action: "notifyFull",
      serverTimestamp: "2025-01-02T03:04:05.000Z",
    });
  });
});

describe("isNewerCommand", () => {
  const command = buildCommand("bin-1", 4, { action: "auto" }, 0);

  it("is true only when the command id exceeds the last seen id", () => {
    expect(isNewerCommand(command, 3)).toBe(true);
    expect(isNewerCommand(command, 4)).toBe(false);
    expect(isNewerCommand(command, 9)).toBe(false);
  });
});
