import { describe, expect, test, vi } from "vitest";

vi.mock("../../logger.js", () => ({
  createLogger: () => ({
    info: vi.fn(),
    debug: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    trace: vi.fn(),
    fatal: vi.fn(),
  }),
}));

import type { ReadingRow } from "../../storage/index.js";
import type { DeviceSnapshot } from "../schema.js";
import { createDeviceRegistry } from "../service.js";

const snapshot = (deviceId: string, distance: number): DeviceSnapshot => ({
  deviceId,
  distance,
  serverTimestamp: "2025-04-01T10:00:00.000Z",
  isFull: 0,
  fillStatus: "partial",
});

const row = (deviceId: string, distance: number): ReadingRow => ({
  serverTimestamp: `2025-04-01T10:00:${String(distance).padStart(2, "0")}.000Z`,
  deviceId,
  deviceTimestamp: null,
  deviceUptimeMs: null,
  distance,
  motion: 0,
  servoPosition: null,
  targetPosition: null,
  shouldActivateServo: 0,
  isFull: 0,
  fillStatus: "partial",
});

describe("createDeviceRegistry", () => {
  test("keeps the latest snapshot per device", () => {
    const registry = createDeviceRegistry();

    registry.record("bin-a", snapshot("bin-a", 10), row("bin-a", 10));
    registry.record("bin-a", snapshot("bin-a", 12), row("bin-a", 12));

    expect(registry.snapshots()).toEqual({ "bin-a": snapshot("bin-a", 12) });
    expect(registry.count()).toBe(1);
  });

  test("lists devices in first-seen order", () => {
    const registry = createDeviceRegistry();

    registry.record("bin-b", snapshot("bin-b", 1), row("bin-b", 1));
    registry.record("bin-a", snapshot("bin-a", 2), row("bin-a", 2));
    registry.record("bin-b", snapshot("bin-b", 3), row("bin-b", 3));

    expect(registry.deviceIds()).toEqual(["bin-b", "bin-a"]);
  });

  test("discards the oldest history rows beyond the limit", () => {
    const registry = createDeviceRegistry(3);

    for (const distance of [1, 2, 3, 4, 5]) {
      registry.record("bin-a", snapshot("bin-a", distance), row("bin-a", distance));
    }

    expect(registry.history("bin-a").map((entry) => entry.distance)).toEqual([3, 4, 5]);
  });

  test("returns copies of the history", () => {
    const registry = createDeviceRegistry();
    registry.record("bin-a", snapshot("bin-a", 1), row("bin-a", 1));

    const copy = registry.history("bin-a");

    expect(copy).not.toBe(registry.history("bin-a"));
    expect(copy).toHaveLength(1);
    expect(registry.history("bin-z")).toEqual([]);
  });
});
