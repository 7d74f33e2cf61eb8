/**
 * Ingestion service tests wiring the real classifier, registry, alert
 * tracker and command queue around an in-memory reading store.
 */
import { err, ok } from "neverthrow";
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

import { createAlertTracker } from "../../alerts/index.js";
import { createCommandQueue } from "../../commands/index.js";
import { createDeviceRegistry } from "../../devices/index.js";
import type { Settings } from "../../settings/index.js";
import type { ReadingRow, ReadingStore } from "../../storage/index.js";
import { writeFailed } from "../../storage/index.js";
import { createIngestionService } from "../service.js";

const T0 = Date.parse("2025-04-01T10:00:00.000Z");

const setup = (settings: Settings, store?: Pick<ReadingStore, "append">) => {
  let now = T0;
  const clock = () => now;
  const rows: ReadingRow[] = [];
  const notify = vi.fn(async () => ok(undefined));
  const commands = createCommandQueue(clock);
  const registry = createDeviceRegistry(10);
  const alerts = createAlertTracker({ commands, notify });
  const ingestion = createIngestionService({
    settings: { get: () => ({ ...settings }) },
    registry,
    alerts,
    store: store ?? {
      append: async (row) => {
        rows.push(row);
        return ok(undefined);
      },
    },
    clock,
  });

  return {
    ingestion,
    commands,
    registry,
    alerts,
    notify,
    rows,
    advance: (seconds: number) => {
      now += seconds * 1000;
    },
  };
};

describe("ingest", () => {
  test("a full reading with zero sustain queues notifyFull with id 1", async () => {
    // Arrange
    const ctx = setup({ thresholdCm: 5, emptyThresholdCm: 15, alertSustainSec: 0 });

    // Act
    const outcome = await ctx.ingestion.ingest({ deviceId: "A", distance: 2 });

    // Assert
    expect(outcome.receipt).toEqual({
      status: "ok",
      deviceId: "A",
      serverTimestamp: "2025-04-01T10:00:00.000Z",
    });
    expect(outcome.row.fillStatus).toBe("full");
    expect(outcome.row.isFull).toBe(1);
    expect(ctx.commands.latest("A")).toEqual({
      deviceId: "A",
      commandId: 1,
      action: "notifyFull",
      serverTimestamp: "2025-04-01T10:00:00.000Z",
    });
    expect(ctx.notify).toHaveBeenCalledTimes(1);
  });

  test("records the snapshot, history and CSV row", async () => {
    const ctx = setup({ thresholdCm: 5, emptyThresholdCm: 15, alertSustainSec: 3 });

    await ctx.ingestion.ingest({ deviceId: "A", distance: 20, motion: 1 });

    expect(ctx.registry.snapshots().A).toMatchObject({
      deviceId: "A",
      distance: 20,
      fillStatus: "empty",
      isFull: 0,
    });
    expect(ctx.registry.history("A")).toHaveLength(1);
    expect(ctx.rows).toHaveLength(1);
    expect(ctx.rows[0]?.motion).toBe(1);
  });

  test("fires only after the sustain window", async () => {
    const ctx = setup({ thresholdCm: 5, emptyThresholdCm: 15, alertSustainSec: 2 });

    await ctx.ingestion.ingest({ deviceId: "A", distance: 3 });
    ctx.advance(1);
    await ctx.ingestion.ingest({ deviceId: "A", distance: 3 });
    expect(ctx.commands.latest("A")).toBeNull();

    ctx.advance(1);
    const fired = await ctx.ingestion.ingest({ deviceId: "A", distance: 3 });
    expect(fired.alert?.fired).toBe("full");

    ctx.advance(1);
    const again = await ctx.ingestion.ingest({ deviceId: "A", distance: 3 });
    expect(again.alert?.fired).toBeNull();
    expect(ctx.commands.latest("A")?.commandId).toBe(1);
  });

  test("a missing distance is stored as unknown without alert evaluation", async () => {
    const ctx = setup({ thresholdCm: 5, emptyThresholdCm: 15, alertSustainSec: 0 });

    const outcome = await ctx.ingestion.ingest({ deviceId: "A" });

    expect(outcome.row.fillStatus).toBe("unknown");
    expect(outcome.row.distance).toBeNull();
    expect(outcome.alert).toBeNull();
    expect(ctx.alerts.stateOf("A")).toBeNull();
  });

  test("reports without a device id are filed under unknown", async () => {
    const ctx = setup({ thresholdCm: 5, emptyThresholdCm: 15, alertSustainSec: 3 });

    const outcome = await ctx.ingestion.ingest({ distance: 10 });

    expect(outcome.receipt.deviceId).toBe("unknown");
    expect(ctx.registry.deviceIds()).toEqual(["unknown"]);
  });

  test("a storage failure does not fail the reading", async () => {
    const ctx = setup(
      { thresholdCm: 5, emptyThresholdCm: 15, alertSustainSec: 0 },
      { append: async () => err(writeFailed("/tmp/x.csv", new Error("EROFS"))) },
    );

    const outcome = await ctx.ingestion.ingest({ deviceId: "A", distance: 2 });

    expect(outcome.receipt.status).toBe("ok");
    expect(ctx.registry.count()).toBe(1);
  });
});
