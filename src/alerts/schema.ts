/**
 * Alerts Module - Schemas and Types
 *
 * Per-device alert slots for the three fill conditions. The band a reading
 * falls into is re-derived on every reading; the slots only remember when the
 * current condition started and whether its alert already went out.
 */
import type { Result } from "neverthrow";
import type { AlertAction, Command } from "../commands/index.js";
import type { NotificationError } from "../notifications/index.js";

// =============================================================================
// Conditions and Bands
// =============================================================================

export const ALERT_CONDITIONS = ["full", "partial", "empty"] as const;

export type AlertCondition = (typeof ALERT_CONDITIONS)[number];

/**
 * Band a reading falls into. "normal" sits between the partial band and the
 * empty threshold and clears every condition.
 */
export type AlertBand = AlertCondition | "normal";

// =============================================================================
// Alert State
// =============================================================================

/**
 * Tracking slot for one condition.
 * `since` is null whenever the condition is not currently matching, and
 * `sent` is then always false.
 */
export type AlertSlot = Readonly<{
  /** When the current dwell started (ms since epoch) */
  since: number | null;
  /** Whether this dwell already fired its alert */
  sent: boolean;
}>;

export type DeviceAlertState = Readonly<Record<AlertCondition, AlertSlot>>;

export const IDLE_SLOT: AlertSlot = { since: null, sent: false };

export const INITIAL_DEVICE_ALERT_STATE: DeviceAlertState = {
  full: IDLE_SLOT,
  partial: IDLE_SLOT,
  empty: IDLE_SLOT,
};

/**
 * Command raised for each condition when its alert fires.
 */
export const ALERT_ACTIONS: Readonly<Record<AlertCondition, AlertAction>> = {
  full: "notifyFull",
  partial: "notifyPartial",
  empty: "notifyEmpty",
};

/**
 * Conditions that also send a message to the notifier. Partial and empty
 * only queue a device command.
 */
export const MESSAGE_CONDITIONS: ReadonlySet<AlertCondition> = new Set(["full"]);

// =============================================================================
// Evaluation Results
// =============================================================================

/**
 * Outcome of advancing one device's slots by one reading.
 */
export type AlertStep = Readonly<{
  state: DeviceAlertState;
  /** Condition whose alert fired on this reading */
  fired: AlertCondition | null;
  /** Seconds the matched condition has held, null for "normal" */
  elapsedSec: number | null;
}>;

/**
 * Outcome of evaluating one reading, including its side effects.
 */
export type AlertEvaluation = Readonly<{
  deviceId: string;
  distance: number;
  band: AlertBand;
  fired: AlertCondition | null;
  elapsedSec: number | null;
  /** Command queued because an alert fired */
  command: Command | null;
  /** Pending notifier delivery, when the fired condition sends a message */
  delivery: Promise<Result<void, NotificationError>> | null;
}>;
