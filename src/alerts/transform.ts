/**
 * Alerts Module - Pure Transformations
 *
 * The debounce state machine. No side effects, no I/O - the service decides
 * what to do with a fired condition.
 */
import { partialThresholdFor } from "../fill/index.js";
import type { Settings } from "../settings/index.js";
import type {
  AlertBand,
  AlertCondition,
  AlertSlot,
  AlertStep,
  DeviceAlertState,
} from "./schema.js";
import { IDLE_SLOT, INITIAL_DEVICE_ALERT_STATE } from "./schema.js";

/**
 * Band for a distance, using the same check order as the fill classifier
 * except that the middle ground is "normal" instead of "partial".
 */
export function resolveAlertBand(distance: number, settings: Settings): AlertBand {
  if (distance <= settings.thresholdCm) {
    return "full";
  }
  if (distance <= partialThresholdFor(settings.thresholdCm)) {
    return "partial";
  }
  if (distance >= settings.emptyThresholdCm) {
    return "empty";
  }
  return "normal";
}

/**
 * Whether a condition that has held for `elapsedSec` is due to fire.
 * A sustain of zero or less fires on the first matching reading.
 */
export function isSustained(elapsedSec: number, sustainSec: number): boolean {
  return sustainSec <= 0 || elapsedSec >= sustainSec;
}

/**
 * Advance a device's slots by one reading.
 *
 * The matched condition starts its dwell if needed and fires once the dwell
 * reaches the sustain duration, at most once per dwell. The other two
 * conditions are reset, so leaving a condition and coming back restarts its
 * timing and lets it fire again. A "normal" reading resets all three.
 *
 * @param state - Current slots for the device
 * @param band - Band of the incoming reading
 * @param now - Reading time in ms since epoch
 * @param sustainSec - Required dwell in seconds
 */
export function stepAlertState(
  state: DeviceAlertState,
  band: AlertBand,
  now: number,
  sustainSec: number,
): AlertStep {
  if (band === "normal") {
    return { state: INITIAL_DEVICE_ALERT_STATE, fired: null, elapsedSec: null };
  }

  const slot = state[band];
  const since = slot.since ?? now;
  const elapsedSec = (now - since) / 1000;
  const fire = isSustained(elapsedSec, sustainSec) && !slot.sent;

  const matched: AlertSlot = { since, sent: slot.sent || fire };
  const slotFor = (condition: AlertCondition): AlertSlot =>
    condition === band ? matched : IDLE_SLOT;

  return {
    state: {
      full: slotFor("full"),
      partial: slotFor("partial"),
      empty: slotFor("empty"),
    },
    fired: fire ? band : null,
    elapsedSec,
  };
}

/**
 * Message sent to the notifier when a full alert fires.
 */
export function formatFullAlertMessage(alert: {
  deviceId: string;
  distance: number;
  thresholdCm: number;
  elapsedSec: number;
  sustainSec: number;
}): string {
  return (
    `Alert: Device ${alert.deviceId} distance ${alert.distance.toFixed(2)} cm ` +
    `is at/below threshold ${alert.thresholdCm.toFixed(2)} cm for ` +
    `${alert.elapsedSec.toFixed(1)}s (>= ${alert.sustainSec.toFixed(1)}s).`
  );
}

/**
 * Whether the slots satisfy the tracker's invariants: at most one active
 * condition, and no sent flag without an active dwell.
 */
export function isConsistentAlertState(state: DeviceAlertState): boolean {
  const slots = [state.full, state.partial, state.empty];
  const active = slots.filter((slot) => slot.since !== null).length;
  return active <= 1 && slots.every((slot) => slot.since !== null || !slot.sent);
}
