/**
 * Alerts Module - Service Layer
 *
 * Owns the per-device alert slots and performs the side effects of a fired
 * alert: a device command for every condition, plus a notifier message for
 * "full". Evaluation is synchronous up to the state write, so two readings
 * for the same device never interleave on the event loop; the notifier call
 * runs after it, unawaited, and its failures only get logged.
 */
import { type Result, err, ok } from "neverthrow";

import type { Command, CommandQueue } from "../commands/index.js";
import { createLogger } from "../logger.js";
import type { NotificationError, Notifier } from "../notifications/index.js";
import { formatNotificationError, networkError } from "../notifications/index.js";
import type { Settings } from "../settings/index.js";
import { parseNumber } from "../shared/parse.js";
import { type AlertError, invalidDistance } from "./errors.js";
import type { AlertEvaluation, DeviceAlertState } from "./schema.js";
import {
  ALERT_ACTIONS,
  INITIAL_DEVICE_ALERT_STATE,
  MESSAGE_CONDITIONS,
} from "./schema.js";
import {
  formatFullAlertMessage,
  resolveAlertBand,
  stepAlertState,
} from "./transform.js";

const log = createLogger("alerts");

export type AlertTrackerDeps = Readonly<{
  commands: Pick<CommandQueue, "enqueue">;
  notify: Notifier;
}>;

export type AlertTracker = Readonly<{
  /**
   * Evaluate one reading for a device. An unparsable distance leaves the
   * device's state untouched and comes back as an error value.
   */
  evaluate: (
    deviceId: string,
    distance: unknown,
    settings: Settings,
    now: number,
  ) => Result<AlertEvaluation, AlertError>;
  /** Current slots of a device, null if it never had a valid reading */
  stateOf: (deviceId: string) => DeviceAlertState | null;
  /** Snapshot of every tracked device */
  snapshot: () => ReadonlyMap<string, DeviceAlertState>;
}>;

/**
 * Call the notifier without letting a thrown or rejected call escape.
 */
async function deliver(
  notify: Notifier,
  message: string,
): Promise<Result<void, NotificationError>> {
  try {
    return await notify(message);
  } catch (error) {
    const cause = error instanceof Error ? error : new Error(String(error));
    return err(networkError(cause.message, cause));
  }
}

/**
 * Create an alert tracker.
 */
export function createAlertTracker(deps: AlertTrackerDeps): AlertTracker {
  const states = new Map<string, DeviceAlertState>();

  const evaluate = (
    deviceId: string,
    rawDistance: unknown,
    settings: Settings,
    now: number,
  ): Result<AlertEvaluation, AlertError> => {
    const distance = parseNumber(rawDistance);
    if (distance === null) {
      log.debug({ deviceId, distance: rawDistance }, "Skipping alert evaluation, distance unreadable");
      return err(invalidDistance(rawDistance));
    }

    const band = resolveAlertBand(distance, settings);
    const previous = states.get(deviceId) ?? INITIAL_DEVICE_ALERT_STATE;
    const step = stepAlertState(previous, band, now, settings.alertSustainSec);
    states.set(deviceId, step.state);

    let command: Command | null = null;
    let delivery: Promise<Result<void, NotificationError>> | null = null;

    if (step.fired !== null) {
      command = deps.commands.enqueue(deviceId, { action: ALERT_ACTIONS[step.fired] });

      if (MESSAGE_CONDITIONS.has(step.fired)) {
        const message = formatFullAlertMessage({
          deviceId,
          distance,
          thresholdCm: settings.thresholdCm,
          elapsedSec: step.elapsedSec ?? 0,
          sustainSec: settings.alertSustainSec,
        });
        delivery = deliver(deps.notify, message);
        void delivery.then((result) => {
          if (result.isErr()) {
            log.warn(
              { deviceId, error: formatNotificationError(result.error) },
              "Alert notification not delivered",
            );
          }
        });
      }

      log.info(
        {
          deviceId,
          condition: step.fired,
          distance,
          elapsedSec: step.elapsedSec,
          commandId: command.commandId,
        },
        `🚨 ${step.fired} alert fired`,
      );
    }

    return ok({
      deviceId,
      distance,
      band,
      fired: step.fired,
      elapsedSec: step.elapsedSec,
      command,
      delivery,
    });
  };

  const stateOf = (deviceId: string): DeviceAlertState | null =>
    states.get(deviceId) ?? null;

  const snapshot = (): ReadonlyMap<string, DeviceAlertState> => new Map(states);

  return { evaluate, stateOf, snapshot };
}
