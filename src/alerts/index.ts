/**
 * Alerts Module - Public API
 */

// Types
export type {
  AlertBand,
  AlertCondition,
  AlertEvaluation,
  AlertSlot,
  AlertStep,
  DeviceAlertState,
} from "./schema.js";
export type { AlertError } from "./errors.js";
export type { AlertTracker, AlertTrackerDeps } from "./service.js";

export {
  ALERT_ACTIONS,
  ALERT_CONDITIONS,
  IDLE_SLOT,
  INITIAL_DEVICE_ALERT_STATE,
  MESSAGE_CONDITIONS,
} from "./schema.js";
export { invalidDistance } from "./errors.js";

// Service
export { createAlertTracker } from "./service.js";

// Pure transformations
export {
  formatFullAlertMessage,
  isConsistentAlertState,
  isSustained,
  resolveAlertBand,
  stepAlertState,
} from "./transform.js";
