/**
 * Commands Module - Public API
 */

// Types
export type {
  AlertAction,
  Command,
  CommandAction,
  CommandPayload,
  CommandPollQuery,
  CommandRequest,
} from "./schema.js";
export type { CommandError } from "./errors.js";
export type { CommandQueue } from "./service.js";

export {
  CLOSED_ANGLE,
  CommandPollQuerySchema,
  CommandRequestSchema,
  OPEN_ANGLE,
  SERVO_MAX_ANGLE,
  SERVO_MIN_ANGLE,
} from "./schema.js";
export { deviceIdRequired, invalidTargetPosition } from "./errors.js";

// Service
export { createCommandQueue } from "./service.js";

// Pure transformations
export {
  buildCommand,
  clampAngle,
  isNewerCommand,
  normalizeCommandRequest,
} from "./transform.js";
