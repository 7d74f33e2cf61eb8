/**
 * Commands Module - Schemas and Types
 *
 * Device-directed commands. Devices poll for the latest command and compare
 * its id against the last one they executed.
 */
import { z } from "zod";
import { deviceIdParam, intParam } from "../shared/query.js";

// =============================================================================
// Command Payloads
// =============================================================================

/**
 * Actions raised by the alert tracker.
 */
export type AlertAction = "notifyFull" | "notifyPartial" | "notifyEmpty";

/**
 * Payload of a queued command, before the queue stamps id and timestamp.
 */
export type CommandPayload =
  | Readonly<{ action: "setAngle"; targetPosition: number }>
  | Readonly<{ action: "auto" }>
  | Readonly<{ action: "notify" }>
  | Readonly<{ action: AlertAction }>;

export type CommandAction = CommandPayload["action"];

/**
 * A queued command as returned to devices.
 */
export type Command = CommandPayload &
  Readonly<{
    deviceId: string;
    commandId: number;
    serverTimestamp: string;
  }>;

// =============================================================================
// Dashboard Request
// =============================================================================

/**
 * Body of POST /api/command. Fields are loosely typed because the dashboard
 * and scripts send angles as numbers or strings.
 */
export const CommandRequestSchema = z.object({
  deviceId: z.string().min(1, "deviceId required"),
  action: z.unknown().optional(),
  targetPosition: z.unknown().optional(),
});

export type CommandRequest = z.infer<typeof CommandRequestSchema>;

/**
 * Query of GET /api/command. Devices send the id of the last command they ran.
 */
export const CommandPollQuerySchema = z.object({
  deviceId: deviceIdParam,
  lastId: intParam(0),
});

export type CommandPollQuery = z.infer<typeof CommandPollQuerySchema>;

/**
 * Servo angle limits in degrees.
 */
export const SERVO_MIN_ANGLE = 0;
export const SERVO_MAX_ANGLE = 180;

/**
 * Angles used by the open/close shortcuts.
 */
export const OPEN_ANGLE = 90;
export const CLOSED_ANGLE = 0;
