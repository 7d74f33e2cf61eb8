/**
 * Commands Module - Pure Transformations
 *
 * Normalises dashboard requests into command payloads and builds command
 * records. No side effects, no I/O.
 */
import { type Result, err, ok } from "neverthrow";
import { parseInteger } from "../shared/parse.js";
import { type CommandError, deviceIdRequired, invalidTargetPosition } from "./errors.js";
import type { Command, CommandPayload } from "./schema.js";
import {
  CLOSED_ANGLE,
  CommandRequestSchema,
  OPEN_ANGLE,
  SERVO_MAX_ANGLE,
  SERVO_MIN_ANGLE,
} from "./schema.js";

const OPEN_ALIASES: ReadonlySet<string> = new Set(["open", "activate"]);
const CLOSE_ALIASES: ReadonlySet<string> = new Set(["close", "deactivate"]);

/**
 * Clamp a servo angle into the supported range.
 */
export function clampAngle(angle: number): number {
  return Math.max(SERVO_MIN_ANGLE, Math.min(SERVO_MAX_ANGLE, Math.trunc(angle)));
}

/**
 * Turn a dashboard command request into a payload.
 *
 * - missing or blank action means "setAngle"
 * - open/activate and close/deactivate without a target become setAngle 90/0
 * - "auto" and "notify" pass through without a target
 * - every other action is treated as setAngle and needs an integer target
 */
export function normalizeCommandRequest(
  raw: unknown,
): Result<{ deviceId: string; payload: CommandPayload }, CommandError> {
  const parsed = CommandRequestSchema.safeParse(raw);
  if (!parsed.success) {
    return err(deviceIdRequired());
  }

  const { deviceId } = parsed.data;
  let action =
    parsed.data.action === undefined || parsed.data.action === null
      ? "setAngle"
      : String(parsed.data.action).trim() || "setAngle";
  let target = parsed.data.targetPosition ?? null;

  if (OPEN_ALIASES.has(action) && target === null) {
    target = OPEN_ANGLE;
    action = "setAngle";
  } else if (CLOSE_ALIASES.has(action) && target === null) {
    target = CLOSED_ANGLE;
    action = "setAngle";
  }

  if (action === "auto") {
    return ok({ deviceId, payload: { action: "auto" } });
  }
  if (action === "notify") {
    return ok({ deviceId, payload: { action: "notify" } });
  }

  const angle = parseInteger(target);
  if (angle === null) {
    return err(invalidTargetPosition(target));
  }

  return ok({
    deviceId,
    payload: { action: "setAngle", targetPosition: clampAngle(angle) },
  });
}

/**
 * Stamp a payload with device id, sequence number and server time.
 */
export function buildCommand(
  deviceId: string,
  commandId: number,
  payload: CommandPayload,
  now: number,
): Command {
  return {
    deviceId,
    commandId,
    ...payload,
    serverTimestamp: new Date(now).toISOString(),
  };
}

/**
 * Whether a device that last executed `lastId` should receive `command`.
 */
export function isNewerCommand(command: Command, lastId: number): boolean {
  return command.commandId > lastId;
}
