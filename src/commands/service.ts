/**
 * Commands Module - Service Layer
 *
 * Per-device command slot. Each device keeps only its latest command
 * (last write wins); a device that polls slowly misses superseded commands.
 */
import { createLogger } from "../logger.js";
import type { Command, CommandPayload } from "./schema.js";
import { buildCommand, isNewerCommand } from "./transform.js";

const log = createLogger("commands");

export type CommandQueue = Readonly<{
  /** Queue a command, replacing any pending one for the device */
  enqueue: (deviceId: string, payload: CommandPayload) => Command;
  /** Latest command if its id is greater than `lastId` */
  pending: (deviceId: string, lastId: number) => Command | null;
  /** Latest command regardless of id */
  latest: (deviceId: string) => Command | null;
}>;

/**
 * Create an in-memory command queue.
 *
 * @param clock - Time source for serverTimestamp (ms since epoch)
 */
export function createCommandQueue(
  clock: () => number = Date.now,
): CommandQueue {
  const commands = new Map<string, Command>();
  const sequences = new Map<string, number>();

  const enqueue = (deviceId: string, payload: CommandPayload): Command => {
    const commandId = (sequences.get(deviceId) ?? 0) + 1;
    sequences.set(deviceId, commandId);

    const command = buildCommand(deviceId, commandId, payload, clock());
    commands.set(deviceId, command);

    log.info(
      { deviceId, commandId, action: payload.action },
      "Command queued",
    );
    return command;
  };

  const latest = (deviceId: string): Command | null =>
    commands.get(deviceId) ?? null;

  const pending = (deviceId: string, lastId: number): Command | null => {
    const command = latest(deviceId);
    if (!command || !isNewerCommand(command, lastId)) {
      return null;
    }
    return command;
  };

  return { enqueue, pending, latest };
}
