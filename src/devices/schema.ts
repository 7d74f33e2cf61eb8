/**
 * Devices Module - Schemas and Types
 */
import { z } from "zod";

/**
 * Body of POST /api/sensor-data. Only the device id is interpreted here;
 * every other field is kept as sent and parsed leniently downstream.
 */
export const SensorPayloadSchema = z
  .object({
    deviceId: z.unknown().optional(),
    deviceTimestamp: z.unknown().optional(),
    deviceUptimeMs: z.unknown().optional(),
    distance: z.unknown().optional(),
    motion: z.unknown().optional(),
    servoPosition: z.unknown().optional(),
    targetPosition: z.unknown().optional(),
    shouldActivateServo: z.unknown().optional(),
  })
  .passthrough();

export type SensorPayload = z.infer<typeof SensorPayloadSchema>;

/**
 * Latest payload of a device, augmented with server-side fields.
 */
export type DeviceSnapshot = SensorPayload &
  Readonly<{
    serverTimestamp: string;
    isFull: 0 | 1;
    fillStatus: string;
  }>;

export const DEFAULT_MAX_HISTORY = 500;
