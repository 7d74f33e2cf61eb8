/**
 * Devices Module - Public API
 */
export type { DeviceSnapshot, SensorPayload } from "./schema.js";
export { DEFAULT_MAX_HISTORY, SensorPayloadSchema } from "./schema.js";

export type { DeviceRegistry } from "./service.js";
export { createDeviceRegistry } from "./service.js";
