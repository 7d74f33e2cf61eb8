/**
 * Settings Module - Schemas and Types
 *
 * Alert thresholds editable from the dashboard and persisted to disk.
 */
import { z } from "zod";

export const SETTINGS_KEYS = [
  "thresholdCm",
  "emptyThresholdCm",
  "alertSustainSec",
] as const;

export type SettingsKey = (typeof SETTINGS_KEYS)[number];

export const SettingsSchema = z.object({
  thresholdCm: z
    .number()
    .nonnegative()
    .describe("Distance (cm) at or below which the bin is full"),
  emptyThresholdCm: z
    .number()
    .nonnegative()
    .describe("Distance (cm) at or above which the bin is empty"),
  alertSustainSec: z
    .number()
    .nonnegative()
    .describe("Seconds a condition must hold before its alert fires"),
});

export type Settings = z.infer<typeof SettingsSchema>;

export const DEFAULT_SETTINGS: Settings = {
  thresholdCm: 5,
  emptyThresholdCm: 15,
  alertSustainSec: 3,
};
