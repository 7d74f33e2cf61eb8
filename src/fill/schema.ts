/**
 * Fill Module - Schemas and Types
 *
 * Fill status labels derived from the ultrasonic distance sensor mounted in
 * the bin lid. A smaller distance means the waste surface is closer to the
 * sensor, i.e. the bin is fuller.
 */
import { z } from "zod";

export const FillStatusSchema = z.enum(["unknown", "full", "partial", "empty"]);

export type FillStatus = z.infer<typeof FillStatusSchema>;

/**
 * Readings up to `threshold * PARTIAL_THRESHOLD_FACTOR` count as three
 * quarters full.
 */
export const PARTIAL_THRESHOLD_FACTOR = 1.33;

/**
 * Thresholds used for classification, in centimetres.
 */
export type FillThresholds = Readonly<{
  thresholdCm: number;
  emptyThresholdCm: number;
}>;
