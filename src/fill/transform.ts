/**
 * Fill Module - Pure Transformations
 *
 * No side effects, no I/O - just data in, data out.
 */
import type { FillStatus, FillThresholds } from "./schema.js";
import { PARTIAL_THRESHOLD_FACTOR } from "./schema.js";

/**
 * Upper bound of the "partial" band for a given full threshold.
 */
export function partialThresholdFor(threshold: number): number {
  return threshold * PARTIAL_THRESHOLD_FACTOR;
}

/**
 * Classify a distance reading.
 *
 * Checks run in a fixed order and the first match wins: full, partial by
 * threshold, empty, then the fallback. Distances between the partial band
 * and the empty threshold fall back to "partial".
 *
 * @param distance - Sensor distance in cm, or null when missing
 * @param threshold - Distance at or below which the bin is full
 * @param emptyThreshold - Distance at or above which the bin is empty
 */
export function classify(
  distance: number | null,
  threshold: number,
  emptyThreshold: number,
): FillStatus {
  if (distance === null) {
    return "unknown";
  }

  if (distance <= threshold) {
    return "full";
  }
  if (distance <= partialThresholdFor(threshold)) {
    return "partial";
  }
  if (distance >= emptyThreshold) {
    return "empty";
  }
  return "partial";
}

/**
 * Classify against a thresholds record.
 */
export function classifyWith(
  distance: number | null,
  thresholds: FillThresholds,
): FillStatus {
  return classify(distance, thresholds.thresholdCm, thresholds.emptyThresholdCm);
}

/**
 * Legacy 0/1 "isFull" flag stored next to each reading.
 */
export function isFullFlag(distance: number | null, threshold: number): 0 | 1 {
  return distance !== null && distance <= threshold ? 1 : 0;
}
