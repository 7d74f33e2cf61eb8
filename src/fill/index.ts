/**
 * Fill Module - Public API
 */
export type { FillStatus, FillThresholds } from "./schema.js";
export { FillStatusSchema, PARTIAL_THRESHOLD_FACTOR } from "./schema.js";
export {
  classify,
  classifyWith,
  isFullFlag,
  partialThresholdFor,
} from "./transform.js";
