/**
 * Lenient value parsers for loosely-typed device and dashboard payloads.
 *
 * Devices post JSON produced by microcontroller firmware; numbers may arrive
 * as numbers, numeric strings or booleans. Each parser returns null instead
 * of throwing when the value cannot be read.
 */

const DECIMAL_PATTERN = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;
const INTEGER_PATTERN = /^[+-]?\d+$/;
const TRUTHY_FLAGS: ReadonlySet<string> = new Set(["1", "true", "yes", "y", "on"]);

/**
 * Read a finite float from a number, boolean or numeric string.
 */
export function parseNumber(value: unknown): number | null {
  if (typeof value === "boolean") {
    return value ? 1 : 0;
  }
  if (typeof value === "number") {
    return Number.isFinite(value) ? value : null;
  }
  if (typeof value === "string") {
    const trimmed = value.trim();
    if (!DECIMAL_PATTERN.test(trimmed)) {
      return null;
    }
    const parsed = Number(trimmed);
    return Number.isFinite(parsed) ? parsed : null;
  }
  return null;
}

/**
 * Read an integer. Numbers are truncated toward zero; strings must be
 * integer literals ("12" but not "12.5").
 */
export function parseInteger(value: unknown): number | null {
  if (typeof value === "boolean") {
    return value ? 1 : 0;
  }
  if (typeof value === "number") {
    return Number.isFinite(value) ? Math.trunc(value) : null;
  }
  if (typeof value === "string") {
    const trimmed = value.trim();
    return INTEGER_PATTERN.test(trimmed) ? Number.parseInt(trimmed, 10) : null;
  }
  return null;
}

/**
 * Read a 0/1 flag. Unknown values read as 0.
 */
export function parseFlag(value: unknown): 0 | 1 {
  if (typeof value === "boolean") {
    return value ? 1 : 0;
  }
  if (typeof value === "number") {
    return value === 1 ? 1 : 0;
  }
  if (typeof value === "string") {
    return TRUTHY_FLAGS.has(value.trim().toLowerCase()) ? 1 : 0;
  }
  return 0;
}
