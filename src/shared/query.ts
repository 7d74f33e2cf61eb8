/**
 * Query-string parameters shared by the polling and history endpoints.
 */
import { z } from "zod";
import { parseInteger } from "./parse.js";

/**
 * Integer parameter; anything that is not an integer literal uses the fallback.
 */
export const intParam = (fallback: number) =>
  z
    .string()
    .optional()
    .transform((value) => parseInteger(value) ?? fallback);

/**
 * Optional device id parameter; blank means "not given".
 */
export const deviceIdParam = z
  .string()
  .optional()
  .transform((value) => {
    const trimmed = value?.trim();
    return trimmed ? trimmed : null;
  });
