/**
 * Notifications Module - Pure Transformations
 *
 * No side effects, no I/O - just data in, data out.
 */
import type { WebhookPayload } from "./schema.js";
import { MAX_CONTENT_LENGTH } from "./schema.js";

/**
 * Shorten content that exceeds the webhook limit, marking the cut.
 */
export function truncateContent(
  content: string,
  maxLength: number = MAX_CONTENT_LENGTH,
): string {
  if (content.length <= maxLength) {
    return content;
  }
  return `${content.slice(0, maxLength - 1)}…`;
}

/**
 * Build the webhook request payload.
 */
export function buildWebhookPayload(message: string): WebhookPayload {
  return { content: truncateContent(message) };
}
