/**
 * Notifications Module - Public API
 *
 * Exports types, service functions, and transformations for the notifications module.
 */

// Types
export type { NotifierConfig, WebhookPayload } from "./schema.js";
export { MAX_CONTENT_LENGTH, WebhookPayloadSchema } from "./schema.js";

// Error types
export type { NotificationError } from "./errors.js";
export { networkError, notConfigured, sendFailed } from "./errors.js";

// Service functions
export type { Notifier } from "./service.js";
export {
  createWebhookNotifier,
  formatNotificationError,
  sendWebhookMessage,
} from "./service.js";

// Pure transformations
export { buildWebhookPayload, truncateContent } from "./transform.js";
