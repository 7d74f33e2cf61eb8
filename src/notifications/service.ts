/**
 * Notifications Module - Service Layer
 *
 * Discord webhook delivery. Best effort: one attempt with a timeout, failures
 * come back as Result errors and are never retried.
 */
import { type Result, err, ok } from "neverthrow";

import { getNotificationConfig } from "../config.js";
import { createLogger } from "../logger.js";
import { networkError, notConfigured, sendFailed } from "./errors.js";
import type { NotificationError } from "./errors.js";
import type { NotifierConfig } from "./schema.js";
import { buildWebhookPayload } from "./transform.js";

const log = createLogger("notifications");

/**
 * Delivers a human-readable message somewhere a person will see it.
 */
export type Notifier = (
  message: string,
) => Promise<Result<void, NotificationError>>;

// =============================================================================
// Core Send Function
// =============================================================================

/**
 * Post a message to the Discord webhook.
 *
 * @param message - Message text to send
 * @param notifierConfig - Webhook settings, null when notifications are off
 * @returns Result with void on success or error
 */
export async function sendWebhookMessage(
  message: string,
  notifierConfig: NotifierConfig | null = getNotificationConfig(),
): Promise<Result<void, NotificationError>> {
  if (!notifierConfig) {
    log.debug("Webhook not configured, skipping notification");
    return err(
      notConfigured(
        "Webhook notifications not configured (DISCORD_WEBHOOK missing or disabled)",
      ),
    );
  }

  const payload = buildWebhookPayload(message);

  log.debug(
    { contentLength: payload.content.length },
    "Sending webhook notification...",
  );

  try {
    const response = await fetch(notifierConfig.webhookUrl, {
      method: "POST",
      headers: { "Content-Type": "application/json" },
      body: JSON.stringify(payload),
      signal: AbortSignal.timeout(notifierConfig.timeoutMs),
    });

    if (!response.ok) {
      const errorText = await response.text().catch(() => "Unknown error");
      log.error(
        { statusCode: response.status, error: errorText },
        "Webhook request failed",
      );
      return err(
        sendFailed(
          `Webhook returned ${response.status}: ${errorText}`,
          response.status,
        ),
      );
    }

    log.info("Webhook notification sent successfully");
    return ok(undefined);
  } catch (error) {
    const cause = error instanceof Error ? error : new Error(String(error));
    const message =
      cause.name === "TimeoutError" || cause.name === "AbortError"
        ? `Webhook timed out after ${notifierConfig.timeoutMs}ms`
        : cause.message;
    log.error({ error: message }, "Failed to send webhook notification");
    return err(networkError(message, cause));
  }
}

/**
 * Create a notifier bound to a fixed webhook configuration.
 */
export function createWebhookNotifier(
  notifierConfig: NotifierConfig | null,
): Notifier {
  return (message) => sendWebhookMessage(message, notifierConfig);
}

/**
 * Human-readable description of a notification error.
 */
export function formatNotificationError(error: NotificationError): string {
  switch (error.type) {
    case "SEND_FAILED":
      return error.statusCode !== undefined
        ? `Send failed (${error.statusCode}): ${error.message}`
        : `Send failed: ${error.message}`;
    case "NETWORK_ERROR":
      return `Network error: ${error.message}`;
    case "NOT_CONFIGURED":
      return `Not configured: ${error.message}`;
  }
}
