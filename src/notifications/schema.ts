/**
 * Notifications Module - Schemas and Types
 *
 * Defines the data shapes for Discord webhook notifications.
 * Schemas are the source of truth - types derived with z.infer<>.
 */
import { z } from "zod";

/**
 * Discord rejects message content longer than this.
 */
export const MAX_CONTENT_LENGTH = 2000;

/**
 * Discord webhook execute payload (content-only messages).
 */
export const WebhookPayloadSchema = z.object({
  content: z
    .string()
    .min(1)
    .max(MAX_CONTENT_LENGTH)
    .describe("Message text to post"),
});

export type WebhookPayload = z.infer<typeof WebhookPayloadSchema>;

/**
 * Resolved notifier settings.
 */
export type NotifierConfig = Readonly<{
  webhookUrl: string;
  timeoutMs: number;
}>;
