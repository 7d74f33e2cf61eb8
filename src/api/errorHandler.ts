/**
 * Global error boundary for anything a route lets escape.
 */
import type { ErrorHandler } from "hono";
import { HTTPException } from "hono/http-exception";
import { createLogger } from "../logger.js";

const log = createLogger("api");

/**
 * Logs the failure with its request id and answers with a JSON 500.
 * HTTP exceptions (auth challenges) keep their own response.
 */
export const errorHandler: ErrorHandler = (err, c) => {
  if (err instanceof HTTPException) {
    return err.getResponse();
  }

  const requestId = c.get("requestId") ?? "unknown";

  log.error(
    {
      operation: "unhandledError",
      requestId,
      error: err.message,
      stack: err.stack,
      path: c.req.path,
      method: c.req.method,
    },
    "❌ Unhandled error",
  );

  // Internal messages stay out of production responses
  const message =
    process.env.NODE_ENV === "production"
      ? "Internal server error"
      : err.message;

  return c.json({ error: message, requestId }, 500);
};
