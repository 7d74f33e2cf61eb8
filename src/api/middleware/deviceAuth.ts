/**
 * Bearer-token check for device uploads. Devices share the dashboard
 * password as their token; any mismatch is a 401.
 */
import type { MiddlewareHandler } from "hono";
import { createLogger } from "../../logger.js";

const log = createLogger("middleware");

const BEARER_PREFIX = "Bearer ";

export const deviceAuth =
  (token: string): MiddlewareHandler =>
  async (c, next) => {
    const header = c.req.header("authorization") ?? "";
    const supplied = header.startsWith(BEARER_PREFIX)
      ? header.slice(BEARER_PREFIX.length)
      : null;

    if (supplied !== token) {
      log.warn(
        { requestId: c.get("requestId"), path: c.req.path },
        "Rejected device request",
      );
      return c.json({ error: "Unauthorized" }, 401);
    }

    await next();
  };
