import type { MiddlewareHandler } from "hono";
import type { Logger } from "../logger.js";
import { clientIp } from "./client-ip.js";

/**
 * Structured audit logging middleware.
 *
 * Emits one log line per request with timing, status, method, path,
 * and client IP through the server's logger.
 */
export function auditLog(logger: Logger): MiddlewareHandler {
  return async (c, next) => {
    const start = Date.now();
    const method = c.req.method;
    const path = c.req.path;
    const ip = clientIp((name) => c.req.header(name));
    const userAgent = c.req.header("user-agent") || "unknown";

    await next();

    const duration = Date.now() - start;
    const status = c.res.status;
    const fields = { method, path, status, duration, ip, userAgent };

    if (status >= 500) {
      logger.error("request", fields);
    } else if (status >= 400) {
      logger.warn("request", fields);
    } else {
      logger.info("request", fields);
    }
  };
}
