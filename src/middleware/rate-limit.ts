import type { MiddlewareHandler } from "hono";
import { clientIp } from "./client-ip.js";

export interface RateLimitOptions {
  rpm?: number;
  windowMs?: number;
  now?: () => number;
}

/**
 * Simple per-IP sliding-window rate limiter.
 *
 * Tracks request timestamps in memory and rejects requests that exceed the
 * configured requests-per-minute (rpm) threshold with a 429 status code.
 */
export function rateLimit(options: RateLimitOptions = {}): MiddlewareHandler {
  const limit = options.rpm ?? 60;
  const windowMs = options.windowMs ?? 60_000;
  const now = options.now ?? Date.now;
  const windows = new Map<string, number[]>();

  // Periodic sweep of idle clients
  const cleanupInterval = setInterval(() => {
    const cutoff = now() - windowMs;
    for (const [ip, timestamps] of windows) {
      const filtered = timestamps.filter((t) => t > cutoff);
      if (filtered.length === 0) {
        windows.delete(ip);
      } else {
        windows.set(ip, filtered);
      }
    }
  }, windowMs);
  cleanupInterval.unref();

  return async (c, next) => {
    const ip = clientIp((name) => c.req.header(name));
    const current = now();
    const cutoff = current - windowMs;

    const filtered = (windows.get(ip) ?? []).filter((t) => t > cutoff);
    const oldestInWindow = filtered[0];

    if (filtered.length >= limit && oldestInWindow !== undefined) {
      const retryAfterSec = Math.ceil((oldestInWindow + windowMs - current) / 1000);

      c.header("Retry-After", String(retryAfterSec));
      c.header("X-RateLimit-Limit", String(limit));
      c.header("X-RateLimit-Remaining", "0");
      c.header("X-RateLimit-Reset", String(Math.ceil((oldestInWindow + windowMs) / 1000)));

      return c.json(
        {
          error: "rate_limit_exceeded",
          error_description: `Too many requests. Limit: ${limit} requests per minute.`,
          retry_after: retryAfterSec,
        },
        429,
      );
    }

    filtered.push(current);
    windows.set(ip, filtered);

    c.header("X-RateLimit-Limit", String(limit));
    c.header("X-RateLimit-Remaining", String(limit - filtered.length));

    await next();
  };
}
