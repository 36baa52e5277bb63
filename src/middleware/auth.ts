import { createHash, timingSafeEqual } from "node:crypto";
import type { MiddlewareHandler } from "hono";

/**
 * Bearer token validation middleware.
 *
 * Compares the token from the Authorization header against the configured
 * API token and returns 401 on failure.
 */
export function bearerAuth(apiToken: string): MiddlewareHandler {
  const expected = digest(apiToken);

  return async (c, next) => {
    const auth = c.req.header("Authorization");

    if (!auth?.startsWith("Bearer ")) {
      return c.json(
        {
          error: "unauthorized",
          error_description: "Missing or malformed Authorization header. Expected: Bearer <token>",
        },
        401,
      );
    }

    const token = auth.slice(7);

    if (!token) {
      return c.json(
        {
          error: "unauthorized",
          error_description: "Empty bearer token.",
        },
        401,
      );
    }

    // Equal-length digests keep the comparison constant-time
    if (!timingSafeEqual(digest(token), expected)) {
      return c.json(
        {
          error: "invalid_token",
          error_description: "The access token is invalid.",
        },
        401,
      );
    }

    await next();
  };
}

function digest(value: string): Buffer {
  return createHash("sha256").update(value).digest();
}
