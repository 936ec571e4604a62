import type { MiddlewareHandler } from "hono";
import { errorBody } from "../errors.js";
import { clientAddress } from "./audit.js";

export interface RateLimitOptions {
  /** Requests allowed per client per minute. */
  rpm: number;
  /** Clock in epoch milliseconds. */
  now?: () => number;
}

const WINDOW_MS = 60_000;

/**
 * Per-client sliding-window rate limiter.
 *
 * Keeps request timestamps in memory keyed by client address and answers
 * 429 once a client exceeds `rpm` requests in the last minute. Requests
 * are rejected before they are forwarded anywhere.
 */
export function rateLimit(options: RateLimitOptions): MiddlewareHandler {
  const limit = options.rpm;
  const now = options.now ?? Date.now;
  const windows = new Map<string, number[]>();

  const cleanupInterval = setInterval(() => {
    const cutoff = now() - WINDOW_MS;
    for (const [client, timestamps] of windows) {
      const live = timestamps.filter((t) => t > cutoff);
      if (live.length === 0) {
        windows.delete(client);
      } else {
        windows.set(client, live);
      }
    }
  }, WINDOW_MS);
  cleanupInterval.unref();

  return async (c, next) => {
    const client = clientAddress(c.req.raw.headers);
    const at = now();
    const cutoff = at - WINDOW_MS;

    const live = (windows.get(client) ?? []).filter((t) => t > cutoff);
    const oldest = live[0];

    if (oldest !== undefined && live.length >= limit) {
      const retryAfterSec = Math.ceil((oldest + WINDOW_MS - at) / 1000);

      c.header("Retry-After", String(retryAfterSec));
      c.header("X-RateLimit-Limit", String(limit));
      c.header("X-RateLimit-Remaining", "0");
      windows.set(client, live);

      return c.json(
        errorBody(
          "rate_limit_exceeded",
          `Too many requests. Limit: ${limit} requests per minute.`,
          { retry_after: retryAfterSec }
        ),
        429
      );
    }

    live.push(at);
    windows.set(client, live);

    c.header("X-RateLimit-Limit", String(limit));
    c.header("X-RateLimit-Remaining", String(limit - live.length));

    await next();
  };
}
