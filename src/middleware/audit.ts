import type { MiddlewareHandler } from "hono";
import { createLogger } from "../logger.js";

/** Caller address as reported by the first proxy hop, if any. */
export function clientAddress(headers: Headers): string {
  return (
    headers.get("x-forwarded-for")?.split(",")[0]?.trim() ||
    headers.get("x-real-ip") ||
    "unknown"
  );
}

/**
 * Structured audit logging middleware.
 *
 * Emits one JSON log line per request with timing, status, method, path
 * and client address. The level follows the status: 5xx is an error,
 * 4xx a warning.
 */
export function auditLog(service: string): MiddlewareHandler {
  const log = createLogger(`${service}-audit`);

  return async (c, next) => {
    const start = Date.now();
    const method = c.req.method;
    const path = c.req.path;
    const ip = clientAddress(c.req.raw.headers);
    const userAgent = c.req.header("user-agent") || "unknown";

    await next();

    const status = c.res.status;
    const fields = {
      method,
      path,
      status,
      duration: Date.now() - start,
      ip,
      userAgent,
    };

    if (status >= 500) {
      log.error("request", fields);
    } else if (status >= 400) {
      log.warn("request", fields);
    } else {
      log.info("request", fields);
    }
  };
}
