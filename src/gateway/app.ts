import { Hono } from "hono";
import { cors } from "hono/cors";
import { logger } from "hono/logger";
import type { BackendName } from "../config.js";
import { errorBody, isUpstreamUnavailable } from "../errors.js";
import { createLogger, errorMessage } from "../logger.js";
import { auditLog } from "../middleware/audit.js";
import { rateLimit } from "../middleware/rate-limit.js";
import { forwardRequest, type ProxyOptions } from "./proxy.js";
import { ALLOWED_METHODS, isForwardedMethod, resolveRoute } from "./routes.js";

const log = createLogger("gateway");

function isPreflight(headers: Headers): boolean {
  return headers.has("origin") && headers.has("access-control-request-method");
}

export interface GatewayOptions {
  backends: Readonly<Record<BackendName, string>>;
  timeoutMs: number;
  corsOrigins?: readonly string[];
  /** Per-client requests per minute; 0 or absent disables limiting. */
  rateLimitRpm?: number;
  /** Request line logging through hono/logger (on by default). */
  requestLogging?: boolean;
  fetch?: typeof fetch;
}

/**
 * The public entry point of the platform. Answers `/health` itself and
 * forwards everything under `/api/v1` to the backend owning the path.
 */
export function createGatewayApp(options: GatewayOptions): Hono {
  const app = new Hono();
  const proxy: ProxyOptions = {
    backends: options.backends,
    timeoutMs: options.timeoutMs,
    fetch: options.fetch,
  };

  // ── Middleware ──
  if (options.requestLogging ?? true) {
    app.use(logger());
  }
  app.use(auditLog("gateway"));

  const origins = options.corsOrigins ?? ["*"];
  const corsHandler = cors({
    origin: origins.includes("*") ? "*" : [...origins],
    allowMethods: [...ALLOWED_METHODS, "OPTIONS"],
  });
  // A bare OPTIONS is not a preflight; it goes on to dispatch and its 405.
  app.use(async (c, next) => {
    if (c.req.method === "OPTIONS" && !isPreflight(c.req.raw.headers)) {
      return next();
    }
    return corsHandler(c, next);
  });

  if (options.rateLimitRpm && options.rateLimitRpm > 0) {
    app.use("/api/*", rateLimit({ rpm: options.rateLimitRpm }));
  }

  // ── Health check ──
  app.get("/health", (c) => c.json({ status: "healthy" }));

  // ── Dispatch ──
  app.all("*", async (c) => {
    const route = resolveRoute(c.req.path);
    if (!route) {
      return c.json(errorBody("not_found", `No route for ${c.req.path}`), 404);
    }

    const method = c.req.method;
    if (!isForwardedMethod(method)) {
      c.header("Allow", ALLOWED_METHODS.join(", "));
      return c.json(
        errorBody("method_not_allowed", `Method ${method} is not allowed`),
        405
      );
    }

    try {
      return await forwardRequest(c.req.raw, route, proxy);
    } catch (error) {
      if (isUpstreamUnavailable(error)) {
        return c.json(
          errorBody("service_unavailable", error.message, { service: error.service }),
          503
        );
      }
      throw error;
    }
  });

  app.onError((error, c) => {
    log.error("Unhandled error", {
      method: c.req.method,
      path: c.req.path,
      error: errorMessage(error),
    });
    return c.json(errorBody("internal_error", "Internal server error"), 500);
  });

  return app;
}
