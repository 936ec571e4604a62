#!/usr/bin/env node
/**
 * Personal-finance gateway and budget analysis service.
 *
 * One executable, two roles:
 *   node dist/index.js --service gateway   # public entry point (port 8000)
 *   node dist/index.js --service budget    # budget backend (port 8004)
 *
 * The role can also come from the SERVICE environment variable.
 */

import { serve } from "@hono/node-server";
import type { Hono } from "hono";
import { createBudgetApp } from "./budgets/app.js";
import { MemoryBudgetStore } from "./budgets/store.js";
import { loadConfig, type Config } from "./config.js";
import { createGatewayApp } from "./gateway/app.js";
import { createLogger, errorMessage, setLogLevel } from "./logger.js";
import { HttpTransactionSource } from "./transactions/client.js";

const log = createLogger("main");

const config = loadConfigOrExit();
setLogLevel(config.logLevel);

const app = config.service === "gateway" ? buildGateway(config) : buildBudgetService(config);

// ── Start server ────────────────────────────────────────────────────────────

const server = serve({ fetch: app.fetch, port: config.server.port }, (info) => {
  log.info(`${config.service} listening on http://localhost:${info.port}`, {
    service: config.service,
    port: info.port,
  });
});

const shutdown = (signal: string) => {
  log.info("Shutting down", { signal });
  server.close((error) => {
    if (error) {
      log.error("Error while closing server", { error: errorMessage(error) });
      process.exit(1);
    }
    process.exit(0);
  });
};

process.on("SIGINT", () => shutdown("SIGINT"));
process.on("SIGTERM", () => shutdown("SIGTERM"));

function loadConfigOrExit(): Readonly<Config> {
  try {
    return loadConfig();
  } catch (error) {
    log.error("Invalid configuration", { error: errorMessage(error) });
    process.exit(1);
  }
}

// ── Roles ───────────────────────────────────────────────────────────────────

function buildGateway(config: Readonly<Config>): Hono {
  log.info("Gateway backends", { ...config.backends, timeoutMs: config.upstreamTimeoutMs });
  return createGatewayApp({
    backends: config.backends,
    timeoutMs: config.upstreamTimeoutMs,
    corsOrigins: config.server.corsOrigins,
    rateLimitRpm: config.rateLimit.rpm,
  });
}

function buildBudgetService(config: Readonly<Config>): Hono {
  log.info("Transaction source", {
    url: config.backends.transactions,
    timeoutMs: config.upstreamTimeoutMs,
  });
  return createBudgetApp({
    store: new MemoryBudgetStore(),
    source: new HttpTransactionSource({
      baseUrl: config.backends.transactions,
      timeoutMs: config.upstreamTimeoutMs,
    }),
  });
}
