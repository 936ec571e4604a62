export type ServiceRole = "gateway" | "budget";

export type BackendName = "transactions" | "accounts" | "notifications" | "budget";

export type LogLevel = "debug" | "info" | "warn" | "error";

export interface Config {
  service: ServiceRole;
  server: {
    port: number;
    corsOrigins: string[];
  };
  backends: Record<BackendName, string>;
  upstreamTimeoutMs: number;
  rateLimit: {
    /** Requests per minute per client at the gateway. 0 disables limiting. */
    rpm: number;
  };
  logLevel: LogLevel;
}

const DEFAULT_PORTS: Record<ServiceRole, number> = {
  gateway: 8000,
  budget: 8004,
};

/**
 * Read the process configuration from the environment (and `--service`).
 * Called once at start-up; the returned object is frozen.
 */
export function loadConfig(
  env: NodeJS.ProcessEnv = process.env,
  argv: string[] = process.argv.slice(2)
): Readonly<Config> {
  const service = resolveService(env, argv);

  const config: Config = {
    service,
    server: {
      port: parseIntOr(env.PORT, DEFAULT_PORTS[service]),
      corsOrigins: (env.CORS_ORIGINS || "*")
        .split(",")
        .map((origin) => origin.trim())
        .filter(Boolean),
    },
    backends: Object.freeze({
      transactions: baseUrl(env.TRANSACTION_SERVICE_URL, "http://localhost:8001"),
      accounts: baseUrl(env.ACCOUNT_SERVICE_URL, "http://localhost:8002"),
      notifications: baseUrl(env.NOTIFICATION_SERVICE_URL, "http://localhost:8003"),
      budget: baseUrl(env.BUDGET_SERVICE_URL, "http://localhost:8004"),
    }),
    upstreamTimeoutMs: parseIntOr(env.UPSTREAM_TIMEOUT_MS, 10_000),
    rateLimit: {
      rpm: parseIntOr(env.RATE_LIMIT_RPM, 0),
    },
    logLevel: resolveLogLevel(env.LOG_LEVEL),
  };

  Object.freeze(config.server);
  Object.freeze(config.rateLimit);
  return Object.freeze(config);
}

function resolveService(env: NodeJS.ProcessEnv, argv: string[]): ServiceRole {
  // CLI flag takes precedence
  const idx = argv.indexOf("--service");
  const fromFlag = idx !== -1 ? argv[idx + 1] : undefined;
  const value = fromFlag ?? env.SERVICE ?? "gateway";

  if (value === "gateway" || value === "budget") return value;
  throw new Error(`Unknown service "${value}". Expected "gateway" or "budget".`);
}

function resolveLogLevel(value: string | undefined): LogLevel {
  const level = (value || "info").toLowerCase();
  if (level === "debug" || level === "info" || level === "warn" || level === "error") {
    return level;
  }
  throw new Error(`Invalid LOG_LEVEL "${value}". Expected debug, info, warn or error.`);
}

function parseIntOr(value: string | undefined, fallback: number): number {
  if (!value) return fallback;
  const parsed = Number.parseInt(value, 10);
  return Number.isNaN(parsed) || parsed < 0 ? fallback : parsed;
}

function baseUrl(value: string | undefined, fallback: string): string {
  return (value || fallback).replace(/\/+$/, "");
}
