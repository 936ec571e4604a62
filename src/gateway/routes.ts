import type { BackendName } from "../config.js";

// ── Route table ─────────────────────────────────────────────────────────────

interface AliasRule {
  path: string;
  service: BackendName;
  target: string;
}

interface PrefixRule {
  prefix: string;
  service: BackendName;
  /** Outbound path the remainder is appended to ("" strips the prefix). */
  target: string;
}

/** Exact paths, checked before the prefixes. */
const ALIASES: readonly AliasRule[] = [
  { path: "/api/v1/auth/register", service: "accounts", target: "/users/register" },
  { path: "/api/v1/auth/login", service: "accounts", target: "/users/login" },
  { path: "/api/v1/auth/me", service: "accounts", target: "/users/me" },
];

const PREFIXES: readonly PrefixRule[] = [
  { prefix: "/api/v1/transactions", service: "transactions", target: "" },
  { prefix: "/api/v1/users", service: "accounts", target: "/users" },
  { prefix: "/api/v1/accounts", service: "accounts", target: "/accounts" },
  { prefix: "/api/v1/notifications", service: "notifications", target: "/notifications" },
  { prefix: "/api/v1/preferences", service: "notifications", target: "/preferences" },
  { prefix: "/api/v1/budgets", service: "budget", target: "/budgets" },
  { prefix: "/api/v1/insights", service: "budget", target: "/insights" },
];

export const ALLOWED_METHODS = ["GET", "POST", "PUT", "DELETE"] as const;

export type ForwardedMethod = (typeof ALLOWED_METHODS)[number];

const FORWARDED: ReadonlySet<string> = new Set(ALLOWED_METHODS);

export function isForwardedMethod(method: string): method is ForwardedMethod {
  return FORWARDED.has(method);
}

export interface ResolvedRoute {
  service: BackendName;
  /** Path on the backend, always starting with "/". */
  path: string;
}

/**
 * Map an inbound gateway path to the backend service and the path to
 * request there. Returns `null` when no rule matches.
 */
export function resolveRoute(path: string): ResolvedRoute | null {
  for (const alias of ALIASES) {
    if (path === alias.path) {
      return { service: alias.service, path: alias.target };
    }
  }

  for (const rule of PREFIXES) {
    if (path === rule.prefix) {
      return { service: rule.service, path: rule.target || "/" };
    }
    if (path.startsWith(`${rule.prefix}/`)) {
      const rest = path.slice(rule.prefix.length);
      return { service: rule.service, path: `${rule.target}${rest}` };
    }
  }

  return null;
}
