import type { BackendName } from "../config.js";
import { UpstreamUnavailableError } from "../errors.js";
import { createDeadline } from "../http/deadline.js";
import { createLogger, errorMessage } from "../logger.js";
import type { ResolvedRoute } from "./routes.js";

const log = createLogger("gateway-proxy");

/**
 * Headers describing the inbound connection rather than the request.
 * `host` must go so the backend sees its own host; the rest are recomputed
 * by the outbound client.
 */
const DROPPED_HEADERS = new Set([
  "host",
  "connection",
  "keep-alive",
  "proxy-connection",
  "transfer-encoding",
  "upgrade",
  "te",
  "trailer",
  "content-length",
]);

const NULL_BODY_STATUSES = new Set([101, 204, 205, 304]);

export interface ProxyOptions {
  backends: Readonly<Record<BackendName, string>>;
  timeoutMs: number;
  fetch?: typeof fetch;
}

/**
 * Forward `inbound` to the backend chosen by `route` and translate the
 * answer into the response the gateway sends back.
 *
 * Rejects with `UpstreamUnavailableError` when the backend cannot be
 * reached or does not answer within `timeoutMs`. Backend error statuses
 * are relayed like any other response.
 */
export async function forwardRequest(
  inbound: Request,
  route: ResolvedRoute,
  options: ProxyOptions
): Promise<Response> {
  const fetchImpl = options.fetch ?? fetch.bind(globalThis);
  const method = inbound.method;

  const target = new URL(`${options.backends[route.service]}${route.path}`);
  target.search = new URL(inbound.url).search;

  const body = method === "POST" || method === "PUT" ? await inbound.arrayBuffer() : undefined;

  log.debug("Forwarding request", { method, service: route.service, url: target.toString() });

  const deadline = createDeadline(options.timeoutMs, inbound.signal);
  try {
    const upstream = await fetchImpl(target, {
      method,
      headers: outboundHeaders(inbound.headers),
      body,
      signal: deadline.signal,
    });
    return await relayResponse(upstream);
  } catch (error) {
    const reason = deadline.timedOut() ? "timeout" : "transport";
    const detail = deadline.timedOut()
      ? `no response within ${options.timeoutMs}ms`
      : errorMessage(error);

    log.warn("Backend unavailable", { service: route.service, method, reason, error: detail });
    throw new UpstreamUnavailableError(route.service, reason, detail, { cause: error });
  } finally {
    deadline.dispose();
  }
}

export function outboundHeaders(inbound: Headers): Headers {
  const headers = new Headers();
  inbound.forEach((value, name) => {
    if (!DROPPED_HEADERS.has(name.toLowerCase())) {
      headers.append(name, value);
    }
  });
  return headers;
}

/**
 * Copy a backend response: JSON bodies are parsed and re-emitted, any
 * other payload is passed through byte for byte.
 */
export async function relayResponse(upstream: Response): Promise<Response> {
  const status = upstream.status;
  if (NULL_BODY_STATUSES.has(status)) {
    return new Response(null, { status });
  }

  const contentType = upstream.headers.get("content-type");
  const payload = await upstream.arrayBuffer();

  if (contentType && isJsonContentType(contentType)) {
    const parsed = parseJson(new TextDecoder().decode(payload));
    if (parsed.ok) {
      return new Response(JSON.stringify(parsed.value), {
        status,
        headers: { "content-type": "application/json" },
      });
    }
  }

  const headers = new Headers();
  if (contentType) headers.set("content-type", contentType);
  return new Response(payload, { status, headers });
}

function isJsonContentType(contentType: string): boolean {
  const mediaType = contentType.split(";")[0]?.trim().toLowerCase() ?? "";
  return mediaType === "application/json" || mediaType.endsWith("+json");
}

function parseJson(text: string): { ok: true; value: unknown } | { ok: false } {
  try {
    return { ok: true, value: JSON.parse(text) };
  } catch {
    return { ok: false };
  }
}
