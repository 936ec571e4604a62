// ── Error kinds ─────────────────────────────────────────────────────────────

export type UpstreamFailureReason =
  | "transport"
  | "timeout"
  | "status"
  | "invalid_response";

/**
 * A backend or the transaction source could not be reached, did not answer
 * in time, or answered with something other than a usable success.
 *
 * Never to be read as "no data": callers decide how to surface it.
 */
export class UpstreamUnavailableError extends Error {
  readonly service: string;
  readonly reason: UpstreamFailureReason;
  /** HTTP status when `reason` is "status". */
  readonly status?: number;

  constructor(
    service: string,
    reason: UpstreamFailureReason,
    message: string,
    options: { status?: number; cause?: unknown } = {}
  ) {
    super(`${service} unavailable: ${message}`, { cause: options.cause });
    this.name = "UpstreamUnavailableError";
    this.service = service;
    this.reason = reason;
    this.status = options.status;
  }
}

export function isUpstreamUnavailable(
  error: unknown
): error is UpstreamUnavailableError {
  return error instanceof UpstreamUnavailableError;
}

// ── Wire bodies ─────────────────────────────────────────────────────────────

export interface ErrorBody {
  error: string;
  error_description: string;
  [extra: string]: unknown;
}

export function errorBody(
  error: string,
  description: string,
  extra: Record<string, unknown> = {}
): ErrorBody {
  return { error, error_description: description, ...extra };
}
