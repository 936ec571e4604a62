import { z } from "zod";
import type { FetchOptions, Transaction, TransactionSource } from "../analysis/index.js";
import { UpstreamUnavailableError } from "../errors.js";
import { createDeadline } from "../http/deadline.js";
import { createLogger, errorMessage } from "../logger.js";

const log = createLogger("transactions-client");

const SERVICE = "transactions";

const transactionRecord = z.object({
  amount: z.number().default(0),
  category: z
    .string()
    .nullish()
    .transform((value) => value ?? null),
});

const transactionList = z.array(transactionRecord);

export interface TransactionClientOptions {
  /** Base URL of the transactions backend, without a trailing slash. */
  baseUrl: string;
  timeoutMs: number;
  fetch?: typeof fetch;
}

/**
 * Transaction Source backed by the transactions service:
 * `GET /transactions/{userId}?start_date=…&end_date=…`.
 *
 * An empty array from the service is a real "no transactions"; every other
 * failure (unreachable, slow, non-2xx, malformed body) rejects with
 * `UpstreamUnavailableError`.
 */
export class HttpTransactionSource implements TransactionSource {
  private readonly baseUrl: string;
  private readonly timeoutMs: number;
  private readonly fetchImpl: typeof fetch;

  constructor(options: TransactionClientOptions) {
    this.baseUrl = options.baseUrl;
    this.timeoutMs = options.timeoutMs;
    this.fetchImpl = options.fetch ?? fetch.bind(globalThis);
  }

  async fetchTransactions(
    userId: number,
    start: Date,
    end: Date,
    options: FetchOptions = {}
  ): Promise<Transaction[]> {
    const url = new URL(`${this.baseUrl}/transactions/${userId}`);
    url.searchParams.set("start_date", start.toISOString());
    url.searchParams.set("end_date", end.toISOString());

    const deadline = createDeadline(this.timeoutMs, options.signal);
    try {
      let response: Response;
      try {
        response = await this.fetchImpl(url, {
          method: "GET",
          headers: { Accept: "application/json" },
          signal: deadline.signal,
        });
      } catch (error) {
        throw this.transportFailure(error, deadline.timedOut());
      }

      if (!response.ok) {
        log.warn("Transaction service rejected request", {
          userId,
          status: response.status,
        });
        throw new UpstreamUnavailableError(
          SERVICE,
          "status",
          `responded with ${response.status}`,
          { status: response.status }
        );
      }

      let body: unknown;
      try {
        body = await response.json();
      } catch (error) {
        if (deadline.signal.aborted) {
          throw this.transportFailure(error, deadline.timedOut());
        }
        throw new UpstreamUnavailableError(SERVICE, "invalid_response", "body is not JSON", {
          cause: error,
        });
      }

      const parsed = transactionList.safeParse(body);
      if (!parsed.success) {
        throw new UpstreamUnavailableError(
          SERVICE,
          "invalid_response",
          `unexpected transaction payload: ${parsed.error.issues[0]?.message ?? "invalid"}`,
          { cause: parsed.error }
        );
      }

      log.debug("Fetched transactions", { userId, count: parsed.data.length });
      return parsed.data;
    } finally {
      deadline.dispose();
    }
  }

  private transportFailure(error: unknown, timedOut: boolean): UpstreamUnavailableError {
    if (timedOut) {
      log.warn("Transaction service timed out", { timeoutMs: this.timeoutMs });
      return new UpstreamUnavailableError(
        SERVICE,
        "timeout",
        `no response within ${this.timeoutMs}ms`,
        { cause: error }
      );
    }
    log.warn("Transaction service unreachable", { error: errorMessage(error) });
    return new UpstreamUnavailableError(SERVICE, "transport", errorMessage(error), {
      cause: error,
    });
  }
}
