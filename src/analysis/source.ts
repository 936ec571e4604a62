// ── Transaction Source ──────────────────────────────────────────────
// The contract the aggregation engine consumes. Implementations live
// outside this directory (see src/transactions/client.ts).

export interface Transaction {
  /** Summed as-is; no sign convention is applied. */
  amount: number;
  /** Free text; null when the source sent none. */
  category: string | null;
}

export interface FetchOptions {
  /** Aborts the fetch when the caller goes away. */
  signal?: AbortSignal;
}

/**
 * Supplies a user's transactions within an inclusive date range.
 *
 * Resolves with the records (possibly none) on success and rejects with
 * `UpstreamUnavailableError` when the source cannot produce a result.
 */
export interface TransactionSource {
  fetchTransactions(
    userId: number,
    start: Date,
    end: Date,
    options?: FetchOptions
  ): Promise<Transaction[]>;
}

export const MS_PER_DAY = 86_400_000;

export function round(n: number): number {
  return Math.round(n * 100) / 100;
}
