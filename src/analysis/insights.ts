// ── Spending Insights ───────────────────────────────────────────────
// Category-level totals over a trailing window ending now.

import { MS_PER_DAY, round, type Transaction, type TransactionSource } from "./source.js";

export type SpendingTrend = "increasing" | "decreasing" | "stable";

export interface SpendingInsight {
  category: string;
  totalSpent: number;
  transactionCount: number;
  averageTransaction: number;
  /**
   * Always "stable": no historical baseline is computed yet, so there is
   * nothing to compare the window against.
   */
  trend: SpendingTrend;
}

export interface InsightOptions {
  now?: Date;
  signal?: AbortSignal;
}

export const DEFAULT_WINDOW_DAYS = 30;

/** A century; longer windows fall outside the representable date range. */
export const MAX_WINDOW_DAYS = 36_500;

/**
 * Fetch a user's transactions for the last `windowDays` days and
 * summarise them per category, largest total first.
 *
 * Rejects with `UpstreamUnavailableError` when the source cannot be read;
 * an empty window resolves to `[]`.
 */
export async function spendingInsights(
  source: TransactionSource,
  userId: number,
  windowDays: number = DEFAULT_WINDOW_DAYS,
  options: InsightOptions = {}
): Promise<SpendingInsight[]> {
  if (!Number.isInteger(windowDays) || windowDays <= 0) {
    throw new RangeError(`windowDays must be a positive integer, got ${windowDays}`);
  }
  if (windowDays > MAX_WINDOW_DAYS) {
    throw new RangeError(`windowDays must be at most ${MAX_WINDOW_DAYS}, got ${windowDays}`);
  }

  const end = options.now ?? new Date();
  const start = new Date(end.getTime() - windowDays * MS_PER_DAY);

  const transactions = await source.fetchTransactions(userId, start, end, {
    signal: options.signal,
  });

  return summarizeByCategory(transactions);
}

/**
 * Group transactions by their exact category label. Transactions without
 * a category are left out.
 *
 * Groups are laid out in label order before the stable sort by total, so
 * equal totals come out ordered by label.
 */
export function summarizeByCategory(
  transactions: readonly Transaction[]
): SpendingInsight[] {
  const groups = new Map<string, { total: number; count: number }>();

  for (const tx of transactions) {
    if (tx.category === null) continue;
    const group = groups.get(tx.category);
    if (group) {
      group.total += tx.amount;
      group.count += 1;
    } else {
      groups.set(tx.category, { total: tx.amount, count: 1 });
    }
  }

  const insights: SpendingInsight[] = [];
  const byLabel = [...groups].sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
  for (const [category, { total, count }] of byLabel) {
    insights.push({
      category,
      totalSpent: round(total),
      transactionCount: count,
      averageTransaction: round(total / count),
      trend: "stable",
    });
  }

  insights.sort((a, b) => b.totalSpent - a.totalSpent);
  return insights;
}
