// ── Budget Analysis ─────────────────────────────────────────────────
// Derives spend, remaining amount and status for each of a user's
// budgets from the transactions recorded in the budget's date range.

import { isUpstreamUnavailable, type UpstreamUnavailableError } from "../errors.js";
import { MS_PER_DAY, type Transaction, type TransactionSource } from "./source.js";

export type BudgetPeriod = "weekly" | "monthly" | "yearly";

export interface Budget {
  id: number;
  userId: number;
  name: string;
  category: string;
  /** Spending ceiling for the period. */
  amount: number;
  /** Informational only; not checked against the dates. */
  period: BudgetPeriod;
  startDate: Date;
  endDate: Date;
}

export type BudgetStatus = "on_track" | "at_risk" | "over_budget";

export interface BudgetAnalysis {
  budgetId: number;
  budgetName: string;
  budgetAmount: number;
  spentAmount: number;
  /** Negative once the budget is overspent. */
  remainingAmount: number;
  /** Not capped at 100. */
  percentageUsed: number;
  daysRemaining: number;
  status: BudgetStatus;
}

export type BudgetAnalysisOutcome =
  | { ok: true; analysis: BudgetAnalysis }
  | {
      ok: false;
      budgetId: number;
      budgetName: string;
      error: UpstreamUnavailableError;
    };

/**
 * What to do when the transactions of a budget cannot be fetched:
 * - "report": return a failed outcome for that budget
 * - "zero": analyse the budget as if it had no transactions
 */
export type UnavailablePolicy = "report" | "zero";

export interface AnalyzeOptions {
  onUnavailable?: UnavailablePolicy;
  now?: Date;
  signal?: AbortSignal;
}

export const AT_RISK_THRESHOLD = 80;
export const OVER_BUDGET_THRESHOLD = 100;

/**
 * Analyse every budget of a user against the transaction source.
 *
 * Fetches run concurrently; the result keeps the order of `budgets`.
 * One budget's fetch failure never affects its siblings.
 */
export async function analyzeBudgets(
  source: TransactionSource,
  userId: number,
  budgets: readonly Budget[],
  options: AnalyzeOptions = {}
): Promise<BudgetAnalysisOutcome[]> {
  const policy = options.onUnavailable ?? "report";
  const now = options.now ?? new Date();

  const settled = await Promise.allSettled(
    budgets.map((budget) =>
      source.fetchTransactions(userId, budget.startDate, budget.endDate, {
        signal: options.signal,
      })
    )
  );

  return budgets.map((budget, i): BudgetAnalysisOutcome => {
    const result = settled[i];
    if (result?.status === "fulfilled") {
      return { ok: true, analysis: summarizeBudget(budget, result.value, now) };
    }

    const reason: unknown = result?.reason;
    if (!isUpstreamUnavailable(reason)) throw reason;

    if (policy === "zero") {
      return { ok: true, analysis: summarizeBudget(budget, [], now) };
    }
    return { ok: false, budgetId: budget.id, budgetName: budget.name, error: reason };
  });
}

/**
 * Pure derivation of one budget's analysis from the transactions of its
 * date range. Only transactions whose category matches the budget's
 * (ignoring case) count towards the spend.
 */
export function summarizeBudget(
  budget: Budget,
  transactions: readonly Transaction[],
  now: Date
): BudgetAnalysis {
  const category = budget.category.toLowerCase();

  let spent = 0;
  for (const tx of transactions) {
    if (tx.category?.toLowerCase() === category) {
      spent += tx.amount;
    }
  }

  const percentageUsed = budget.amount > 0 ? (spent / budget.amount) * 100 : 0;

  return {
    budgetId: budget.id,
    budgetName: budget.name,
    budgetAmount: budget.amount,
    spentAmount: spent,
    remainingAmount: budget.amount - spent,
    percentageUsed,
    daysRemaining: daysRemaining(budget.endDate, now),
    status: budgetStatus(percentageUsed),
  };
}

export function budgetStatus(percentageUsed: number): BudgetStatus {
  if (percentageUsed >= OVER_BUDGET_THRESHOLD) return "over_budget";
  if (percentageUsed >= AT_RISK_THRESHOLD) return "at_risk";
  return "on_track";
}

/** Whole days from `now` until `end`, floored, never below zero. */
export function daysRemaining(end: Date, now: Date): number {
  const days = Math.floor((end.getTime() - now.getTime()) / MS_PER_DAY);
  return Math.max(0, days);
}
