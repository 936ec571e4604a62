import { z } from "zod";
import {
  DEFAULT_WINDOW_DAYS,
  MAX_WINDOW_DAYS,
  type BudgetAnalysisOutcome,
  type SpendingInsight,
} from "../analysis/index.js";
import type { BudgetAlert, StoredBudget } from "./store.js";

// ── Inbound ─────────────────────────────────────────────────────────────────

export const idParam = z.coerce.number().int().positive();

export const budgetCreate = z.object({
  name: z.string().min(1),
  category: z.string().min(1),
  amount: z.number().finite(),
  period: z.enum(["weekly", "monthly", "yearly"]),
  start_date: z.coerce.date(),
  end_date: z.coerce.date(),
});

export const analysisQuery = z.object({
  on_unavailable: z.enum(["report", "zero"]).default("report"),
});

export const insightsQuery = z.object({
  days: z.coerce.number().int().positive().max(MAX_WINDOW_DAYS).default(DEFAULT_WINDOW_DAYS),
});

export const alertQuery = z.object({
  alert_type: z.enum(["overspent", "approaching_limit", "goal_reached"]),
  message: z.string().min(1),
});

/** First issue of a failed parse, prefixed with the offending field. */
export function describeIssue(error: z.ZodError, subject: string): string {
  const issue = error.issues[0];
  if (!issue) return `Invalid ${subject}`;
  const field = issue.path.join(".");
  return field ? `Invalid ${subject} field "${field}": ${issue.message}` : `Invalid ${subject}: ${issue.message}`;
}

// ── Outbound ────────────────────────────────────────────────────────────────

export function budgetToWire(budget: StoredBudget) {
  return {
    id: budget.id,
    user_id: budget.userId,
    name: budget.name,
    category: budget.category,
    amount: budget.amount,
    period: budget.period,
    start_date: budget.startDate.toISOString(),
    end_date: budget.endDate.toISOString(),
    created_at: budget.createdAt.toISOString(),
  };
}

export function outcomeToWire(outcome: BudgetAnalysisOutcome) {
  if (!outcome.ok) {
    return {
      budget_id: outcome.budgetId,
      budget_name: outcome.budgetName,
      error: "upstream_unavailable",
      error_description: outcome.error.message,
    };
  }

  const { analysis } = outcome;
  return {
    budget_id: analysis.budgetId,
    budget_name: analysis.budgetName,
    budget_amount: analysis.budgetAmount,
    spent_amount: analysis.spentAmount,
    remaining_amount: analysis.remainingAmount,
    percentage_used: analysis.percentageUsed,
    days_remaining: analysis.daysRemaining,
    status: analysis.status,
  };
}

export function insightToWire(insight: SpendingInsight) {
  return {
    category: insight.category,
    total_spent: insight.totalSpent,
    transaction_count: insight.transactionCount,
    average_transaction: insight.averageTransaction,
    trend: insight.trend,
  };
}

export function alertToWire(alert: BudgetAlert) {
  return {
    id: alert.id,
    budget_id: alert.budgetId,
    user_id: alert.userId,
    alert_type: alert.alertType,
    message: alert.message,
    triggered_at: alert.triggeredAt.toISOString(),
    is_read: alert.isRead,
  };
}
