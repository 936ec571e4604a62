// ── Aggregation Engine ───────────────────────────────────────────────
// Barrel export for the analysis modules.
// No HTTP here: transactions arrive through an injected TransactionSource.

export {
  analyzeBudgets,
  summarizeBudget,
  budgetStatus,
  daysRemaining,
  AT_RISK_THRESHOLD,
  OVER_BUDGET_THRESHOLD,
  type Budget,
  type BudgetPeriod,
  type BudgetStatus,
  type BudgetAnalysis,
  type BudgetAnalysisOutcome,
  type UnavailablePolicy,
  type AnalyzeOptions,
} from "./budgets.js";

export {
  spendingInsights,
  summarizeByCategory,
  DEFAULT_WINDOW_DAYS,
  MAX_WINDOW_DAYS,
  type SpendingInsight,
  type SpendingTrend,
  type InsightOptions,
} from "./insights.js";

export {
  MS_PER_DAY,
  round,
  type Transaction,
  type TransactionSource,
  type FetchOptions,
} from "./source.js";
