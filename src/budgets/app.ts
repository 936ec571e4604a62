import { Hono, type Context } from "hono";
import { logger } from "hono/logger";
import {
  analyzeBudgets,
  spendingInsights,
  type TransactionSource,
} from "../analysis/index.js";
import { errorBody, isUpstreamUnavailable } from "../errors.js";
import { createLogger, errorMessage } from "../logger.js";
import { auditLog } from "../middleware/audit.js";
import {
  alertQuery,
  alertToWire,
  analysisQuery,
  budgetCreate,
  budgetToWire,
  describeIssue,
  idParam,
  insightToWire,
  insightsQuery,
  outcomeToWire,
} from "./schemas.js";
import type { BudgetStore } from "./store.js";

const log = createLogger("budget-service");

export interface BudgetServiceOptions {
  store: BudgetStore;
  source: TransactionSource;
  /** Clock used for days remaining and the insights window. */
  now?: () => Date;
  requestLogging?: boolean;
}

/**
 * HTTP surface of the budget backend. Handlers only marshal: budgets come
 * from the store, numbers come from the analysis engine.
 */
export function createBudgetApp(options: BudgetServiceOptions): Hono {
  const { store, source } = options;
  const now = options.now ?? (() => new Date());
  const app = new Hono();

  if (options.requestLogging ?? true) {
    app.use(logger());
  }
  app.use(auditLog("budget"));

  app.get("/", (c) =>
    c.json({ service: "Budget Analysis Service", status: "running" })
  );

  app.get("/health", (c) => c.json({ status: "healthy" }));

  // ── Budgets ──

  app.post("/budgets", async (c) => {
    const userId = idParam.safeParse(c.req.query("user_id"));
    if (!userId.success) {
      return invalid(c, "user_id must be a positive integer");
    }

    let body: unknown;
    try {
      body = await c.req.json();
    } catch {
      return invalid(c, "Invalid JSON body.");
    }

    const parsed = budgetCreate.safeParse(body);
    if (!parsed.success) {
      return invalid(c, describeIssue(parsed.error, "budget"));
    }

    const input = parsed.data;
    const budget = await store.createBudget(userId.data, {
      name: input.name,
      category: input.category,
      amount: input.amount,
      period: input.period,
      startDate: input.start_date,
      endDate: input.end_date,
    });

    log.info("Budget created", { budgetId: budget.id, userId: budget.userId });
    return c.json(budgetToWire(budget), 201);
  });

  app.get("/budgets/:userId", async (c) => {
    const userId = idParam.safeParse(c.req.param("userId"));
    if (!userId.success) {
      return invalid(c, "userId must be a positive integer");
    }

    const budgets = await store.listBudgets(userId.data);
    return c.json(budgets.map(budgetToWire));
  });

  app.get("/budgets/:userId/analysis", async (c) => {
    const userId = idParam.safeParse(c.req.param("userId"));
    if (!userId.success) {
      return invalid(c, "userId must be a positive integer");
    }
    const query = analysisQuery.safeParse(c.req.query());
    if (!query.success) {
      return invalid(c, describeIssue(query.error, "query"));
    }

    const budgets = await store.listBudgets(userId.data);
    const outcomes = await analyzeBudgets(source, userId.data, budgets, {
      onUnavailable: query.data.on_unavailable,
      now: now(),
      signal: c.req.raw.signal,
    });

    const failed = outcomes.filter((o) => !o.ok).length;
    if (failed > 0) {
      log.warn("Budget analysis incomplete", { userId: userId.data, failed, total: outcomes.length });
    }

    return c.json(outcomes.map(outcomeToWire));
  });

  // ── Alerts ──

  app.post("/budgets/:budgetId/alerts", async (c) => {
    const budgetId = idParam.safeParse(c.req.param("budgetId"));
    if (!budgetId.success) {
      return invalid(c, "budgetId must be a positive integer");
    }
    const query = alertQuery.safeParse(c.req.query());
    if (!query.success) {
      return invalid(c, describeIssue(query.error, "alert"));
    }

    const budget = await store.getBudget(budgetId.data);
    if (!budget) {
      return c.json(errorBody("not_found", "Budget not found"), 404);
    }

    const alert = await store.createAlert(budget, query.data.alert_type, query.data.message);
    return c.json({ message: "Alert created successfully", alert: alertToWire(alert) }, 201);
  });

  app.get("/budgets/:budgetId/alerts", async (c) => {
    const budgetId = idParam.safeParse(c.req.param("budgetId"));
    if (!budgetId.success) {
      return invalid(c, "budgetId must be a positive integer");
    }

    const budget = await store.getBudget(budgetId.data);
    if (!budget) {
      return c.json(errorBody("not_found", "Budget not found"), 404);
    }

    const alerts = await store.listAlerts(budget.id);
    return c.json(alerts.map(alertToWire));
  });

  // ── Insights ──

  app.get("/insights/:userId/spending", async (c) => {
    const userId = idParam.safeParse(c.req.param("userId"));
    if (!userId.success) {
      return invalid(c, "userId must be a positive integer");
    }
    const query = insightsQuery.safeParse(c.req.query());
    if (!query.success) {
      return invalid(c, describeIssue(query.error, "query"));
    }

    try {
      const insights = await spendingInsights(source, userId.data, query.data.days, {
        now: now(),
        signal: c.req.raw.signal,
      });
      return c.json(insights.map(insightToWire));
    } catch (error) {
      if (isUpstreamUnavailable(error)) {
        return c.json(errorBody("upstream_unavailable", error.message), 503);
      }
      throw error;
    }
  });

  app.notFound((c) => c.json(errorBody("not_found", `No route for ${c.req.path}`), 404));

  app.onError((error, c) => {
    log.error("Unhandled error", {
      method: c.req.method,
      path: c.req.path,
      error: errorMessage(error),
    });
    return c.json(errorBody("internal_error", "Internal server error"), 500);
  });

  return app;
}

function invalid(c: Context, description: string) {
  return c.json(errorBody("invalid_request", description), 400);
}
