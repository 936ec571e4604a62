import type { Budget, BudgetPeriod } from "../analysis/index.js";

// ── Types ───────────────────────────────────────────────────────────────────

export interface StoredBudget extends Budget {
  createdAt: Date;
}

export interface NewBudget {
  name: string;
  category: string;
  amount: number;
  period: BudgetPeriod;
  startDate: Date;
  endDate: Date;
}

export type AlertType = "overspent" | "approaching_limit" | "goal_reached";

export interface BudgetAlert {
  id: number;
  budgetId: number;
  userId: number;
  alertType: AlertType;
  message: string;
  triggeredAt: Date;
  isRead: boolean;
}

/**
 * Where the budget service keeps budgets and their alerts. The analysis
 * engine never sees this; the HTTP layer loads budgets and hands them over.
 */
export interface BudgetStore {
  createBudget(userId: number, input: NewBudget): Promise<StoredBudget>;
  listBudgets(userId: number): Promise<StoredBudget[]>;
  getBudget(budgetId: number): Promise<StoredBudget | undefined>;
  createAlert(budget: StoredBudget, alertType: AlertType, message: string): Promise<BudgetAlert>;
  listAlerts(budgetId: number): Promise<BudgetAlert[]>;
}

// ── In-memory implementation ────────────────────────────────────────────────

/** Process-local store with incrementing ids. Lost on restart. */
export class MemoryBudgetStore implements BudgetStore {
  private readonly budgets = new Map<number, StoredBudget>();
  private readonly alerts: BudgetAlert[] = [];
  private nextBudgetId = 1;
  private nextAlertId = 1;

  constructor(private readonly now: () => Date = () => new Date()) {}

  async createBudget(userId: number, input: NewBudget): Promise<StoredBudget> {
    const budget: StoredBudget = {
      ...input,
      id: this.nextBudgetId++,
      userId,
      createdAt: this.now(),
    };
    this.budgets.set(budget.id, budget);
    return { ...budget };
  }

  async listBudgets(userId: number): Promise<StoredBudget[]> {
    const result: StoredBudget[] = [];
    for (const budget of this.budgets.values()) {
      if (budget.userId === userId) result.push({ ...budget });
    }
    return result;
  }

  async getBudget(budgetId: number): Promise<StoredBudget | undefined> {
    const budget = this.budgets.get(budgetId);
    return budget ? { ...budget } : undefined;
  }

  async createAlert(
    budget: StoredBudget,
    alertType: AlertType,
    message: string
  ): Promise<BudgetAlert> {
    const alert: BudgetAlert = {
      id: this.nextAlertId++,
      budgetId: budget.id,
      userId: budget.userId,
      alertType,
      message,
      triggeredAt: this.now(),
      isRead: false,
    };
    this.alerts.push(alert);
    return { ...alert };
  }

  async listAlerts(budgetId: number): Promise<BudgetAlert[]> {
    return this.alerts.filter((a) => a.budgetId === budgetId).map((a) => ({ ...a }));
  }
}
