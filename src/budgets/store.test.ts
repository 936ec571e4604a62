import { describe, expect, test } from "vitest";
import { MemoryBudgetStore, type NewBudget } from "./store.js";

const CREATED = new Date("2025-05-01T08:00:00Z");

function newBudget(overrides: Partial<NewBudget> = {}): NewBudget {
  return {
    name: overrides.name ?? "Groceries",
    category: overrides.category ?? "groceries",
    amount: overrides.amount ?? 400,
    period: overrides.period ?? "monthly",
    startDate: overrides.startDate ?? new Date("2025-05-01T00:00:00Z"),
    endDate: overrides.endDate ?? new Date("2025-05-31T00:00:00Z"),
  };
}

describe("MemoryBudgetStore", () => {
  test("assigns incrementing ids and the owning user", async () => {
    const store = new MemoryBudgetStore(() => CREATED);

    const first = await store.createBudget(7, newBudget());
    const second = await store.createBudget(8, newBudget({ name: "Fuel" }));

    expect(first.id).toBe(1);
    expect(first.userId).toBe(7);
    expect(first.createdAt).toEqual(CREATED);
    expect(second.id).toBe(2);
    expect(second.userId).toBe(8);
  });

  test("lists only the user's budgets in creation order", async () => {
    const store = new MemoryBudgetStore();
    await store.createBudget(7, newBudget({ name: "A" }));
    await store.createBudget(8, newBudget({ name: "B" }));
    await store.createBudget(7, newBudget({ name: "C" }));

    const budgets = await store.listBudgets(7);

    expect(budgets.map((b) => b.name)).toEqual(["A", "C"]);
  });

  test("returns copies so callers cannot mutate stored budgets", async () => {
    const store = new MemoryBudgetStore();
    const created = await store.createBudget(7, newBudget());

    created.amount = 1;

    expect((await store.getBudget(created.id))?.amount).toBe(400);
  });

  test("getBudget is undefined for an unknown id", async () => {
    const store = new MemoryBudgetStore();
    expect(await store.getBudget(42)).toBeUndefined();
  });

  test("records alerts against the budget's user", async () => {
    const store = new MemoryBudgetStore(() => CREATED);
    const budget = await store.createBudget(7, newBudget());

    const alert = await store.createAlert(budget, "approaching_limit", "80% used");

    expect(alert).toEqual({
      id: 1,
      budgetId: budget.id,
      userId: 7,
      alertType: "approaching_limit",
      message: "80% used",
      triggeredAt: CREATED,
      isRead: false,
    });
    expect(await store.listAlerts(budget.id)).toEqual([alert]);
    expect(await store.listAlerts(99)).toEqual([]);
  });
});
