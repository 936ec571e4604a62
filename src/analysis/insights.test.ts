import { describe, expect, test } from "vitest";
import { UpstreamUnavailableError } from "../errors.js";
import { spendingInsights, summarizeByCategory } from "./insights.js";
import { MS_PER_DAY, type Transaction, type TransactionSource } from "./source.js";

const NOW = new Date("2025-06-15T12:00:00Z");

function tx(amount: number, category: string): Transaction {
  return { amount, category };
}

function recordingSource(transactions: Transaction[]) {
  const calls: Array<{ userId: number; start: Date; end: Date }> = [];
  const source: TransactionSource = {
    fetchTransactions: async (userId, start, end) => {
      calls.push({ userId, start, end });
      return transactions;
    },
  };
  return { source, calls };
}

describe("summarizeByCategory", () => {
  test("returns an empty list for no transactions", () => {
    expect(summarizeByCategory([])).toEqual([]);
  });

  test("totals, counts and averages each category", () => {
    const result = summarizeByCategory([
      tx(10.5, "Food"),
      tx(40, "Transport"),
      tx(20.25, "Food"),
      tx(4, "Food"),
    ]);

    expect(result).toEqual([
      {
        category: "Transport",
        totalSpent: 40,
        transactionCount: 1,
        averageTransaction: 40,
        trend: "stable",
      },
      {
        category: "Food",
        totalSpent: 34.75,
        transactionCount: 3,
        averageTransaction: 11.58,
        trend: "stable",
      },
    ]);
  });

  test("groups on the exact label without folding case", () => {
    const result = summarizeByCategory([tx(5, "Food"), tx(3, "food")]);
    expect(result.map((i) => i.category)).toEqual(["Food", "food"]);
  });

  test("orders equal totals by category label", () => {
    const result = summarizeByCategory([
      tx(30, "Books"),
      tx(10, "Games"),
      tx(30, "Art"),
      tx(20, "Games"),
    ]);
    expect(result.map((i) => i.category)).toEqual(["Art", "Books", "Games"]);
  });

  test("a later label sorts after an earlier one on a tie", () => {
    const result = summarizeByCategory([tx(50, "travel"), tx(50, "dining")]);
    expect(result.map((i) => i.category)).toEqual(["dining", "travel"]);
  });

  test("leaves out transactions without a category", () => {
    const result = summarizeByCategory([
      { amount: 70, category: null },
      tx(5, "Food"),
      tx(9, ""),
    ]);
    expect(result.map((i) => [i.category, i.totalSpent])).toEqual([
      ["", 9],
      ["Food", 5],
    ]);
  });

  test("totals never increase down the list", () => {
    const result = summarizeByCategory([
      tx(5, "A"),
      tx(50, "B"),
      tx(25, "C"),
      tx(25, "D"),
      tx(75, "E"),
    ]);
    for (let i = 1; i < result.length; i++) {
      expect(result[i]!.totalSpent).toBeLessThanOrEqual(result[i - 1]!.totalSpent);
    }
  });

  test("always reports a stable trend", () => {
    const result = summarizeByCategory([tx(1, "A"), tx(100, "A")]);
    expect(result[0]!.trend).toBe("stable");
  });
});

describe("spendingInsights", () => {
  test("queries a 30 day window ending now by default", async () => {
    const { source, calls } = recordingSource([]);

    await spendingInsights(source, 42, undefined, { now: NOW });

    expect(calls).toEqual([
      {
        userId: 42,
        start: new Date(NOW.getTime() - 30 * MS_PER_DAY),
        end: NOW,
      },
    ]);
  });

  test("accepts the longest window", async () => {
    const { source, calls } = recordingSource([]);

    await spendingInsights(source, 42, 36_500, { now: NOW });

    expect(calls[0]!.start).toEqual(new Date(NOW.getTime() - 36_500 * MS_PER_DAY));
  });

  test("honours a custom window", async () => {
    const { source, calls } = recordingSource([]);

    await spendingInsights(source, 42, 7, { now: NOW });

    expect(calls[0]!.start).toEqual(new Date("2025-06-08T12:00:00Z"));
  });

  test("an empty window yields no insights", async () => {
    const { source } = recordingSource([]);
    await expect(spendingInsights(source, 42, 30, { now: NOW })).resolves.toEqual([]);
  });

  test("summarises the fetched transactions", async () => {
    const { source } = recordingSource([tx(12, "Coffee"), tx(8, "Coffee")]);

    const result = await spendingInsights(source, 42, 30, { now: NOW });

    expect(result).toEqual([
      {
        category: "Coffee",
        totalSpent: 20,
        transactionCount: 2,
        averageTransaction: 10,
        trend: "stable",
      },
    ]);
  });

  test.each([0, -3, 2.5, 36_501, 200_000_000])("rejects a window of %d days", async (days) => {
    const { source, calls } = recordingSource([]);
    await expect(spendingInsights(source, 42, days, { now: NOW })).rejects.toThrow(RangeError);
    expect(calls).toHaveLength(0);
  });

  test("propagates an unavailable source instead of returning nothing", async () => {
    const source: TransactionSource = {
      fetchTransactions: () =>
        Promise.reject(new UpstreamUnavailableError("transactions", "timeout", "Timed out")),
    };

    await expect(spendingInsights(source, 42, 30, { now: NOW })).rejects.toBeInstanceOf(
      UpstreamUnavailableError
    );
  });
});
