import { beforeEach, describe, expect, it, vi } from "vitest";
import { loadConfig } from "./config";
import { resolveDuplicates } from "./ingestion/dedup";
import { fingerprintBatch } from "./ingestion/fingerprint";
import type { CanonicalTransaction } from "./ingestion/types";
import { MemStorage } from "./memStorage";
import { checkConnection, getSpendingSummary } from "./stats";

async function insert(store: MemStorage, transactions: CanonicalTransaction[]) {
  const rows = fingerprintBatch(
    transactions.map((transaction, i) => ({ rowNumber: i + 2, cells: [transaction.description], transaction }))
  );
  const resolved = await resolveDuplicates(rows, store);
  await store.insertBatch({ rows: resolved.rows, groupTags: resolved.groupTags });
}

async function categorize(store: MemStorage, description: string, category: string) {
  const txn = store.listTransactions().find((row) => row.description === description);
  if (!txn) throw new Error(`no transaction ${description}`);
  await store.updateTransactionCategory(txn.id, category);
}

describe("stats", () => {
  let store: MemStorage;

  beforeEach(async () => {
    vi.spyOn(console, "log").mockImplementation(() => {});
    store = new MemStorage();
    await insert(store, [
      { date: "2023-12-30", description: "OLD", amount: -20, source: "chase" },
      { date: "2024-01-05", description: "STARBUCKS #1", amount: -4.5, source: "chase" },
      { date: "2024-01-05", description: "STARBUCKS #2", amount: -4.5, source: "chase" },
      { date: "2024-01-12", description: "GROCER", amount: -60.25, source: "chase" },
      { date: "2024-01-15", description: "PAYROLL", amount: 2500, source: "chase" },
      { date: "2024-01-18", description: "CAFE", amount: -3.5, source: "chase" },
      { date: "2024-01-19", description: "BOOKSHOP", amount: -9.99, source: "chase" },
      { date: "2024-01-25", description: "LATER", amount: -1, source: "chase" },
    ]);
    await categorize(store, "STARBUCKS #1", "Dining");
    await categorize(store, "CAFE", "Dining");
    await categorize(store, "GROCER", "Groceries");
    await categorize(store, "PAYROLL", "Income");
  });

  it("summarizes counts and month-to-date spending by category", async () => {
    const summary = await getSpendingSummary(store, new Date(2024, 0, 20));

    expect(summary).toMatchObject({
      from: "2024-01-01",
      to: "2024-01-20",
      total: 8,
      categorized: 4,
      uncategorized: 4,
      pendingDuplicateGroups: 1,
    });
    expect(summary.categoryTotals).toEqual([
      { category: "Groceries", total: -60.25, count: 1 },
      { category: null, total: -14.49, count: 2 },
      { category: "Dining", total: -8, count: 2 },
      { category: "Income", total: 2500, count: 1 },
    ]);
  });

  it("reports the connection and whether the classifier is configured", async () => {
    const report = await checkConnection(store, loadConfig({ OPENAI_API_KEY: "test-key" }));
    expect(report).toEqual({ apiKeyConfigured: true, model: "gpt-4o-mini", total: 8, uncategorized: 4 });

    expect((await checkConnection(store, loadConfig({}))).apiKeyConfigured).toBe(false);
  });

  it("fails the check when the store is unreachable", async () => {
    vi.spyOn(store, "ping").mockRejectedValueOnce(new Error("connect ECONNREFUSED"));
    await expect(checkConnection(store, loadConfig({}))).rejects.toThrow("connect ECONNREFUSED");
  });
});
