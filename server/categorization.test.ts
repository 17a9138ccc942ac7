import { beforeEach, describe, expect, it, vi } from "vitest";
import { runCategorization } from "./categorization";
import type { ClassifierInput, ClassifierResult, TransactionClassifier } from "./classifier";
import { ClassifierError } from "./errors";
import { resolveDuplicates } from "./ingestion/dedup";
import { fingerprintBatch } from "./ingestion/fingerprint";
import type { CanonicalTransaction } from "./ingestion/types";
import { MemStorage } from "./memStorage";
import { seedDefaultCategories } from "./seed";

async function insert(store: MemStorage, transactions: CanonicalTransaction[]) {
  const rows = fingerprintBatch(
    transactions.map((transaction, i) => ({ rowNumber: i + 2, cells: [transaction.description], transaction }))
  );
  const resolved = await resolveDuplicates(rows, store);
  await store.insertBatch({ rows: resolved.rows, groupTags: resolved.groupTags });
}

class FakeClassifier implements TransactionClassifier {
  readonly batches: ClassifierInput[][] = [];

  constructor(private readonly answer: (input: ClassifierInput) => ClassifierResult) {}

  async categorize(batch: ClassifierInput[]): Promise<ClassifierResult[]> {
    this.batches.push(batch);
    if (batch.some((input) => input.description === "MYSTERY")) {
      throw new ClassifierError("model unavailable");
    }
    return batch.map(this.answer);
  }
}

describe("runCategorization", () => {
  let store: MemStorage;

  beforeEach(async () => {
    vi.spyOn(console, "log").mockImplementation(() => {});
    vi.spyOn(console, "warn").mockImplementation(() => {});
    vi.spyOn(console, "error").mockImplementation(() => {});

    store = new MemStorage();
    await seedDefaultCategories(store);
    await store.createVendorRule({ pattern: "STARBUCKS", category: "Dining", priority: 5 });
    await insert(store, [
      { date: "2024-01-05", description: "STARBUCKS #1", amount: -4.5, source: "chase", account: "1234", balance: 995.5 },
      { date: "2024-01-06", description: "SHELL OIL 55", amount: -40, source: "chase", reference: "1001" },
      { date: "2024-01-07", description: "BOOKSHOP", amount: -9.99, source: "chase" },
    ]);
  });

  it("applies rules first and sends only the rest to the classifier", async () => {
    const classifier = new FakeClassifier((input) =>
      input.description.startsWith("SHELL") ? { category: "Transportation", vendor: "Shell" } : { category: null }
    );

    const summary = await runCategorization(store, classifier, { batchSize: 1 });
    expect(summary).toMatchObject({
      status: "completed",
      processed: 3,
      ruleCategorized: 1,
      aiCategorized: 1,
      uncategorized: 1,
      batches: 2,
      failedBatches: 0,
    });

    const byDescription = new Map(store.listTransactions().map((txn) => [txn.description, txn]));
    expect(byDescription.get("STARBUCKS #1")).toMatchObject({ category: "Dining", vendor: "STARBUCKS" });
    expect(byDescription.get("SHELL OIL 55")).toMatchObject({ category: "Transportation", vendor: "Shell" });
    expect(byDescription.get("BOOKSHOP")?.category).toBeNull();
  });

  it("never sends account, balance or reference to the classifier", async () => {
    const classifier = new FakeClassifier(() => ({ category: null }));
    await runCategorization(store, classifier);

    const inputs = classifier.batches.flat();
    expect(inputs).toHaveLength(2);
    for (const input of inputs) {
      expect(Object.keys(input).sort()).toEqual(["amount", "date", "description"]);
    }
  });

  it("ignores categories that are not in the category list", async () => {
    const classifier = new FakeClassifier(() => ({ category: "Crypto" }));
    const summary = await runCategorization(store, classifier);
    expect(summary.aiCategorized).toBe(0);
    expect(summary.uncategorized).toBe(2);
  });

  it("keeps going when a batch fails and reports the run as partial", async () => {
    await insert(store, [{ date: "2024-01-08", description: "MYSTERY", amount: -1, source: "chase" }]);
    const classifier = new FakeClassifier(() => ({ category: "Shopping" }));

    const summary = await runCategorization(store, classifier, { batchSize: 1, concurrency: 1 });
    expect(summary).toMatchObject({ status: "partial", failedBatches: 1, aiCategorized: 2, uncategorized: 1 });

    const [entry] = store.listProcessingLogs();
    expect(entry).toMatchObject({ operationType: "ai_categorization", status: "partial", errorCount: 1 });
  });

  it("drops queued batches when the run fails outright", async () => {
    await insert(store, [
      { date: "2024-01-09", description: "HARDWARE", amount: -12, source: "chase" },
      { date: "2024-01-10", description: "PHARMACY", amount: -7.25, source: "chase" },
    ]);
    const calls: string[] = [];
    const classifier: TransactionClassifier = {
      async categorize(batch) {
        calls.push(batch[0].description);
        if (calls.length === 1) throw new Error("socket hang up");
        await new Promise((resolve) => setTimeout(resolve, 5));
        return batch.map(() => ({ category: "Shopping" }));
      },
    };

    await expect(runCategorization(store, classifier, { batchSize: 1, concurrency: 1 })).rejects.toThrow(
      "socket hang up"
    );
    await new Promise((resolve) => setTimeout(resolve, 30));

    expect(calls.length).toBeLessThan(3);
    expect(store.listProcessingLogs()[0]).toMatchObject({ status: "failed" });
  });

  it("stops after the limit", async () => {
    const classifier = new FakeClassifier(() => ({ category: "Shopping" }));
    const summary = await runCategorization(store, classifier, { limit: 1 });
    expect(summary.processed).toBe(1);
  });
});
