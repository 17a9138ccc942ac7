import pLimit from "p-limit";
import type { Transaction } from "@shared/schema";
import { toClassifierInput, type ClassifierResult, type TransactionClassifier } from "./classifier";
import { ClassifierError, logError } from "./errors";
import { categorizeBatch, compileRules } from "./ingestion/categorize";
import { log } from "./logger";
import type { ProcessingLogResult, RecordStore } from "./storage";

export interface CategorizationOptions {
  batchSize?: number;
  limit?: number;
  concurrency?: number;
}

export interface CategorizationSummary {
  logId: string;
  status: ProcessingLogResult["status"];
  processed: number;
  ruleCategorized: number;
  aiCategorized: number;
  uncategorized: number;
  batches: number;
  failedBatches: number;
}

function chunk<T>(items: T[], size: number): T[][] {
  const batches: T[][] = [];
  for (let i = 0; i < items.length; i += size) {
    batches.push(items.slice(i, i + size));
  }
  return batches;
}

/**
 * Categorizes stored rows that have no category yet: vendor rules first,
 * then the classifier in batches. A failed batch leaves its rows
 * uncategorized and makes the run partial; the other batches still land.
 */
export async function runCategorization(
  store: RecordStore,
  classifier: TransactionClassifier,
  options: CategorizationOptions = {}
): Promise<CategorizationSummary> {
  const batchSize = Math.max(1, options.batchSize ?? 50);
  const limit = pLimit(Math.max(1, options.concurrency ?? 2));

  const logId = await store.startProcessingLog({
    operationType: "ai_categorization",
    details: { batchSize, limit: options.limit ?? null },
  });

  const summary: CategorizationSummary = {
    logId,
    status: "completed",
    processed: 0,
    ruleCategorized: 0,
    aiCategorized: 0,
    uncategorized: 0,
    batches: 0,
    failedBatches: 0,
  };

  const batchErrors: Array<{ batch: number; code: string; message: string }> = [];

  try {
    const rows = await store.getUncategorizedTransactions(options.limit);
    summary.processed = rows.length;
    log(`Categorizing ${rows.length} uncategorized transaction(s)`, "categorize");

    const { matched, queue } = categorizeBatch(rows, compileRules(await store.getActiveVendorRules()));
    for (const { row, match } of matched) {
      if (await store.updateTransactionCategory(row.id, match.category, match.vendor)) {
        summary.ruleCategorized++;
      }
    }

    const known = new Set((await store.getCategories()).map((category) => category.name));
    const batches = chunk(queue, batchSize);
    summary.batches = batches.length;

    const applyBatch = async (batch: Transaction[], index: number): Promise<number> => {
      let results: ClassifierResult[];
      try {
        results = await classifier.categorize(batch.map(toClassifierInput));
      } catch (error) {
        if (!(error instanceof ClassifierError)) throw error;
        logError(error, "categorize");
        summary.failedBatches++;
        batchErrors.push({ batch: index, code: error.code, message: error.message });
        return 0;
      }

      let updated = 0;
      for (let i = 0; i < batch.length; i++) {
        const result = results[i];
        if (!result?.category || !known.has(result.category)) continue;
        if (await store.updateTransactionCategory(batch[i].id, result.category, result.vendor)) {
          updated++;
        }
      }
      log(`Batch ${index + 1}/${batches.length}: ${updated} of ${batch.length} categorized`, "categorize");
      return updated;
    };

    const counts = await Promise.all(batches.map((batch, index) => limit(() => applyBatch(batch, index))));
    summary.aiCategorized = counts.reduce((total, count) => total + count, 0);
    summary.uncategorized = summary.processed - summary.ruleCategorized - summary.aiCategorized;
    summary.status = summary.failedBatches > 0 ? "partial" : "completed";
  } catch (error) {
    // Batches still waiting on the limiter must not write after the run has failed
    limit.clearQueue();
    logError(error, "categorize");
    await store.completeProcessingLog(logId, {
      recordsProcessed: summary.processed,
      recordsInserted: 0,
      recordsUpdated: summary.ruleCategorized + summary.aiCategorized,
      recordsSkipped: 0,
      errorCount: summary.failedBatches + 1,
      status: "failed",
      details: { batchErrors },
    });
    throw error;
  }

  await store.completeProcessingLog(logId, {
    recordsProcessed: summary.processed,
    recordsInserted: 0,
    recordsUpdated: summary.ruleCategorized + summary.aiCategorized,
    recordsSkipped: summary.uncategorized,
    errorCount: summary.failedBatches,
    status: summary.status,
    details: {
      ruleCategorized: summary.ruleCategorized,
      aiCategorized: summary.aiCategorized,
      batches: summary.batches,
      batchErrors,
    },
  });

  return summary;
}
