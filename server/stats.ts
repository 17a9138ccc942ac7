import { format, startOfMonth } from "date-fns";
import type { AppConfig } from "./config";
import { log } from "./logger";
import type { RecordStore, TransactionStats } from "./storage";

export interface SpendingSummary extends TransactionStats {
  categorized: number;
  from: string;
  to: string;
}

/** Overall counts plus per-category totals for the month to date. */
export async function getSpendingSummary(store: RecordStore, today: Date = new Date()): Promise<SpendingSummary> {
  const from = format(startOfMonth(today), "yyyy-MM-dd");
  const to = format(today, "yyyy-MM-dd");

  log(`Generating summary statistics for ${from}..${to}`, "stats");
  const stats = await store.getTransactionStats(from, to);
  return { ...stats, categorized: stats.total - stats.uncategorized, from, to };
}

export interface ConnectionReport {
  apiKeyConfigured: boolean;
  model: string;
  total: number;
  uncategorized: number;
}

export async function checkConnection(store: RecordStore, config: AppConfig): Promise<ConnectionReport> {
  await store.ping();
  const today = format(new Date(), "yyyy-MM-dd");
  const stats = await store.getTransactionStats(today, today);
  return {
    apiKeyConfigured: Boolean(config.openai.apiKey),
    model: config.openai.model,
    total: stats.total,
    uncategorized: stats.uncategorized,
  };
}
