import type {
  Category,
  InsertCategory,
  InsertVendorMapping,
  Transaction,
  VendorMapping,
} from "@shared/schema";
import { ReviewError } from "./errors";
import type { BatchCounts, ExistingMatch, InsertPlan } from "./ingestion/types";
import { MemStorage } from "./memStorage";
import {
  formatDupGroupId,
  type DuplicateGroupMember,
  type ProcessingLogResult,
  type ProcessingLogStart,
  type RecordStore,
  type ReviewDecisionPlan,
  type TransactionStats,
} from "./storage";

/**
 * Read-through overlay used by `import --dry-run`. Reads consult the real
 * store and the in-memory overlay; writes only ever reach the overlay, so a
 * dry run reports the same counts a real run would and persists nothing.
 */
export class DryRunStorage implements RecordStore {
  private readonly overlay = new MemStorage();
  private readonly baseGroupTags = new Map<string, string>();
  private readonly baseCategoryEdits = new Map<string, string>();
  private nextDupGroup: number | null = null;

  constructor(private readonly base: RecordStore) {}

  async lookupRowHash(hash: string): Promise<boolean> {
    return (await this.overlay.lookupRowHash(hash)) || (await this.base.lookupRowHash(hash));
  }

  async lookupTxnId(txnId: string, account: string): Promise<boolean> {
    return (await this.overlay.lookupTxnId(txnId, account)) || (await this.base.lookupTxnId(txnId, account));
  }

  async lookupReference(reference: string, date: string, amount: number): Promise<boolean> {
    return (
      (await this.overlay.lookupReference(reference, date, amount)) ||
      (await this.base.lookupReference(reference, date, amount))
    );
  }

  async findDateAmountMatches(date: string, amount: number): Promise<ExistingMatch[]> {
    const stored = (await this.base.findDateAmountMatches(date, amount)).map((match) => ({
      ...match,
      possibleDupGroup: match.possibleDupGroup ?? this.baseGroupTags.get(match.id) ?? null,
    }));
    return [...stored, ...(await this.overlay.findDateAmountMatches(date, amount))];
  }

  async allocateDupGroupId(): Promise<string> {
    const value = this.nextDupGroup ?? (await this.base.peekNextDupGroupNumber());
    this.nextDupGroup = value + 1;
    return formatDupGroupId(value);
  }

  async peekNextDupGroupNumber(): Promise<number> {
    return this.nextDupGroup ?? (await this.base.peekNextDupGroupNumber());
  }

  async insertBatch(plan: InsertPlan): Promise<BatchCounts> {
    const overlayTags = plan.groupTags.filter((tag) => this.overlay.getTransaction(tag.transactionId));
    const baseTags = plan.groupTags.filter((tag) => !this.overlay.getTransaction(tag.transactionId));

    const counts = await this.overlay.insertBatch({ rows: plan.rows, groupTags: overlayTags });

    let updated = counts.updated;
    for (const tag of baseTags) {
      if (this.baseGroupTags.has(tag.transactionId)) continue;
      this.baseGroupTags.set(tag.transactionId, tag.groupId);
      updated++;
    }
    return { inserted: counts.inserted, updated };
  }

  async getActiveVendorRules(): Promise<VendorMapping[]> {
    return [...(await this.base.getActiveVendorRules()), ...(await this.overlay.getActiveVendorRules())];
  }

  async createVendorRule(rule: InsertVendorMapping): Promise<VendorMapping> {
    return await this.overlay.createVendorRule(rule);
  }

  async getCategories(): Promise<Category[]> {
    const stored = await this.base.getCategories();
    const added = (await this.overlay.getCategories()).filter(
      (category) => !stored.some((existing) => existing.name === category.name)
    );
    return [...stored, ...added];
  }

  async seedCategories(list: InsertCategory[]): Promise<number> {
    const stored = new Set((await this.base.getCategories()).map((category) => category.name));
    return await this.overlay.seedCategories(list.filter((category) => !stored.has(category.name)));
  }

  async startProcessingLog(entry: ProcessingLogStart): Promise<string> {
    return await this.overlay.startProcessingLog(entry);
  }

  async completeProcessingLog(id: string, result: ProcessingLogResult): Promise<void> {
    await this.overlay.completeProcessingLog(id, result);
  }

  async getUncategorizedTransactions(limit?: number): Promise<Transaction[]> {
    const stored = (await this.base.getUncategorizedTransactions()).filter(
      (txn) => !this.baseCategoryEdits.has(txn.id)
    );
    const rows = [...(await this.overlay.getUncategorizedTransactions()), ...stored];
    return limit ? rows.slice(0, limit) : rows;
  }

  async updateTransactionCategory(id: string, category: string, vendor?: string): Promise<boolean> {
    if (this.overlay.getTransaction(id)) {
      return await this.overlay.updateTransactionCategory(id, category, vendor);
    }
    this.baseCategoryEdits.set(id, category);
    return true;
  }

  async getPendingDuplicateReviews(): Promise<DuplicateGroupMember[]> {
    return [...(await this.base.getPendingDuplicateReviews()), ...(await this.overlay.getPendingDuplicateReviews())];
  }

  async getDuplicateGroup(groupId: string): Promise<DuplicateGroupMember[]> {
    return [...(await this.base.getDuplicateGroup(groupId)), ...(await this.overlay.getDuplicateGroup(groupId))];
  }

  /** Stored rows only; what the dry run would have written is not counted. */
  async getTransactionStats(from: string, to: string): Promise<TransactionStats> {
    return await this.base.getTransactionStats(from, to);
  }

  async ping(): Promise<void> {
    await this.base.ping();
  }

  async applyReviewDecision(plan: ReviewDecisionPlan): Promise<{ reviewed: number; deleted: number }> {
    throw new ReviewError(`Duplicate group ${plan.groupId} cannot be reviewed during a dry run`, {
      groupId: plan.groupId,
    });
  }
}
