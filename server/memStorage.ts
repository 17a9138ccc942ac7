import { randomUUID } from "node:crypto";
import type {
  Category,
  DuplicateReview,
  InsertCategory,
  InsertVendorMapping,
  ProcessingLogEntry,
  Transaction,
  VendorMapping,
} from "@shared/schema";
import type { BatchCounts, ExistingMatch, InsertPlan } from "./ingestion/types";
import { sanitizeDetails } from "./processingLog";
import {
  collectReviewRows,
  compareCategoryTotals,
  formatDupGroupId,
  toInsertTransaction,
  type DuplicateGroupMember,
  type ProcessingLogResult,
  type ProcessingLogStart,
  type RecordStore,
  type ReviewDecisionPlan,
  type TransactionStats,
} from "./storage";

function byDateThenCreated(a: DuplicateGroupMember, b: DuplicateGroupMember): number {
  const dateA = a.transaction?.date ?? "";
  const dateB = b.transaction?.date ?? "";
  if (dateA !== dateB) return dateA < dateB ? -1 : 1;
  return (a.review.createdAt?.getTime() ?? 0) - (b.review.createdAt?.getTime() ?? 0);
}

/**
 * RecordStore kept entirely in process memory. Backs the dry-run overlay and
 * the tests; a batch either applies completely or not at all.
 */
export class MemStorage implements RecordStore {
  private transactions: Transaction[] = [];
  private vendorRules: VendorMapping[] = [];
  private categoryList: Category[] = [];
  private logs: ProcessingLogEntry[] = [];
  private reviews: DuplicateReview[] = [];
  private lastDupGroup = 0;
  private ruleSequence = 0;

  async lookupRowHash(hash: string): Promise<boolean> {
    return this.transactions.some((txn) => txn.rowHash === hash);
  }

  async lookupTxnId(txnId: string, account: string): Promise<boolean> {
    return this.transactions.some((txn) => txn.txnId === txnId && txn.account === account);
  }

  async lookupReference(reference: string, date: string, amount: number): Promise<boolean> {
    return this.transactions.some(
      (txn) => txn.reference === reference && txn.date === date && Number(txn.amount) === amount
    );
  }

  async findDateAmountMatches(date: string, amount: number): Promise<ExistingMatch[]> {
    return this.transactions
      .filter((txn) => txn.date === date && Number(txn.amount) === amount)
      .map((txn) => ({ id: txn.id, rowHash: txn.rowHash, possibleDupGroup: txn.possibleDupGroup }));
  }

  async allocateDupGroupId(): Promise<string> {
    this.lastDupGroup += 1;
    return formatDupGroupId(this.lastDupGroup);
  }

  async peekNextDupGroupNumber(): Promise<number> {
    return this.lastDupGroup + 1;
  }

  async insertBatch(plan: InsertPlan): Promise<BatchCounts> {
    const now = new Date();
    const next = [...this.transactions];
    const idsByHash = new Map<string, string>();
    const hashes = new Set(next.map((txn) => txn.rowHash));

    for (const row of plan.rows) {
      if (hashes.has(row.rowHash)) continue;
      hashes.add(row.rowHash);
      const values = toInsertTransaction(row);
      const id = randomUUID();
      next.push({
        id,
        date: values.date,
        description: values.description,
        amount: values.amount,
        category: values.category ?? null,
        vendor: values.vendor ?? null,
        source: values.source ?? null,
        txnId: values.txnId ?? null,
        reference: values.reference ?? null,
        account: values.account ?? null,
        balance: values.balance ?? null,
        timePart: values.timePart ?? null,
        originalHash: values.originalHash ?? null,
        possibleDupGroup: values.possibleDupGroup ?? null,
        rowHash: values.rowHash,
        createdAt: now,
        updatedAt: now,
      });
      idsByHash.set(row.rowHash, id);
    }

    let updated = 0;
    const tagged = next.map((txn) => {
      const tag = plan.groupTags.find((t) => t.transactionId === txn.id);
      if (!tag || txn.possibleDupGroup) return txn;
      updated++;
      return { ...txn, possibleDupGroup: tag.groupId, updatedAt: now };
    });

    const reviews = [...this.reviews];
    for (const review of collectReviewRows(plan, idsByHash)) {
      const exists = reviews.some((r) => r.groupId === review.groupId && r.transactionId === review.transactionId);
      if (exists) continue;
      reviews.push({
        id: randomUUID(),
        groupId: review.groupId,
        transactionId: review.transactionId ?? null,
        reviewed: false,
        actionTaken: null,
        reviewedBy: null,
        reviewedAt: null,
        notes: null,
        createdAt: now,
      });
    }

    this.transactions = tagged;
    this.reviews = reviews;
    return { inserted: idsByHash.size, updated };
  }

  async getActiveVendorRules(): Promise<VendorMapping[]> {
    return this.vendorRules
      .filter((rule) => rule.isActive)
      .sort((a, b) => b.priority - a.priority || a.sequence - b.sequence);
  }

  async createVendorRule(rule: InsertVendorMapping): Promise<VendorMapping> {
    const now = new Date();
    this.ruleSequence += 1;
    const created: VendorMapping = {
      id: randomUUID(),
      sequence: rule.sequence ?? this.ruleSequence,
      pattern: rule.pattern,
      category: rule.category,
      isRegex: rule.isRegex ?? false,
      priority: rule.priority ?? 0,
      isActive: rule.isActive ?? true,
      createdAt: now,
      updatedAt: now,
    };
    this.vendorRules.push(created);
    return created;
  }

  async getCategories(): Promise<Category[]> {
    return this.categoryList
      .filter((category) => category.isActive)
      .sort((a, b) => a.sortOrder - b.sortOrder || a.name.localeCompare(b.name));
  }

  async seedCategories(list: InsertCategory[]): Promise<number> {
    let created = 0;
    for (const category of list) {
      if (this.categoryList.some((existing) => existing.name === category.name)) continue;
      this.categoryList.push({
        id: randomUUID(),
        name: category.name,
        description: category.description ?? null,
        isActive: category.isActive ?? true,
        sortOrder: category.sortOrder ?? 0,
        createdAt: new Date(),
      });
      created++;
    }
    return created;
  }

  async startProcessingLog(entry: ProcessingLogStart): Promise<string> {
    const id = randomUUID();
    this.logs.push({
      id,
      operationType: entry.operationType,
      sourceFile: entry.sourceFile ?? null,
      recordsProcessed: 0,
      recordsInserted: 0,
      recordsUpdated: 0,
      recordsSkipped: 0,
      errorCount: 0,
      status: "pending",
      details: sanitizeDetails(entry.details),
      startedAt: new Date(),
      completedAt: null,
    });
    return id;
  }

  async completeProcessingLog(id: string, result: ProcessingLogResult): Promise<void> {
    this.logs = this.logs.map((entry) => {
      if (entry.id !== id || entry.status !== "pending") return entry;
      return {
        ...entry,
        recordsProcessed: result.recordsProcessed,
        recordsInserted: result.recordsInserted,
        recordsUpdated: result.recordsUpdated,
        recordsSkipped: result.recordsSkipped,
        errorCount: result.errorCount,
        status: result.status,
        details: sanitizeDetails(result.details),
        completedAt: new Date(),
      };
    });
  }

  async getUncategorizedTransactions(limit?: number): Promise<Transaction[]> {
    const rows = this.transactions
      .filter((txn) => !txn.category)
      .sort((a, b) => (a.date === b.date ? b.id.localeCompare(a.id) : a.date < b.date ? 1 : -1));
    return limit ? rows.slice(0, limit) : rows;
  }

  async updateTransactionCategory(id: string, category: string, vendor?: string): Promise<boolean> {
    const txn = this.transactions.find((row) => row.id === id);
    if (!txn) return false;
    txn.category = category;
    if (vendor) txn.vendor = vendor;
    txn.updatedAt = new Date();
    return true;
  }

  async getPendingDuplicateReviews(): Promise<DuplicateGroupMember[]> {
    return this.reviews
      .filter((review) => !review.reviewed)
      .map((review) => this.toMember(review))
      .sort((a, b) => a.review.groupId.localeCompare(b.review.groupId) || byDateThenCreated(a, b));
  }

  async getDuplicateGroup(groupId: string): Promise<DuplicateGroupMember[]> {
    return this.reviews
      .filter((review) => review.groupId === groupId)
      .map((review) => this.toMember(review))
      .sort(byDateThenCreated);
  }

  async applyReviewDecision(plan: ReviewDecisionPlan): Promise<{ reviewed: number; deleted: number }> {
    const now = new Date();

    if (plan.keepTransactionId && plan.mergedFields) {
      const kept = this.transactions.find((txn) => txn.id === plan.keepTransactionId);
      if (kept) Object.assign(kept, plan.mergedFields, { updatedAt: now });
    }

    let reviewed = 0;
    this.reviews = this.reviews.map((review) => {
      if (review.groupId !== plan.groupId || review.reviewed) return review;
      reviewed++;
      return {
        ...review,
        reviewed: true,
        actionTaken: plan.action,
        reviewedBy: plan.reviewedBy ?? null,
        reviewedAt: now,
        notes: plan.notes ?? null,
      };
    });

    const doomed = new Set(plan.deleteTransactionIds);
    const before = this.transactions.length;
    this.transactions = this.transactions.filter((txn) => !doomed.has(txn.id));
    this.reviews = this.reviews.map((review) =>
      review.transactionId && doomed.has(review.transactionId) ? { ...review, transactionId: null } : review
    );

    return { reviewed, deleted: before - this.transactions.length };
  }

  async getTransactionStats(from: string, to: string): Promise<TransactionStats> {
    const buckets = new Map<string | null, { cents: number; count: number }>();
    for (const txn of this.transactions) {
      if (txn.date < from || txn.date > to) continue;
      const key = txn.category || null;
      const bucket = buckets.get(key) ?? { cents: 0, count: 0 };
      bucket.cents += Math.round(Number(txn.amount) * 100);
      bucket.count++;
      buckets.set(key, bucket);
    }

    const pendingGroups = new Set(this.reviews.filter((review) => !review.reviewed).map((review) => review.groupId));
    return {
      total: this.transactions.length,
      uncategorized: this.transactions.filter((txn) => !txn.category).length,
      pendingDuplicateGroups: pendingGroups.size,
      categoryTotals: Array.from(buckets, ([category, bucket]) => ({
        category,
        total: bucket.cents / 100,
        count: bucket.count,
      })).sort(compareCategoryTotals),
    };
  }

  async ping(): Promise<void> {}

  getTransaction(id: string): Transaction | undefined {
    return this.transactions.find((txn) => txn.id === id);
  }

  listTransactions(): Transaction[] {
    return [...this.transactions];
  }

  listProcessingLogs(): ProcessingLogEntry[] {
    return [...this.logs];
  }

  private toMember(review: DuplicateReview): DuplicateGroupMember {
    const transaction = review.transactionId ? this.getTransaction(review.transactionId) ?? null : null;
    return { review, transaction };
  }
}
