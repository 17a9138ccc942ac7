import { and, asc, count, countDistinct, desc, eq, gte, isNull, lte, or, sql, sum } from "drizzle-orm";
import {
  categories,
  duplicateReview,
  processingLog,
  transactions,
  vendorMappings,
  type Category,
  type DuplicateReview,
  type InsertCategory,
  type InsertDuplicateReview,
  type InsertTransaction,
  type InsertVendorMapping,
  type ProcessingStatus,
  type ReviewAction,
  type Transaction,
  type VendorMapping,
} from "@shared/schema";
import type { Database } from "./db";
import { StoreWriteError, errorMessage } from "./errors";
import { sanitizeDetails } from "./processingLog";
import type { BatchCounts, ExistingMatch, InsertPlan, ResolvedTransaction } from "./ingestion/types";

const INSERT_CHUNK_SIZE = 500;

export interface ProcessingLogStart {
  operationType: string;
  sourceFile?: string;
  details?: Record<string, unknown>;
}

export interface ProcessingLogResult {
  recordsProcessed: number;
  recordsInserted: number;
  recordsUpdated: number;
  recordsSkipped: number;
  errorCount: number;
  status: Exclude<ProcessingStatus, "pending">;
  details?: Record<string, unknown>;
}

export interface DuplicateGroupMember {
  review: DuplicateReview;
  transaction: Transaction | null;
}

export interface ReviewDecisionPlan {
  groupId: string;
  action: ReviewAction;
  reviewedBy?: string;
  notes?: string;
  keepTransactionId?: string;
  mergedFields?: Partial<InsertTransaction>;
  deleteTransactionIds: string[];
}

export interface CategoryTotal {
  category: string | null;
  total: number;
  count: number;
}

export interface TransactionStats {
  total: number;
  uncategorized: number;
  pendingDuplicateGroups: number;
  /** Per-category sums for rows dated within the requested range, largest spend first. */
  categoryTotals: CategoryTotal[];
}

/**
 * Read lookups the dedup resolver needs. Split out so the resolver can run
 * against the real store or the dry-run overlay.
 */
export interface DedupLookup {
  lookupRowHash(hash: string): Promise<boolean>;
  lookupTxnId(txnId: string, account: string): Promise<boolean>;
  lookupReference(reference: string, date: string, amount: number): Promise<boolean>;
  findDateAmountMatches(date: string, amount: number): Promise<ExistingMatch[]>;
  allocateDupGroupId(): Promise<string>;
}

export interface RecordStore extends DedupLookup {
  peekNextDupGroupNumber(): Promise<number>;
  /** All-or-nothing: either every row and group tag commits, or StoreWriteError is thrown and nothing does. */
  insertBatch(plan: InsertPlan): Promise<BatchCounts>;

  // Vendor rules
  getActiveVendorRules(): Promise<VendorMapping[]>;
  createVendorRule(rule: InsertVendorMapping): Promise<VendorMapping>;

  // Categories
  getCategories(): Promise<Category[]>;
  seedCategories(list: InsertCategory[]): Promise<number>;

  // Processing log
  startProcessingLog(entry: ProcessingLogStart): Promise<string>;
  completeProcessingLog(id: string, result: ProcessingLogResult): Promise<void>;

  // Categorization
  getUncategorizedTransactions(limit?: number): Promise<Transaction[]>;
  updateTransactionCategory(id: string, category: string, vendor?: string): Promise<boolean>;

  // Duplicate review
  getPendingDuplicateReviews(): Promise<DuplicateGroupMember[]>;
  getDuplicateGroup(groupId: string): Promise<DuplicateGroupMember[]>;
  applyReviewDecision(plan: ReviewDecisionPlan): Promise<{ reviewed: number; deleted: number }>;

  // Reporting
  getTransactionStats(from: string, to: string): Promise<TransactionStats>;
  ping(): Promise<void>;
}

export function compareCategoryTotals(a: CategoryTotal, b: CategoryTotal): number {
  if (a.total !== b.total) return a.total - b.total;
  if (a.category === b.category) return 0;
  if (a.category === null) return 1;
  if (b.category === null) return -1;
  return a.category.localeCompare(b.category);
}

export function formatDupGroupId(value: number): string {
  return `DUP_${String(value).padStart(4, "0")}`;
}

export function toInsertTransaction(row: ResolvedTransaction): InsertTransaction {
  return {
    date: row.date,
    description: row.description,
    amount: row.amount.toFixed(2),
    category: row.category ?? null,
    vendor: row.vendor ?? null,
    source: row.source || null,
    txnId: row.txnId ?? null,
    reference: row.reference ?? null,
    account: row.account ?? null,
    balance: row.balance !== undefined ? row.balance.toFixed(2) : null,
    timePart: row.timePart ?? null,
    originalHash: row.originalHash,
    possibleDupGroup: row.possibleDupGroup ?? null,
    rowHash: row.rowHash,
  };
}

/** Review rows for every group member in the plan: new rows (by row hash) and tagged existing rows. */
export function collectReviewRows(plan: InsertPlan, idsByHash: Map<string, string>): InsertDuplicateReview[] {
  const reviewRows: InsertDuplicateReview[] = [];
  for (const row of plan.rows) {
    if (!row.possibleDupGroup) continue;
    const id = idsByHash.get(row.rowHash);
    if (id) reviewRows.push({ groupId: row.possibleDupGroup, transactionId: id });
  }
  for (const tag of plan.groupTags) {
    reviewRows.push({ groupId: tag.groupId, transactionId: tag.transactionId });
  }
  return reviewRows;
}

export class DatabaseStorage implements RecordStore {
  constructor(private readonly db: Database) {}

  async lookupRowHash(hash: string): Promise<boolean> {
    const [row] = await this.db
      .select({ id: transactions.id })
      .from(transactions)
      .where(eq(transactions.rowHash, hash))
      .limit(1);
    return row !== undefined;
  }

  async lookupTxnId(txnId: string, account: string): Promise<boolean> {
    const [row] = await this.db
      .select({ id: transactions.id })
      .from(transactions)
      .where(and(eq(transactions.txnId, txnId), eq(transactions.account, account)))
      .limit(1);
    return row !== undefined;
  }

  async lookupReference(reference: string, date: string, amount: number): Promise<boolean> {
    const [row] = await this.db
      .select({ id: transactions.id })
      .from(transactions)
      .where(and(
        eq(transactions.reference, reference),
        eq(transactions.date, date),
        eq(transactions.amount, amount.toFixed(2))
      ))
      .limit(1);
    return row !== undefined;
  }

  async findDateAmountMatches(date: string, amount: number): Promise<ExistingMatch[]> {
    return await this.db
      .select({
        id: transactions.id,
        rowHash: transactions.rowHash,
        possibleDupGroup: transactions.possibleDupGroup,
      })
      .from(transactions)
      .where(and(eq(transactions.date, date), eq(transactions.amount, amount.toFixed(2))))
      .orderBy(asc(transactions.createdAt), asc(transactions.id));
  }

  async allocateDupGroupId(): Promise<string> {
    const result = await this.db.execute<{ value: string }>(sql`select nextval('dup_group_seq') as value`);
    const value = Number(result.rows[0]?.value);
    if (!Number.isInteger(value)) {
      throw new StoreWriteError("dup_group_seq returned no value");
    }
    return formatDupGroupId(value);
  }

  async peekNextDupGroupNumber(): Promise<number> {
    const result = await this.db.execute<{ last_value: string; is_called: boolean }>(
      sql`select last_value, is_called from dup_group_seq`
    );
    const row = result.rows[0];
    if (!row) return 1;
    const last = Number(row.last_value);
    return row.is_called ? last + 1 : last;
  }

  async insertBatch(plan: InsertPlan): Promise<BatchCounts> {
    try {
      return await this.db.transaction(async (tx) => {
        let inserted = 0;
        const idsByHash = new Map<string, string>();
        const values = plan.rows.map(toInsertTransaction);

        for (let i = 0; i < values.length; i += INSERT_CHUNK_SIZE) {
          const rows = await tx
            .insert(transactions)
            .values(values.slice(i, i + INSERT_CHUNK_SIZE))
            .onConflictDoNothing({ target: transactions.rowHash })
            .returning({ id: transactions.id, rowHash: transactions.rowHash });
          inserted += rows.length;
          for (const row of rows) idsByHash.set(row.rowHash, row.id);
        }

        let updated = 0;
        for (const tag of plan.groupTags) {
          const rows = await tx
            .update(transactions)
            .set({ possibleDupGroup: tag.groupId, updatedAt: new Date() })
            .where(and(eq(transactions.id, tag.transactionId), isNull(transactions.possibleDupGroup)))
            .returning({ id: transactions.id });
          updated += rows.length;
        }

        const reviewRows = collectReviewRows(plan, idsByHash);
        if (reviewRows.length > 0) {
          await tx.insert(duplicateReview).values(reviewRows).onConflictDoNothing();
        }

        return { inserted, updated };
      });
    } catch (error) {
      throw new StoreWriteError(`Batch insert failed: ${errorMessage(error)}`, {
        rows: plan.rows.length,
        groupTags: plan.groupTags.length,
      });
    }
  }

  async getActiveVendorRules(): Promise<VendorMapping[]> {
    return await this.db
      .select()
      .from(vendorMappings)
      .where(eq(vendorMappings.isActive, true))
      .orderBy(desc(vendorMappings.priority), asc(vendorMappings.sequence));
  }

  async createVendorRule(rule: InsertVendorMapping): Promise<VendorMapping> {
    const [created] = await this.db.insert(vendorMappings).values(rule).returning();
    return created;
  }

  async getCategories(): Promise<Category[]> {
    return await this.db
      .select()
      .from(categories)
      .where(eq(categories.isActive, true))
      .orderBy(asc(categories.sortOrder), asc(categories.name));
  }

  async seedCategories(list: InsertCategory[]): Promise<number> {
    if (list.length === 0) return 0;
    const rows = await this.db
      .insert(categories)
      .values(list)
      .onConflictDoNothing({ target: categories.name })
      .returning({ id: categories.id });
    return rows.length;
  }

  async startProcessingLog(entry: ProcessingLogStart): Promise<string> {
    const [row] = await this.db
      .insert(processingLog)
      .values({
        operationType: entry.operationType,
        sourceFile: entry.sourceFile ?? null,
        details: sanitizeDetails(entry.details),
        status: "pending",
      })
      .returning({ id: processingLog.id });
    return row.id;
  }

  async completeProcessingLog(id: string, result: ProcessingLogResult): Promise<void> {
    await this.db
      .update(processingLog)
      .set({
        recordsProcessed: result.recordsProcessed,
        recordsInserted: result.recordsInserted,
        recordsUpdated: result.recordsUpdated,
        recordsSkipped: result.recordsSkipped,
        errorCount: result.errorCount,
        status: result.status,
        details: sanitizeDetails(result.details),
        completedAt: new Date(),
      })
      .where(and(eq(processingLog.id, id), eq(processingLog.status, "pending")));
  }

  async getUncategorizedTransactions(limit?: number): Promise<Transaction[]> {
    const query = this.db
      .select()
      .from(transactions)
      .where(or(isNull(transactions.category), eq(transactions.category, "")))
      .orderBy(desc(transactions.date), desc(transactions.id));
    return limit ? await query.limit(limit) : await query;
  }

  async updateTransactionCategory(id: string, category: string, vendor?: string): Promise<boolean> {
    const rows = await this.db
      .update(transactions)
      .set(vendor ? { category, vendor, updatedAt: new Date() } : { category, updatedAt: new Date() })
      .where(eq(transactions.id, id))
      .returning({ id: transactions.id });
    return rows.length > 0;
  }

  async getPendingDuplicateReviews(): Promise<DuplicateGroupMember[]> {
    return await this.db
      .select({ review: duplicateReview, transaction: transactions })
      .from(duplicateReview)
      .leftJoin(transactions, eq(duplicateReview.transactionId, transactions.id))
      .where(eq(duplicateReview.reviewed, false))
      .orderBy(asc(duplicateReview.groupId), asc(transactions.date), asc(duplicateReview.createdAt));
  }

  async getDuplicateGroup(groupId: string): Promise<DuplicateGroupMember[]> {
    return await this.db
      .select({ review: duplicateReview, transaction: transactions })
      .from(duplicateReview)
      .leftJoin(transactions, eq(duplicateReview.transactionId, transactions.id))
      .where(eq(duplicateReview.groupId, groupId))
      .orderBy(asc(transactions.date), asc(duplicateReview.createdAt));
  }

  async applyReviewDecision(plan: ReviewDecisionPlan): Promise<{ reviewed: number; deleted: number }> {
    try {
      return await this.db.transaction(async (tx) => {
        if (plan.keepTransactionId && plan.mergedFields && Object.keys(plan.mergedFields).length > 0) {
          await tx
            .update(transactions)
            .set({ ...plan.mergedFields, updatedAt: new Date() })
            .where(eq(transactions.id, plan.keepTransactionId));
        }

        const reviewed = await tx
          .update(duplicateReview)
          .set({
            reviewed: true,
            actionTaken: plan.action,
            reviewedBy: plan.reviewedBy ?? null,
            reviewedAt: new Date(),
            notes: plan.notes ?? null,
          })
          .where(and(eq(duplicateReview.groupId, plan.groupId), eq(duplicateReview.reviewed, false)))
          .returning({ id: duplicateReview.id });

        let deleted = 0;
        for (const id of plan.deleteTransactionIds) {
          const rows = await tx.delete(transactions).where(eq(transactions.id, id)).returning({ id: transactions.id });
          deleted += rows.length;
        }

        return { reviewed: reviewed.length, deleted };
      });
    } catch (error) {
      throw new StoreWriteError(`Review decision for ${plan.groupId} failed: ${errorMessage(error)}`, {
        groupId: plan.groupId,
      });
    }
  }

  async getTransactionStats(from: string, to: string): Promise<TransactionStats> {
    const [counts] = await this.db
      .select({
        total: count(),
        uncategorized: sql<number>`count(*) filter (where ${transactions.category} is null or ${transactions.category} = '')`.mapWith(Number),
      })
      .from(transactions);

    const [reviews] = await this.db
      .select({ groups: countDistinct(duplicateReview.groupId) })
      .from(duplicateReview)
      .where(eq(duplicateReview.reviewed, false));

    const totals = await this.db
      .select({
        category: transactions.category,
        total: sum(transactions.amount).mapWith(Number),
        count: count(),
      })
      .from(transactions)
      .where(and(gte(transactions.date, from), lte(transactions.date, to)))
      .groupBy(transactions.category);

    return {
      total: counts.total,
      uncategorized: counts.uncategorized,
      pendingDuplicateGroups: reviews.groups,
      categoryTotals: totals
        .map((row) => ({ category: row.category || null, total: Math.round(row.total * 100) / 100, count: row.count }))
        .sort(compareCategoryTotals),
    };
  }

  async ping(): Promise<void> {
    await this.db.execute(sql`select 1`);
  }
}
