import { sql } from "drizzle-orm";
import {
  boolean,
  date,
  index,
  integer,
  jsonb,
  numeric,
  pgEnum,
  pgSequence,
  pgTable,
  serial,
  text,
  timestamp,
  unique,
  varchar,
} from "drizzle-orm/pg-core";
import { createInsertSchema } from "drizzle-zod";
import { z } from "zod";

// Dup group ids (DUP_0001, ...) are drawn from this sequence so they survive restarts and are never reused
export const dupGroupSeq = pgSequence("dup_group_seq", { startWith: 1, increment: 1 });

// Transactions - canonical rows imported from bank/card CSV exports
export const transactions = pgTable("transactions", {
  id: varchar("id").primaryKey().default(sql`gen_random_uuid()`),
  date: date("date", { mode: "string" }).notNull(),
  description: text("description").notNull(),
  amount: numeric("amount", { precision: 12, scale: 2 }).notNull(), // expense negative, income positive
  category: varchar("category", { length: 50 }),
  vendor: varchar("vendor", { length: 200 }),
  source: varchar("source", { length: 100 }),
  txnId: varchar("txn_id", { length: 100 }), // Provider id (Transaction ID / FITID)
  reference: varchar("reference", { length: 100 }), // Check or slip number
  account: varchar("account", { length: 50 }), // Last 4 digits
  balance: numeric("balance", { precision: 12, scale: 2 }),
  timePart: varchar("time_part", { length: 20 }),
  originalHash: varchar("original_hash", { length: 32 }), // Lineage hash over the raw CSV record
  possibleDupGroup: varchar("possible_dup_group", { length: 20 }),
  rowHash: varchar("row_hash", { length: 32 }).notNull().unique(), // date + normalized description + amount
  createdAt: timestamp("created_at").defaultNow(),
  updatedAt: timestamp("updated_at").defaultNow(),
}, (table) => [
  index("idx_transactions_date").on(table.date),
  index("idx_transactions_category").on(table.category),
  index("idx_transactions_date_amount").on(table.date, table.amount),
  index("idx_transactions_txn_id").on(table.txnId, table.account),
  index("idx_transactions_reference").on(table.reference, table.date, table.amount),
  index("idx_transactions_dup_group").on(table.possibleDupGroup),
]);

// Vendor mapping rules - applied before the AI classifier
export const vendorMappings = pgTable("vendor_mappings", {
  id: varchar("id").primaryKey().default(sql`gen_random_uuid()`),
  sequence: serial("sequence").notNull(), // Creation order, breaks priority ties (first created wins)
  pattern: varchar("pattern", { length: 200 }).notNull(),
  category: varchar("category", { length: 50 }).notNull(),
  isRegex: boolean("is_regex").default(false).notNull(),
  priority: integer("priority").default(0).notNull(), // Higher values take precedence
  isActive: boolean("is_active").default(true).notNull(),
  createdAt: timestamp("created_at").defaultNow(),
  updatedAt: timestamp("updated_at").defaultNow(),
}, (table) => [
  index("idx_vendor_mappings_priority").on(table.priority, table.sequence),
]);

export const processingStatusEnum = pgEnum("processing_status", ["pending", "completed", "failed", "partial"]);

// Processing log - one entry per import or categorization run
export const processingLog = pgTable("processing_log", {
  id: varchar("id").primaryKey().default(sql`gen_random_uuid()`),
  operationType: varchar("operation_type", { length: 50 }).notNull(), // csv_import, ai_categorization
  sourceFile: varchar("source_file", { length: 500 }),
  recordsProcessed: integer("records_processed").default(0).notNull(),
  recordsInserted: integer("records_inserted").default(0).notNull(),
  recordsUpdated: integer("records_updated").default(0).notNull(),
  recordsSkipped: integer("records_skipped").default(0).notNull(),
  errorCount: integer("error_count").default(0).notNull(),
  status: processingStatusEnum("status").default("pending").notNull(),
  details: jsonb("details"),
  startedAt: timestamp("started_at").defaultNow(),
  completedAt: timestamp("completed_at"),
}, (table) => [
  index("idx_processing_log_operation").on(table.operationType),
  index("idx_processing_log_started").on(table.startedAt),
]);

export const reviewActionEnum = pgEnum("review_action", ["keep", "merge", "delete", "ignore"]);

// Duplicate review - membership of each possible dup group, kept as an audit trail after review
export const duplicateReview = pgTable("duplicate_review", {
  id: varchar("id").primaryKey().default(sql`gen_random_uuid()`),
  groupId: varchar("group_id", { length: 20 }).notNull(),
  transactionId: varchar("transaction_id").references(() => transactions.id, { onDelete: "set null" }),
  reviewed: boolean("reviewed").default(false).notNull(),
  actionTaken: reviewActionEnum("action_taken"),
  reviewedBy: varchar("reviewed_by", { length: 100 }),
  reviewedAt: timestamp("reviewed_at"),
  notes: text("notes"),
  createdAt: timestamp("created_at").defaultNow(),
}, (table) => [
  index("idx_duplicate_review_group").on(table.groupId),
  index("idx_duplicate_review_reviewed").on(table.reviewed),
  unique("uq_duplicate_review_member").on(table.groupId, table.transactionId),
]);

// Categories - master list the classifier and rules must map into
export const categories = pgTable("categories", {
  id: varchar("id").primaryKey().default(sql`gen_random_uuid()`),
  name: varchar("name", { length: 50 }).notNull().unique(),
  description: text("description"),
  isActive: boolean("is_active").default(true).notNull(),
  sortOrder: integer("sort_order").default(0).notNull(),
  createdAt: timestamp("created_at").defaultNow(),
});

export type Transaction = typeof transactions.$inferSelect;
export type InsertTransaction = typeof transactions.$inferInsert;

export type VendorMapping = typeof vendorMappings.$inferSelect;
export type InsertVendorMapping = typeof vendorMappings.$inferInsert;
export const insertVendorMappingSchema = createInsertSchema(vendorMappings, {
  pattern: z.string().trim().min(1, "Pattern is required").max(200),
  category: z.string().trim().min(1, "Category is required").max(50),
}).omit({ id: true, sequence: true, createdAt: true, updatedAt: true });

export type ProcessingLogEntry = typeof processingLog.$inferSelect;
export type InsertProcessingLogEntry = typeof processingLog.$inferInsert;
export type ProcessingStatus = (typeof processingStatusEnum.enumValues)[number];

export type DuplicateReview = typeof duplicateReview.$inferSelect;
export type InsertDuplicateReview = typeof duplicateReview.$inferInsert;
export type ReviewAction = (typeof reviewActionEnum.enumValues)[number];

export type Category = typeof categories.$inferSelect;
export type InsertCategory = typeof categories.$inferInsert;
export const insertCategorySchema = createInsertSchema(categories).omit({ id: true, createdAt: true });
