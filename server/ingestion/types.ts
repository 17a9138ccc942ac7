import type { ProcessingStatus } from "@shared/schema";

/** Normalized record shape shared by every bank format. Dates are `yyyy-MM-dd`. */
export interface CanonicalTransaction {
  date: string;
  description: string;
  amount: number; // expense negative, income positive, cents precision
  source: string;
  txnId?: string;
  reference?: string;
  account?: string;
  balance?: number;
  timePart?: string;
}

export type CanonicalField =
  | "date"
  | "description"
  | "amount"
  | "debit"
  | "credit"
  | "type"
  | "txnId"
  | "reference"
  | "timePart"
  | "account"
  | "balance";

export type AmountMode = "single" | "split" | "typed";

export type SignConvention = "expense_negative" | "expense_positive";

/** Per-file mapping from canonical fields to column positions. */
export interface FormatProfile {
  columns: Partial<Record<CanonicalField, number>>;
  amountMode: AmountMode;
  dateFormat?: string;
  signConvention: SignConvention;
  sourceColumn?: number;
}

/** Column names (rather than positions) a caller can force for a file. */
export interface ProfileOverrides {
  columns?: Partial<Record<CanonicalField, string>>;
  dateFormat?: string;
  signConvention?: SignConvention;
}

export interface NormalizedRow {
  rowNumber: number; // 1-based line in the file, header included
  cells: string[];
  transaction: CanonicalTransaction;
}

export interface FingerprintedTransaction extends CanonicalTransaction {
  rowNumber: number;
  rowHash: string;
  originalHash: string;
  dupKey: string;
}

export type Disposition = "new" | "exact_duplicate" | "review_candidate";

export type DuplicateMatch = "txn_id" | "reference" | "row_hash";

export interface ResolvedTransaction extends FingerprintedTransaction {
  disposition: Disposition;
  matchedBy?: DuplicateMatch;
  possibleDupGroup?: string;
  category?: string;
  vendor?: string;
}

/** An already-stored row that shares (date, amount) with an incoming one. */
export interface ExistingMatch {
  id: string;
  rowHash: string;
  possibleDupGroup: string | null;
}

/** Tags an existing stored row with a dup group in the same commit as the batch. */
export interface GroupTag {
  transactionId: string;
  groupId: string;
}

export interface InsertPlan {
  rows: ResolvedTransaction[];
  groupTags: GroupTag[];
}

export interface BatchCounts {
  inserted: number;
  updated: number;
}

export interface RowErrorInfo {
  rowNumber: number;
  code: string;
  message: string;
}

export type FileStatus = "imported" | "failed";

export interface FileImportResult {
  file: string;
  status: FileStatus;
  processed: number;
  inserted: number;
  updated: number;
  skipped: number;
  errored: number;
  filtered: number;
  reviewCandidates: number;
  uncategorized: number;
  rowErrors: RowErrorInfo[];
  error?: { code: string; message: string };
}

export interface ImportOptions {
  inputDir: string;
  recursive?: boolean;
  since?: string;
  dryRun?: boolean;
  sourceFrom?: string; // "filename" or a column name
  encoding?: BufferEncoding;
  profile?: ProfileOverrides;
}

export interface ImportRunSummary {
  logId: string;
  status: Exclude<ProcessingStatus, "pending">;
  dryRun: boolean;
  filesProcessed: number;
  filesFailed: number;
  processed: number;
  inserted: number;
  updated: number;
  skipped: number;
  errored: number;
  reviewCandidates: number;
  uncategorized: number;
  files: FileImportResult[];
}
