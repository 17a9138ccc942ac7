import { readdir } from "node:fs/promises";
import { basename, extname, join } from "node:path";
import type { VendorMapping } from "@shared/schema";
import { DryRunStorage } from "../dryRunStorage";
import {
  FileReadError,
  LedgerError,
  MalformedRowError,
  StoreWriteError,
  errorMessage,
  logError,
} from "../errors";
import { log, warn } from "../logger";
import type { ProcessingLogResult, RecordStore } from "../storage";
import { categorizeBatch, compileRules } from "./categorize";
import { locateHeader, parseCsvRecords, readCsvFile, resolveSourceColumn } from "./csv";
import { countDispositions, resolveDuplicates } from "./dedup";
import { fingerprintBatch, groupByDupKey } from "./fingerprint";
import { normalizeRow } from "./normalize";
import type {
  FileImportResult,
  ImportOptions,
  ImportRunSummary,
  NormalizedRow,
} from "./types";

export async function discoverCsvFiles(inputDir: string, recursive = false): Promise<string[]> {
  const entries = await readdir(inputDir, { withFileTypes: true }).catch((error: unknown) => {
    throw new FileReadError(inputDir, `Could not read directory ${inputDir}: ${errorMessage(error)}`);
  });

  const files: string[] = [];
  for (const entry of entries) {
    const path = join(inputDir, entry.name);
    if (entry.isDirectory()) {
      if (recursive) files.push(...(await discoverCsvFiles(path, true)));
    } else if (entry.isFile() && extname(entry.name).toLowerCase() === ".csv") {
      files.push(path);
    }
  }

  return files.sort();
}

function emptyFileResult(file: string): FileImportResult {
  return {
    file,
    status: "imported",
    processed: 0,
    inserted: 0,
    updated: 0,
    skipped: 0,
    errored: 0,
    filtered: 0,
    reviewCandidates: 0,
    uncategorized: 0,
    rowErrors: [],
  };
}

function failFile(result: FileImportResult, error: LedgerError): FileImportResult {
  logError(error, "import");
  return {
    ...result,
    status: "failed",
    error: { code: error.code, message: error.message },
  };
}

/**
 * Runs one file through the whole pipeline and commits it as a single batch.
 * Row-level problems are counted and skipped; a file that cannot be read or
 * written comes back with status "failed" instead of throwing.
 */
export async function importFile(
  store: RecordStore,
  file: string,
  options: ImportOptions,
  rules: VendorMapping[]
): Promise<FileImportResult> {
  const result = emptyFileResult(file);

  let records: string[][];
  try {
    const content = await readCsvFile(file, options.encoding);
    records = parseCsvRecords(content, file);
  } catch (error) {
    if (!(error instanceof FileReadError)) throw error;
    return failFile({ ...result, errored: 1 }, error);
  }

  const located = locateHeader(records, options.profile);
  if (!located) {
    const error = new FileReadError(file, `No recognizable header row in ${file}`);
    return failFile({ ...result, errored: 1 }, error);
  }

  const profile = { ...located.profile, sourceColumn: resolveSourceColumn(located.header, options.sourceFrom) };
  const source = basename(file, extname(file));

  const normalized: NormalizedRow[] = [];
  for (let i = located.headerIndex + 1; i < records.length; i++) {
    const rowNumber = i + 1;
    result.processed++;
    try {
      const transaction = normalizeRow(records[i], profile, source, rowNumber);
      if (options.since && transaction.date < options.since) {
        result.filtered++;
        continue;
      }
      normalized.push({ rowNumber, cells: records[i], transaction });
    } catch (error) {
      if (!(error instanceof MalformedRowError)) throw error;
      result.errored++;
      result.rowErrors.push({ rowNumber, code: error.reason, message: error.message });
      warn(`${basename(file)}: ${error.message}`, "import");
    }
  }

  const fingerprinted = fingerprintBatch(normalized);
  const inBatchCollisions = groupByDupKey(fingerprinted).size;
  if (inBatchCollisions > 0) {
    log(`${basename(file)}: ${inBatchCollisions} date/amount collision(s) within the file`, "import");
  }

  const { rows, groupTags } = await resolveDuplicates(fingerprinted, store);
  const survivors = rows.filter((row) => row.disposition !== "exact_duplicate");

  const { matched, queue } = categorizeBatch(survivors, compileRules(rules));
  for (const { row, match } of matched) {
    row.category = match.category;
    row.vendor = match.vendor;
  }

  const dispositions = countDispositions(rows);
  result.skipped = dispositions.exact_duplicate;

  if (survivors.length === 0 && groupTags.length === 0) {
    return result;
  }

  try {
    const counts = await store.insertBatch({ rows: survivors, groupTags });
    result.inserted = counts.inserted;
    result.updated = counts.updated;
    result.reviewCandidates = dispositions.review_candidate;
    result.uncategorized = queue.length;
  } catch (error) {
    if (!(error instanceof StoreWriteError)) throw error;
    return failFile({ ...result, errored: result.errored + survivors.length }, error);
  }

  return result;
}

function runStatus(files: FileImportResult[]): ProcessingLogResult["status"] {
  const failed = files.filter((file) => file.status === "failed").length;
  if (files.length === 0 || failed === files.length) return "failed";
  return failed > 0 ? "partial" : "completed";
}

export function summarizeRun(logId: string, dryRun: boolean, files: FileImportResult[]): ImportRunSummary {
  const sum = (pick: (file: FileImportResult) => number) => files.reduce((total, file) => total + pick(file), 0);

  return {
    logId,
    status: runStatus(files),
    dryRun,
    filesProcessed: files.length,
    filesFailed: files.filter((file) => file.status === "failed").length,
    processed: sum((file) => file.processed),
    inserted: sum((file) => file.inserted),
    updated: sum((file) => file.updated),
    skipped: sum((file) => file.skipped),
    errored: sum((file) => file.errored),
    reviewCandidates: sum((file) => file.reviewCandidates),
    uncategorized: sum((file) => file.uncategorized),
    files,
  };
}

function toLogResult(
  summary: ImportRunSummary,
  status: ProcessingLogResult["status"],
  extra: Record<string, unknown> = {}
): ProcessingLogResult {
  return {
    recordsProcessed: summary.processed,
    recordsInserted: summary.inserted,
    recordsUpdated: summary.updated,
    recordsSkipped: summary.skipped,
    errorCount: summary.errored,
    status,
    details: {
      dryRun: summary.dryRun,
      filesProcessed: summary.filesProcessed,
      filesFailed: summary.filesFailed,
      reviewCandidates: summary.reviewCandidates,
      uncategorized: summary.uncategorized,
      files: summary.files,
      ...extra,
    },
  };
}

/**
 * Imports every CSV export under `inputDir`. Each file is independent: one
 * that fails to read or commit is reported and the run moves on. With
 * `dryRun`, the same pipeline runs against an in-memory overlay.
 */
export async function runImport(store: RecordStore, options: ImportOptions): Promise<ImportRunSummary> {
  const dryRun = options.dryRun ?? false;
  const target = dryRun ? new DryRunStorage(store) : store;

  const logId = await target.startProcessingLog({
    operationType: "csv_import",
    sourceFile: options.inputDir,
    details: { dryRun, since: options.since ?? null, recursive: options.recursive ?? false },
  });

  const results: FileImportResult[] = [];
  try {
    const files = await discoverCsvFiles(options.inputDir, options.recursive);
    log(`Found ${files.length} CSV file(s) in ${options.inputDir}${dryRun ? " (dry run)" : ""}`, "import");
    if (files.length === 0) {
      warn(`No CSV files found in ${options.inputDir}`, "import");
    }

    const rules = await target.getActiveVendorRules();
    for (const file of files) {
      const result = await importFile(target, file, options, rules);
      results.push(result);
      log(
        `${basename(file)}: ${result.status}, ${result.processed} processed, ${result.inserted} inserted, ` +
          `${result.skipped} skipped, ${result.errored} errored, ${result.reviewCandidates} to review`,
        "import"
      );
    }
  } catch (error) {
    logError(error, "import");
    const partial = summarizeRun(logId, dryRun, results);
    await target.completeProcessingLog(logId, toLogResult(partial, "failed", { error: errorMessage(error) }));
    throw error;
  }

  const summary = summarizeRun(logId, dryRun, results);
  await target.completeProcessingLog(logId, toLogResult(summary, summary.status));
  return summary;
}
