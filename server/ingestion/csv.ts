import { readFile } from "node:fs/promises";
import Papa from "papaparse";
import columnCandidates from "../data/column-candidates.json";
import { FileReadError, errorMessage } from "../errors";
import type { CanonicalField, FormatProfile, ProfileOverrides } from "./types";

const HEADER_SEARCH_DEPTH = 10;

const DEFAULT_COLUMN_MAPPINGS: Record<CanonicalField, string[]> = columnCandidates;

const CANONICAL_FIELDS: CanonicalField[] = [
  "date",
  "description",
  "amount",
  "debit",
  "credit",
  "type",
  "txnId",
  "reference",
  "timePart",
  "account",
  "balance",
];

function normalizeHeader(value: string): string {
  return value.trim().toLowerCase();
}

function findColumn(header: string[], candidates: string[]): number | undefined {
  const normalized = header.map(normalizeHeader);
  for (const candidate of candidates) {
    const index = normalized.indexOf(normalizeHeader(candidate));
    if (index !== -1) return index;
  }
  return undefined;
}

/**
 * Reads a CSV export as text. Bank exports are usually UTF-8 but older ones
 * come out as latin1, so a strict UTF-8 decode is tried first.
 */
export async function readCsvFile(path: string, encoding?: BufferEncoding): Promise<string> {
  let bytes: Buffer;
  try {
    bytes = await readFile(path);
  } catch (error) {
    throw new FileReadError(path, `Could not open ${path}: ${errorMessage(error)}`);
  }

  let text: string;
  if (encoding) {
    text = bytes.toString(encoding);
  } else {
    try {
      text = new TextDecoder("utf-8", { fatal: true }).decode(bytes);
    } catch {
      text = bytes.toString("latin1");
    }
  }

  return text.charCodeAt(0) === 0xfeff ? text.slice(1) : text;
}

export function parseCsvRecords(content: string, file: string): string[][] {
  const results = Papa.parse<string[]>(content, {
    header: false,
    skipEmptyLines: "greedy",
  });

  const fatal = results.errors.find((error) => error.type === "Delimiter");
  if (fatal && results.data.length === 0) {
    throw new FileReadError(file, `Could not parse ${file}: ${fatal.message}`);
  }

  const records = results.data.filter((record) => record.some((cell) => cell.trim() !== ""));
  if (records.length === 0) {
    throw new FileReadError(file, `${file} is empty`);
  }

  return records;
}

/**
 * Builds a format profile from a header row. Returns null when the header
 * has no recognizable date column or no way to derive an amount. Without a
 * known description header, the first unclaimed column is used instead.
 */
export function detectProfile(header: string[], overrides: ProfileOverrides = {}): FormatProfile | null {
  const columns: FormatProfile["columns"] = {};

  for (const field of CANONICAL_FIELDS) {
    const forced = overrides.columns?.[field];
    const index = forced !== undefined
      ? findColumn(header, [forced])
      : findColumn(header, DEFAULT_COLUMN_MAPPINGS[field]);
    if (index !== undefined) columns[field] = index;
  }

  if (columns.date === undefined) return null;

  let amountMode: FormatProfile["amountMode"];
  if (columns.amount !== undefined) {
    amountMode = "single";
  } else if (columns.debit !== undefined || columns.credit !== undefined) {
    amountMode = "split";
  } else if (columns.type !== undefined) {
    // Type-signed exports keep the magnitude in any "amount"/"value" column
    const amountIndex = header.findIndex((name, index) => {
      if (index === columns.type) return false;
      const lower = name.toLowerCase();
      return lower.includes("amount") || lower.includes("value");
    });
    if (amountIndex === -1) return null;
    columns.amount = amountIndex;
    amountMode = "typed";
  } else {
    return null;
  }

  if (columns.description === undefined) {
    // No known description header: use the first column nothing else claimed
    const claimed = new Set(Object.values(columns));
    const fallback = header.findIndex((name, index) => name.trim() !== "" && !claimed.has(index));
    if (fallback !== -1) columns.description = fallback;
  }

  return {
    columns,
    amountMode,
    dateFormat: overrides.dateFormat,
    signConvention: overrides.signConvention ?? "expense_negative",
  };
}

/** Finds the header row, skipping account preambles some banks put above it. */
export function locateHeader(
  records: string[][],
  overrides: ProfileOverrides = {}
): { headerIndex: number; header: string[]; profile: FormatProfile } | null {
  const depth = Math.min(HEADER_SEARCH_DEPTH, records.length);
  for (let i = 0; i < depth; i++) {
    const header = records[i].map((cell) => cell.trim());
    const profile = detectProfile(header, overrides);
    if (profile) {
      return { headerIndex: i, header, profile };
    }
  }
  return null;
}

export function resolveSourceColumn(header: string[], sourceFrom?: string): number | undefined {
  if (!sourceFrom || sourceFrom === "filename") return undefined;
  return findColumn(header, [sourceFrom]);
}
