import { format, isValid, parse, parseISO } from "date-fns";
import { MalformedRowError } from "../errors";
import type { CanonicalField, CanonicalTransaction, FormatProfile } from "./types";

// Two-digit tokens accept one or two digits, so "1/5/2024" parses too
const DATE_FORMATS = [
  "MM/dd/yyyy",
  "MM/dd/yy",
  "yyyy/MM/dd",
  "dd-MMM-yyyy",
  "MMM dd, yyyy",
  "dd MMM yyyy",
];

const ISO_DATE = /^\d{4}-\d{2}-\d{2}(?:[T ].*)?$/;

// Probe order for shifted rows: missing leading column first, then an extra one
const SHIFT_PROBES = [-1, 1];

const DEBIT_TYPES = ["dr", "withdrawal", "charge"];

const REFERENCE_DATE = new Date(2000, 0, 1);

export function roundCents(value: number): number {
  const rounded = Math.sign(value) * Math.round(Math.abs(value) * 100) / 100;
  return rounded === 0 ? 0 : rounded;
}

/**
 * Parses bank amount notation: `$1,234.56`, `-4.50`, `(4.50)` and `4.50-`.
 * Returns null for anything that is not a number.
 */
export function parseAmount(raw: string | undefined): number | null {
  if (raw === undefined) return null;
  let value = raw.trim();
  if (!value) return null;

  let negative = false;
  if (value.startsWith("(") && value.endsWith(")")) {
    negative = true;
    value = value.slice(1, -1);
  }
  if (value.endsWith("-")) {
    negative = true;
    value = value.slice(0, -1);
  }

  value = value.replace(/[$,\s]/g, "");
  if (!/^[+-]?(\d+(\.\d*)?|\.\d+)$/.test(value)) return null;

  const amount = Number(value);
  if (!Number.isFinite(amount)) return null;
  return roundCents(negative ? -Math.abs(amount) : amount);
}

function inRange(date: Date): boolean {
  const year = date.getFullYear();
  return year >= 1900 && year <= 2100;
}

function tryParseDate(value: string, dateFormat?: string): Date | null {
  if (dateFormat) {
    const parsed = parse(value, dateFormat, REFERENCE_DATE);
    return isValid(parsed) && inRange(parsed) ? parsed : null;
  }

  if (ISO_DATE.test(value)) {
    const parsed = parseISO(value);
    if (isValid(parsed) && inRange(parsed)) return parsed;
  }

  for (const candidate of DATE_FORMATS) {
    const parsed = parse(value, candidate, REFERENCE_DATE);
    if (isValid(parsed) && inRange(parsed)) return parsed;
  }
  return null;
}

/** Parses a cell to `yyyy-MM-dd`, or null when it is not a date. */
export function parseDate(raw: string | undefined, dateFormat?: string): string | null {
  if (raw === undefined) return null;
  const value = raw.trim();
  if (!value) return null;

  let parsed = tryParseDate(value, dateFormat);
  if (!parsed && !dateFormat && /\s/.test(value)) {
    // "01/05/2024 10:32 AM" and similar date-time cells
    parsed = tryParseDate(value.split(/\s+/)[0]);
  }
  return parsed ? format(parsed, "yyyy-MM-dd") : null;
}

export function normalizeAccount(value: string): string {
  const trimmed = value.trim();
  const last4 = trimmed.replace(/\D/g, "").slice(-4);
  return last4 || trimmed.slice(0, 12);
}

/**
 * Works out how far a row is shifted relative to its header. Some exports
 * drop or add a leading column on individual rows, so when the date column
 * does not hold a date the neighbouring columns are probed.
 */
export function detectShift(cells: string[], profile: FormatProfile): number | null {
  const dateIndex = profile.columns.date;
  if (dateIndex === undefined) return null;

  if (parseDate(cells[dateIndex], profile.dateFormat)) return 0;

  for (const shift of SHIFT_PROBES) {
    const index = dateIndex + shift;
    if (index < 0 || index >= cells.length) continue;
    if (parseDate(cells[index], profile.dateFormat)) return shift;
  }
  return null;
}

function cellAt(cells: string[], index: number | undefined, shift: number): string | undefined {
  if (index === undefined) return undefined;
  const cell = cells[index + shift];
  if (cell === undefined) return undefined;
  const trimmed = cell.trim();
  return trimmed === "" ? undefined : trimmed;
}

// Rows whose description cell is blank still need distinct text to hash apart
function unclaimedText(cells: string[], profile: FormatProfile, shift: number): string {
  const claimed = new Set<number>();
  for (const index of Object.values(profile.columns)) {
    if (index !== undefined) claimed.add(index + shift);
  }
  if (profile.sourceColumn !== undefined) claimed.add(profile.sourceColumn + shift);
  return cells
    .filter((cell, index) => !claimed.has(index) && cell.trim() !== "")
    .map((cell) => cell.trim())
    .join(" ");
}

function resolveAmount(
  read: (field: CanonicalField) => string | undefined,
  profile: FormatProfile,
  rowNumber: number
): number {
  if (profile.amountMode === "split") {
    const debitCell = read("debit");
    const creditCell = read("credit");
    if (debitCell === undefined && creditCell === undefined) {
      throw new MalformedRowError("missing_amount", `Row ${rowNumber}: no debit or credit value`, { rowNumber });
    }
    const debit = debitCell === undefined ? 0 : parseAmount(debitCell);
    const credit = creditCell === undefined ? 0 : parseAmount(creditCell);
    if (debit === null || credit === null) {
      throw new MalformedRowError(
        "unparsable_amount",
        `Row ${rowNumber}: cannot parse debit "${debitCell ?? ""}" / credit "${creditCell ?? ""}"`,
        { rowNumber }
      );
    }
    return roundCents(Math.abs(credit) - Math.abs(debit));
  }

  const amountCell = read("amount");
  if (amountCell === undefined) {
    throw new MalformedRowError("missing_amount", `Row ${rowNumber}: amount is empty`, { rowNumber });
  }
  const amount = parseAmount(amountCell);
  if (amount === null) {
    throw new MalformedRowError("unparsable_amount", `Row ${rowNumber}: cannot parse amount "${amountCell}"`, {
      rowNumber,
    });
  }

  if (profile.amountMode === "typed") {
    const type = (read("type") ?? "").toLowerCase();
    const isDebit = type.includes("debit") || DEBIT_TYPES.includes(type);
    return isDebit ? -Math.abs(amount) : Math.abs(amount);
  }
  return amount;
}

/**
 * Turns one raw CSV record into exactly one canonical transaction, or throws
 * MalformedRowError. `rowNumber` only feeds error messages.
 */
export function normalizeRow(
  cells: string[],
  profile: FormatProfile,
  source: string,
  rowNumber = 0
): CanonicalTransaction {
  const shift = detectShift(cells, profile);
  if (shift === null) {
    const rawDate = cellAt(cells, profile.columns.date, 0);
    if (rawDate === undefined) {
      throw new MalformedRowError("missing_date", `Row ${rowNumber}: date is empty`, { rowNumber });
    }
    throw new MalformedRowError("unparsable_date", `Row ${rowNumber}: cannot parse date "${rawDate}"`, {
      rowNumber,
    });
  }

  const read = (field: CanonicalField) => cellAt(cells, profile.columns[field], shift);
  const date = parseDate(read("date"), profile.dateFormat);
  if (!date) {
    throw new MalformedRowError("unparsable_date", `Row ${rowNumber}: cannot parse date`, { rowNumber });
  }

  let amount = resolveAmount(read, profile, rowNumber);
  if (profile.signConvention === "expense_positive") {
    amount = roundCents(-amount);
  }

  const txn: CanonicalTransaction = {
    date,
    description: read("description") ?? unclaimedText(cells, profile, shift),
    amount,
    source: (profile.sourceColumn !== undefined ? cellAt(cells, profile.sourceColumn, shift) : undefined) ?? source,
  };

  const txnId = read("txnId");
  if (txnId) txn.txnId = txnId;
  const reference = read("reference");
  if (reference) txn.reference = reference;
  const account = read("account");
  if (account) txn.account = normalizeAccount(account);
  const balance = parseAmount(read("balance"));
  if (balance !== null) txn.balance = balance;
  const timePart = read("timePart");
  if (timePart) txn.timePart = timePart;

  return txn;
}
