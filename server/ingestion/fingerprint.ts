import { createHash } from "node:crypto";
import type { CanonicalTransaction, FingerprintedTransaction, NormalizedRow } from "./types";

/**
 * Lower-cases, strips punctuation and collapses whitespace so that the same
 * merchant line formatted slightly differently hashes the same.
 */
export function normalizeDescription(description: string): string {
  return description
    .toLowerCase()
    .replace(/[^\p{L}\p{N}\s]/gu, " ")
    .replace(/\s+/g, " ")
    .trim();
}

/** Exact-match dedup key. Only date, normalized description and amount feed it. */
export function computeRowHash(txn: Pick<CanonicalTransaction, "date" | "description" | "amount">): string {
  const payload = `${txn.date}|${normalizeDescription(txn.description)}|${txn.amount.toFixed(2)}`;
  return createHash("md5").update(payload, "utf8").digest("hex");
}

/** Lineage hash over every raw cell of the record, in file order. */
export function computeOriginalHash(cells: string[]): string {
  return createHash("sha256").update(JSON.stringify(cells), "utf8").digest("hex").slice(0, 32);
}

/** Near-duplicate key: same day, same amount, any description. */
export function dupKey(txn: Pick<CanonicalTransaction, "date" | "amount">): string {
  return `${txn.date}|${txn.amount.toFixed(2)}`;
}

export function fingerprintBatch(rows: NormalizedRow[]): FingerprintedTransaction[] {
  return rows.map(({ rowNumber, cells, transaction }) => ({
    ...transaction,
    rowNumber,
    rowHash: computeRowHash(transaction),
    originalHash: computeOriginalHash(cells),
    dupKey: dupKey(transaction),
  }));
}

/** In-batch (date, amount) collisions with two or more members, keyed by dup key. */
export function groupByDupKey<T extends { dupKey: string }>(rows: T[]): Map<string, T[]> {
  const groups = new Map<string, T[]>();
  for (const row of rows) {
    const members = groups.get(row.dupKey);
    if (members) {
      members.push(row);
    } else {
      groups.set(row.dupKey, [row]);
    }
  }

  for (const [key, members] of Array.from(groups.entries())) {
    if (members.length < 2) groups.delete(key);
  }
  return groups;
}
