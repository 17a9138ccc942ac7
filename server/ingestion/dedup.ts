import type { DedupLookup } from "../storage";
import type { ExistingMatch, FingerprintedTransaction, GroupTag, ResolvedTransaction } from "./types";

export interface DedupResult {
  rows: ResolvedTransaction[];
  groupTags: GroupTag[];
}

interface CollisionEntry {
  existing: ExistingMatch[];
  members: ResolvedTransaction[];
  groupId?: string;
}

/**
 * Classifies each row of a batch as new, exact_duplicate or
 * review_candidate, in order. Exact matches are checked first (provider id,
 * then reference, then row hash); anything left that shares a date and
 * amount with a stored row or an earlier row of the batch goes into a
 * possible-duplicate group, with every member of that group tagged.
 */
export async function resolveDuplicates(
  rows: FingerprintedTransaction[],
  lookup: DedupLookup
): Promise<DedupResult> {
  const resolved: ResolvedTransaction[] = [];
  const groupTags: GroupTag[] = [];
  const taggedIds = new Set<string>();

  const seenTxnIds = new Set<string>();
  const seenReferences = new Set<string>();
  const seenHashes = new Set<string>();
  const collisions = new Map<string, CollisionEntry>();

  for (const row of rows) {
    if (row.txnId && row.account) {
      const key = `${row.account}|${row.txnId}`;
      if (seenTxnIds.has(key) || await lookup.lookupTxnId(row.txnId, row.account)) {
        resolved.push({ ...row, disposition: "exact_duplicate", matchedBy: "txn_id" });
        continue;
      }
      seenTxnIds.add(key);
    }

    if (row.reference) {
      const key = `${row.reference}|${row.dupKey}`;
      if (seenReferences.has(key) || await lookup.lookupReference(row.reference, row.date, row.amount)) {
        resolved.push({ ...row, disposition: "exact_duplicate", matchedBy: "reference" });
        continue;
      }
      seenReferences.add(key);
    }

    if (seenHashes.has(row.rowHash) || await lookup.lookupRowHash(row.rowHash)) {
      resolved.push({ ...row, disposition: "exact_duplicate", matchedBy: "row_hash" });
      continue;
    }
    seenHashes.add(row.rowHash);

    let entry = collisions.get(row.dupKey);
    if (!entry) {
      entry = { existing: await lookup.findDateAmountMatches(row.date, row.amount), members: [] };
      collisions.set(row.dupKey, entry);
    }

    if (entry.existing.length === 0 && entry.members.length === 0) {
      const accepted: ResolvedTransaction = { ...row, disposition: "new" };
      entry.members.push(accepted);
      resolved.push(accepted);
      continue;
    }

    if (!entry.groupId) {
      // Join a group already recorded in the store before opening a new one
      const tagged = entry.existing.find((match) => match.possibleDupGroup);
      entry.groupId = tagged?.possibleDupGroup ?? await lookup.allocateDupGroupId();

      for (const member of entry.members) {
        member.disposition = "review_candidate";
        member.possibleDupGroup = entry.groupId;
      }
      for (const match of entry.existing) {
        if (match.possibleDupGroup || taggedIds.has(match.id)) continue;
        taggedIds.add(match.id);
        groupTags.push({ transactionId: match.id, groupId: entry.groupId });
      }
    }

    const candidate: ResolvedTransaction = {
      ...row,
      disposition: "review_candidate",
      possibleDupGroup: entry.groupId,
    };
    entry.members.push(candidate);
    resolved.push(candidate);
  }

  return { rows: resolved, groupTags };
}

export function countDispositions(rows: ResolvedTransaction[]): Record<ResolvedTransaction["disposition"], number> {
  const counts = { new: 0, exact_duplicate: 0, review_candidate: 0 };
  for (const row of rows) counts[row.disposition]++;
  return counts;
}
