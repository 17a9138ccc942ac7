import { z } from "zod";
import { reviewActionEnum, type InsertTransaction, type ReviewAction, type Transaction } from "@shared/schema";
import { ReviewError } from "./errors";
import { log } from "./logger";
import type { DuplicateGroupMember, RecordStore } from "./storage";

// Optional fields a merge copies onto the kept row when it has none
const MERGE_FIELDS = ["txnId", "reference", "account", "balance", "timePart", "category", "vendor"] as const;

export const reviewDecisionSchema = z.object({
  groupId: z.string().trim().regex(/^DUP_\d{4,}$/, "Group ids look like DUP_0001"),
  action: z.enum(reviewActionEnum.enumValues),
  keepTransactionId: z.string().trim().min(1).optional(),
  reviewedBy: z.string().trim().max(100).optional(),
  notes: z.string().optional(),
});

export type ReviewDecision = z.infer<typeof reviewDecisionSchema>;

export interface DuplicateGroupView {
  groupId: string;
  members: DuplicateGroupMember[];
}

export interface ReviewOutcome {
  groupId: string;
  action: ReviewAction;
  keptTransactionId?: string;
  reviewed: number;
  deleted: number;
}

/** Pending review rows grouped by dup group, in group id order. */
export async function getReviewQueue(store: RecordStore): Promise<DuplicateGroupView[]> {
  const groups = new Map<string, DuplicateGroupMember[]>();
  for (const member of await store.getPendingDuplicateReviews()) {
    const members = groups.get(member.review.groupId) ?? [];
    members.push(member);
    groups.set(member.review.groupId, members);
  }
  return Array.from(groups, ([groupId, members]) => ({ groupId, members }));
}

export function mergeFields(kept: Transaction, others: Transaction[]): Partial<InsertTransaction> {
  const merged: Partial<InsertTransaction> = {};
  for (const field of MERGE_FIELDS) {
    if (kept[field]) continue;
    const donor = others.find((txn) => txn[field]);
    if (donor) merged[field] = donor[field];
  }
  return merged;
}

/**
 * Applies a reviewer's decision to every pending member of a dup group.
 * `keep` and `ignore` only close the review; `delete` and `merge` keep one
 * transaction and remove the rest of the group.
 */
export async function reviewDuplicateGroup(store: RecordStore, input: ReviewDecision): Promise<ReviewOutcome> {
  const parsed = reviewDecisionSchema.safeParse(input);
  if (!parsed.success) {
    throw new ReviewError(parsed.error.issues.map((issue) => issue.message).join("; "), {
      groupId: input.groupId,
    });
  }
  const decision = parsed.data;

  const members = await store.getDuplicateGroup(decision.groupId);
  if (!members.some((member) => !member.review.reviewed)) {
    throw new ReviewError(`No pending review for group ${decision.groupId}`, { groupId: decision.groupId });
  }

  const live = new Map<string, Transaction>();
  for (const member of members) {
    if (member.transaction) live.set(member.transaction.id, member.transaction);
  }

  let keptTransactionId: string | undefined;
  let deleteTransactionIds: string[] = [];
  let mergedFields: Partial<InsertTransaction> | undefined;

  if (decision.action === "delete" || decision.action === "merge") {
    const kept = decision.keepTransactionId ? live.get(decision.keepTransactionId) : undefined;
    if (!kept) {
      throw new ReviewError(
        decision.keepTransactionId
          ? `Transaction ${decision.keepTransactionId} is not a member of ${decision.groupId}`
          : `Action "${decision.action}" needs the id of the transaction to keep`,
        { groupId: decision.groupId }
      );
    }

    const others = Array.from(live.values()).filter((txn) => txn.id !== kept.id);
    keptTransactionId = kept.id;
    deleteTransactionIds = others.map((txn) => txn.id);
    if (decision.action === "merge") {
      mergedFields = mergeFields(kept, others);
    }
  }

  const result = await store.applyReviewDecision({
    groupId: decision.groupId,
    action: decision.action,
    reviewedBy: decision.reviewedBy,
    notes: decision.notes,
    keepTransactionId: keptTransactionId,
    mergedFields,
    deleteTransactionIds,
  });

  log(
    `${decision.groupId}: ${decision.action} (${result.reviewed} reviewed, ${result.deleted} deleted)`,
    "review"
  );

  return { groupId: decision.groupId, action: decision.action, keptTransactionId, ...result };
}
