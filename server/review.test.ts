import { beforeEach, describe, expect, it, vi } from "vitest";
import { ReviewError } from "./errors";
import { resolveDuplicates } from "./ingestion/dedup";
import { fingerprintBatch } from "./ingestion/fingerprint";
import type { CanonicalTransaction } from "./ingestion/types";
import { MemStorage } from "./memStorage";
import { getReviewQueue, mergeFields, reviewDuplicateGroup } from "./review";

async function insert(store: MemStorage, transactions: CanonicalTransaction[]) {
  const rows = fingerprintBatch(
    transactions.map((transaction, i) => ({ rowNumber: i + 2, cells: [transaction.description], transaction }))
  );
  const resolved = await resolveDuplicates(rows, store);
  await store.insertBatch({ rows: resolved.rows, groupTags: resolved.groupTags });
}

function idOf(store: MemStorage, description: string): string {
  const txn = store.listTransactions().find((row) => row.description === description);
  if (!txn) throw new Error(`no transaction ${description}`);
  return txn.id;
}

describe("duplicate review", () => {
  let store: MemStorage;

  beforeEach(async () => {
    vi.spyOn(console, "log").mockImplementation(() => {});
    store = new MemStorage();
    await insert(store, [
      { date: "2024-01-05", description: "STARBUCKS #123", amount: -4.5, source: "chase" },
      { date: "2024-01-05", description: "STARBUCKS #456", amount: -4.5, source: "visa", reference: "1001", account: "1234" },
    ]);
  });

  it("lists pending groups with their members", async () => {
    const queue = await getReviewQueue(store);
    expect(queue.map((group) => group.groupId)).toEqual(["DUP_0001"]);
    expect(queue[0].members.map((member) => member.transaction?.description)).toEqual([
      "STARBUCKS #123",
      "STARBUCKS #456",
    ]);
  });

  it("keeps every member and closes the review", async () => {
    const outcome = await reviewDuplicateGroup(store, { groupId: "DUP_0001", action: "keep", reviewedBy: "tester" });
    expect(outcome).toMatchObject({ reviewed: 2, deleted: 0 });
    expect(await getReviewQueue(store)).toEqual([]);
    expect(store.listTransactions()).toHaveLength(2);

    await expect(reviewDuplicateGroup(store, { groupId: "DUP_0001", action: "keep" })).rejects.toBeInstanceOf(
      ReviewError
    );
  });

  it("needs a member to keep before deleting", async () => {
    await expect(reviewDuplicateGroup(store, { groupId: "DUP_0001", action: "delete" })).rejects.toBeInstanceOf(
      ReviewError
    );
    await expect(
      reviewDuplicateGroup(store, { groupId: "DUP_0001", action: "delete", keepTransactionId: "someone-else" })
    ).rejects.toBeInstanceOf(ReviewError);
  });

  it("deletes the other members and keeps the review rows", async () => {
    const keep = idOf(store, "STARBUCKS #123");
    const outcome = await reviewDuplicateGroup(store, {
      groupId: "DUP_0001",
      action: "delete",
      keepTransactionId: keep,
      notes: "same purchase",
    });

    expect(outcome).toMatchObject({ keptTransactionId: keep, reviewed: 2, deleted: 1 });
    expect(store.listTransactions().map((txn) => txn.id)).toEqual([keep]);

    const members = await store.getDuplicateGroup("DUP_0001");
    expect(members).toHaveLength(2);
    expect(members.every((member) => member.review.reviewed && member.review.actionTaken === "delete")).toBe(true);
    expect(members.filter((member) => member.review.transactionId === null)).toHaveLength(1);
  });

  it("merges missing fields onto the kept row", async () => {
    const keep = idOf(store, "STARBUCKS #123");
    await reviewDuplicateGroup(store, { groupId: "DUP_0001", action: "merge", keepTransactionId: keep });

    expect(store.listTransactions()).toHaveLength(1);
    expect(store.getTransaction(keep)).toMatchObject({ reference: "1001", account: "1234", source: "chase" });
  });

  it("reopens a reviewed group when a new member joins it", async () => {
    await reviewDuplicateGroup(store, { groupId: "DUP_0001", action: "keep" });
    await insert(store, [{ date: "2024-01-05", description: "STARBUCKS #789", amount: -4.5, source: "chase" }]);

    const queue = await getReviewQueue(store);
    expect(queue).toHaveLength(1);
    expect(queue[0].members.map((member) => member.transaction?.description)).toEqual(["STARBUCKS #789"]);
  });

  it("rejects malformed group ids", async () => {
    await expect(reviewDuplicateGroup(store, { groupId: "group-1", action: "keep" })).rejects.toBeInstanceOf(
      ReviewError
    );
  });
});

describe("mergeFields", () => {
  it("only fills fields the kept row is missing", () => {
    const base = {
      id: "a",
      date: "2024-01-05",
      description: "X",
      amount: "-1.00",
      category: "Dining",
      vendor: null,
      source: "chase",
      txnId: null,
      reference: null,
      account: "1111",
      balance: null,
      timePart: null,
      originalHash: null,
      possibleDupGroup: "DUP_0001",
      rowHash: "h1",
      createdAt: null,
      updatedAt: null,
    };
    const other = { ...base, id: "b", category: "Shopping", vendor: "Shop", account: "2222", reference: "77", rowHash: "h2" };

    expect(mergeFields(base, [other])).toEqual({ vendor: "Shop", reference: "77" });
  });
});
