import { beforeEach, describe, expect, it, vi } from "vitest";
import { MemStorage } from "../memStorage";
import { reviewDuplicateGroup } from "../review";
import { resolveDuplicates } from "./dedup";
import { fingerprintBatch } from "./fingerprint";
import type { CanonicalTransaction, FingerprintedTransaction } from "./types";

function row(
  description: string,
  extra: Partial<CanonicalTransaction> = {},
  date = "2024-01-05",
  amount = -4.5
): FingerprintedTransaction {
  const transaction: CanonicalTransaction = { date, description, amount, source: "test", ...extra };
  return fingerprintBatch([{ rowNumber: 2, cells: [date, description, amount.toFixed(2)], transaction }])[0];
}

async function commit(store: MemStorage, rows: FingerprintedTransaction[]) {
  const result = await resolveDuplicates(rows, store);
  const counts = await store.insertBatch({
    rows: result.rows.filter((r) => r.disposition !== "exact_duplicate"),
    groupTags: result.groupTags,
  });
  return { ...result, counts };
}

describe("resolveDuplicates", () => {
  let store: MemStorage;

  beforeEach(() => {
    store = new MemStorage();
    vi.spyOn(console, "log").mockImplementation(() => {});
  });

  it("accepts a row with no matches as new", async () => {
    const { rows, groupTags } = await resolveDuplicates([row("WHOLE FOODS", {}, "2024-01-07", -82.13)], store);
    expect(rows[0].disposition).toBe("new");
    expect(rows[0].possibleDupGroup).toBeUndefined();
    expect(groupTags).toEqual([]);
  });

  it("groups two different merchants on the same day and amount", async () => {
    const { rows, groupTags } = await resolveDuplicates([row("STARBUCKS #123"), row("STARBUCKS #456")], store);

    expect(rows.map((r) => r.disposition)).toEqual(["review_candidate", "review_candidate"]);
    expect(rows.map((r) => r.possibleDupGroup)).toEqual(["DUP_0001", "DUP_0001"]);
    expect(rows[0].rowHash).not.toBe(rows[1].rowHash);
    expect(groupTags).toEqual([]);
  });

  it("skips a repeated row within the batch", async () => {
    const { rows } = await resolveDuplicates([row("STARBUCKS #123"), row("starbucks 123")], store);
    expect(rows[0].disposition).toBe("new");
    expect(rows[1]).toMatchObject({ disposition: "exact_duplicate", matchedBy: "row_hash" });
  });

  it("skips a row already in the store", async () => {
    await commit(store, [row("WHOLE FOODS")]);
    const { rows } = await resolveDuplicates([row("WHOLE FOODS")], store);
    expect(rows[0]).toMatchObject({ disposition: "exact_duplicate", matchedBy: "row_hash" });
  });

  it("matches on provider id and account before anything else", async () => {
    await commit(store, [row("ATM WITHDRAWAL", { txnId: "T1", account: "1234" })]);

    const { rows } = await resolveDuplicates(
      [
        row("ATM WDL 0042", { txnId: "T1", account: "1234" }, "2024-02-01", -20),
        row("ATM", { txnId: "T1" }, "2024-03-01", -7),
      ],
      store
    );
    expect(rows[0]).toMatchObject({ disposition: "exact_duplicate", matchedBy: "txn_id" });
    expect(rows[1].disposition).toBe("new");
  });

  it("matches on reference, date and amount", async () => {
    await commit(store, [row("CHECK 1001", { reference: "1001" }, "2024-01-10", -250)]);
    const { rows } = await resolveDuplicates([row("CHECK PAID", { reference: "1001" }, "2024-01-10", -250)], store);
    expect(rows[0]).toMatchObject({ disposition: "exact_duplicate", matchedBy: "reference" });
  });

  it("tags a stored row when a new one collides with it", async () => {
    await commit(store, [row("STARBUCKS #123")]);
    const [stored] = store.listTransactions();

    const result = await commit(store, [row("STARBUCKS #456")]);
    expect(result.rows[0]).toMatchObject({ disposition: "review_candidate", possibleDupGroup: "DUP_0001" });
    expect(result.groupTags).toEqual([{ transactionId: stored.id, groupId: "DUP_0001" }]);
    expect(result.counts).toEqual({ inserted: 1, updated: 1 });

    expect(store.getTransaction(stored.id)?.possibleDupGroup).toBe("DUP_0001");
    expect(await store.getDuplicateGroup("DUP_0001")).toHaveLength(2);
  });

  it("joins an existing group instead of opening a new one", async () => {
    await commit(store, [row("STARBUCKS #123"), row("STARBUCKS #456")]);

    const { rows, groupTags } = await resolveDuplicates([row("STARBUCKS #789")], store);
    expect(rows[0].possibleDupGroup).toBe("DUP_0001");
    expect(groupTags).toEqual([]);
    expect(await store.peekNextDupGroupNumber()).toBe(2);
  });

  it("never reuses a group id, even after the group is reviewed", async () => {
    await commit(store, [row("STARBUCKS #123"), row("STARBUCKS #456")]);
    await reviewDuplicateGroup(store, { groupId: "DUP_0001", action: "keep" });

    const { rows } = await commit(store, [
      row("LYFT RIDE", {}, "2024-02-02", -12),
      row("UBER TRIP", {}, "2024-02-02", -12),
    ]);
    expect(rows.map((r) => r.possibleDupGroup)).toEqual(["DUP_0002", "DUP_0002"]);
  });
});
