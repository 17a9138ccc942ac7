import { beforeEach, describe, expect, it, vi } from "vitest";
import { ErrorCodes } from "./errors";
import { MemStorage } from "./memStorage";
import { addVendorRule, listVendorRules } from "./rules";
import { seedDefaultCategories } from "./seed";

describe("vendor rules", () => {
  let store: MemStorage;

  beforeEach(async () => {
    vi.spyOn(console, "log").mockImplementation(() => {});
    store = new MemStorage();
    await seedDefaultCategories(store);
  });

  it("lists rules by priority, then creation order", async () => {
    await addVendorRule(store, { pattern: "A", category: "Misc" });
    await addVendorRule(store, { pattern: "B", category: "Misc", priority: 5 });
    await addVendorRule(store, { pattern: "C", category: "Misc", priority: 5 });

    const rules = await listVendorRules(store);
    expect(rules.map((rule) => rule.pattern)).toEqual(["B", "C", "A"]);
  });

  it("stores literal rules by default", async () => {
    const rule = await addVendorRule(store, { pattern: "  STARBUCKS ", category: "Dining" });
    expect(rule).toMatchObject({ pattern: "STARBUCKS", category: "Dining", isRegex: false, priority: 0, isActive: true });
  });

  it("rejects a category that does not exist", async () => {
    await expect(addVendorRule(store, { pattern: "BITSTAMP", category: "Crypto" })).rejects.toMatchObject({
      code: ErrorCodes.VALIDATION_ERROR,
      message: 'Unknown category "Crypto"',
    });
    expect(await listVendorRules(store)).toEqual([]);
  });

  it("rejects an empty pattern", async () => {
    await expect(addVendorRule(store, { pattern: "   ", category: "Dining" })).rejects.toMatchObject({
      code: ErrorCodes.VALIDATION_ERROR,
    });
  });

  it("rejects a regex that does not compile", async () => {
    await expect(addVendorRule(store, { pattern: "([", category: "Misc", isRegex: true })).rejects.toMatchObject({
      code: ErrorCodes.VALIDATION_ERROR,
    });
    expect(await listVendorRules(store)).toEqual([]);
  });
});
