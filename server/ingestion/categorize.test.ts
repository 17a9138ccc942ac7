import { describe, expect, it, vi } from "vitest";
import { categorizeBatch, cleanVendorName, compileRules, matchRule } from "./categorize";

let nextSequence = 1;

function rule(pattern: string, category: string, priority = 0, options: { isRegex?: boolean; sequence?: number } = {}) {
  const sequence = options.sequence ?? nextSequence++;
  return { id: `rule-${sequence}`, pattern, category, priority, sequence, isRegex: options.isRegex ?? false };
}

describe("matchRule", () => {
  it("prefers the higher priority rule", () => {
    const compiled = compileRules([rule("STAR", "Shopping", 1), rule("STARBUCKS", "Dining", 5)]);
    expect(matchRule("STARBUCKS #123", compiled)?.category).toBe("Dining");
  });

  it("breaks priority ties by creation order", () => {
    const compiled = compileRules([
      rule("AMAZON", "Shopping", 0, { sequence: 20 }),
      rule("AMAZON", "Subscriptions", 0, { sequence: 10 }),
    ]);
    expect(matchRule("AMAZON PRIME", compiled)?.category).toBe("Subscriptions");
  });

  it("matches literals case-insensitively", () => {
    const compiled = compileRules([rule("starbucks", "Dining")]);
    expect(matchRule("STARBUCKS #123", compiled)?.category).toBe("Dining");
  });

  it("searches with regex rules", () => {
    const compiled = compileRules([rule("^uber\\s+(trip|eats)", "Transportation", 0, { isRegex: true })]);
    expect(matchRule("UBER TRIP 8841", compiled)?.category).toBe("Transportation");
    expect(matchRule("MY UBER TRIP", compiled)).toBeNull();
  });

  it("skips a rule whose regex does not compile", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
    const compiled = compileRules([rule("([", "Misc", 9, { isRegex: true }), rule("SHELL", "Transportation")]);

    expect(compiled).toHaveLength(1);
    expect(matchRule("SHELL OIL", compiled)?.category).toBe("Transportation");
    expect(warn).toHaveBeenCalledTimes(1);
  });
});

describe("cleanVendorName", () => {
  it("strips store numbers and corporate suffixes", () => {
    expect(cleanVendorName("STARBUCKS #123")).toBe("STARBUCKS");
    expect(cleanVendorName("AMAZON MKTPLACE 12345678 LLC")).toBe("AMAZON MKTPLACE");
    expect(cleanVendorName("SHELL OIL STORE 42")).toBe("SHELL OIL");
    expect(cleanVendorName("ACME CO.")).toBe("ACME");
  });

  it("leaves words that only end in a suffix alone", () => {
    expect(cleanVendorName("COSTCO")).toBe("COSTCO");
  });

  it("falls back to the raw description when nothing is left", () => {
    expect(cleanVendorName("#1234")).toBe("#1234");
  });
});

describe("categorizeBatch", () => {
  it("queues rows no rule matches", () => {
    const compiled = compileRules([rule("STARBUCKS", "Dining", 5)]);
    const rows = [{ description: "STARBUCKS #123" }, { description: "UNKNOWN SHOP" }];

    const { matched, queue } = categorizeBatch(rows, compiled);
    expect(matched).toHaveLength(1);
    expect(matched[0].row).toBe(rows[0]);
    expect(matched[0].match).toMatchObject({ category: "Dining", vendor: "STARBUCKS" });
    expect(queue).toEqual([rows[1]]);
  });
});
