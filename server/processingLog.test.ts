import { describe, expect, it } from "vitest";
import { sanitizeDetails } from "./processingLog";

describe("sanitizeDetails", () => {
  it("returns null without details", () => {
    expect(sanitizeDetails()).toBeNull();
  });

  it("redacts credential-looking keys at any depth", () => {
    expect(
      sanitizeDetails({ apiKey: "test-key", file: "chase.csv", connection: { databaseUrl: "postgres://x", host: "db" } })
    ).toEqual({ apiKey: "[REDACTED]", file: "chase.csv", connection: { databaseUrl: "[REDACTED]", host: "db" } });
  });

  it("truncates long strings", () => {
    const result = sanitizeDetails({ message: "x".repeat(1500) });
    expect(result?.message).toBe("x".repeat(1000) + "...[truncated]");
  });

  it("caps long lists", () => {
    const rowErrors = Array.from({ length: 105 }, (_, i) => i);
    const result = sanitizeDetails({ rowErrors });
    const capped = result?.rowErrors;
    expect(Array.isArray(capped) ? capped.length : 0).toBe(101);
    expect(Array.isArray(capped) ? capped[100] : undefined).toBe("...[5 more]");
  });
});
