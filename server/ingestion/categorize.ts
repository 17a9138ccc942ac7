import type { VendorMapping } from "@shared/schema";
import { warn } from "../logger";

type RuleFields = Pick<VendorMapping, "id" | "pattern" | "category" | "isRegex" | "priority" | "sequence">;

export interface CompiledRule {
  rule: RuleFields;
  test: (description: string) => boolean;
}

export interface RuleMatch {
  ruleId: string;
  category: string;
  vendor: string;
}

export interface CategorizeResult<T> {
  matched: Array<{ row: T; match: RuleMatch }>;
  queue: T[];
}

const VENDOR_NOISE = [
  /#\s*\d+/g,
  /\b\d{4,}\b/g,
  /\bstore\s+\d+\b/gi,
  /\blocation\s+\d+\b/gi,
];

const CORPORATE_SUFFIX = /[\s,]*\b(?:llc|inc|corp|co)\b\.?$/i;

export function compareRules(a: RuleFields, b: RuleFields): number {
  return b.priority - a.priority || a.sequence - b.sequence;
}

/**
 * Orders rules for resolution (priority descending, then creation order) and
 * compiles their matchers. Run once per batch, not per row.
 */
export function compileRules(rules: RuleFields[]): CompiledRule[] {
  const ordered = [...rules].sort(compareRules);
  const compiled: CompiledRule[] = [];

  for (const rule of ordered) {
    if (rule.isRegex) {
      let regex: RegExp;
      try {
        regex = new RegExp(rule.pattern, "i");
      } catch (error) {
        warn(`Skipping vendor rule ${rule.id}: invalid regex "${rule.pattern}" (${String(error)})`, "rules");
        continue;
      }
      compiled.push({ rule, test: (description) => regex.test(description) });
    } else {
      const needle = rule.pattern.toLowerCase();
      compiled.push({ rule, test: (description) => description.toLowerCase().includes(needle) });
    }
  }

  return compiled;
}

/** First matching rule in resolution order, or null. */
export function matchRule(description: string, compiled: CompiledRule[]): RuleFields | null {
  for (const entry of compiled) {
    if (entry.test(description)) return entry.rule;
  }
  return null;
}

/**
 * Strips store numbers, long digit runs and corporate suffixes from a
 * merchant line, e.g. "STARBUCKS STORE 1234 #88" -> "STARBUCKS".
 */
export function cleanVendorName(description: string): string {
  let vendor = description;
  for (const pattern of VENDOR_NOISE) {
    vendor = vendor.replace(pattern, " ");
  }
  vendor = vendor.replace(/\s+/g, " ").trim();
  vendor = vendor.replace(CORPORATE_SUFFIX, "").trim();

  return (vendor || description.trim()).slice(0, 100);
}

export function categorizeBatch<T extends { description: string }>(
  rows: T[],
  compiled: CompiledRule[]
): CategorizeResult<T> {
  const result: CategorizeResult<T> = { matched: [], queue: [] };

  for (const row of rows) {
    const rule = matchRule(row.description, compiled);
    if (rule) {
      result.matched.push({
        row,
        match: { ruleId: rule.id, category: rule.category, vendor: cleanVendorName(row.description) },
      });
    } else {
      result.queue.push(row);
    }
  }

  return result;
}
