import { insertVendorMappingSchema, type VendorMapping } from "@shared/schema";
import { LedgerError, ErrorCodes, errorMessage } from "./errors";
import { compareRules } from "./ingestion/categorize";
import { log } from "./logger";
import type { RecordStore } from "./storage";

export interface VendorRuleInput {
  pattern: string;
  category: string;
  isRegex?: boolean;
  priority?: number;
}

/** Rules in the order the engine resolves them: priority descending, then creation order. */
export async function listVendorRules(store: RecordStore): Promise<VendorMapping[]> {
  return [...(await store.getActiveVendorRules())].sort(compareRules);
}

export async function addVendorRule(store: RecordStore, input: VendorRuleInput): Promise<VendorMapping> {
  const parsed = insertVendorMappingSchema.safeParse({
    pattern: input.pattern,
    category: input.category,
    isRegex: input.isRegex ?? false,
    priority: input.priority ?? 0,
    isActive: true,
  });
  if (!parsed.success) {
    throw new LedgerError(parsed.error.issues.map((issue) => issue.message).join("; "), ErrorCodes.VALIDATION_ERROR);
  }
  const rule = parsed.data;

  const categories = await store.getCategories();
  if (!categories.some((category) => category.name === rule.category)) {
    throw new LedgerError(`Unknown category "${rule.category}"`, ErrorCodes.VALIDATION_ERROR, {
      categories: categories.map((category) => category.name),
    });
  }

  if (rule.isRegex) {
    try {
      new RegExp(rule.pattern, "i");
    } catch (error) {
      throw new LedgerError(`Invalid regex "${rule.pattern}": ${errorMessage(error)}`, ErrorCodes.VALIDATION_ERROR);
    }
  }

  const created = await store.createVendorRule(rule);
  log(`Added rule ${created.pattern} -> ${created.category} (priority ${created.priority})`, "rules");
  return created;
}
