import { insertCategorySchema, type InsertCategory } from "@shared/schema";
import defaultCategories from "./data/categories.json";
import { log } from "./logger";
import type { RecordStore } from "./storage";

export function loadDefaultCategories(): InsertCategory[] {
  return defaultCategories.map((category) => insertCategorySchema.parse(category));
}

/** Inserts the default category list; categories that already exist are left alone. */
export async function seedDefaultCategories(store: RecordStore): Promise<number> {
  const categories = loadDefaultCategories();
  log(`Seeding ${categories.length} default categories...`, "seed");

  const created = await store.seedCategories(categories);
  if (created === 0) {
    log("Categories already exist, nothing to do", "seed");
  } else {
    log(`Created ${created} categories`, "seed");
  }
  return created;
}
