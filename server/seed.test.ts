import { beforeEach, describe, expect, it, vi } from "vitest";
import { MemStorage } from "./memStorage";
import { loadDefaultCategories, seedDefaultCategories } from "./seed";

describe("seedDefaultCategories", () => {
  beforeEach(() => {
    vi.spyOn(console, "log").mockImplementation(() => {});
  });

  it("loads the default category list", () => {
    const categories = loadDefaultCategories();
    expect(categories).toHaveLength(11);
    expect(categories[0]).toMatchObject({ name: "Groceries", sortOrder: 1 });
  });

  it("creates the categories once", async () => {
    const store = new MemStorage();
    expect(await seedDefaultCategories(store)).toBe(11);
    expect(await seedDefaultCategories(store)).toBe(0);

    const names = (await store.getCategories()).map((category) => category.name);
    expect(names).toHaveLength(11);
    expect(names.slice(0, 3)).toEqual(["Groceries", "Dining", "Utilities"]);
  });
});
