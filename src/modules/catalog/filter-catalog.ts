import type { FilterCatalog, ProductRecord } from "./types.js";

// Identifiers, free text and numeric fields are not offered as filter values.
const NON_FILTERABLE_FIELDS = new Set(["product_id", "price", "productDisplayName", "subCategory", "year"]);

export const buildFilterCatalog = (products: readonly ProductRecord[]): FilterCatalog => {
  const values = new Map<string, Set<string>>();

  for (const product of products) {
    for (const [key, value] of Object.entries(product)) {
      if (NON_FILTERABLE_FIELDS.has(key)) {
        continue;
      }
      if (typeof value !== "string" || value.trim().length === 0) {
        continue;
      }
      const bucket = values.get(key) ?? new Set<string>();
      bucket.add(value);
      values.set(key, bucket);
    }
  }

  const catalog: Record<string, readonly string[]> = {};
  for (const [key, bucket] of values) {
    catalog[key] = Object.freeze(Array.from(bucket).sort());
  }
  return Object.freeze(catalog);
};

export const describeFilterCatalog = (catalog: FilterCatalog): string => JSON.stringify(catalog);
