import { describe, expect, it } from "vitest";
import { buildFilterCatalog, describeFilterCatalog } from "../../src/modules/catalog/filter-catalog.js";
import type { ProductRecord } from "../../src/modules/catalog/types.js";

const product = (overrides: Partial<ProductRecord>): ProductRecord => ({
  product_id: 1,
  productDisplayName: "Sample",
  gender: "Men",
  masterCategory: "Apparel",
  subCategory: "Topwear",
  articleType: "Shirts",
  baseColour: "Blue",
  season: "Summer",
  year: 2018,
  usage: "Casual",
  price: 30,
  ...overrides
});

describe("modules/catalog/filter-catalog", () => {
  it("collects sorted distinct values for filterable fields only", () => {
    const catalog = buildFilterCatalog([
      product({ product_id: 1, baseColour: "Red", gender: "Women" }),
      product({ product_id: 2, baseColour: "Blue" }),
      product({ product_id: 3, baseColour: "Red", season: "" })
    ]);

    expect(catalog).toEqual({
      gender: ["Men", "Women"],
      masterCategory: ["Apparel"],
      articleType: ["Shirts"],
      baseColour: ["Blue", "Red"],
      season: ["Summer"],
      usage: ["Casual"]
    });
    expect(Object.isFrozen(catalog)).toBe(true);
    expect(Object.isFrozen(catalog.baseColour)).toBe(true);
  });

  it("serializes the catalog for prompts", () => {
    const catalog = buildFilterCatalog([product({})]);

    expect(describeFilterCatalog(catalog)).toBe(
      '{"gender":["Men"],"masterCategory":["Apparel"],"articleType":["Shirts"],"baseColour":["Blue"],"season":["Summer"],"usage":["Casual"]}'
    );
  });

  it("returns an empty catalog for no products", () => {
    expect(buildFilterCatalog([])).toEqual({});
  });
});
