import path from "node:path";
import { describe, expect, it, vi } from "vitest";
import {
  DatasetLoadError,
  KNOWLEDGE_BASE_FILE_NAME,
  PRODUCTS_FILE_NAME,
  loadKnowledgeBase,
  loadProducts
} from "../../src/modules/catalog/datasets.js";

const dataPath = (fileName: string): string => path.resolve(process.cwd(), "data", fileName);

describe("modules/catalog/datasets", () => {
  it("loads the bundled product catalog", async () => {
    const products = await loadProducts(dataPath(PRODUCTS_FILE_NAME));

    expect(products.length).toBeGreaterThan(0);
    expect(products[0]).toEqual({
      product_id: 1001,
      productDisplayName: "Harbor Men Blue Slim Fit Casual Shirt",
      gender: "Men",
      masterCategory: "Apparel",
      subCategory: "Topwear",
      articleType: "Shirts",
      baseColour: "Blue",
      season: "Summer",
      year: 2017,
      usage: "Casual",
      price: 39.99
    });
    expect(Object.isFrozen(products)).toBe(true);
  });

  it("loads the bundled knowledge base", async () => {
    const records = await loadKnowledgeBase(dataPath(KNOWLEDGE_BASE_FILE_NAME));

    expect(records[0]).toEqual({
      question: "What is your return policy?",
      answer:
        "You can return unworn items with tags attached within 30 days of delivery for a full refund to the original payment method.",
      category: "returns and refunds"
    });
  });

  it("fills missing text fields and years", async () => {
    const readFile = vi.fn().mockResolvedValue(
      JSON.stringify([
        {
          product_id: "12",
          productDisplayName: "Plain Cap",
          gender: null,
          masterCategory: "Accessories",
          subCategory: "Headwear",
          articleType: "Caps",
          baseColour: "Grey",
          season: null,
          year: null,
          usage: "Casual",
          price: 9.5
        }
      ])
    );

    const [record] = await loadProducts("products.json", { readFile });

    expect(record).toMatchObject({ product_id: 12, gender: "", season: "", year: 0 });
  });

  it("falls back to the type field, then a default category", async () => {
    const readFile = vi.fn().mockResolvedValue(
      JSON.stringify([
        { question: "Q1", answer: "A1", type: "shipping" },
        { question: "Q2", answer: "A2" }
      ])
    );

    const records = await loadKnowledgeBase("faq.json", { readFile });

    expect(records.map((record) => record.category)).toEqual(["shipping", "general information"]);
  });

  it("reports unreadable, malformed and invalid files as DatasetLoadError", async () => {
    await expect(
      loadProducts("missing.json", { readFile: vi.fn().mockRejectedValue(new Error("ENOENT")) })
    ).rejects.toThrowError("Dataset file could not be read: missing.json");
    await expect(
      loadProducts("broken.json", { readFile: vi.fn().mockResolvedValue("[{") })
    ).rejects.toThrowError(DatasetLoadError);
    await expect(
      loadKnowledgeBase("faq.json", { readFile: vi.fn().mockResolvedValue(JSON.stringify([{ question: "Q" }])) })
    ).rejects.toThrowError("Dataset file has invalid records: faq.json\n- 0.answer: Required");
  });
});
