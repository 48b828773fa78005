import { describe, expect, it, vi } from "vitest";
import type { VectorStoreClient } from "../../src/clients/vector-store.js";
import {
  SearchBackendError,
  createOpenAIEmbedder,
  createVectorStoreSearchBackend,
  toVectorFilter
} from "../../src/modules/rag/search-backend.js";

const makeClient = (overrides: Partial<VectorStoreClient> = {}): VectorStoreClient => ({
  getCollections: vi.fn().mockResolvedValue({ collections: [] }),
  search: vi.fn().mockResolvedValue([]),
  scroll: vi.fn().mockResolvedValue({ points: [], nextOffset: null }),
  ...overrides
});

describe("modules/rag/search-backend", () => {
  it("translates predicates into a must filter", () => {
    expect(toVectorFilter(undefined)).toBeUndefined();
    expect(toVectorFilter([])).toBeUndefined();
    expect(
      toVectorFilter([
        { kind: "any_of", field: "baseColour", values: ["Blue", "Navy Blue"] },
        { kind: "greater_than", field: "price", value: 20 },
        { kind: "less_than", field: "price", value: 100 }
      ])
    ).toEqual({
      must: [
        { key: "baseColour", match: { any: ["Blue", "Navy Blue"] } },
        { key: "price", range: { gt: 20 } },
        { key: "price", range: { lt: 100 } }
      ]
    });
  });

  it("embeds the text and searches the collection with filters", async () => {
    const search = vi.fn().mockResolvedValue([{ id: "7", score: 0.91, payload: { productDisplayName: "Blue Shirt" } }]);
    const embed = vi.fn().mockResolvedValue([0.1, 0.2]);
    const backend = createVectorStoreSearchBackend({
      collection: "products",
      textFields: ["productDisplayName"],
      embed,
      getClient: async () => makeClient({ search })
    });

    const hits = await backend.queryByVectorSimilarity("blue shirt", 3, [
      { kind: "any_of", field: "gender", values: ["Men"] }
    ]);

    expect(embed).toHaveBeenCalledWith("blue shirt", undefined);
    expect(search).toHaveBeenCalledWith("products", {
      vector: [0.1, 0.2],
      limit: 3,
      filter: { must: [{ key: "gender", match: { any: ["Men"] } }] }
    });
    expect(hits).toEqual([{ id: "7", score: 0.91, properties: { productDisplayName: "Blue Shirt" } }]);
  });

  it("scrolls full-text candidates and ranks them with BM25", async () => {
    const scroll = vi.fn().mockResolvedValue({
      points: [
        { id: "1", score: 0, payload: { productDisplayName: "Red Checked Shirt", baseColour: "Red" } },
        { id: "2", score: 0, payload: { productDisplayName: "Blue Denim Shirt", baseColour: "Blue" } },
        { id: "3", score: 0, payload: { productDisplayName: "Blue Jeans", baseColour: "Blue" } }
      ],
      nextOffset: null
    });
    const backend = createVectorStoreSearchBackend({
      collection: "products",
      textFields: ["productDisplayName", "baseColour"],
      embed: vi.fn(),
      getClient: async () => makeClient({ scroll })
    });

    const hits = await backend.queryByKeyword("blue shirt", 2);

    expect(scroll).toHaveBeenCalledTimes(1);
    expect(scroll).toHaveBeenCalledWith("products", {
      limit: 256,
      filter: {
        should: [
          { key: "productDisplayName", match: { text: "blue" } },
          { key: "productDisplayName", match: { text: "shirt" } },
          { key: "baseColour", match: { text: "blue" } },
          { key: "baseColour", match: { text: "shirt" } }
        ]
      }
    });
    expect(hits.map((hit) => hit.id)).toEqual(["2", "3"]);
    expect(hits[0].properties).toEqual({ productDisplayName: "Blue Denim Shirt", baseColour: "Blue" });
  });

  it("ranks matches from every scroll page", async () => {
    const plainShirts = Array.from({ length: 150 }, (_value, index) => ({
      id: `p${index}`,
      score: 0,
      payload: { productDisplayName: "Plain shirt in soft cotton" }
    }));
    const scroll = vi
      .fn()
      .mockResolvedValueOnce({ points: plainShirts, nextOffset: "best" })
      .mockResolvedValueOnce({
        points: [{ id: "best", score: 0, payload: { productDisplayName: "Blue shirt" } }],
        nextOffset: null
      });
    const backend = createVectorStoreSearchBackend({
      collection: "products",
      textFields: ["productDisplayName"],
      embed: vi.fn(),
      getClient: async () => makeClient({ scroll })
    });

    const hits = await backend.queryByKeyword("blue shirt", 5);

    expect(scroll).toHaveBeenCalledTimes(2);
    expect(scroll).toHaveBeenLastCalledWith("products", {
      limit: 256,
      filter: {
        should: [
          { key: "productDisplayName", match: { text: "blue" } },
          { key: "productDisplayName", match: { text: "shirt" } }
        ]
      },
      offset: "best"
    });
    expect(hits.map((hit) => hit.id)).toEqual(["best", "p0", "p1", "p2", "p3"]);
  });

  it("skips the store for a query without searchable terms", async () => {
    const scroll = vi.fn();
    const backend = createVectorStoreSearchBackend({
      collection: "faq",
      textFields: ["question"],
      embed: vi.fn(),
      getClient: async () => makeClient({ scroll })
    });

    await expect(backend.queryByKeyword("?!", 5)).resolves.toEqual([]);
    expect(scroll).not.toHaveBeenCalled();
  });

  it("wraps store failures in SearchBackendError", async () => {
    const backend = createVectorStoreSearchBackend({
      collection: "products",
      textFields: ["productDisplayName"],
      embed: vi.fn().mockRejectedValue(new Error("embedding offline")),
      getClient: async () => makeClient()
    });

    const failure = backend.queryByVectorSimilarity("blue", 5);
    await expect(failure).rejects.toThrowError(SearchBackendError);
    await expect(failure).rejects.toThrowError('Vector query on "products" failed: embedding offline');
  });

  it("rejects when the request signal is already aborted", async () => {
    const scroll = vi.fn();
    const backend = createVectorStoreSearchBackend({
      collection: "products",
      textFields: ["productDisplayName"],
      embed: vi.fn(),
      getClient: async () => makeClient({ scroll })
    });
    const controller = new AbortController();
    controller.abort(new Error("deadline"));

    await expect(backend.queryByKeyword("blue", 5, controller.signal)).rejects.toThrowError(
      'Keyword query on "products" failed: deadline'
    );
    expect(scroll).not.toHaveBeenCalled();
  });

  it("creates embeddings through the OpenAI client", async () => {
    const create = vi.fn().mockResolvedValue({ data: [{ embedding: [0.5, 0.25] }] });
    const getClient = vi.fn().mockResolvedValue({ client: { embeddings: { create } } });
    const embed = createOpenAIEmbedder("text-embedding-3-small", getClient);

    await expect(embed("summer dress")).resolves.toEqual([0.5, 0.25]);
    expect(create).toHaveBeenCalledWith(
      { model: "text-embedding-3-small", input: "summer dress" },
      { signal: undefined }
    );
  });
});
