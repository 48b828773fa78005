import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import {
  createLocalVectorStoreClient,
  matchesFilter,
  resolveStorePath
} from "../../src/clients/local-vector-store.js";

type SeedPoint = { id: string; vector: number[]; payload: Record<string, unknown> };

describe("clients/local-vector-store", () => {
  let directory: string;
  let storePath: string;

  const seed = async (collections: Record<string, SeedPoint[]>): Promise<void> => {
    await fs.writeFile(storePath, JSON.stringify({ collections }), "utf8");
  };

  beforeEach(async () => {
    directory = await fs.mkdtemp(path.join(os.tmpdir(), "vector-store-"));
    storePath = path.join(directory, "store.json");
  });

  afterEach(async () => {
    await fs.rm(directory, { recursive: true, force: true });
  });

  it("treats a missing store file as an empty store", async () => {
    const client = createLocalVectorStoreClient(storePath);

    await expect(client.getCollections()).resolves.toEqual({ collections: [] });
    await expect(client.search("products", { vector: [1, 0], limit: 5 })).resolves.toEqual([]);
    await expect(client.scroll("products", { limit: 5 })).resolves.toEqual({ points: [], nextOffset: null });
  });

  it("searches by cosine similarity with payload filters", async () => {
    await seed({
      products: [
        { id: "1", vector: [1, 0], payload: { baseColour: "Blue", price: 30 } },
        { id: "2", vector: [0.8, 0.6], payload: { baseColour: "Red", price: 80 } },
        { id: "3", vector: [0, 1], payload: { baseColour: "Blue", price: 120 } }
      ]
    });
    const client = createLocalVectorStoreClient(storePath);

    const all = await client.search("products", { vector: [1, 0], limit: 10 });
    expect(all.map((point) => point.id)).toEqual(["1", "2", "3"]);
    expect(all[1].score).toBeCloseTo(0.8, 12);

    const blueUnder100 = await client.search("products", {
      vector: [1, 0],
      limit: 10,
      filter: {
        must: [
          { key: "baseColour", match: { any: ["Blue"] } },
          { key: "price", range: { lt: 100 } }
        ]
      }
    });
    expect(blueUnder100.map((point) => point.id)).toEqual(["1"]);
  });

  it("scrolls points matching any full-text condition", async () => {
    await seed({
      faq: [
        { id: "q1", vector: [1], payload: { question: "What is your return policy?" } },
        { id: "q2", vector: [1], payload: { question: "Do you ship internationally?" } }
      ]
    });
    const client = createLocalVectorStoreClient(storePath);

    const page = await client.scroll("faq", {
      limit: 10,
      filter: {
        should: [
          { key: "question", match: { text: "return" } },
          { key: "question", match: { text: "refund" } }
        ]
      }
    });

    expect(page).toEqual({
      points: [{ id: "q1", score: 0, payload: { question: "What is your return policy?" } }],
      nextOffset: null
    });
  });

  it("pages through matches with the next offset", async () => {
    await seed({
      products: ["a", "b", "c", "d", "e"].map((id) => ({
        id,
        vector: [1],
        payload: { season: id === "c" ? "Winter" : "Summer" }
      }))
    });
    const client = createLocalVectorStoreClient(storePath);
    const filter = { should: [{ key: "season", match: { text: "summer" } }] };

    const first = await client.scroll("products", { limit: 2, filter });
    expect(first.points.map((point) => point.id)).toEqual(["a", "b"]);
    expect(first.nextOffset).toBe("d");

    const second = await client.scroll("products", { limit: 2, filter, offset: "d" });
    expect(second.points.map((point) => point.id)).toEqual(["d", "e"]);
    expect(second.nextOffset).toBeNull();
  });

  it("requires every must condition and at least one should condition", () => {
    const payload = { gender: "Women", price: 50, articleType: "Dresses" };

    expect(matchesFilter(payload)).toBe(true);
    expect(
      matchesFilter(payload, {
        must: [{ key: "gender", match: { any: ["Women", "Girls"] } }, { key: "price", range: { gt: 20, lt: 60 } }]
      })
    ).toBe(true);
    expect(matchesFilter(payload, { must: [{ key: "price", range: { gt: 50 } }] })).toBe(false);
    expect(matchesFilter(payload, { should: [{ key: "articleType", match: { text: "shirts" } }] })).toBe(false);
  });

  it("resolves relative store paths against the working directory", () => {
    expect(resolveStorePath(undefined)).toBe(path.resolve(process.cwd(), "data/local-vector-store.json"));
    expect(resolveStorePath("/tmp/store.json")).toBe("/tmp/store.json");
  });
});
