import fs from "node:fs/promises";
import path from "node:path";
import { z } from "zod";
import { cosineSimilarity, tokenize } from "../modules/rag/bm25.js";
import type {
  VectorCondition,
  VectorFilter,
  VectorPoint,
  VectorStoreClient
} from "./vector-store.js";

type StoredPoint = {
  id: string;
  vector: number[];
  payload: Record<string, unknown>;
};

type StoreShape = {
  collections: Record<string, StoredPoint[]>;
};

const DEFAULT_LOCAL_STORE_PATH = "data/local-vector-store.json";

export function resolveStorePath(configured: string | undefined): string {
  const relative = configured && configured.trim().length > 0 ? configured.trim() : DEFAULT_LOCAL_STORE_PATH;
  return path.isAbsolute(relative)
    ? relative
    : path.resolve(process.cwd(), relative);
}

const matchesCondition = (payload: Record<string, unknown>, condition: VectorCondition): boolean => {
  const value = payload[condition.key];

  if ("range" in condition) {
    if (typeof value !== "number") {
      return false;
    }
    const { gt, lt } = condition.range;
    return (gt === undefined || value > gt) && (lt === undefined || value < lt);
  }

  const { match } = condition;
  if ("any" in match) {
    return match.any.some((candidate) => candidate === value);
  }
  if (typeof value !== "string") {
    return false;
  }
  const tokens = new Set(tokenize(value));
  return tokenize(match.text).every((token) => tokens.has(token));
};

export function matchesFilter(payload: Record<string, unknown>, filter?: VectorFilter): boolean {
  const must = filter?.must ?? [];
  const should = filter?.should ?? [];
  return (
    must.every((condition) => matchesCondition(payload, condition)) &&
    (should.length === 0 || should.some((condition) => matchesCondition(payload, condition)))
  );
}

const storeSchema = z.object({
  collections: z
    .record(
      z.array(
        z.object({
          id: z.string(),
          vector: z.array(z.number()),
          payload: z.record(z.unknown()).default({})
        })
      )
    )
    .default({})
});

async function readStore(filePath: string): Promise<StoreShape> {
  let raw: string;
  try {
    raw = await fs.readFile(filePath, "utf8");
  } catch (error) {
    if ((error as NodeJS.ErrnoException).code === "ENOENT") {
      return { collections: {} };
    }
    throw error;
  }
  return storeSchema.parse(JSON.parse(raw));
}

export function createLocalVectorStoreClient(filePath: string): VectorStoreClient {
  return {
    async getCollections() {
      const store = await readStore(filePath);
      return {
        collections: Object.keys(store.collections).map((name) => ({ name }))
      };
    },

    async search(collection, request) {
      const store = await readStore(filePath);
      const points = store.collections[collection] ?? [];
      return points
        .filter((point) => matchesFilter(point.payload, request.filter))
        .map((point): VectorPoint => ({
          id: point.id,
          score: cosineSimilarity(point.vector, request.vector),
          payload: point.payload
        }))
        .sort((a, b) => b.score - a.score)
        .slice(0, Math.max(1, request.limit));
    },

    // Pages follow storage order; the offset is the id of the first point of a page.
    async scroll(collection, request) {
      const store = await readStore(filePath);
      const matching = (store.collections[collection] ?? []).filter((point) =>
        matchesFilter(point.payload, request.filter)
      );
      const offset = request.offset === undefined ? undefined : String(request.offset);
      const start = offset === undefined ? 0 : matching.findIndex((point) => point.id === offset);
      if (start < 0) {
        return { points: [], nextOffset: null };
      }

      const end = start + Math.max(1, request.limit);
      return {
        points: matching
          .slice(start, end)
          .map((point): VectorPoint => ({ id: point.id, score: 0, payload: point.payload })),
        nextOffset: matching[end]?.id ?? null
      };
    }
  };
}
