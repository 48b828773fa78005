import { QdrantClient } from "@qdrant/js-client-rest";
import { config } from "../config/index.js";
import { createLocalVectorStoreClient, resolveStorePath } from "./local-vector-store.js";
import type { VectorPoint, VectorPointId, VectorStoreClient } from "./vector-store.js";

type HealthStatus = "ok" | "error";

export interface QdrantSingleton {
  client: VectorStoreClient;
  healthCheck: () => Promise<{ status: HealthStatus; details?: string }>;
}

const REQUEST_TIMEOUT_MS = 5000;
// In local mode we support two retrieval backends:
// - Qdrant server, when QDRANT_URL is configured
// - file-backed vector store, when QDRANT_URL is omitted
const USE_LOCAL_FILE_VECTOR_STORE =
  config.APP_MODE === "local" && !config.QDRANT_URL;

let singleton: QdrantSingleton | null = null;
let initPromise: Promise<QdrantSingleton> | null = null;

type RawQdrantPoint = {
  id: string | number;
  score?: number;
  payload?: Record<string, unknown> | null;
};

const toNextOffset = (value: unknown): VectorPointId | null =>
  typeof value === "string" || typeof value === "number" ? value : null;

const toVectorPoint = (point: RawQdrantPoint): VectorPoint => ({
  id: String(point.id),
  score: typeof point.score === "number" ? point.score : 0,
  payload: point.payload ?? {}
});

export const adaptQdrantClient = (client: QdrantClient): VectorStoreClient => ({
  async getCollections() {
    const response = await client.getCollections();
    return { collections: response.collections.map(({ name }) => ({ name })) };
  },

  async search(collection, request) {
    const points = await client.search(collection, {
      vector: request.vector,
      limit: request.limit,
      filter: request.filter,
      with_payload: true,
      with_vector: false
    });
    return points.map(toVectorPoint);
  },

  async scroll(collection, request) {
    const response = await client.scroll(collection, {
      limit: request.limit,
      offset: request.offset,
      filter: request.filter,
      with_payload: true,
      with_vector: false
    });
    return {
      points: response.points.map(toVectorPoint),
      nextOffset: toNextOffset(response.next_page_offset)
    };
  }
});

async function initialize(): Promise<QdrantSingleton> {
  if (USE_LOCAL_FILE_VECTOR_STORE) {
    const localClient = createLocalVectorStoreClient(resolveStorePath(config.LOCAL_VECTOR_STORE_FILE));
    console.info("[clients/qdrant] initialized singleton (local file vector store)");
    return {
      client: localClient,
      async healthCheck() {
        try {
          await localClient.getCollections();
          return { status: "ok", details: "local file vector store" };
        } catch (error) {
          const details = error instanceof Error ? error.message : "unknown error";
          return { status: "error", details };
        }
      }
    };
  }

  const qdrant = new QdrantClient({
    url: config.QDRANT_URL,
    apiKey: config.QDRANT_API_KEY,
    timeout: REQUEST_TIMEOUT_MS
  });
  const client = adaptQdrantClient(qdrant);

  await client.getCollections();

  console.info("[clients/qdrant] initialized singleton");

  return {
    client,
    async healthCheck() {
      try {
        const { collections } = await client.getCollections();
        const names = new Set(collections.map(({ name }) => name));
        const missing = [config.QDRANT_PRODUCTS_COLLECTION, config.QDRANT_FAQ_COLLECTION].filter(
          (name) => !names.has(name)
        );
        if (missing.length > 0) {
          return { status: "error", details: `missing collections: ${missing.join(", ")}` };
        }
        return { status: "ok" };
      } catch (error) {
        const details = error instanceof Error ? error.message : "unknown error";
        return { status: "error", details };
      }
    }
  };
}

export async function getQdrantClient(): Promise<QdrantSingleton> {
  if (singleton) {
    return singleton;
  }

  if (!initPromise) {
    // A failed start is not cached; the next call tries again.
    initPromise = initialize().catch((error: unknown) => {
      initPromise = null;
      throw error;
    });
  }

  singleton = await initPromise;
  return singleton;
}

export async function shutdownQdrantClient(): Promise<void> {
  if (!singleton) {
    return;
  }

  singleton = null;
  initPromise = null;
  console.info("[clients/qdrant] shutdown complete");
}

export function resetQdrantClientForTests(): void {
  singleton = null;
  initPromise = null;
}
