import { getOpenAIClient } from "../../clients/openai.js";
import { getQdrantClient } from "../../clients/qdrant.js";
import type {
  VectorCondition,
  VectorFilter,
  VectorPoint,
  VectorPointId,
  VectorStoreClient
} from "../../clients/vector-store.js";
import { rankBm25, tokenize } from "./bm25.js";
import type { FilterPredicate, SearchBackend, SearchHit } from "./types.js";

const KEYWORD_SCROLL_PAGE_SIZE = 256;

export class SearchBackendError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "SearchBackendError";
  }
}

export type EmbedText = (text: string, signal?: AbortSignal) => Promise<number[]>;

export const createOpenAIEmbedder = (
  model: string,
  getClient: typeof getOpenAIClient = getOpenAIClient
): EmbedText => {
  return async (text, signal) => {
    const { client } = await getClient();
    const response = await client.embeddings.create({ model, input: text }, { signal });
    const embedding = response.data[0]?.embedding;
    if (!embedding || embedding.length === 0) {
      throw new SearchBackendError("Embedding response missing vector payload.");
    }
    return embedding;
  };
};

export const toVectorCondition = (predicate: FilterPredicate): VectorCondition => {
  switch (predicate.kind) {
    case "any_of":
      return { key: predicate.field, match: { any: predicate.values } };
    case "greater_than":
      return { key: predicate.field, range: { gt: predicate.value } };
    case "less_than":
      return { key: predicate.field, range: { lt: predicate.value } };
  }
};

export const toVectorFilter = (predicates: FilterPredicate[] | undefined): VectorFilter | undefined => {
  if (!predicates || predicates.length === 0) {
    return undefined;
  }
  return { must: predicates.map(toVectorCondition) };
};

export interface VectorStoreSearchBackendOptions {
  collection: string;
  // Payload fields searched and scored by keyword queries.
  textFields: readonly string[];
  embed: EmbedText;
  getClient?: () => Promise<VectorStoreClient>;
}

const getDefaultClient = async (): Promise<VectorStoreClient> => (await getQdrantClient()).client;

const describeError = (error: unknown): string => (error instanceof Error ? error.message : "unknown error");

const payloadText = (payload: Record<string, unknown>, fields: readonly string[]): string =>
  fields
    .map((field) => payload[field])
    .filter((value): value is string | number => typeof value === "string" || typeof value === "number")
    .join(" ");

export const createVectorStoreSearchBackend = (options: VectorStoreSearchBackendOptions): SearchBackend => {
  const getClient = options.getClient ?? getDefaultClient;

  return {
    async queryByKeyword(text: string, limit: number, signal?: AbortSignal): Promise<SearchHit[]> {
      const terms = Array.from(new Set(tokenize(text)));
      if (terms.length === 0 || limit <= 0) {
        return [];
      }

      const should: VectorCondition[] = options.textFields.flatMap((field) =>
        terms.map((term): VectorCondition => ({ key: field, match: { text: term } }))
      );

      try {
        signal?.throwIfAborted();
        const client = await getClient();
        // Every matching point is ranked, so the whole match set is paged in first.
        const points: VectorPoint[] = [];
        let offset: VectorPointId | undefined;
        do {
          const page = await client.scroll(options.collection, {
            limit: KEYWORD_SCROLL_PAGE_SIZE,
            filter: { should },
            ...(offset === undefined ? {} : { offset })
          });
          signal?.throwIfAborted();
          points.push(...page.points);
          offset = page.nextOffset ?? undefined;
        } while (offset !== undefined);

        const ranked = rankBm25(
          text,
          points.map((point) => ({ item: point, text: payloadText(point.payload, options.textFields) }))
        );
        return ranked.slice(0, limit).map(({ item, score }) => ({ id: item.id, score, properties: item.payload }));
      } catch (error) {
        throw new SearchBackendError(
          `Keyword query on "${options.collection}" failed: ${describeError(error)}`,
          { cause: error }
        );
      }
    },

    async queryByVectorSimilarity(
      text: string,
      limit: number,
      filters?: FilterPredicate[],
      signal?: AbortSignal
    ): Promise<SearchHit[]> {
      if (limit <= 0) {
        return [];
      }

      try {
        const vector = await options.embed(text, signal);
        signal?.throwIfAborted();
        const client = await getClient();
        const points = await client.search(options.collection, {
          vector,
          limit,
          filter: toVectorFilter(filters)
        });
        signal?.throwIfAborted();
        return points.map((point) => ({ id: point.id, score: point.score, properties: point.payload }));
      } catch (error) {
        throw new SearchBackendError(
          `Vector query on "${options.collection}" failed: ${describeError(error)}`,
          { cause: error }
        );
      }
    }
  };
};
