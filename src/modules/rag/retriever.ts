import { logInfo, logWarn, serializeError } from "../../observability/logger.js";
import { recordErrorRate, recordRetrievalLatency } from "../../observability/metrics.js";
import { DEFAULT_FUSION_ALPHA, DEFAULT_FUSION_K, fuse } from "./rank-fusion.js";
import type {
  RetrievalSource,
  RetrieveOptions,
  Retriever,
  RetrieverType,
  ScoredResult,
  SearchBackend,
  SearchHit
} from "./types.js";

export interface RetrieverDependencies {
  now?: () => number;
  recordRetrievalLatency?: typeof recordRetrievalLatency;
  recordErrorRate?: typeof recordErrorRate;
  logInfo?: typeof logInfo;
  logWarn?: typeof logWarn;
}

const resolveDependencies = (dependencies?: RetrieverDependencies) => ({
  now: dependencies?.now ?? Date.now,
  recordRetrievalLatency: dependencies?.recordRetrievalLatency ?? recordRetrievalLatency,
  recordErrorRate: dependencies?.recordErrorRate ?? recordErrorRate,
  logInfo: dependencies?.logInfo ?? logInfo,
  logWarn: dependencies?.logWarn ?? logWarn
});

type ResolvedDependencies = ReturnType<typeof resolveDependencies>;

const toScoredResults = (hits: SearchHit[], sourceList: RetrievalSource): ScoredResult[] =>
  hits.map((hit, rank) => ({
    id: hit.id,
    sourceList,
    rank,
    properties: hit.properties,
    ...(hit.score === undefined ? {} : { score: hit.score })
  }));

/**
 * Runs one backend query. Backend failures are logged and produce an empty
 * list so a single strategy never fails the request.
 */
const runStrategy = async (
  strategy: "keyword" | "semantic",
  query: () => Promise<SearchHit[]>,
  topK: number,
  options: RetrieveOptions | undefined,
  dependencies: ResolvedDependencies
): Promise<ScoredResult[]> => {
  const startedAt = dependencies.now();
  const context = { requestId: options?.requestId ?? null, route: options?.route ?? "product" };

  let results: ScoredResult[];
  try {
    results = toScoredResults(await query(), strategy);
  } catch (error) {
    dependencies.recordErrorRate(`rag.retrieve.${strategy}`);
    dependencies.logWarn(`rag.retrieve.${strategy}.failed`, context, {
      top_k: topK,
      ...serializeError(error)
    });
    return [];
  }

  const latencyMs = dependencies.now() - startedAt;
  dependencies.recordRetrievalLatency(latencyMs);
  dependencies.logInfo(`rag.retrieve.${strategy}.complete`, context, {
    top_k: topK,
    result_count: results.length,
    latency_ms: latencyMs
  });
  return results;
};

export class KeywordRetriever implements Retriever {
  readonly type = "bm25";
  private readonly dependencies: ResolvedDependencies;

  constructor(
    private readonly backend: SearchBackend,
    dependencies?: RetrieverDependencies
  ) {
    this.dependencies = resolveDependencies(dependencies);
  }

  retrieve(query: string, topK: number, options?: RetrieveOptions): Promise<ScoredResult[]> {
    return runStrategy(
      "keyword",
      () => this.backend.queryByKeyword(query, topK, options?.signal),
      topK,
      options,
      this.dependencies
    );
  }
}

export class SemanticRetriever implements Retriever {
  readonly type = "semantic";
  private readonly dependencies: ResolvedDependencies;

  constructor(
    private readonly backend: SearchBackend,
    dependencies?: RetrieverDependencies
  ) {
    this.dependencies = resolveDependencies(dependencies);
  }

  retrieve(query: string, topK: number, options?: RetrieveOptions): Promise<ScoredResult[]> {
    // Simplified requests never send predicates, even when some were extracted.
    const filters =
      !options?.simplified && options?.filters && options.filters.length > 0 ? options.filters : undefined;
    return runStrategy(
      "semantic",
      () => this.backend.queryByVectorSimilarity(query, topK, filters, options?.signal),
      topK,
      options,
      this.dependencies
    );
  }
}

export class HybridRetriever implements Retriever {
  readonly type = "hybrid";
  private readonly keyword: KeywordRetriever;
  private readonly semantic: SemanticRetriever;
  private readonly dependencies: ResolvedDependencies;

  constructor(backend: SearchBackend, dependencies?: RetrieverDependencies) {
    this.keyword = new KeywordRetriever(backend, dependencies);
    this.semantic = new SemanticRetriever(backend, dependencies);
    this.dependencies = resolveDependencies(dependencies);
  }

  async retrieve(query: string, topK: number, options?: RetrieveOptions): Promise<ScoredResult[]> {
    const candidateTopK = topK * 2;
    const [keywordResults, semanticResults] = await Promise.all([
      this.keyword.retrieve(query, candidateTopK, options),
      this.semantic.retrieve(query, candidateTopK, options)
    ]);

    const alpha = options?.alpha ?? DEFAULT_FUSION_ALPHA;
    const k = options?.k ?? DEFAULT_FUSION_K;
    const fused = fuse(keywordResults, semanticResults, alpha, k);
    const results = fused.slice(0, topK);

    this.dependencies.logInfo(
      "rag.retrieve.hybrid.complete",
      { requestId: options?.requestId ?? null, route: options?.route ?? "product" },
      {
        alpha,
        k,
        keyword_count: keywordResults.length,
        semantic_count: semanticResults.length,
        fused_count: fused.length,
        result_count: results.length
      }
    );
    return results;
  }
}

export const createRetriever = (
  type: RetrieverType,
  backend: SearchBackend,
  dependencies?: RetrieverDependencies
): Retriever => {
  switch (type) {
    case "bm25":
      return new KeywordRetriever(backend, dependencies);
    case "semantic":
      return new SemanticRetriever(backend, dependencies);
    case "hybrid":
      return new HybridRetriever(backend, dependencies);
  }
};
