import { logInfo, logWarn, serializeError } from "../../observability/logger.js";
import type { CrossEncoderCapability } from "./cross-encoder.js";
import type { ScoredResult } from "./types.js";

export interface RerankOptions {
  rerankQuery?: string;
  requestId?: string;
  signal?: AbortSignal;
}

export type RerankedResult = {
  result: ScoredResult;
  score: number;
};

export interface RerankerDependencies {
  now?: () => number;
  logInfo?: typeof logInfo;
  logWarn?: typeof logWarn;
}

const asText = (value: unknown): string =>
  typeof value === "string" || typeof value === "number" ? String(value) : "";

export const toRerankDocument = (properties: Record<string, unknown>): string => {
  if ("productDisplayName" in properties) {
    return `${asText(properties.productDisplayName)} ${asText(properties.baseColour)} ${asText(properties.season)}`;
  }
  if ("question" in properties) {
    return `${asText(properties.question)} ${asText(properties.answer)}`;
  }
  return JSON.stringify(properties);
};

export class Reranker {
  private readonly capability: CrossEncoderCapability;
  private readonly now: () => number;
  private readonly logInfo: typeof logInfo;
  private readonly logWarn: typeof logWarn;

  constructor(capability: CrossEncoderCapability, dependencies?: RerankerDependencies) {
    this.capability = capability;
    this.now = dependencies?.now ?? Date.now;
    this.logInfo = dependencies?.logInfo ?? logInfo;
    this.logWarn = dependencies?.logWarn ?? logWarn;
  }

  async rerank(
    query: string,
    candidates: ScoredResult[],
    topK: number,
    options?: RerankOptions
  ): Promise<ScoredResult[]> {
    const scores = await this.scoreCandidates(query, candidates, topK, options);
    if (!scores) {
      return candidates.slice(0, Math.max(0, topK));
    }
    return this.order(candidates, scores, topK).map(({ result, score }, rank) => ({ ...result, rank, score }));
  }

  async rerankWithScores(
    query: string,
    candidates: ScoredResult[],
    topK: number,
    options?: RerankOptions
  ): Promise<RerankedResult[]> {
    const scores = await this.scoreCandidates(query, candidates, topK, options);
    if (!scores) {
      return candidates.slice(0, Math.max(0, topK)).map((result) => ({ result, score: 0 }));
    }
    return this.order(candidates, scores, topK);
  }

  private order(candidates: ScoredResult[], scores: number[], topK: number): RerankedResult[] {
    return candidates
      .map((result, index) => ({ result, score: scores[index] }))
      .sort((a, b) => b.score - a.score)
      .slice(0, Math.max(0, topK));
  }

  // Returns null when reranking must fall back to the input order.
  private async scoreCandidates(
    query: string,
    candidates: ScoredResult[],
    topK: number,
    options?: RerankOptions
  ): Promise<number[] | null> {
    const context = { requestId: options?.requestId ?? null, route: "product" };
    if (candidates.length === 0) {
      return null;
    }

    const encoder = await this.capability.acquire();
    if (!encoder) {
      this.logWarn("rag.rerank.fallback", context, {
        reason: "cross_encoder_unavailable",
        candidate_count: candidates.length
      });
      return null;
    }

    const startedAt = this.now();
    const rerankQuery = options?.rerankQuery ?? query;
    try {
      const scores = await encoder.score(
        candidates.map((candidate) => ({ query: rerankQuery, document: toRerankDocument(candidate.properties) })),
        options?.signal
      );
      if (scores.length !== candidates.length) {
        this.logWarn("rag.rerank.fallback", context, {
          reason: "score_count_mismatch",
          candidate_count: candidates.length,
          score_count: scores.length
        });
        return null;
      }

      this.logInfo("rag.rerank.complete", context, {
        candidate_count: candidates.length,
        selected_count: Math.min(candidates.length, Math.max(0, topK)),
        latency_ms: this.now() - startedAt,
        custom_query: options?.rerankQuery !== undefined
      });
      return scores;
    } catch (error) {
      this.logWarn("rag.rerank.fallback", context, {
        reason: "scoring_failed",
        candidate_count: candidates.length,
        ...serializeError(error)
      });
      return null;
    }
  }
}
