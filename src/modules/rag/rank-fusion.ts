import type { FusionScore, ScoredResult } from "./types.js";

export const DEFAULT_FUSION_ALPHA = 0.5;
export const DEFAULT_FUSION_K = 60;

type FusionEntry = FusionScore & { result: ScoredResult };

const accumulate = (
  entries: Map<string, FusionEntry>,
  results: ScoredResult[],
  weight: number,
  k: number,
  field: "keywordScore" | "semanticScore"
): void => {
  const seenInList = new Set<string>();
  results.forEach((result, rank) => {
    // A repeated id keeps the contribution of its best (first) rank.
    if (seenInList.has(result.id)) {
      return;
    }
    seenInList.add(result.id);

    const partial = weight / (k + rank + 1);
    const entry = entries.get(result.id) ?? {
      id: result.id,
      keywordScore: 0,
      semanticScore: 0,
      finalScore: 0,
      result
    };
    entry[field] = partial;
    entries.set(result.id, entry);
  });
};

const computeEntries = (
  keywordList: ScoredResult[],
  semanticList: ScoredResult[],
  alpha: number,
  k: number
): FusionEntry[] => {
  const entries = new Map<string, FusionEntry>();
  accumulate(entries, keywordList, alpha, k, "keywordScore");
  accumulate(entries, semanticList, 1 - alpha, k, "semanticScore");

  const ordered = Array.from(entries.values());
  for (const entry of ordered) {
    entry.finalScore = entry.keywordScore + entry.semanticScore;
  }
  // Array.prototype.sort is stable, so equal scores keep first-encounter order.
  return ordered.sort((a, b) => b.finalScore - a.finalScore);
};

export const computeFusionScores = (
  keywordList: ScoredResult[],
  semanticList: ScoredResult[],
  alpha: number = DEFAULT_FUSION_ALPHA,
  k: number = DEFAULT_FUSION_K
): FusionScore[] =>
  computeEntries(keywordList, semanticList, alpha, k).map(({ id, keywordScore, semanticScore, finalScore }) => ({
    id,
    keywordScore,
    semanticScore,
    finalScore
  }));

export const fuse = (
  keywordList: ScoredResult[],
  semanticList: ScoredResult[],
  alpha: number = DEFAULT_FUSION_ALPHA,
  k: number = DEFAULT_FUSION_K
): ScoredResult[] =>
  computeEntries(keywordList, semanticList, alpha, k).map((entry, rank) => ({
    id: entry.id,
    sourceList: "hybrid",
    rank,
    properties: entry.result.properties,
    score: entry.finalScore
  }));
