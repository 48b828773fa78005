const BM25_K1 = 1.5;
const BM25_B = 0.75;

export const tokenize = (text: string): string[] =>
  text
    .toLowerCase()
    .split(/[^\p{L}\p{N}]+/u)
    .filter(Boolean);

export const cosineSimilarity = (a: number[], b: number[]): number => {
  if (a.length === 0 || b.length === 0 || a.length !== b.length) {
    return 0;
  }

  let dot = 0;
  let normA = 0;
  let normB = 0;
  for (let i = 0; i < a.length; i += 1) {
    dot += a[i] * b[i];
    normA += a[i] * a[i];
    normB += b[i] * b[i];
  }
  if (normA === 0 || normB === 0) {
    return 0;
  }
  return dot / (Math.sqrt(normA) * Math.sqrt(normB));
};

export type Bm25Document<T> = {
  item: T;
  text: string;
};

export type Bm25Ranked<T> = {
  item: T;
  score: number;
};

/**
 * Ranks documents against a query with Okapi BM25. Corpus statistics come from
 * the documents passed in, so the scores are relative to that pool. Documents
 * that share no term with the query are dropped.
 */
export const rankBm25 = <T>(query: string, documents: Array<Bm25Document<T>>): Array<Bm25Ranked<T>> => {
  const queryTerms = Array.from(new Set(tokenize(query)));
  if (queryTerms.length === 0 || documents.length === 0) {
    return [];
  }

  const tokenized = documents.map((document) => tokenize(document.text));
  const avgDocLength = tokenized.reduce((sum, tokens) => sum + tokens.length, 0) / tokenized.length;

  const documentFrequency = new Map<string, number>();
  for (const tokens of tokenized) {
    for (const term of new Set(tokens)) {
      documentFrequency.set(term, (documentFrequency.get(term) ?? 0) + 1);
    }
  }

  const ranked: Array<Bm25Ranked<T>> = [];
  tokenized.forEach((tokens, index) => {
    const termFrequency = new Map<string, number>();
    for (const token of tokens) {
      termFrequency.set(token, (termFrequency.get(token) ?? 0) + 1);
    }

    let score = 0;
    for (const term of queryTerms) {
      const tf = termFrequency.get(term) ?? 0;
      if (tf === 0) {
        continue;
      }
      const df = documentFrequency.get(term) ?? 0;
      const idf = Math.log(1 + (documents.length - df + 0.5) / (df + 0.5));
      const denominator = tf + BM25_K1 * (1 - BM25_B + (BM25_B * tokens.length) / Math.max(avgDocLength, 1));
      score += idf * ((tf * (BM25_K1 + 1)) / denominator);
    }

    if (score > 0) {
      ranked.push({ item: documents[index].item, score });
    }
  });

  return ranked.sort((a, b) => b.score - a.score);
};
