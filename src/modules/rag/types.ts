export type RetrieverType = "bm25" | "semantic" | "hybrid";

export type RetrievalSource = "keyword" | "semantic" | "hybrid";

export type ScoredResult = {
  id: string;
  sourceList: RetrievalSource;
  rank: number;
  properties: Record<string, unknown>;
  score?: number;
};

export type FusionScore = {
  id: string;
  keywordScore: number;
  semanticScore: number;
  finalScore: number;
};

export const FILTERABLE_TEXT_FIELDS = [
  "gender",
  "masterCategory",
  "articleType",
  "baseColour",
  "usage",
  "season"
] as const;

export type FilterableTextField = (typeof FILTERABLE_TEXT_FIELDS)[number];

export type PriceRange = {
  min: number;
  max: number;
};

export type FilterSpec = Partial<Record<FilterableTextField, string[]>> & {
  price?: PriceRange;
};

export type FilterPredicate =
  | { kind: "any_of"; field: FilterableTextField; values: string[] }
  | { kind: "greater_than"; field: "price"; value: number }
  | { kind: "less_than"; field: "price"; value: number };

export type RetrievalConfig = Readonly<{
  retrieverType: RetrieverType;
  simplified: boolean;
  topK: number;
  alpha: number;
  k: number;
  useReranker: boolean;
  rerankQuery?: string;
}>;

export type SearchHit = {
  id: string;
  score?: number;
  properties: Record<string, unknown>;
};

export interface SearchBackend {
  queryByKeyword(text: string, limit: number, signal?: AbortSignal): Promise<SearchHit[]>;
  queryByVectorSimilarity(
    text: string,
    limit: number,
    filters?: FilterPredicate[],
    signal?: AbortSignal
  ): Promise<SearchHit[]>;
}

export type RetrieveOptions = {
  // Route the retrieval serves, for log correlation. Defaults to "product".
  route?: "faq" | "product";
  simplified?: boolean;
  filters?: FilterPredicate[] | null;
  alpha?: number;
  k?: number;
  requestId?: string;
  signal?: AbortSignal;
};

export interface Retriever {
  readonly type: RetrieverType;
  retrieve(query: string, topK: number, options?: RetrieveOptions): Promise<ScoredResult[]>;
}
