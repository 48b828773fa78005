export type VectorCondition =
  | { key: string; match: { any: string[] } }
  | { key: string; match: { text: string } }
  | { key: string; range: { gt?: number; lt?: number } };

export type VectorFilter = {
  must?: VectorCondition[];
  should?: VectorCondition[];
};

export type VectorPoint = {
  id: string;
  score: number;
  payload: Record<string, unknown>;
};

export type VectorPointId = string | number;

export interface VectorSearchRequest {
  vector: number[];
  limit: number;
  filter?: VectorFilter;
}

export interface VectorScrollRequest {
  limit: number;
  filter?: VectorFilter;
  // Id of the first point to return, taken from a previous page.
  offset?: VectorPointId;
}

export interface VectorScrollPage {
  points: VectorPoint[];
  nextOffset: VectorPointId | null;
}

export interface VectorStoreClient {
  getCollections: () => Promise<{ collections: Array<{ name: string }> }>;
  search: (collection: string, request: VectorSearchRequest) => Promise<VectorPoint[]>;
  scroll: (collection: string, request: VectorScrollRequest) => Promise<VectorScrollPage>;
}
