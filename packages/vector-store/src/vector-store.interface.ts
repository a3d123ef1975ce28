import type { VectorRecord } from "@tablelens/types";

export interface VectorSearchParams {
  vector: number[];
  topK: number;
}

export interface VectorSearchResult {
  id: string;
  score: number;
}

export interface IVectorStore {
  readonly dimensions: number;

  upsert(records: VectorRecord[]): Promise<void>;
  /** Descending score; equal scores keep insertion order. */
  search(params: VectorSearchParams): Promise<VectorSearchResult[]>;
  records(): VectorRecord[];
}
