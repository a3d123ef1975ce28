import type { PageText } from "./document.js";

export type ChunkStrategy = "sentence" | "fixed";

export interface ParseResult {
  pages: PageText[];
  pageCount: number;
}

export interface ChunkingPipelineConfig {
  strategy: ChunkStrategy;
  /** Window size in estimated tokens. */
  maxTokens: number;
  /** Tokens shared between consecutive windows; always below maxTokens. */
  overlap: number;
}

export interface ChunkResult {
  content: string;
  index: number;
  tokenCount: number;
  metadata: {
    startChar: number;
    endChar: number;
  };
}

export interface EmbeddingResult {
  embeddings: number[][];
  model: string;
  tokensUsed: number;
  dimensions: number;
}

/**
 * Identifies the embedding space of an index. Queries must present the
 * same signature as the build.
 */
export interface EmbeddingSignature {
  provider: string;
  model: string;
  dimensions: number;
}

export interface VectorRecord {
  id: string;
  vector: number[];
}
