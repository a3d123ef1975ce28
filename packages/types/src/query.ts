import type { ScoredNode } from "./node.js";

/** Ordered by descending score, ties in insertion order. */
export type RetrievalResult = ScoredNode[];

export interface QueryResponse {
  answer: string;
  /** Distinct table image paths in first-retrieval order. */
  sourceImages: string[];
  context: string;
}

export type QueryErrorCode = "NOT_INGESTED" | "INDEX_CORRUPT" | "SYNTHESIS_FAILED";

export interface QueryError {
  code: QueryErrorCode;
  message: string;
}

export interface CitationReport {
  citedPages: number[];
  citedTables: string[];
  /** Cited pages or filenames that no retrieved node carries. */
  unmatchedCitations: string[];
  /** Retrieved table images the answer never names. */
  uncitedImages: string[];
}
