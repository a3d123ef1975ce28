export type { PageText, BoundingBox, TableRegion, TableArtifact } from "./document.js";
export type {
  NodeModality,
  TextNodeMetadata,
  TableNodeMetadata,
  TextNode,
  TableNode,
  IndexNode,
  ScoredNode,
} from "./node.js";
export { isTableNode, isTextNode } from "./node.js";
export type {
  ChunkStrategy,
  ParseResult,
  ChunkingPipelineConfig,
  ChunkResult,
  EmbeddingResult,
  EmbeddingSignature,
  VectorRecord,
} from "./pipeline.js";
export type {
  RetrievalResult,
  QueryResponse,
  QueryErrorCode,
  QueryError,
  CitationReport,
} from "./query.js";
export type { Result } from "./result.js";
export { ok, err } from "./result.js";
export type {
  AppConfig,
  EmbeddingProviderType,
  ProviderConfig,
  EmbeddingConfig,
  DetectorConfig,
  ChunkingConfig,
  SummarizerConfig,
  RetrievalConfig,
  PathsConfig,
} from "./config.js";
