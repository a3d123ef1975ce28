export type {
  IVectorStore,
  VectorSearchParams,
  VectorSearchResult,
} from "./vector-store.interface.js";
export { InMemoryVectorStore } from "./in-memory-store.js";
export { cosineSimilarity } from "./similarity.js";
export { VectorIndex, sameSignature, describeSignature } from "./vector-index.js";
export { persistIndex, loadIndex, indexExists } from "./persistence.js";
export {
  INDEX_FORMAT_VERSION,
  MANIFEST_FILE,
  NODES_FILE,
  VECTORS_FILE,
  manifestSchema,
  nodesSchema,
  vectorsSchema,
} from "./schemas.js";
export type { IndexManifest } from "./schemas.js";
