export type { IChunker } from "./chunker.interface.js";
export { FixedChunker } from "./fixed-chunker.js";
export { SentenceChunker } from "./sentence-chunker.js";
export { createChunker } from "./factory.js";
export { DocumentChunker, chunkPages, textNodeId } from "./document-chunker.js";
export { CHARS_PER_TOKEN, estimateTokens, validateChunkingConfig } from "./tokens.js";
