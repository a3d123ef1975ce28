import type { ChunkStrategy } from "@tablelens/types";
import type { IChunker } from "./chunker.interface.js";
import { FixedChunker } from "./fixed-chunker.js";
import { SentenceChunker } from "./sentence-chunker.js";

export function createChunker(strategy: ChunkStrategy): IChunker {
  switch (strategy) {
    case "fixed":
      return new FixedChunker();
    case "sentence":
      return new SentenceChunker();
    default:
      throw new Error(`Unknown chunking strategy: ${String(strategy)}`);
  }
}
