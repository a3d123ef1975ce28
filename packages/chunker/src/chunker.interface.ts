import type { ChunkResult, ChunkingPipelineConfig } from "@tablelens/types";

export interface IChunker {
  readonly strategy: string;
  chunk(content: string, config: ChunkingPipelineConfig): ChunkResult[];
}
