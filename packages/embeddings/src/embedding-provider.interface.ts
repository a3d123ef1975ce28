import type { EmbeddingResult, EmbeddingSignature } from "@tablelens/types";

/** Documents are embedded at ingest, queries at retrieval. Some providers embed them differently. */
export type EmbeddingInputType = "document" | "query";

export interface EmbedOptions {
  inputType?: EmbeddingInputType;
  signal?: AbortSignal;
}

export interface IEmbeddingProvider {
  readonly name: string;
  readonly model: string;
  readonly dimensions: number;

  signature(): EmbeddingSignature;
  embed(text: string, options?: EmbedOptions): Promise<EmbeddingResult>;
  batchEmbed(texts: string[], options?: EmbedOptions): Promise<EmbeddingResult>;
}
