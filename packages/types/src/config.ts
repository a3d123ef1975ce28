import type { ChunkStrategy } from "./pipeline.js";

export type EmbeddingProviderType = "openai" | "cohere";

export interface AppConfig {
  nodeEnv: "development" | "test" | "production";
  logLevel: "debug" | "info" | "warn" | "error";
  provider: ProviderConfig;
  embedding: EmbeddingConfig;
  detector: DetectorConfig;
  chunking: ChunkingConfig;
  summarizer: SummarizerConfig;
  retrieval: RetrievalConfig;
  paths: PathsConfig;
}

export interface ProviderConfig {
  apiKey: string;
  baseUrl: string;
  llmModel: string;
  vlmModel: string;
  requestTimeoutMs: number;
  maxRetries: number;
}

export interface EmbeddingConfig {
  provider: EmbeddingProviderType;
  model: string;
  dimensions: number;
  cohereApiKey: string;
}

export interface DetectorConfig {
  url: string;
  confidence: number;
  renderScale: number;
}

export interface ChunkingConfig {
  strategy: ChunkStrategy;
  maxTokens: number;
  overlap: number;
}

export interface SummarizerConfig {
  concurrency: number;
}

export interface RetrievalConfig {
  topK: number;
}

export interface PathsConfig {
  pdfPath: string;
  tableOutputDir: string;
  persistDir: string;
}
