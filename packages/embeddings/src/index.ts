export type {
  IEmbeddingProvider,
  EmbeddingInputType,
  EmbedOptions,
} from "./embedding-provider.interface.js";
export { CohereEmbeddingProvider } from "./cohere-provider.js";
export type { CohereProviderConfig } from "./cohere-provider.js";
export { AiSdkEmbeddingProvider } from "./ai-sdk-provider.js";
export type { AiSdkEmbeddingProviderConfig } from "./ai-sdk-provider.js";
export { createEmbeddingProvider } from "./factory.js";
