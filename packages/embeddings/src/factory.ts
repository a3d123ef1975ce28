import type { EmbeddingConfig, ProviderConfig } from "@tablelens/types";
import { ConfigurationError } from "@tablelens/errors";
import { createOpenRouterProvider } from "@tablelens/llm";
import type { IEmbeddingProvider } from "./embedding-provider.interface.js";
import { CohereEmbeddingProvider } from "./cohere-provider.js";
import { AiSdkEmbeddingProvider } from "./ai-sdk-provider.js";

export function createEmbeddingProvider(
  embedding: EmbeddingConfig,
  provider: ProviderConfig,
): IEmbeddingProvider {
  switch (embedding.provider) {
    case "cohere":
      if (!embedding.cohereApiKey) {
        throw new ConfigurationError("COHERE_API_KEY is required when EMBEDDING_PROVIDER is 'cohere'");
      }
      return new CohereEmbeddingProvider({
        apiKey: embedding.cohereApiKey,
        model: embedding.model,
        dimensions: embedding.dimensions,
      });
    case "openai": {
      const gateway = createOpenRouterProvider(provider);
      return new AiSdkEmbeddingProvider({
        model: gateway.embedding(embedding.model, { dimensions: embedding.dimensions }),
        modelId: embedding.model,
        dimensions: embedding.dimensions,
      });
    }
    default:
      throw new ConfigurationError(`Unknown embedding provider: ${String(embedding.provider)}`);
  }
}
