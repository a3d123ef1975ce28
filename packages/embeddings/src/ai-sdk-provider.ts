import { embedMany, type EmbeddingModel } from "ai";
import type { EmbeddingResult, EmbeddingSignature } from "@tablelens/types";
import { AppError, ExternalServiceError } from "@tablelens/errors";
import type { EmbedOptions, IEmbeddingProvider } from "./embedding-provider.interface.js";

export interface AiSdkEmbeddingProviderConfig {
  model: EmbeddingModel<string>;
  modelId: string;
  dimensions: number;
  name?: string;
}

/**
 * Embeddings through the AI SDK. Used with OpenAI-compatible gateways.
 */
export class AiSdkEmbeddingProvider implements IEmbeddingProvider {
  readonly name: string;
  readonly model: string;
  readonly dimensions: number;
  private embeddingModel: EmbeddingModel<string>;

  constructor(config: AiSdkEmbeddingProviderConfig) {
    this.name = config.name ?? "openai";
    this.model = config.modelId;
    this.dimensions = config.dimensions;
    this.embeddingModel = config.model;
  }

  signature(): EmbeddingSignature {
    return { provider: this.name, model: this.model, dimensions: this.dimensions };
  }

  async embed(text: string, options?: EmbedOptions): Promise<EmbeddingResult> {
    return this.batchEmbed([text], options);
  }

  async batchEmbed(texts: string[], options?: EmbedOptions): Promise<EmbeddingResult> {
    if (texts.length === 0) {
      return { embeddings: [], model: this.model, tokensUsed: 0, dimensions: this.dimensions };
    }

    try {
      const { embeddings, usage } = await embedMany({
        model: this.embeddingModel,
        values: texts,
        abortSignal: options?.signal,
        maxRetries: 0,
      });

      return {
        embeddings,
        model: this.model,
        tokensUsed: usage.tokens,
        dimensions: this.dimensions,
      };
    } catch (error: unknown) {
      if (AppError.isAppError(error)) throw error;
      const reason = error instanceof Error ? error.message : String(error);
      throw new ExternalServiceError(`Embedding request failed: ${reason}`, this.name, {
        cause: error,
      });
    }
  }
}
