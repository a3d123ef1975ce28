import { CohereClient } from "cohere-ai";
import type { EmbeddingResult, EmbeddingSignature } from "@tablelens/types";
import { ExternalServiceError } from "@tablelens/errors";
import type {
  EmbeddingInputType,
  EmbedOptions,
  IEmbeddingProvider,
} from "./embedding-provider.interface.js";

const DEFAULT_MODEL = "embed-v4.0";
const DEFAULT_DIMENSIONS = 1024;
const BATCH_SIZE = 96; // Cohere limit

const INPUT_TYPES = {
  document: "search_document",
  query: "search_query",
} as const satisfies Record<EmbeddingInputType, string>;

export interface CohereProviderConfig {
  apiKey: string;
  model?: string;
  dimensions?: number;
}

export class CohereEmbeddingProvider implements IEmbeddingProvider {
  readonly name = "cohere";
  readonly model: string;
  readonly dimensions: number;
  private client: CohereClient;

  constructor(config: CohereProviderConfig) {
    this.client = new CohereClient({ token: config.apiKey });
    this.model = config.model ?? DEFAULT_MODEL;
    this.dimensions = config.dimensions ?? DEFAULT_DIMENSIONS;
  }

  signature(): EmbeddingSignature {
    return { provider: this.name, model: this.model, dimensions: this.dimensions };
  }

  async embed(text: string, options?: EmbedOptions): Promise<EmbeddingResult> {
    return this.batchEmbed([text], options);
  }

  async batchEmbed(texts: string[], options?: EmbedOptions): Promise<EmbeddingResult> {
    const allEmbeddings: number[][] = [];
    let totalTokens = 0;
    const inputType = INPUT_TYPES[options?.inputType ?? "document"];

    for (let i = 0; i < texts.length; i += BATCH_SIZE) {
      const batch = texts.slice(i, i + BATCH_SIZE);

      let response;
      try {
        response = await this.client.v2.embed(
          {
            texts: batch,
            model: this.model,
            inputType,
            embeddingTypes: ["float"],
            outputDimension: this.dimensions,
          },
          { abortSignal: options?.signal, maxRetries: 0 },
        );
      } catch (error: unknown) {
        const reason = error instanceof Error ? error.message : String(error);
        throw new ExternalServiceError(`Cohere embedding failed: ${reason}`, this.name, {
          cause: error,
        });
      }

      if (response.embeddings.float) {
        allEmbeddings.push(...response.embeddings.float);
      }

      if (response.meta?.billedUnits?.inputTokens) {
        totalTokens += response.meta.billedUnits.inputTokens;
      }
    }

    return {
      embeddings: allEmbeddings,
      model: this.model,
      tokensUsed: totalTokens,
      dimensions: this.dimensions,
    };
  }
}
