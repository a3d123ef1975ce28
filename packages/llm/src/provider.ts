import { createOpenAI } from "@ai-sdk/openai";
import type { ProviderConfig } from "@tablelens/types";
import { AiSdkLanguageModel, AiSdkVisionModel } from "./ai-sdk-models.js";
import type { ILanguageModel, IVisionModel } from "./model.interface.js";

/**
 * OpenRouter (or any OpenAI-compatible gateway) as an AI SDK provider.
 */
export function createOpenRouterProvider(config: ProviderConfig) {
  return createOpenAI({
    apiKey: config.apiKey,
    baseURL: config.baseUrl,
    compatibility: "compatible",
  });
}

export function createLanguageModel(config: ProviderConfig): ILanguageModel {
  const provider = createOpenRouterProvider(config);
  return new AiSdkLanguageModel(provider.chat(config.llmModel), config.llmModel);
}

export function createVisionModel(config: ProviderConfig): IVisionModel {
  const provider = createOpenRouterProvider(config);
  return new AiSdkVisionModel(provider.chat(config.vlmModel), config.vlmModel);
}
