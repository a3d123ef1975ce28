export type {
  CallOptions,
  CompletionOptions,
  ILanguageModel,
  ImageInput,
  IVisionModel,
} from "./model.interface.js";
export { AiSdkLanguageModel, AiSdkVisionModel } from "./ai-sdk-models.js";
export { createOpenRouterProvider, createLanguageModel, createVisionModel } from "./provider.js";
