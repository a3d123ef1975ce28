import { generateText, type LanguageModel } from "ai";
import { AppError, ExternalServiceError } from "@tablelens/errors";
import type {
  CallOptions,
  CompletionOptions,
  ILanguageModel,
  ImageInput,
  IVisionModel,
} from "./model.interface.js";

function toServiceError(error: unknown, modelId: string): unknown {
  if (AppError.isAppError(error)) return error;
  const reason = error instanceof Error ? error.message : String(error);
  return new ExternalServiceError(`Model ${modelId} request failed: ${reason}`, "llm", {
    cause: error,
  });
}

/**
 * Text completion through any AI SDK language model.
 */
export class AiSdkLanguageModel implements ILanguageModel {
  constructor(
    private readonly model: LanguageModel,
    readonly modelId: string,
  ) {}

  async complete(prompt: string, options?: CompletionOptions): Promise<string> {
    try {
      const { text } = await generateText({
        model: this.model,
        system: options?.system,
        prompt,
        abortSignal: options?.signal,
      });
      return text;
    } catch (error: unknown) {
      throw toServiceError(error, this.modelId);
    }
  }
}

/**
 * Single-image description: one user message holding the instruction and the image.
 */
export class AiSdkVisionModel implements IVisionModel {
  constructor(
    private readonly model: LanguageModel,
    readonly modelId: string,
  ) {}

  async describeImage(input: ImageInput, options?: CallOptions): Promise<string> {
    try {
      const { text } = await generateText({
        model: this.model,
        messages: [
          {
            role: "user",
            content: [
              { type: "text", text: input.instruction },
              { type: "image", image: input.image, mimeType: input.mimeType },
            ],
          },
        ],
        abortSignal: options?.signal,
      });
      return text;
    } catch (error: unknown) {
      throw toServiceError(error, this.modelId);
    }
  }
}
