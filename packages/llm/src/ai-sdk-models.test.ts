import { describe, it, expect } from "vitest";
import { MockLanguageModelV1 } from "ai/test";
import { ExternalServiceError } from "@tablelens/errors";
import { AiSdkLanguageModel, AiSdkVisionModel } from "./ai-sdk-models.js";
import { createLanguageModel, createVisionModel } from "./provider.js";

const usage = { promptTokens: 10, completionTokens: 5 };

describe("AiSdkLanguageModel", () => {
  it("returns the generated text", async () => {
    const prompts: unknown[] = [];
    const mock = new MockLanguageModelV1({
      doGenerate: async (options) => {
        prompts.push(options.prompt);
        return {
          rawCall: { rawPrompt: null, rawSettings: {} },
          finishReason: "stop",
          usage,
          text: "Net sales were $391.0 billion (Page 22).",
        };
      },
    });
    const model = new AiSdkLanguageModel(mock, "test-llm");

    const answer = await model.complete("What were net sales?");

    expect(answer).toBe("Net sales were $391.0 billion (Page 22).");
    expect(model.modelId).toBe("test-llm");
    expect(prompts).toEqual([
      [{ role: "user", content: [{ type: "text", text: "What were net sales?" }] }],
    ]);
  });

  it("sends the system instruction ahead of the prompt", async () => {
    const prompts: unknown[] = [];
    const mock = new MockLanguageModelV1({
      doGenerate: async (options) => {
        prompts.push(options.prompt);
        return {
          rawCall: { rawPrompt: null, rawSettings: {} },
          finishReason: "stop",
          usage,
          text: "ok",
        };
      },
    });
    const model = new AiSdkLanguageModel(mock, "test-llm");

    await model.complete("Question", { system: "Answer from context only." });

    expect(prompts).toEqual([
      [
        { role: "system", content: "Answer from context only." },
        { role: "user", content: [{ type: "text", text: "Question" }] },
      ],
    ]);
  });

  it("wraps provider failures in ExternalServiceError", async () => {
    const mock = new MockLanguageModelV1({
      doGenerate: async () => {
        throw new Error("401 invalid key");
      },
    });
    const model = new AiSdkLanguageModel(mock, "test-llm");

    await expect(model.complete("hello")).rejects.toBeInstanceOf(ExternalServiceError);
  });
});

describe("AiSdkVisionModel", () => {
  it("sends the instruction and the image in one user message", async () => {
    const prompts: unknown[] = [];
    const mock = new MockLanguageModelV1({
      doGenerate: async (options) => {
        prompts.push(options.prompt);
        return {
          rawCall: { rawPrompt: null, rawSettings: {} },
          finishReason: "stop",
          usage,
          text: "Columns: 2024, 2023. Net sales 391,035 and 383,285.",
        };
      },
    });
    const model = new AiSdkVisionModel(mock, "test-vlm");
    const image = new Uint8Array([137, 80, 78, 71]);

    const summary = await model.describeImage({
      image,
      mimeType: "image/png",
      instruction: "Describe this table.",
    });

    expect(summary).toBe("Columns: 2024, 2023. Net sales 391,035 and 383,285.");
    expect(prompts).toHaveLength(1);
    expect(prompts[0]).toEqual([
      {
        role: "user",
        content: [
          { type: "text", text: "Describe this table." },
          expect.objectContaining({ type: "image", mimeType: "image/png" }),
        ],
      },
    ]);
  });
});

describe("provider factories", () => {
  const config = {
    apiKey: "test-key",
    baseUrl: "http://localhost:4000/v1",
    llmModel: "openai/gpt-4o-mini",
    vlmModel: "google/gemini-flash-1.5",
    requestTimeoutMs: 1000,
    maxRetries: 0,
  };

  it("creates models with the configured ids", () => {
    expect(createLanguageModel(config).modelId).toBe("openai/gpt-4o-mini");
    expect(createVisionModel(config).modelId).toBe("google/gemini-flash-1.5");
  });
});
