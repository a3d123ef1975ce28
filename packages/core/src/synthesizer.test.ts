import { describe, it, expect } from "vitest";
import type { RetrievalResult } from "@tablelens/types";
import { ExternalServiceError, ValidationError } from "@tablelens/errors";
import { createSilentLogger } from "@tablelens/logger";
import { Synthesizer } from "./synthesizer.js";
import { ANALYST_SYSTEM_PROMPT } from "./prompts.js";
import { providerDown, ScriptedLanguageModel } from "./testing/fakes.js";

const RESULTS: RetrievalResult = [
  {
    node: {
      id: "table-p4_table_0.png",
      modality: "table_image",
      text: "Net sales 391,035.",
      metadata: { imagePath: "/tables/p4_table_0.png", fileName: "p4_table_0.png", pageNumber: 4 },
    },
    score: 0.9,
  },
];

function synthesizer(llm: ScriptedLanguageModel, maxRetries = 2) {
  return new Synthesizer(llm, createSilentLogger(), {
    maxRetries,
    requestTimeoutMs: 1000,
    retryBaseDelayMs: 1,
  });
}

describe("Synthesizer", () => {
  it("asks one question over the assembled context", async () => {
    const llm = new ScriptedLanguageModel(["  Net sales were $391.0 billion (p4_table_0.png).  "]);

    const response = await synthesizer(llm).answer("What were net sales?", RESULTS);

    expect(response).toEqual({
      answer: "Net sales were $391.0 billion (p4_table_0.png).",
      sourceImages: ["/tables/p4_table_0.png"],
      context: "\n--- Source: Table Image (p4_table_0.png) ---\nNet sales 391,035.\n",
    });
    expect(llm.calls).toEqual([
      {
        prompt:
          "Context:\n\n--- Source: Table Image (p4_table_0.png) ---\nNet sales 391,035.\n\nQuestion: What were net sales?\nAnswer:",
        system: ANALYST_SYSTEM_PROMPT,
      },
    ]);
  });

  it("retries transient provider errors", async () => {
    const llm = new ScriptedLanguageModel([providerDown(), providerDown(), "Recovered answer."]);

    const response = await synthesizer(llm, 2).answer("What were net sales?", RESULTS);

    expect(response.answer).toBe("Recovered answer.");
    expect(llm.calls).toHaveLength(3);
  });

  it("gives up after the retry budget", async () => {
    const llm = new ScriptedLanguageModel([providerDown()]);

    await expect(synthesizer(llm, 1).answer("What were net sales?", RESULTS)).rejects.toBeInstanceOf(
      ExternalServiceError,
    );
    expect(llm.calls).toHaveLength(2);
  });

  it("does not retry non-retryable errors", async () => {
    const llm = new ScriptedLanguageModel([new ValidationError("bad prompt", { prompt: "too long" })]);

    await expect(synthesizer(llm, 3).answer("q", RESULTS)).rejects.toBeInstanceOf(ValidationError);
    expect(llm.calls).toHaveLength(1);
  });
});
