import type { QueryResponse, RetrievalResult } from "@tablelens/types";
import { withRetry, withTimeout } from "@tablelens/errors";
import type { Logger } from "@tablelens/logger";
import type { ILanguageModel } from "@tablelens/llm";
import { assembleContext } from "./context-assembler.js";
import { ANALYST_SYSTEM_PROMPT, buildQuestionPrompt } from "./prompts.js";

export interface SynthesizerOptions {
  maxRetries: number;
  requestTimeoutMs: number;
  retryBaseDelayMs?: number;
}

/**
 * Answers a question from retrieved context with one completion request,
 * retried on transient provider errors.
 */
export class Synthesizer {
  constructor(
    private readonly llm: ILanguageModel,
    private readonly logger: Logger,
    private readonly options: SynthesizerOptions,
  ) {}

  async answer(question: string, results: RetrievalResult): Promise<QueryResponse> {
    const { context, sourceImages } = assembleContext(results);
    const prompt = buildQuestionPrompt(context, question);

    const text = await withRetry(
      () =>
        withTimeout("answer synthesis", this.options.requestTimeoutMs, (signal) =>
          this.llm.complete(prompt, { system: ANALYST_SYSTEM_PROMPT, signal }),
        ),
      {
        maxRetries: this.options.maxRetries,
        baseDelayMs: this.options.retryBaseDelayMs,
        logger: this.logger,
        operation: "answer synthesis",
      },
    );

    this.logger.debug(
      { model: this.llm.modelId, nodes: results.length, images: sourceImages.length },
      "synthesized answer",
    );

    return { answer: text.trim(), sourceImages, context };
  }
}
