import type { ChunkResult, ChunkingPipelineConfig } from "@tablelens/types";
import type { IChunker } from "./chunker.interface.js";
import { CHARS_PER_TOKEN, estimateTokens, snapToCodePoint, validateChunkingConfig } from "./tokens.js";

/**
 * Fixed-size character windows. Consecutive windows share `overlap` tokens,
 * so the stride is `maxTokens - overlap`.
 */
export class FixedChunker implements IChunker {
  readonly strategy = "fixed";

  chunk(content: string, config: ChunkingPipelineConfig): ChunkResult[] {
    validateChunkingConfig(config);

    const windowChars = config.maxTokens * CHARS_PER_TOKEN;
    const strideChars = windowChars - config.overlap * CHARS_PER_TOKEN;
    const results: ChunkResult[] = [];

    for (let start = 0; start < content.length; start += strideChars) {
      const from = snapToCodePoint(content, start);
      const end = snapToCodePoint(content, Math.min(start + windowChars, content.length));
      const raw = content.slice(from, end);
      const text = raw.trim();

      if (text.length > 0) {
        const startChar = from + raw.indexOf(text);
        results.push({
          content: text,
          index: results.length,
          tokenCount: estimateTokens(text),
          metadata: { startChar, endChar: startChar + text.length },
        });
      }

      if (end === content.length) break;
    }

    return results;
  }
}
