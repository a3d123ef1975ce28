import type { ChunkResult, ChunkingPipelineConfig } from "@tablelens/types";
import type { IChunker } from "./chunker.interface.js";
import { CHARS_PER_TOKEN, estimateTokens, snapToCodePoint, validateChunkingConfig } from "./tokens.js";

/** Sentence ends, or blank lines (headings and table rows rarely end in punctuation). */
const BOUNDARY_REGEX = /(?<=[.!?])\s+|\n\s*\n\s*/g;

interface Span {
  start: number;
  end: number;
}

/**
 * Groups whole sentences into windows of at most `maxTokens`. The next window
 * starts with the trailing sentences of the previous one, as many as fit in
 * `overlap` tokens. Sentences longer than a window are hard-split.
 */
export class SentenceChunker implements IChunker {
  readonly strategy = "sentence";

  chunk(content: string, config: ChunkingPipelineConfig): ChunkResult[] {
    validateChunkingConfig(config);

    const maxChars = config.maxTokens * CHARS_PER_TOKEN;
    const overlapChars = config.overlap * CHARS_PER_TOKEN;
    const spans = this.splitSentences(content, maxChars);
    const results: ChunkResult[] = [];

    const width = (from: number, to: number): number => {
      const first = spans[from];
      const last = spans[to];
      return first && last ? last.end - first.start : 0;
    };

    let first = 0;
    while (first < spans.length) {
      let last = first;
      while (last + 1 < spans.length && width(first, last + 1) <= maxChars) {
        last++;
      }

      const startSpan = spans[first];
      const endSpan = spans[last];
      if (!startSpan || !endSpan) break;

      const text = content.slice(startSpan.start, endSpan.end);
      results.push({
        content: text,
        index: results.length,
        tokenCount: estimateTokens(text),
        metadata: { startChar: startSpan.start, endChar: endSpan.end },
      });

      if (last === spans.length - 1) break;

      // Walk back over trailing sentences while they fit in the overlap and
      // still leave room for the next unseen sentence.
      let next = last + 1;
      while (
        next - 1 > first &&
        width(next - 1, last) <= overlapChars &&
        width(next - 1, last + 1) <= maxChars
      ) {
        next--;
      }
      first = next;
    }

    return results;
  }

  private splitSentences(content: string, maxChars: number): Span[] {
    const spans: Span[] = [];
    let segmentStart = 0;

    const pushSegment = (start: number, end: number): void => {
      const raw = content.slice(start, end);
      const trimmed = raw.trim();
      if (trimmed.length === 0) return;

      const trimmedStart = start + raw.indexOf(trimmed);
      const trimmedEnd = trimmedStart + trimmed.length;
      let pos = trimmedStart;
      while (pos < trimmedEnd) {
        const end = snapToCodePoint(content, Math.min(pos + maxChars, trimmedEnd));
        spans.push({ start: pos, end });
        pos = end;
      }
    };

    for (const match of content.matchAll(BOUNDARY_REGEX)) {
      const boundary = match.index ?? 0;
      pushSegment(segmentStart, boundary);
      segmentStart = boundary + match[0].length;
    }
    pushSegment(segmentStart, content.length);

    return spans;
  }
}
