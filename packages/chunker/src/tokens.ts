import type { ChunkingPipelineConfig } from "@tablelens/types";
import { ValidationError } from "@tablelens/errors";

/** Rough estimate for English text. */
export const CHARS_PER_TOKEN = 4;

export function estimateTokens(text: string): number {
  return Math.ceil(text.length / CHARS_PER_TOKEN);
}

/** Moves `index` back one unit when it would split a surrogate pair. */
export function snapToCodePoint(text: string, index: number): number {
  if (index <= 0 || index >= text.length) return index;
  const before = text.charCodeAt(index - 1);
  const at = text.charCodeAt(index);
  const splitsPair = before >= 0xd800 && before <= 0xdbff && at >= 0xdc00 && at <= 0xdfff;
  return splitsPair ? index - 1 : index;
}

export function validateChunkingConfig(config: ChunkingPipelineConfig): void {
  const fields: Record<string, string> = {};

  if (!Number.isInteger(config.maxTokens) || config.maxTokens <= 0) {
    fields["maxTokens"] = "must be a positive integer";
  }
  if (!Number.isInteger(config.overlap) || config.overlap < 0) {
    fields["overlap"] = "must be a non-negative integer";
  } else if (config.overlap >= config.maxTokens) {
    fields["overlap"] = "must be less than maxTokens";
  }

  if (Object.keys(fields).length > 0) {
    throw new ValidationError("Invalid chunking config", fields);
  }
}
