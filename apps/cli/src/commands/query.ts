import { checkSourceImages, type QueryOutcome } from "@tablelens/core";
import { indexExists } from "@tablelens/vector-store";
import { formatAnswer, formatQueryError, NOT_INGESTED_MESSAGE } from "../format.js";
import type { Print } from "./ingest.js";

export interface Answerer {
  query(question: string): Promise<QueryOutcome>;
}

export async function runQuery(service: Answerer, question: string, print: Print): Promise<number> {
  const outcome = await service.query(question);
  if (!outcome.ok) {
    formatQueryError(outcome.error).forEach(print);
    return 1;
  }

  const images = await checkSourceImages(outcome.value.sourceImages);
  formatAnswer(outcome.value, images).forEach(print);
  return 0;
}

/**
 * Runs before any credential check, so a checkout without an index is told
 * to ingest rather than to configure a key it does not need yet.
 */
export async function ensureIngested(persistDir: string, print: Print): Promise<boolean> {
  if (await indexExists(persistDir)) return true;
  print(NOT_INGESTED_MESSAGE);
  return false;
}
