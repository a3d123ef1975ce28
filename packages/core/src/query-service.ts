import { access } from "node:fs/promises";
import type { QueryError, QueryResponse, Result } from "@tablelens/types";
import { err, ok } from "@tablelens/types";
import { AppError, IndexCorruptError, IndexNotFoundError, ValidationError } from "@tablelens/errors";
import type { IEmbeddingProvider } from "@tablelens/embeddings";
import type { Logger } from "@tablelens/logger";
import { loadIndex as loadIndexFromDisk, type VectorIndex } from "@tablelens/vector-store";
import { verifyCitations } from "./citations.js";
import { retrieve } from "./retriever.js";
import type { Synthesizer } from "./synthesizer.js";

export type QueryOutcome = Result<QueryResponse, QueryError>;

export interface QueryServiceDeps {
  persistDir: string;
  topK: number;
  embeddings: IEmbeddingProvider;
  synthesizer: Pick<Synthesizer, "answer">;
  logger: Logger;
  requestTimeoutMs?: number;
  loadIndex?: (directory: string) => Promise<VectorIndex>;
}

export interface SourceImageCheck {
  present: string[];
  missing: string[];
}

/**
 * Splits image paths into those still on disk and those that are gone.
 */
export async function checkSourceImages(paths: readonly string[]): Promise<SourceImageCheck> {
  const present: string[] = [];
  const missing: string[] = [];
  for (const path of paths) {
    try {
      await access(path);
      present.push(path);
    } catch {
      missing.push(path);
    }
  }
  return { present, missing };
}

/**
 * Answers questions against a persisted index. The index is loaded on the
 * first query and reused afterwards.
 */
export class QueryService {
  private index: Promise<VectorIndex> | undefined;
  private loadIndex: (directory: string) => Promise<VectorIndex>;

  constructor(private readonly deps: QueryServiceDeps) {
    this.loadIndex = deps.loadIndex ?? loadIndexFromDisk;
  }

  /**
   * @throws EmbeddingMismatchError when the configured embeddings differ from the index's
   */
  async query(question: string): Promise<QueryOutcome> {
    if (question.trim().length === 0) {
      throw new ValidationError("Question must not be empty", { question: "empty" });
    }

    let index: VectorIndex;
    try {
      index = await this.getIndex();
    } catch (error: unknown) {
      if (error instanceof IndexNotFoundError) {
        return err({ code: "NOT_INGESTED", message: error.message });
      }
      if (error instanceof IndexCorruptError) {
        this.deps.logger.error({ err: error }, "index is corrupt");
        return err({ code: "INDEX_CORRUPT", message: error.message });
      }
      throw error;
    }

    const results = await retrieve(index, question, this.deps.topK, this.deps.embeddings, {
      timeoutMs: this.deps.requestTimeoutMs,
    });
    this.deps.logger.debug(
      { retrieved: results.length, topScore: results[0]?.score },
      "retrieved context",
    );

    let response: QueryResponse;
    try {
      response = await this.deps.synthesizer.answer(question, results);
    } catch (error: unknown) {
      if (AppError.isAppError(error) && error.isOperational) {
        this.deps.logger.error({ err: error }, "answer synthesis failed");
        return err({ code: "SYNTHESIS_FAILED", message: error.message });
      }
      throw error;
    }

    const citations = verifyCitations(response.answer, results);
    if (citations.unmatchedCitations.length > 0) {
      this.deps.logger.warn(
        { unmatchedCitations: citations.unmatchedCitations },
        "answer cites sources that were not retrieved",
      );
    }
    this.deps.logger.debug(
      {
        citedPages: citations.citedPages,
        citedTables: citations.citedTables,
        uncitedImages: citations.uncitedImages,
      },
      "checked citations",
    );
    return ok(response);
  }

  private getIndex(): Promise<VectorIndex> {
    if (!this.index) {
      const loading = this.loadIndex(this.deps.persistDir);
      this.index = loading;
      // A failed load is not cached: the next query retries, e.g. after ingestion.
      void loading.catch(() => {
        if (this.index === loading) this.index = undefined;
      });
    }
    return this.index;
  }
}
