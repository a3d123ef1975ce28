import { readFile } from "node:fs/promises";
import type { Result, TableArtifact, TableNode } from "@tablelens/types";
import { ok, err } from "@tablelens/types";
import { AppError, withTimeout } from "@tablelens/errors";
import type { Logger } from "@tablelens/logger";
import type { IVisionModel } from "@tablelens/llm";
import { ConcurrentPool } from "./concurrent-pool.js";
import { TABLE_SUMMARY_INSTRUCTION } from "./prompts.js";

const TABLE_FILE = /^p(\d+)_table_\d+\.png$/;
const CODE_FENCE = /^```[\w-]*[ \t]*\n?([\s\S]*?)\n?```$/;

export interface SummarizationFailure {
  fileName: string;
  imagePath: string;
  code: string;
  message: string;
}

export interface SummarizeAllResult {
  /** In artifact order. */
  nodes: TableNode[];
  failures: SummarizationFailure[];
}

export interface TableSummarizerOptions {
  concurrency: number;
  requestTimeoutMs: number;
  readImage?: (path: string) => Promise<Uint8Array>;
}

export function tableNodeId(fileName: string): string {
  return `table-${fileName}`;
}

export function stripCodeFences(text: string): string {
  const trimmed = text.trim();
  const match = CODE_FENCE.exec(trimmed);
  return (match?.[1] ?? trimmed).trim();
}

export function resolveTablePage(artifact: TableArtifact): number | null {
  if (Number.isInteger(artifact.pageNumber) && artifact.pageNumber > 0) {
    return artifact.pageNumber;
  }
  const match = TABLE_FILE.exec(artifact.fileName);
  return match?.[1] !== undefined ? parseInt(match[1], 10) : null;
}

/**
 * Turns table crops into searchable text nodes with a vision model.
 */
export class TableSummarizer {
  private readImage: (path: string) => Promise<Uint8Array>;

  constructor(
    private readonly vision: IVisionModel,
    private readonly logger: Logger,
    private readonly options: TableSummarizerOptions,
  ) {
    this.readImage = options.readImage ?? readFile;
  }

  async summarize(artifact: TableArtifact): Promise<Result<TableNode, SummarizationFailure>> {
    const failure = (code: string, message: string) =>
      err({ fileName: artifact.fileName, imagePath: artifact.imagePath, code, message });

    try {
      const image = await this.readImage(artifact.imagePath);
      const raw = await withTimeout(
        `summarize ${artifact.fileName}`,
        this.options.requestTimeoutMs,
        (signal) =>
          this.vision.describeImage(
            { image, mimeType: "image/png", instruction: TABLE_SUMMARY_INSTRUCTION },
            { signal },
          ),
      );

      const text = stripCodeFences(raw);
      if (text.length === 0) {
        return failure("EMPTY_SUMMARY", "Vision model returned an empty summary");
      }

      const node: TableNode = {
        id: tableNodeId(artifact.fileName),
        modality: "table_image",
        text,
        metadata: {
          imagePath: artifact.imagePath,
          fileName: artifact.fileName,
          pageNumber: resolveTablePage(artifact),
        },
      };
      return ok(node);
    } catch (error: unknown) {
      const code = AppError.isAppError(error) ? error.code : "SUMMARIZATION_FAILED";
      const message = error instanceof Error ? error.message : String(error);
      return failure(code, message);
    }
  }

  async summarizeAll(
    artifacts: readonly TableArtifact[],
    onItemComplete?: (completed: number, total: number) => void,
  ): Promise<SummarizeAllResult> {
    let completed = 0;
    const results = await ConcurrentPool.run(
      artifacts,
      this.options.concurrency,
      (artifact) => this.summarize(artifact),
      () => {
        completed++;
        onItemComplete?.(completed, artifacts.length);
      },
    );

    const nodes: TableNode[] = [];
    const failures: SummarizationFailure[] = [];
    for (const result of results) {
      if (result.ok) {
        nodes.push(result.value);
      } else {
        failures.push(result.error);
        this.logger.warn(
          { fileName: result.error.fileName, code: result.error.code, reason: result.error.message },
          "table summarization failed, dropping table",
        );
      }
    }

    this.logger.info(
      { tables: artifacts.length, summarized: nodes.length, failed: failures.length },
      "summarized tables",
    );
    return { nodes, failures };
  }
}
