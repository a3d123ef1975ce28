import { access } from "node:fs/promises";
import type {
  EmbeddingSignature,
  IndexNode,
  TableArtifact,
  TableNode,
  TextNode,
} from "@tablelens/types";
import { DocumentNotFoundError } from "@tablelens/errors";
import type { IEmbeddingProvider } from "@tablelens/embeddings";
import type { Logger } from "@tablelens/logger";
import { persistIndex } from "@tablelens/vector-store";
import { buildIndex } from "./index-builder.js";

export interface IngestionPaths {
  pdfPath: string;
  tableOutputDir: string;
  persistDir: string;
}

export interface TableSummaries {
  nodes: TableNode[];
  failures: { fileName: string }[];
}

export interface IngestionDependencies {
  chunker: { chunk(pdfPath: string): Promise<TextNode[]> };
  extractor: { extract(pdfPath: string, outputDir: string): Promise<TableArtifact[]> };
  summarizer: { summarizeAll(artifacts: TableArtifact[]): Promise<TableSummaries> };
  embeddings: IEmbeddingProvider;
  logger: Logger;
  embedTimeoutMs?: number;
  onChunked?: (nodes: TextNode[]) => Promise<void>;
  onTablesExtracted?: (artifacts: TableArtifact[]) => Promise<void>;
  onSummarized?: (summaries: TableSummaries) => Promise<void>;
  onPersisted?: (persistDir: string) => Promise<void>;
}

export interface IngestionReport {
  textNodeCount: number;
  tableArtifactCount: number;
  tableNodeCount: number;
  failedTables: string[];
  persistDir: string;
  embedding: EmbeddingSignature;
}

/**
 * Ingestion pipeline: (Chunk text || Extract -> Summarize tables) -> Embed -> Persist
 *
 * The text and table branches run concurrently. Text nodes come first in
 * page order, then table nodes in artifact order. The index directory is
 * replaced only once everything has been embedded.
 */
export async function ingest(
  paths: IngestionPaths,
  deps: IngestionDependencies,
): Promise<IngestionReport> {
  try {
    await access(paths.pdfPath);
  } catch (error: unknown) {
    throw new DocumentNotFoundError(paths.pdfPath, { cause: error });
  }

  const textBranch = async (): Promise<TextNode[]> => {
    const nodes = await deps.chunker.chunk(paths.pdfPath);
    if (deps.onChunked) await deps.onChunked(nodes);
    return nodes;
  };

  const tableBranch = async (): Promise<{ artifacts: TableArtifact[]; summaries: TableSummaries }> => {
    const artifacts = await deps.extractor.extract(paths.pdfPath, paths.tableOutputDir);
    if (deps.onTablesExtracted) await deps.onTablesExtracted(artifacts);
    const summaries = await deps.summarizer.summarizeAll(artifacts);
    if (deps.onSummarized) await deps.onSummarized(summaries);
    return { artifacts, summaries };
  };

  // Both branches settle before any failure propagates
  const [text, tables] = await Promise.allSettled([textBranch(), tableBranch()]);
  if (text.status === "rejected") throw text.reason;
  if (tables.status === "rejected") throw tables.reason;

  const textNodes = text.value;
  const { artifacts, summaries } = tables.value;
  const nodes: IndexNode[] = [...textNodes, ...summaries.nodes];

  if (nodes.length === 0) {
    deps.logger.warn({ pdfPath: paths.pdfPath }, "document produced no text or table nodes");
  }

  const index = await buildIndex(nodes, deps.embeddings, { timeoutMs: deps.embedTimeoutMs });
  await persistIndex(index, paths.persistDir);
  if (deps.onPersisted) await deps.onPersisted(paths.persistDir);

  const report: IngestionReport = {
    textNodeCount: textNodes.length,
    tableArtifactCount: artifacts.length,
    tableNodeCount: summaries.nodes.length,
    failedTables: summaries.failures.map((failure) => failure.fileName),
    persistDir: paths.persistDir,
    embedding: index.signature,
  };

  deps.logger.info(report, "ingestion complete");
  return report;
}
