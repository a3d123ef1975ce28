import type { AppConfig } from "@tablelens/types";
import type { Logger } from "@tablelens/logger";
import { ingest, type IngestionDependencies } from "@tablelens/core";
import { formatIngestFailure, formatReport } from "../format.js";

export type Print = (line: string) => void;

export async function runIngest(
  config: AppConfig,
  deps: IngestionDependencies,
  print: Print,
  logger: Logger,
): Promise<number> {
  print(`Ingesting ${config.paths.pdfPath}`);
  try {
    const report = await ingest(config.paths, {
      ...deps,
      onChunked: async (nodes) => {
        print(`  chunked text into ${String(nodes.length)} nodes`);
      },
      onTablesExtracted: async (artifacts) => {
        print(`  extracted ${String(artifacts.length)} table images`);
      },
      onSummarized: async (summaries) => {
        print(`  summarized ${String(summaries.nodes.length)} tables`);
      },
    });
    formatReport(report).forEach(print);
    return 0;
  } catch (error: unknown) {
    logger.error({ err: error }, "ingestion failed");
    formatIngestFailure(error).forEach(print);
    return 1;
  }
}
