import { ZodError } from "zod";
import type { QueryError, QueryResponse } from "@tablelens/types";
import type { IngestionReport, SourceImageCheck } from "@tablelens/core";
import { AppError } from "@tablelens/errors";

export const NOT_INGESTED_MESSAGE = "Database not found. Run `tablelens --ingest` first.";
export const ENV_HINT = "Check the settings in your .env file (see .env.example).";

export function formatReport(report: IngestionReport): string[] {
  const lines = [
    "Ingestion complete.",
    `  Text nodes:    ${String(report.textNodeCount)}`,
    `  Table images:  ${String(report.tableArtifactCount)} (${String(report.tableNodeCount)} summarized, ${String(report.failedTables.length)} failed)`,
  ];
  if (report.failedTables.length > 0) {
    lines.push(`  Failed tables: ${report.failedTables.join(", ")}`);
  }
  lines.push(
    `  Index:         ${report.persistDir}`,
    `  Embeddings:    ${report.embedding.provider}/${report.embedding.model} (${String(report.embedding.dimensions)}d)`,
  );
  return lines;
}

/** Answer, then the source tables with one warning per image no longer on disk. */
export function formatAnswer(response: QueryResponse, images: SourceImageCheck): string[] {
  const lines = [response.answer, ""];
  if (response.sourceImages.length === 0) {
    lines.push("No visual tables cited");
    return lines;
  }

  const missing = new Set(images.missing);
  lines.push("Source tables:");
  for (const path of response.sourceImages) {
    lines.push(missing.has(path) ? `  ! Image file missing: ${path}` : `  - ${path}`);
  }
  return lines;
}

export function formatQueryError(error: QueryError): string[] {
  if (error.code === "NOT_INGESTED") return [NOT_INGESTED_MESSAGE];
  return [`Query failed (${error.code}): ${error.message}`];
}

/** A failure the chat can show and move past. */
export function formatTurnFailure(error: AppError): string[] {
  return [`Query failed (${error.code}): ${error.message}`];
}

/** Fatal lines, always ending in the .env hint exactly once. */
export function formatIngestFailure(error: unknown): string[] {
  const lines = formatFatal(error);
  return lines.includes(ENV_HINT) ? lines : [...lines, ENV_HINT];
}

export function formatFatal(error: unknown): string[] {
  if (error instanceof ZodError) {
    return [
      "Invalid configuration:",
      ...error.issues.map((issue) => `  ${issue.path.join(".")}: ${issue.message}`),
      ENV_HINT,
    ];
  }
  if (AppError.isAppError(error)) {
    const lines = [`Error: ${error.message}`];
    if (!error.isOperational) lines.push(ENV_HINT);
    return lines;
  }
  return [`Unexpected error: ${error instanceof Error ? error.message : String(error)}`];
}
