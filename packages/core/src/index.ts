export { ingest } from "./ingestion-pipeline.js";
export type {
  IngestionDependencies,
  IngestionPaths,
  IngestionReport,
  TableSummaries,
} from "./ingestion-pipeline.js";

export { buildIndex } from "./index-builder.js";
export type { BuildIndexOptions } from "./index-builder.js";

export { retrieve } from "./retriever.js";
export type { RetrieveOptions } from "./retriever.js";

export { assembleContext } from "./context-assembler.js";
export type { AssembledContext } from "./context-assembler.js";

export { Synthesizer } from "./synthesizer.js";
export type { SynthesizerOptions } from "./synthesizer.js";
export { ANALYST_SYSTEM_PROMPT, buildQuestionPrompt } from "./prompts.js";

export { findCitations, verifyCitations } from "./citations.js";
export type { Citations } from "./citations.js";

export { QueryService, checkSourceImages } from "./query-service.js";
export type { QueryOutcome, QueryServiceDeps, SourceImageCheck } from "./query-service.js";
