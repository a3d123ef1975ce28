export { ConcurrentPool } from "./concurrent-pool.js";
export type { ITableDetector, DetectedBox, DetectOptions } from "./table-detector.interface.js";
export { HttpTableDetector, detectionResponseSchema } from "./http-table-detector.js";
export type { HttpTableDetectorConfig } from "./http-table-detector.js";
export { TableCropExtractor, tableFileName, normalizeBox } from "./table-crop-extractor.js";
export type { TableCropExtractorOptions, TableCropExtractorDeps } from "./table-crop-extractor.js";
export {
  TableSummarizer,
  tableNodeId,
  stripCodeFences,
  resolveTablePage,
} from "./table-summarizer.js";
export type {
  SummarizationFailure,
  SummarizeAllResult,
  TableSummarizerOptions,
} from "./table-summarizer.js";
export { TABLE_SUMMARY_INSTRUCTION } from "./prompts.js";
