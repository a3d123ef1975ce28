import type { AppConfig } from "@tablelens/types";
import { createChildLogger, type Logger } from "@tablelens/logger";
import { createChunker, DocumentChunker } from "@tablelens/chunker";
import { ImageCropper, PageRenderer, PdfTextExtractor } from "@tablelens/pdf";
import { createLanguageModel, createVisionModel } from "@tablelens/llm";
import { createEmbeddingProvider } from "@tablelens/embeddings";
import { HttpTableDetector, TableCropExtractor, TableSummarizer } from "@tablelens/vision";
import { QueryService, Synthesizer, type IngestionDependencies } from "@tablelens/core";

export function createIngestionDeps(config: AppConfig, logger: Logger): IngestionDependencies {
  const pdfLogger = createChildLogger(logger, { component: "pdf" });
  const visionLogger = createChildLogger(logger, { component: "vision" });

  const chunker = new DocumentChunker(
    new PdfTextExtractor(pdfLogger),
    createChunker(config.chunking.strategy),
    config.chunking,
    createChildLogger(logger, { component: "chunker" }),
  );

  const extractor = new TableCropExtractor(
    {
      renderer: new PageRenderer(pdfLogger),
      cropper: new ImageCropper(),
      detector: new HttpTableDetector({
        url: config.detector.url,
        timeoutMs: config.provider.requestTimeoutMs,
      }),
      logger: visionLogger,
    },
    { confidence: config.detector.confidence, renderScale: config.detector.renderScale },
  );

  const summarizer = new TableSummarizer(createVisionModel(config.provider), visionLogger, {
    concurrency: config.summarizer.concurrency,
    requestTimeoutMs: config.provider.requestTimeoutMs,
  });

  return {
    chunker,
    extractor,
    summarizer,
    embeddings: createEmbeddingProvider(config.embedding, config.provider),
    logger: createChildLogger(logger, { component: "ingest" }),
    embedTimeoutMs: config.provider.requestTimeoutMs,
  };
}

export function createQueryService(config: AppConfig, logger: Logger): QueryService {
  const queryLogger = createChildLogger(logger, { component: "query" });
  return new QueryService({
    persistDir: config.paths.persistDir,
    topK: config.retrieval.topK,
    embeddings: createEmbeddingProvider(config.embedding, config.provider),
    synthesizer: new Synthesizer(createLanguageModel(config.provider), queryLogger, {
      maxRetries: config.provider.maxRetries,
      requestTimeoutMs: config.provider.requestTimeoutMs,
    }),
    logger: queryLogger,
    requestTimeoutMs: config.provider.requestTimeoutMs,
  });
}
