import type { ChunkingPipelineConfig, PageText, TextNode } from "@tablelens/types";
import type { Logger } from "@tablelens/logger";
import type { IPdfTextSource } from "@tablelens/pdf";
import type { IChunker } from "./chunker.interface.js";
import { validateChunkingConfig } from "./tokens.js";

export function textNodeId(pageNumber: number, chunkIndex: number): string {
  return `text-p${String(pageNumber)}-c${String(chunkIndex)}`;
}

/**
 * Chunks each page independently so every node carries exactly one page
 * number. Output is in page order, then chunk order.
 */
export function chunkPages(
  pages: PageText[],
  chunker: IChunker,
  config: ChunkingPipelineConfig,
): TextNode[] {
  const nodes: TextNode[] = [];

  for (const page of pages) {
    for (const chunk of chunker.chunk(page.text, config)) {
      nodes.push({
        id: textNodeId(page.pageNumber, chunk.index),
        modality: "text",
        text: chunk.content,
        metadata: {
          pageNumber: page.pageNumber,
          chunkIndex: chunk.index,
          startChar: chunk.metadata.startChar,
          endChar: chunk.metadata.endChar,
        },
      });
    }
  }

  return nodes;
}

export class DocumentChunker {
  constructor(
    private readonly textSource: IPdfTextSource,
    private readonly chunker: IChunker,
    private readonly config: ChunkingPipelineConfig,
    private readonly logger: Logger,
  ) {
    validateChunkingConfig(config);
  }

  async chunk(pdfPath: string): Promise<TextNode[]> {
    const parsed = await this.textSource.extract(pdfPath);
    const nodes = chunkPages(parsed.pages, this.chunker, this.config);

    this.logger.info(
      {
        pageCount: parsed.pageCount,
        textNodes: nodes.length,
        strategy: this.chunker.strategy,
        maxTokens: this.config.maxTokens,
        overlap: this.config.overlap,
      },
      "chunked document text",
    );

    return nodes;
  }
}
