import type { Logger } from "@tablelens/logger";
import type { PageText, ParseResult } from "@tablelens/types";
import { ExternalServiceError } from "@tablelens/errors";
import type { IPdfTextSource } from "./pdf.interface.js";
import { readPageCount } from "./pdf-info.js";
import { describeFailure, spawnAsync } from "./spawn-utils.js";
import type { SpawnFn } from "./spawn-utils.js";

const PAGE_BREAK = "\f";

/**
 * Extracts page-separated text with Poppler's `pdfinfo` and `pdftotext`.
 *
 * ## System Requirements
 * - Poppler utils (`brew install poppler` / `apt-get install poppler-utils`)
 */
export class PdfTextExtractor implements IPdfTextSource {
  constructor(
    private readonly logger: Logger,
    private readonly spawn: SpawnFn = spawnAsync,
  ) {}

  async extract(pdfPath: string): Promise<ParseResult> {
    const pageCount = await this.getPageCount(pdfPath);

    const result = await this.spawn("pdftotext", ["-enc", "UTF-8", pdfPath, "-"]);
    if (result.code !== 0) {
      throw new ExternalServiceError(`pdftotext failed: ${describeFailure(result)}`, "pdftotext");
    }

    // pdftotext terminates every page with a form feed
    const parts = result.stdout.split(PAGE_BREAK);
    const pages: PageText[] = [];
    for (let i = 0; i < pageCount; i++) {
      pages.push({ pageNumber: i + 1, text: parts[i] ?? "" });
    }

    const nonEmpty = pages.filter((p) => p.text.trim().length > 0).length;
    this.logger.info({ pdfPath, pageCount, nonEmpty }, "extracted page text");

    return { pages, pageCount };
  }

  getPageCount(pdfPath: string): Promise<number> {
    return readPageCount(this.spawn, pdfPath);
  }
}
