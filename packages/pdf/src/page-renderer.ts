import { mkdir } from "node:fs/promises";
import { join } from "node:path";
import type { Logger } from "@tablelens/logger";
import { ExternalServiceError } from "@tablelens/errors";
import type { IPageRenderer, RenderedPage } from "./pdf.interface.js";
import { readPageCount } from "./pdf-info.js";
import { describeFailure, spawnAsync } from "./spawn-utils.js";
import type { SpawnFn } from "./spawn-utils.js";

const PDF_NATIVE_DPI = 72;

/**
 * Renders PDF pages to PNG images using ImageMagick, one page per call so
 * a page that fails to rasterize does not take the others with it.
 *
 * ## System Requirements
 * - ImageMagick 7 (`magick`)
 * - Ghostscript
 * - Poppler utils (`pdfinfo`) for the page count
 */
export class PageRenderer implements IPageRenderer {
  constructor(
    private readonly logger: Logger,
    private readonly spawn: SpawnFn = spawnAsync,
  ) {}

  pageCount(pdfPath: string): Promise<number> {
    return readPageCount(this.spawn, pdfPath);
  }

  async renderPage(
    pdfPath: string,
    pageNumber: number,
    outputDir: string,
    scale: number,
  ): Promise<RenderedPage> {
    const density = Math.round(PDF_NATIVE_DPI * scale);
    const imagePath = join(outputDir, `page_${String(pageNumber)}.png`);
    await mkdir(outputDir, { recursive: true });

    // ImageMagick indexes scenes from 0
    const result = await this.spawn("magick", [
      "-density",
      density.toString(),
      `${pdfPath}[${String(pageNumber - 1)}]`,
      "-background",
      "white",
      "-alpha",
      "remove",
      "-alpha",
      "off",
      imagePath,
    ]);

    if (result.code !== 0) {
      throw new ExternalServiceError(
        `Failed to render page ${String(pageNumber)}: ${describeFailure(result)}`,
        "magick",
      );
    }

    this.logger.debug({ pageNumber, density, imagePath }, "rendered page");
    return { pageNumber, imagePath };
  }
}
