import { access, mkdir, mkdtemp, readFile, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import type { BoundingBox, TableArtifact, TableRegion } from "@tablelens/types";
import { DocumentNotFoundError } from "@tablelens/errors";
import type { Logger } from "@tablelens/logger";
import type { IImageCropper, IPageRenderer, RenderedPage } from "@tablelens/pdf";
import type { DetectedBox, ITableDetector } from "./table-detector.interface.js";

export interface TableCropExtractorOptions {
  /** Detector confidence floor. */
  confidence: number;
  /** Rasterization factor over 72 DPI. */
  renderScale: number;
}

export interface TableCropExtractorDeps {
  renderer: IPageRenderer;
  cropper: IImageCropper;
  detector: ITableDetector;
  logger: Logger;
}

export function tableFileName(pageNumber: number, sequence: number): string {
  return `p${String(pageNumber)}_table_${String(sequence)}.png`;
}

/** Integer pixel box clamped to the image origin, or null when nothing is left. */
export function normalizeBox(box: BoundingBox): BoundingBox | null {
  const x1 = Math.max(0, Math.round(box.x1));
  const y1 = Math.max(0, Math.round(box.y1));
  const x2 = Math.max(0, Math.round(box.x2));
  const y2 = Math.max(0, Math.round(box.y2));
  if (x2 <= x1 || y2 <= y1) return null;
  return { x1, y1, x2, y2 };
}

/**
 * Finds tables on every page and writes each one as a cropped PNG.
 * The output directory belongs to a single run and is emptied first.
 */
export class TableCropExtractor {
  constructor(
    private readonly deps: TableCropExtractorDeps,
    private readonly options: TableCropExtractorOptions,
  ) {}

  async extract(pdfPath: string, outputDir: string): Promise<TableArtifact[]> {
    try {
      await access(pdfPath);
    } catch (error: unknown) {
      throw new DocumentNotFoundError(pdfPath, { cause: error });
    }

    await rm(outputDir, { recursive: true, force: true });
    await mkdir(outputDir, { recursive: true });

    const pageCount = await this.deps.renderer.pageCount(pdfPath);
    const scratchDir = await mkdtemp(join(tmpdir(), "tablelens-pages-"));
    try {
      const artifacts: TableArtifact[] = [];
      let skipped = 0;

      for (let pageNumber = 1; pageNumber <= pageCount; pageNumber++) {
        try {
          const page = await this.deps.renderer.renderPage(
            pdfPath,
            pageNumber,
            scratchDir,
            this.options.renderScale,
          );
          const regions = await this.detectPage(page);
          for (const { box } of regions) {
            const fileName = tableFileName(page.pageNumber, artifacts.length);
            const imagePath = join(outputDir, fileName);
            await this.deps.cropper.crop(page.imagePath, box, imagePath);
            artifacts.push({ imagePath, fileName, pageNumber: page.pageNumber });
          }
        } catch (error: unknown) {
          skipped++;
          this.deps.logger.warn({ err: error, pageNumber }, "table extraction failed for page, skipping");
        }
      }

      this.deps.logger.info(
        { pages: pageCount, skipped, tables: artifacts.length, outputDir },
        "extracted table crops",
      );
      return artifacts;
    } finally {
      await rm(scratchDir, { recursive: true, force: true });
    }
  }

  private async detectPage(page: RenderedPage): Promise<TableRegion[]> {
    const image = await readFile(page.imagePath);
    const detected = await this.deps.detector.detect(image, { confidence: this.options.confidence });

    const regions: TableRegion[] = [];
    for (const candidate of detected.filter((b: DetectedBox) => b.confidence >= this.options.confidence)) {
      const box = normalizeBox(candidate);
      if (box) regions.push({ pageNumber: page.pageNumber, box, confidence: candidate.confidence });
    }

    this.deps.logger.debug(
      { pageNumber: page.pageNumber, detected: detected.length, accepted: regions.length },
      "detected tables",
    );
    return regions;
  }
}
