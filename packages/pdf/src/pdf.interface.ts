import type { BoundingBox, ParseResult } from "@tablelens/types";

export interface IPdfTextSource {
  /** Text of every page, in page order, 1-based page numbers. */
  extract(pdfPath: string): Promise<ParseResult>;
}

export interface RenderedPage {
  pageNumber: number;
  imagePath: string;
}

export interface IPageRenderer {
  pageCount(pdfPath: string): Promise<number>;
  /**
   * Rasterize one page (1-based) into `outputDir` at `scale` times the
   * PDF's native 72 DPI.
   */
  renderPage(pdfPath: string, pageNumber: number, outputDir: string, scale: number): Promise<RenderedPage>;
}

export interface IImageCropper {
  crop(sourcePath: string, box: BoundingBox, destinationPath: string): Promise<void>;
}
