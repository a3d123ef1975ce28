/** Extracted text of one page, 1-based. */
export interface PageText {
  pageNumber: number;
  text: string;
}

/** Pixel coordinates in the rendered page image. */
export interface BoundingBox {
  x1: number;
  y1: number;
  x2: number;
  y2: number;
}

export interface TableRegion {
  pageNumber: number;
  box: BoundingBox;
  confidence: number;
}

/**
 * Cropped table image on disk, named `p{page}_table_{sequence}.png`.
 * Nodes reference the file; they never own it.
 */
export interface TableArtifact {
  imagePath: string;
  fileName: string;
  pageNumber: number;
}
