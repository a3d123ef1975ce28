import type { BoundingBox } from "@tablelens/types";

export interface DetectedBox extends BoundingBox {
  confidence: number;
}

export interface DetectOptions {
  /** Boxes scoring below this floor are discarded. */
  confidence: number;
}

/**
 * Locates table regions in a rendered page image. Coordinates are in the
 * image's pixel space.
 */
export interface ITableDetector {
  detect(image: Uint8Array, options: DetectOptions): Promise<DetectedBox[]>;
}
