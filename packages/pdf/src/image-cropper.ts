import type { BoundingBox } from "@tablelens/types";
import { ExternalServiceError } from "@tablelens/errors";
import type { IImageCropper } from "./pdf.interface.js";
import { describeFailure, spawnAsync } from "./spawn-utils.js";
import type { SpawnFn } from "./spawn-utils.js";

/** Crops a region out of a rendered page with ImageMagick. */
export class ImageCropper implements IImageCropper {
  constructor(private readonly spawn: SpawnFn = spawnAsync) {}

  async crop(sourcePath: string, box: BoundingBox, destinationPath: string): Promise<void> {
    const width = box.x2 - box.x1;
    const height = box.y2 - box.y1;
    const geometry = `${String(width)}x${String(height)}+${String(box.x1)}+${String(box.y1)}`;

    const result = await this.spawn("magick", [
      sourcePath,
      "-crop",
      geometry,
      "+repage",
      destinationPath,
    ]);

    if (result.code !== 0) {
      throw new ExternalServiceError(
        `Failed to crop ${geometry} from ${sourcePath}: ${describeFailure(result)}`,
        "magick",
      );
    }
  }
}
