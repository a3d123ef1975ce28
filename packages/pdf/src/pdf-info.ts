import { ExternalServiceError } from "@tablelens/errors";
import { describeFailure } from "./spawn-utils.js";
import type { SpawnFn } from "./spawn-utils.js";

/** Page count reported by Poppler's `pdfinfo`. */
export async function readPageCount(spawn: SpawnFn, pdfPath: string): Promise<number> {
  const result = await spawn("pdfinfo", [pdfPath]);
  if (result.code !== 0) {
    throw new ExternalServiceError(`pdfinfo failed: ${describeFailure(result)}`, "pdfinfo");
  }
  const match = /^Pages:\s+(\d+)/m.exec(result.stdout);
  return match?.[1] ? parseInt(match[1], 10) : 0;
}
