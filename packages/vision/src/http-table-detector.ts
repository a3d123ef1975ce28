import { z } from "zod";
import { AppError, ExternalServiceError, withTimeout } from "@tablelens/errors";
import type { DetectedBox, DetectOptions, ITableDetector } from "./table-detector.interface.js";

const SERVICE = "table-detector";

export const detectionResponseSchema = z.object({
  boxes: z.array(
    z.object({
      x1: z.number(),
      y1: z.number(),
      x2: z.number(),
      y2: z.number(),
      confidence: z.number().min(0).max(1),
    }),
  ),
});

export interface HttpTableDetectorConfig {
  url: string;
  timeoutMs: number;
  fetch?: typeof fetch;
}

/**
 * Client for a table-detection model server.
 * POSTs the page PNG as base64 to `{url}/detect`.
 */
export class HttpTableDetector implements ITableDetector {
  private baseUrl: string;
  private timeoutMs: number;
  private fetchFn: typeof fetch;

  constructor(config: HttpTableDetectorConfig) {
    this.baseUrl = config.url.replace(/\/$/, "");
    this.timeoutMs = config.timeoutMs;
    this.fetchFn = config.fetch ?? fetch;
  }

  async detect(image: Uint8Array, options: DetectOptions): Promise<DetectedBox[]> {
    const body = await withTimeout("table detection", this.timeoutMs, async (signal) => {
      let response: Response;
      try {
        response = await this.fetchFn(`${this.baseUrl}/detect`, {
          method: "POST",
          headers: { "Content-Type": "application/json" },
          body: JSON.stringify({
            image: Buffer.from(image).toString("base64"),
            confidence: options.confidence,
          }),
          signal,
        });
      } catch (error: unknown) {
        if (AppError.isAppError(error)) throw error;
        const reason = error instanceof Error ? error.message : String(error);
        throw new ExternalServiceError(`Table detector unreachable: ${reason}`, SERVICE, {
          cause: error,
        });
      }

      if (!response.ok) {
        throw new ExternalServiceError(
          `Table detection failed: ${String(response.status)} ${response.statusText}`,
          SERVICE,
        );
      }

      const json: unknown = await response.json();
      return json;
    });

    const parsed = detectionResponseSchema.safeParse(body);
    if (!parsed.success) {
      throw new ExternalServiceError("Table detector returned a malformed response", SERVICE, {
        details: { issues: parsed.error.issues },
      });
    }

    return parsed.data.boxes.filter((box) => box.confidence >= options.confidence);
  }
}
