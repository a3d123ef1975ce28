import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { existsSync } from "node:fs";
import { mkdir, mkdtemp, readdir, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { basename, join } from "node:path";
import type { BoundingBox } from "@tablelens/types";
import { DocumentNotFoundError } from "@tablelens/errors";
import { createSilentLogger } from "@tablelens/logger";
import type { IImageCropper, IPageRenderer, RenderedPage } from "@tablelens/pdf";
import type { DetectedBox, ITableDetector } from "./table-detector.interface.js";
import { normalizeBox, TableCropExtractor } from "./table-crop-extractor.js";

class FakeRenderer implements IPageRenderer {
  renderDirs: string[] = [];

  constructor(
    private readonly pages: number,
    private readonly brokenPages: number[] = [],
  ) {}

  async pageCount(): Promise<number> {
    return this.pages;
  }

  async renderPage(_pdfPath: string, pageNumber: number, outputDir: string): Promise<RenderedPage> {
    this.renderDirs.push(outputDir);
    if (this.brokenPages.includes(pageNumber)) {
      throw new Error(`page ${String(pageNumber)} syntax error`);
    }
    const imagePath = join(outputDir, `page_${String(pageNumber)}.png`);
    await writeFile(imagePath, `page-${String(pageNumber)}`);
    return { pageNumber, imagePath };
  }
}

/** Answers per page, keyed by the fake page image contents. */
class FakeDetector implements ITableDetector {
  constructor(private readonly answers: Record<string, DetectedBox[] | Error>) {}

  async detect(image: Uint8Array): Promise<DetectedBox[]> {
    const answer = this.answers[Buffer.from(image).toString()] ?? [];
    if (answer instanceof Error) throw answer;
    return answer;
  }
}

class FakeCropper implements IImageCropper {
  crops: { source: string; box: BoundingBox; destination: string }[] = [];

  async crop(sourcePath: string, box: BoundingBox, destinationPath: string): Promise<void> {
    this.crops.push({ source: basename(sourcePath), box, destination: basename(destinationPath) });
    await writeFile(destinationPath, "crop");
  }
}

describe("normalizeBox", () => {
  it("rounds and clamps coordinates", () => {
    expect(normalizeBox({ x1: -3.2, y1: 4.5, x2: 99.6, y2: 50.4 })).toEqual({
      x1: 0,
      y1: 5,
      x2: 100,
      y2: 50,
    });
  });

  it("returns null for an empty box", () => {
    expect(normalizeBox({ x1: 30, y1: 30, x2: 30.2, y2: 60 })).toBeNull();
  });
});

describe("TableCropExtractor", () => {
  let root: string;
  let pdfPath: string;
  let outputDir: string;

  beforeEach(async () => {
    root = await mkdtemp(join(tmpdir(), "tablelens-extract-test-"));
    pdfPath = join(root, "report.pdf");
    outputDir = join(root, "tables");
    await writeFile(pdfPath, "%PDF-1.7 fake");
  });

  afterEach(async () => {
    await rm(root, { recursive: true, force: true });
  });

  it("crops accepted boxes with a document-wide sequence and skips failing pages", async () => {
    await mkdir(outputDir, { recursive: true });
    await writeFile(join(outputDir, "p9_table_9.png"), "stale");

    const renderer = new FakeRenderer(4);
    const cropper = new FakeCropper();
    const detector = new FakeDetector({
      "page-1": [
        { x1: 10.4, y1: 20.6, x2: 110.5, y2: 80, confidence: 0.9 },
        { x1: 0, y1: 0, x2: 5, y2: 5, confidence: 0.3 },
      ],
      "page-2": new Error("detector down"),
      "page-3": [
        { x1: -4, y1: -2, x2: 50, y2: 40, confidence: 0.7 },
        { x1: 30, y1: 30, x2: 30.2, y2: 60, confidence: 0.95 },
      ],
      "page-4": [{ x1: 1, y1: 1, x2: 9, y2: 9, confidence: 0.6 }],
    });
    const extractor = new TableCropExtractor(
      { renderer, cropper, detector, logger: createSilentLogger() },
      { confidence: 0.5, renderScale: 3 },
    );

    const artifacts = await extractor.extract(pdfPath, outputDir);

    expect(artifacts).toEqual([
      { imagePath: join(outputDir, "p1_table_0.png"), fileName: "p1_table_0.png", pageNumber: 1 },
      { imagePath: join(outputDir, "p3_table_1.png"), fileName: "p3_table_1.png", pageNumber: 3 },
      { imagePath: join(outputDir, "p4_table_2.png"), fileName: "p4_table_2.png", pageNumber: 4 },
    ]);
    expect(cropper.crops).toEqual([
      { source: "page_1.png", box: { x1: 10, y1: 21, x2: 111, y2: 80 }, destination: "p1_table_0.png" },
      { source: "page_3.png", box: { x1: 0, y1: 0, x2: 50, y2: 40 }, destination: "p3_table_1.png" },
      { source: "page_4.png", box: { x1: 1, y1: 1, x2: 9, y2: 9 }, destination: "p4_table_2.png" },
    ]);
    expect((await readdir(outputDir)).sort()).toEqual([
      "p1_table_0.png",
      "p3_table_1.png",
      "p4_table_2.png",
    ]);
  });

  it("skips a page that fails to render and keeps the rest", async () => {
    const renderer = new FakeRenderer(3, [2]);
    const cropper = new FakeCropper();
    const detector = new FakeDetector({
      "page-1": [{ x1: 0, y1: 0, x2: 40, y2: 30, confidence: 0.8 }],
      "page-3": [{ x1: 5, y1: 5, x2: 25, y2: 15, confidence: 0.8 }],
    });
    const extractor = new TableCropExtractor(
      { renderer, cropper, detector, logger: createSilentLogger() },
      { confidence: 0.5, renderScale: 2 },
    );

    const artifacts = await extractor.extract(pdfPath, outputDir);

    expect(artifacts.map((a) => a.fileName)).toEqual(["p1_table_0.png", "p3_table_1.png"]);
    expect(renderer.renderDirs).toHaveLength(3);
  });

  it("removes the page scratch directory after the run", async () => {
    const renderer = new FakeRenderer(1);
    const extractor = new TableCropExtractor(
      { renderer, cropper: new FakeCropper(), detector: new FakeDetector({}), logger: createSilentLogger() },
      { confidence: 0.5, renderScale: 2 },
    );

    const artifacts = await extractor.extract(pdfPath, outputDir);

    expect(artifacts).toEqual([]);
    expect(renderer.renderDirs).toHaveLength(1);
    expect(existsSync(renderer.renderDirs[0] ?? "")).toBe(false);
  });

  it("throws DocumentNotFoundError before touching anything for a missing PDF", async () => {
    const renderer = new FakeRenderer(1);
    const extractor = new TableCropExtractor(
      { renderer, cropper: new FakeCropper(), detector: new FakeDetector({}), logger: createSilentLogger() },
      { confidence: 0.5, renderScale: 2 },
    );

    await expect(extractor.extract(join(root, "missing.pdf"), outputDir)).rejects.toBeInstanceOf(
      DocumentNotFoundError,
    );
    expect(renderer.renderDirs).toEqual([]);
    expect(existsSync(outputDir)).toBe(false);
  });
});
