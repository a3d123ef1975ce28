export type { IPdfTextSource, IPageRenderer, IImageCropper, RenderedPage } from "./pdf.interface.js";
export { PdfTextExtractor } from "./pdf-text-extractor.js";
export { PageRenderer } from "./page-renderer.js";
export { ImageCropper } from "./image-cropper.js";
export { spawnAsync } from "./spawn-utils.js";
export type { SpawnFn, SpawnResult } from "./spawn-utils.js";
