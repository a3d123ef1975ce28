export interface CallOptions {
  signal?: AbortSignal;
}

export interface CompletionOptions extends CallOptions {
  system?: string;
}

export interface ILanguageModel {
  readonly modelId: string;
  complete(prompt: string, options?: CompletionOptions): Promise<string>;
}

export interface ImageInput {
  image: Uint8Array;
  mimeType: string;
  instruction: string;
}

export interface IVisionModel {
  readonly modelId: string;
  describeImage(input: ImageInput, options?: CallOptions): Promise<string>;
}
