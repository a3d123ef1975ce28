import { AppError } from "./app-error.js";

interface ErrorExtras {
  details?: Record<string, unknown>;
  cause?: unknown;
}

export class DocumentNotFoundError extends AppError {
  public readonly path: string;

  constructor(path: string, options?: ErrorExtras) {
    super({
      message: `PDF not found at ${path}`,
      code: "DOCUMENT_NOT_FOUND",
      details: options?.details,
      cause: options?.cause,
    });
    this.path = path;
  }
}

export class IndexNotFoundError extends AppError {
  public readonly directory: string;

  constructor(directory: string, options?: ErrorExtras) {
    super({
      message: `No index found in ${directory}. Run ingestion first.`,
      code: "NOT_INGESTED",
      details: options?.details,
      cause: options?.cause,
    });
    this.directory = directory;
  }
}

export class IndexCorruptError extends AppError {
  public readonly directory: string;

  constructor(directory: string, reason: string, options?: ErrorExtras) {
    super({
      message: `Index in ${directory} is incomplete or unreadable: ${reason}`,
      code: "INDEX_CORRUPT",
      details: options?.details,
      cause: options?.cause,
    });
    this.directory = directory;
  }
}

/**
 * The embedding space used at query time differs from the one the index was
 * built with. Never recoverable: results would be silently wrong.
 */
export class EmbeddingMismatchError extends AppError {
  constructor(message: string, options?: ErrorExtras) {
    super({
      message,
      code: "EMBEDDING_MISMATCH",
      isOperational: false,
      details: options?.details,
      cause: options?.cause,
    });
  }
}

export class ConfigurationError extends AppError {
  constructor(message = "Invalid configuration", options?: ErrorExtras) {
    super({
      message,
      code: "CONFIGURATION_ERROR",
      isOperational: false,
      details: options?.details,
      cause: options?.cause,
    });
  }
}

export class ValidationError extends AppError {
  public readonly fields: Record<string, string>;

  constructor(message = "Validation error", fields: Record<string, string>, options?: ErrorExtras) {
    super({
      message,
      code: "VALIDATION_ERROR",
      details: options?.details,
      cause: options?.cause,
    });
    this.fields = fields;
  }
}

export class ExternalServiceError extends AppError {
  public readonly service: string;

  constructor(message = "External service error", service: string, options?: ErrorExtras) {
    super({
      message,
      code: "EXTERNAL_SERVICE_ERROR",
      retryable: true,
      details: options?.details,
      cause: options?.cause,
    });
    this.service = service;
  }
}

export class TimeoutError extends AppError {
  public readonly timeoutMs: number;

  constructor(operation: string, timeoutMs: number, options?: ErrorExtras) {
    super({
      message: `${operation} timed out after ${String(timeoutMs)}ms`,
      code: "TIMEOUT",
      retryable: true,
      details: options?.details,
      cause: options?.cause,
    });
    this.timeoutMs = timeoutMs;
  }
}
