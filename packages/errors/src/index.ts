export { AppError } from "./app-error.js";
export type { AppErrorOptions } from "./app-error.js";

export {
  DocumentNotFoundError,
  IndexNotFoundError,
  IndexCorruptError,
  EmbeddingMismatchError,
  ConfigurationError,
  ValidationError,
  ExternalServiceError,
  TimeoutError,
} from "./errors.js";

export { withRetry } from "./retry.js";
export type { RetryOptions } from "./retry.js";

export { withTimeout } from "./timeout.js";
