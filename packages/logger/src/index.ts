/**
 * @tablelens/logger
 *
 * Structured logging with credential redaction.
 */

export { createLogger, createChildLogger, createSilentLogger } from "./logger.js";
export type { Logger, CreateLoggerOptions } from "./logger.js";
export { REDACT_PATHS, SENSITIVE_KEYS } from "./redact-paths.js";
