/**
 * Creates structured Pino logger instances with credential redaction,
 * pretty-printing in development, and JSON output in production / test.
 */

import pino, { type Logger as PinoLogger } from "pino";
import { REDACT_PATHS } from "./redact-paths.js";

/**
 * Re-export the Pino Logger type so consumers do not need a direct pino dependency.
 */
export type Logger = PinoLogger;

export interface CreateLoggerOptions {
  /** Log level (defaults to "info", or "debug" when NODE_ENV is "development"). */
  level?: string;
  /** Logical component name attached to every log line. */
  service?: string;
  /** Force pretty output regardless of NODE_ENV. */
  pretty?: boolean;
}

function isDevelopment(): boolean {
  return process.env["NODE_ENV"] === "development";
}

function buildTransport(pretty: boolean): pino.TransportSingleOptions | undefined {
  if (pretty) {
    return {
      target: "pino-pretty",
      options: {
        colorize: true,
        translateTime: "SYS:standard",
        ignore: "pid,hostname",
        destination: 2,
      },
    };
  }
  return undefined;
}

/**
 * Create a new root Pino logger.
 *
 * Output goes to stderr so that command output on stdout stays clean.
 */
export function createLogger(options?: CreateLoggerOptions): Logger {
  const level = options?.level ?? (isDevelopment() ? "debug" : "info");
  const service = options?.service ?? "tablelens";

  const transport = buildTransport(options?.pretty ?? isDevelopment());
  const baseOptions: pino.LoggerOptions = {
    level,
    name: service,
    redact: {
      paths: REDACT_PATHS,
      censor: "[REDACTED]",
    },
    timestamp: pino.stdTimeFunctions.isoTime,
  };

  if (transport) {
    return pino({ ...baseOptions, transport });
  }
  return pino(baseOptions, pino.destination(2));
}

/**
 * Logger that drops everything. Used by tests and by callers that opt out of logging.
 */
export function createSilentLogger(): Logger {
  return pino({ level: "silent" });
}

/**
 * Create a child logger that adds component-scoped bindings
 * (e.g. `component`, `page`).
 */
export function createChildLogger(parent: Logger, bindings: Record<string, unknown>): Logger {
  return parent.child(bindings);
}
