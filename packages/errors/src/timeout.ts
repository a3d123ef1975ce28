import { TimeoutError } from "./errors.js";

/**
 * Run an abortable call under a deadline. The signal handed to `fn` fires
 * when the deadline passes; the call then rejects with {@link TimeoutError}
 * even if `fn` ignores the signal.
 */
export async function withTimeout<T>(
  operation: string,
  timeoutMs: number,
  fn: (signal: AbortSignal) => Promise<T>,
): Promise<T> {
  const controller = new AbortController();
  let timer: NodeJS.Timeout | undefined;

  const deadline = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      const timeout = new TimeoutError(operation, timeoutMs);
      reject(timeout);
      controller.abort(timeout);
    }, timeoutMs);
  });

  try {
    return await Promise.race([fn(controller.signal), deadline]);
  } finally {
    clearTimeout(timer);
  }
}
