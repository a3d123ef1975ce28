import { ValidationError } from "@tablelens/errors";

/**
 * Worker pool for bounded concurrent execution.
 *
 * Keeps up to N workers busy: when one finishes it takes the next item
 * from the shared queue. Each item is processed exactly once and writes
 * only its own result slot, so results keep input order.
 */
export class ConcurrentPool {
  /**
   * @param concurrency - Maximum number of items in flight, at least 1
   * @param onItemComplete - Fired after each item completes
   * @returns Results in input order
   */
  static async run<T, R>(
    items: readonly T[],
    concurrency: number,
    processFn: (item: T, index: number) => Promise<R>,
    onItemComplete?: (result: R, index: number) => void,
  ): Promise<R[]> {
    if (!Number.isInteger(concurrency) || concurrency < 1) {
      throw new ValidationError("Concurrency must be a positive integer", {
        concurrency: String(concurrency),
      });
    }

    const results = new Array<R>(items.length);
    const queue = items.entries();

    async function worker(): Promise<void> {
      for (const [index, item] of queue) {
        const result = await processFn(item, index);
        results[index] = result;
        onItemComplete?.(result, index);
      }
    }

    const workers = Array.from({ length: Math.min(concurrency, items.length) }, () => worker());
    await Promise.all(workers);
    return results;
  }
}
