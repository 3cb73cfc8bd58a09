/**
 * Concurrency Control Utilities
 *
 * Semaphore-based limiting of simultaneous track runs, plus a keyed mutex so
 * that no two operations for the same track id overlap.
 */

/**
 * A semaphore implementation for controlling concurrent access to resources
 */
export class Semaphore {
  private permits: number;
  private waitQueue: Array<() => void> = [];

  /**
   * @param permits - Maximum number of concurrent operations allowed
   */
  constructor(permits: number) {
    if (permits <= 0) {
      throw new Error('Semaphore permits must be greater than 0');
    }
    this.permits = permits;
  }

  /**
   * Acquire a permit, waiting if necessary. Waiters are served in FIFO order.
   */
  async acquire(): Promise<void> {
    return new Promise<void>((resolve) => {
      if (this.permits > 0) {
        this.permits--;
        resolve();
      } else {
        this.waitQueue.push(resolve);
      }
    });
  }

  release(): void {
    const next = this.waitQueue.shift();
    if (next) {
      next();
    } else {
      this.permits++;
    }
  }

  getAvailablePermits(): number {
    return this.permits;
  }

  getQueueLength(): number {
    return this.waitQueue.length;
  }
}

/**
 * Serializes async work per key. Different keys run independently.
 */
export class KeyedMutex {
  private tails = new Map<string, Promise<void>>();

  async runExclusive<T>(key: string, fn: () => Promise<T>): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();
    let release: () => void = () => undefined;
    const current = new Promise<void>((resolve) => {
      release = resolve;
    });
    const tail = previous.then(() => current);
    this.tails.set(key, tail);

    await previous;
    try {
      return await fn();
    } finally {
      release();
      if (this.tails.get(key) === tail) {
        this.tails.delete(key);
      }
    }
  }

  isLocked(key: string): boolean {
    return this.tails.has(key);
  }
}

export interface SettledProcessingResult<R> {
  results: (R | null)[];
  errors: (Error | null)[];
  successCount: number;
  errorCount: number;
  /** Items never started because processing stopped after an error */
  notStartedCount: number;
}

export interface ProcessOptions {
  /** Stop starting new items once one has failed; in-flight items finish */
  stopOnError?: boolean;
}

/**
 * Process an array of items with controlled concurrency, collecting errors per item.
 * Items start in array order; with a limit of 1 they run strictly sequentially.
 *
 * @param items - Array of items to process
 * @param processor - Function to process each item
 * @param maxConcurrency - Maximum number of concurrent operations
 */
export async function processWithConcurrencySettled<T, R>(
  items: T[],
  processor: (item: T, index: number) => Promise<R>,
  maxConcurrency: number,
  options: ProcessOptions = {}
): Promise<SettledProcessingResult<R>> {
  if (maxConcurrency <= 0) {
    throw new Error('maxConcurrency must be greater than 0');
  }

  const results: (R | null)[] = new Array<R | null>(items.length).fill(null);
  const errors: (Error | null)[] = new Array<Error | null>(items.length).fill(null);
  const started: boolean[] = new Array<boolean>(items.length).fill(false);

  if (items.length === 0) {
    return { results, errors, successCount: 0, errorCount: 0, notStartedCount: 0 };
  }

  const semaphore = new Semaphore(maxConcurrency);
  let stopped = false;

  const promises = items.map(async (item, index) => {
    await semaphore.acquire();
    try {
      if (stopped) return;
      started[index] = true;
      results[index] = await processor(item, index);
    } catch (error) {
      errors[index] = error instanceof Error ? error : new Error(String(error));
      if (options.stopOnError) {
        stopped = true;
      }
    } finally {
      semaphore.release();
    }
  });

  await Promise.all(promises);

  const errorCount = errors.filter((e) => e !== null).length;
  const notStartedCount = started.filter((s) => !s).length;

  return {
    results,
    errors,
    successCount: items.length - errorCount - notStartedCount,
    errorCount,
    notStartedCount
  };
}
