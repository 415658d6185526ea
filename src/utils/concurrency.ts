/**
 * Concurrency primitives: a limiter for parallel async operations and a
 * single-resolution race between an operation and its deadline.
 *
 * @module utils/concurrency
 */

/**
 * Limits the number of concurrent async operations.
 *
 * `run` waits for a free slot; `tryRun` refuses immediately when none is
 * free, for callers that reject excess work instead of queueing it.
 *
 * @example
 * ```typescript
 * const limiter = new ConcurrencyLimiter(5);
 * const results = await Promise.all(
 *   tasks.map(task => limiter.run(() => performTask(task)))
 * );
 * ```
 */
export class ConcurrencyLimiter {
  private running = 0;
  private queue: Array<() => void> = [];

  /**
   * Creates a new concurrency limiter.
   *
   * @param limit - Maximum number of concurrent operations
   */
  constructor(private readonly limit: number) {
    if (!Number.isInteger(limit) || limit < 1) {
      throw new Error('Concurrency limit must be an integer of at least 1');
    }
  }

  /**
   * Executes an async function once a slot is free.
   *
   * @param fn - Async function to execute
   * @returns Promise resolving to the function's result
   */
  async run<T>(fn: () => Promise<T>): Promise<T> {
    while (this.running >= this.limit) {
      await new Promise<void>((resolve) => this.queue.push(resolve));
    }
    return this.execute(fn);
  }

  /**
   * Executes an async function if a slot is free right now.
   *
   * @returns The function's result promise, or null when the limit is reached
   *
   * @example
   * ```typescript
   * const pending = limiter.tryRun(() => handle(request));
   * if (pending === null) {
   *   return reject(request);
   * }
   * ```
   */
  tryRun<T>(fn: () => Promise<T>): Promise<T> | null {
    if (this.running >= this.limit || this.queue.length > 0) {
      return null;
    }
    return this.execute(fn);
  }

  private async execute<T>(fn: () => Promise<T>): Promise<T> {
    this.running++;
    try {
      return await fn();
    } finally {
      this.running--;
      const next = this.queue.shift();
      if (next) {
        next();
      }
    }
  }

  /**
   * Gets the current number of running operations.
   */
  getRunningCount(): number {
    return this.running;
  }

  /**
   * Gets the current queue size.
   */
  getQueueSize(): number {
    return this.queue.length;
  }

  /** Maximum number of concurrent operations. */
  getLimit(): number {
    return this.limit;
  }
}

/**
 * Outcome of {@link raceWithTimeout}. Exactly one is produced per race.
 */
export type RaceOutcome<T> =
  | { status: 'completed'; value: T }
  | { status: 'failed'; error: unknown }
  | { status: 'timedOut' };

/**
 * Race an operation against a deadline.
 *
 * Both sides write into a single-resolution slot; the first writer wins and
 * the loser's eventual result is discarded. When the deadline wins, the
 * signal passed to the operation is aborted so it may stop early.
 *
 * @param operation - Work to run; receives an AbortSignal tied to the deadline
 * @param timeoutMs - Deadline in milliseconds
 *
 * @example
 * ```typescript
 * const outcome = await raceWithTimeout((signal) => handler(request, { signal }), 5000);
 * if (outcome.status === 'timedOut') {
 *   // send a timeout error
 * }
 * ```
 */
export function raceWithTimeout<T>(
  operation: (signal: AbortSignal) => Promise<T>,
  timeoutMs: number
): Promise<RaceOutcome<T>> {
  const controller = new AbortController();

  return new Promise<RaceOutcome<T>>((resolve) => {
    let settled = false;
    const settle = (outcome: RaceOutcome<T>): void => {
      if (settled) {
        return;
      }
      settled = true;
      clearTimeout(timer);
      resolve(outcome);
    };

    const timer = setTimeout(() => {
      settle({ status: 'timedOut' });
      controller.abort(new Error(`Timed out after ${timeoutMs}ms`));
    }, timeoutMs);

    let work: Promise<T>;
    try {
      work = operation(controller.signal);
    } catch (error) {
      settle({ status: 'failed', error });
      return;
    }
    void work.then(
      (value) => settle({ status: 'completed', value }),
      (error: unknown) => settle({ status: 'failed', error })
    );
  });
}

/**
 * Resolve after a delay. Rejects with the signal's reason if aborted first.
 */
export function delay(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise<void>((resolve, reject) => {
    if (signal?.aborted) {
      reject(signal.reason);
      return;
    }
    const onAbort = (): void => {
      clearTimeout(timer);
      reject(signal?.reason);
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}
