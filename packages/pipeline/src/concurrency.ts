/**
 * Small async helpers used by the index builder: a bounded worker pool, a
 * retry wrapper with exponential backoff, and a mutex for single-writer
 * sections.
 */

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Run `worker` over `items` with at most `concurrency` calls in flight.
 * Workers pull the next item only once they are free, so a lazy iterable is
 * consumed no faster than it is processed. Results keep input order. The
 * first rejection stops further pulls and is rethrown once in-flight work
 * settles.
 */
export async function mapPool<T, R>(
  items: Iterable<T>,
  concurrency: number,
  worker: (item: T, index: number) => Promise<R>
): Promise<R[]> {
  if (!Number.isInteger(concurrency) || concurrency < 1) {
    throw new RangeError(`concurrency must be a positive integer, got ${concurrency}`);
  }

  const iterator = items[Symbol.iterator]();
  const results: R[] = [];
  let nextIndex = 0;
  let failure: { error: unknown } | undefined;

  const take = (): { item: T; index: number } | undefined => {
    if (failure) return undefined;
    const step = iterator.next();
    if (step.done) return undefined;
    return { item: step.value, index: nextIndex++ };
  };

  const run = async (): Promise<void> => {
    for (let job = take(); job; job = take()) {
      try {
        results[job.index] = await worker(job.item, job.index);
      } catch (error) {
        failure ??= { error };
      }
    }
  };

  await Promise.all(Array.from({ length: concurrency }, run));
  if (failure) throw failure.error;
  return results;
}

export interface RetryOptions {
  retries: number;
  baseDelayMs: number;
  shouldRetry?: (err: unknown) => boolean;
  onRetry?: (info: { attempt: number; delayMs: number; error: unknown }) => void;
}

/** Retry `fn` up to `retries` extra times, doubling the delay each time. */
export async function withRetry<T>(fn: () => Promise<T>, opts: RetryOptions): Promise<T> {
  for (let attempt = 0; ; attempt++) {
    try {
      return await fn();
    } catch (err) {
      const retryable = opts.shouldRetry?.(err) ?? true;
      if (!retryable || attempt >= opts.retries) throw err;

      const delayMs = opts.baseDelayMs * 2 ** attempt;
      opts.onRetry?.({ attempt: attempt + 1, delayMs, error: err });
      await sleep(delayMs);
    }
  }
}

/** Serialises async sections; callers run one at a time in arrival order. */
export class Mutex {
  private tail: Promise<void> = Promise.resolve();

  async runExclusive<T>(fn: () => Promise<T>): Promise<T> {
    const previous = this.tail;
    let release: () => void = () => {};
    this.tail = new Promise<void>((resolve) => {
      release = resolve;
    });

    await previous;
    try {
      return await fn();
    } finally {
      release();
    }
  }
}
