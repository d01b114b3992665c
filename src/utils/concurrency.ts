/**
 * Concurrency helpers - bounded worker pool and a promise-chain mutex.
 */

import { ConfigurationError } from '../errors';

/**
 * Map items with at most `concurrency` calls in flight. Results keep the
 * input order regardless of completion order.
 */
export async function mapWithConcurrency<T, R>(
  items: readonly T[],
  concurrency: number,
  fn: (item: T, index: number) => Promise<R>,
): Promise<R[]> {
  if (!Number.isInteger(concurrency) || concurrency < 1) {
    throw new ConfigurationError(`Concurrency must be a positive integer, got ${concurrency}`);
  }
  const results = new Array<R>(items.length);
  let nextIndex = 0;

  async function worker(): Promise<void> {
    while (nextIndex < items.length) {
      const idx = nextIndex++;
      results[idx] = await fn(items[idx], idx);
    }
  }

  const workers: Promise<void>[] = [];
  const effectiveConcurrency = Math.max(1, Math.min(concurrency, items.length));
  for (let i = 0; i < effectiveConcurrency; i++) {
    workers.push(worker());
  }

  await Promise.all(workers);
  return results;
}

export interface Mutex {
  runExclusive<T>(fn: () => Promise<T>): Promise<T>;
  readonly locked: boolean;
}

/** FIFO mutex: each holder runs after the previous one settles */
export function createMutex(): Mutex {
  let tail: Promise<void> = Promise.resolve();
  let holders = 0;

  return {
    runExclusive<T>(fn: () => Promise<T>): Promise<T> {
      holders++;
      const run = tail.then(fn);
      tail = run.then(
        () => undefined,
        () => undefined,
      ).finally(() => {
        holders--;
      });
      return run;
    },
    get locked() {
      return holders > 0;
    },
  };
}

export interface KeyedMutex {
  runExclusive<T>(key: string, fn: () => Promise<T>): Promise<T>;
}

/** One mutex per key, created on first use */
export function createKeyedMutex(): KeyedMutex {
  const mutexes = new Map<string, Mutex>();
  return {
    runExclusive<T>(key: string, fn: () => Promise<T>): Promise<T> {
      let mutex = mutexes.get(key);
      if (!mutex) {
        mutex = createMutex();
        mutexes.set(key, mutex);
      }
      return mutex.runExclusive(fn);
    },
  };
}
