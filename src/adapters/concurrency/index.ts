/**
 * Concurrency Primitives
 *
 * Bounded worker pool, a promise-chain mutex for shared connections,
 * timeouts and abortable sleeps.
 */

import type { WorkerPool, PoolOutcome } from '../../core/ports';
import { clamp, TimeoutError, MIN_WORKERS, MAX_WORKERS } from '../../core/domain';

export const DEFAULT_ITEM_TIMEOUT_MS = 60_000;

// ============================================
// Mutex
// ============================================

export type Mutex = {
  runExclusive: <T>(fn: () => Promise<T>) => Promise<T>;
};

export function createMutex(): Mutex {
  let tail: Promise<void> = Promise.resolve();

  return {
    runExclusive<T>(fn: () => Promise<T>): Promise<T> {
      const run = tail.then(fn);
      // Keep the chain alive whatever this task did
      tail = run.then(() => undefined, () => undefined);
      return run;
    },
  };
}

// ============================================
// Timing
// ============================================

export function withTimeout<T>(promise: Promise<T>, ms: number, label: string): Promise<T> {
  if (!Number.isFinite(ms) || ms <= 0) return promise;

  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new TimeoutError(label, ms)), ms);
  });
  return Promise.race([promise, timeout]).finally(() => clearTimeout(timer));
}

/** Resolves after `ms`, or as soon as `signal` aborts. Never rejects. */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise(resolve => {
    if (signal?.aborted) {
      resolve();
      return;
    }
    const done = () => {
      clearTimeout(timer);
      signal?.removeEventListener('abort', done);
      resolve();
    };
    const timer = setTimeout(done, Math.max(0, ms));
    signal?.addEventListener('abort', done, { once: true });
  });
}

export function backoffDelay(attempt: number, baseMs: number): number {
  return baseMs * 2 ** attempt;
}

// ============================================
// Worker Pool
// ============================================

export type WorkerPoolOptions = {
  concurrency: number;
  itemTimeoutMs?: number;
};

export function createWorkerPool(options: WorkerPoolOptions): WorkerPool {
  const size = clamp(Math.floor(options.concurrency) || MIN_WORKERS, MIN_WORKERS, MAX_WORKERS);
  const itemTimeoutMs = options.itemTimeoutMs ?? DEFAULT_ITEM_TIMEOUT_MS;

  return {
    size,

    async run<T, R>(
      items: T[],
      worker: (item: T, index: number) => Promise<R>,
      signal?: AbortSignal
    ): Promise<PoolOutcome<R>[]> {
      const outcomes: PoolOutcome<R>[] = items.map(() => ({ status: 'skipped' }));

      const runOne = async (index: number): Promise<void> => {
        try {
          const value = await withTimeout(worker(items[index], index), itemTimeoutMs, `item ${index}`);
          outcomes[index] = { status: 'fulfilled', value };
        } catch (err) {
          outcomes[index] = { status: 'rejected', reason: err instanceof Error ? err.message : String(err) };
        }
      };

      let next = 0;
      const inFlight: Promise<void>[] = [];

      while (next < items.length || inFlight.length > 0) {
        // Fill up to the limit; stop taking new work once cancelled
        while (next < items.length && inFlight.length < size && !signal?.aborted) {
          const index = next++;
          const promise = runOne(index).then(() => {
            const idx = inFlight.indexOf(promise);
            if (idx !== -1) inFlight.splice(idx, 1);
          });
          inFlight.push(promise);
        }

        if (inFlight.length === 0) break;
        await Promise.race(inFlight);
      }

      return outcomes;
    },
  };
}
