/**
 * Sliding-Window Rate Limiter
 *
 * Bounds calls to the remote classifier: at most `maxCalls` recorded calls
 * within any window of `windowMs`. Callers queue behind a mutex, so the
 * timestamp window has a single writer even with parallel workers.
 */

import type { RateLimiter } from '../../core/ports';
import { createMutex, sleep as realSleep } from '../concurrency';

export const DEFAULT_MAX_CALLS = 50;
export const DEFAULT_WINDOW_MS = 60_000;

export type RateLimiterOptions = {
  maxCalls?: number;
  windowMs?: number;
  now?: () => number;
  sleep?: (ms: number) => Promise<void>;
};

export function createRateLimiter(options: RateLimiterOptions = {}): RateLimiter {
  const maxCalls = Math.max(1, Math.floor(options.maxCalls ?? DEFAULT_MAX_CALLS));
  const windowMs = Math.max(1, options.windowMs ?? DEFAULT_WINDOW_MS);
  const now = options.now ?? Date.now;
  const sleep = options.sleep ?? ((ms: number) => realSleep(ms));

  const mutex = createMutex();
  const calls: number[] = [];

  function purge(at: number): void {
    while (calls.length > 0 && at - calls[0] >= windowMs) {
      calls.shift();
    }
  }

  return {
    acquire() {
      return mutex.runExclusive(async () => {
        purge(now());
        while (calls.length >= maxCalls) {
          const wait = windowMs - (now() - calls[0]);
          if (wait > 0) {
            console.log(`[remote] Rate limit reached (${maxCalls}/${windowMs}ms), waiting ${Math.ceil(wait)}ms`);
            await sleep(wait);
          }
          purge(now());
        }
        calls.push(now());
      });
    },

    recent() {
      purge(now());
      return [...calls];
    },
  };
}
