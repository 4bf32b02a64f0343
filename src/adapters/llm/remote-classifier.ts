/**
 * Remote Classifier
 *
 * Sends a batch of sanitized messages to a hosted model in one request and
 * maps the reply back onto the batch. Failures come back as values, never as
 * thrown errors: callers treat `{ ok: false }` as "no information".
 */

import type { RateLimiter, RemoteClassifier, RemoteErrorKind, RemoteOutcome } from '../../core/ports';
import { TimeoutError } from '../../core/domain';
import { backoffDelay, sleep as realSleep, withTimeout } from '../concurrency';
import type { ChatRequest, ChatTransport } from './transport';
import { MalformedResponseError, TransportError } from './transport';
import { buildBatchPrompt, parseBatchResponse } from './prompt';

export const DEFAULT_REMOTE_TIMEOUT_MS = 30_000;
export const DEFAULT_REMOTE_RETRIES = 2;
export const DEFAULT_RETRY_BASE_MS = 1_000;

export type RemoteClassifierOptions = {
  transport: ChatTransport;
  limiter: RateLimiter;
  model: string;
  /** Category name → description, shown to the model */
  descriptions?: Readonly<Record<string, string>>;
  timeoutMs?: number;
  retries?: number;
  baseDelayMs?: number;
  sleep?: (ms: number) => Promise<void>;
};

type Failure = {
  kind: RemoteErrorKind;
  retryable: boolean;
  detail: string;
};

function describeFailure(err: unknown): Failure {
  if (err instanceof TimeoutError) {
    return { kind: 'timeout', retryable: true, detail: err.message };
  }
  if (err instanceof MalformedResponseError) {
    return { kind: 'malformed-response', retryable: false, detail: err.message };
  }
  if (err instanceof TransportError && err.status !== null) {
    const retryable = err.status === 429 || err.status >= 500;
    return { kind: 'http-status', retryable, detail: err.message };
  }
  return { kind: 'transport', retryable: true, detail: err instanceof Error ? err.message : String(err) };
}

export function createRemoteClassifier(options: RemoteClassifierOptions): RemoteClassifier {
  const { transport, limiter, model } = options;
  const timeoutMs = options.timeoutMs ?? DEFAULT_REMOTE_TIMEOUT_MS;
  const retries = Math.max(0, options.retries ?? DEFAULT_REMOTE_RETRIES);
  const baseDelayMs = options.baseDelayMs ?? DEFAULT_RETRY_BASE_MS;
  const sleep = options.sleep ?? ((ms: number) => realSleep(ms));

  async function attempt(request: ChatRequest): Promise<string> {
    const controller = new AbortController();
    try {
      return await withTimeout(transport.complete(request, controller.signal), timeoutMs, `${transport.name} request`);
    } finally {
      controller.abort();
    }
  }

  async function completeWithRetry(
    request: ChatRequest
  ): Promise<{ ok: true; content: string } | { ok: false; failure: Failure }> {
    for (let i = 0; ; i++) {
      await limiter.acquire();
      try {
        return { ok: true, content: await attempt(request) };
      } catch (err) {
        const failure = describeFailure(err);
        if (!failure.retryable || i >= retries) {
          return { ok: false, failure };
        }
        const delay = backoffDelay(i, baseDelayMs);
        console.warn(`[remote] ${failure.kind}: ${failure.detail}; retry ${i + 1}/${retries} in ${delay}ms`);
        await sleep(delay);
      }
    }
  }

  return {
    async classifyBatch(items, validCategories, context): Promise<RemoteOutcome> {
      if (items.length === 0) return { ok: true, verdicts: new Map() };

      const prompt = buildBatchPrompt(items, validCategories, options.descriptions, context);
      const started = Date.now();
      const reply = await completeWithRetry({ model, system: prompt.system, user: prompt.user });

      if (!reply.ok) {
        console.error(`[remote] Batch of ${items.length} failed (${reply.failure.kind}): ${reply.failure.detail}`);
        return { ok: false, error: reply.failure.kind, detail: reply.failure.detail };
      }

      const verdicts = parseBatchResponse(reply.content, items, validCategories);
      if (!verdicts) {
        console.error(`[remote] Unparseable reply: ${reply.content.slice(0, 200)}`);
        return { ok: false, error: 'malformed-response', detail: 'Reply is not a JSON array' };
      }

      console.log(
        `[remote] Batch of ${items.length} classified via ${transport.name} ` +
          `(${verdicts.size} verdict(s), ${Date.now() - started}ms)`
      );
      return { ok: true, verdicts };
    },
  };
}
