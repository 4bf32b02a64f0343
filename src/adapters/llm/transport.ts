/**
 * Chat Transports
 *
 * One request/response exchange with a hosted model. The classifier owns
 * retries, rate limiting and parsing; a transport only moves text.
 */

import Anthropic from '@anthropic-ai/sdk';
import { z } from 'zod';

export type ChatRequest = {
  model: string;
  system: string;
  user: string;
};

export type ChatTransport = {
  name: string;
  complete: (request: ChatRequest, signal: AbortSignal) => Promise<string>;
};

/** Network failure (status null) or a non-2xx answer */
export class TransportError extends Error {
  constructor(
    message: string,
    readonly status: number | null
  ) {
    super(message);
    this.name = 'TransportError';
  }
}

/** The service answered 2xx but not in the shape we asked for */
export class MalformedResponseError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'MalformedResponseError';
  }
}

const errorMessage = (err: unknown) => (err instanceof Error ? err.message : String(err));

// ============================================
// Anthropic Messages API
// ============================================

export const DEFAULT_ANTHROPIC_MODEL = 'claude-3-5-haiku-20241022';
const DEFAULT_MAX_TOKENS = 2048;

export function createAnthropicTransport(config: { apiKey: string; maxTokens?: number }): ChatTransport {
  // Retries are handled by the classifier so each attempt passes the rate limiter
  const client = new Anthropic({ apiKey: config.apiKey, maxRetries: 0 });

  return {
    name: 'anthropic',

    async complete(request, signal) {
      try {
        const response = await client.messages.create(
          {
            model: request.model,
            max_tokens: config.maxTokens ?? DEFAULT_MAX_TOKENS,
            temperature: 0.2,
            system: request.system,
            messages: [{ role: 'user', content: request.user }],
          },
          { signal }
        );

        const text = response.content.map(block => (block.type === 'text' ? block.text : '')).join('');
        if (!text) throw new MalformedResponseError('Response contained no text block');
        return text;
      } catch (err) {
        if (err instanceof MalformedResponseError) throw err;
        if (err instanceof Anthropic.APIError) {
          throw new TransportError(err.message, err.status ?? null);
        }
        throw new TransportError(errorMessage(err), null);
      }
    },
  };
}

// ============================================
// OpenAI-style /chat/completions
// ============================================

export const DEFAULT_CHAT_API_URL = 'https://api.perplexity.ai/chat/completions';
export const DEFAULT_CHAT_MODEL = 'sonar-pro';

const chatCompletionSchema = z.object({
  choices: z
    .array(
      z.object({
        message: z.object({ content: z.string() }),
      })
    )
    .min(1),
});

export type ChatCompletionsConfig = {
  url?: string;
  apiKey: string;
  fetch?: typeof fetch;
};

export function createChatCompletionsTransport(config: ChatCompletionsConfig): ChatTransport {
  const url = config.url ?? DEFAULT_CHAT_API_URL;
  const fetchImpl = config.fetch ?? fetch;

  return {
    name: new URL(url).host,

    async complete(request, signal) {
      let response: Response;
      try {
        response = await fetchImpl(url, {
          method: 'POST',
          headers: {
            Authorization: `Bearer ${config.apiKey}`,
            'Content-Type': 'application/json',
          },
          body: JSON.stringify({
            model: request.model,
            messages: [
              { role: 'system', content: request.system },
              { role: 'user', content: request.user },
            ],
          }),
          signal,
        });
      } catch (err) {
        throw new TransportError(errorMessage(err), null);
      }

      if (!response.ok) {
        const body = await response.text().catch(() => '');
        throw new TransportError(`HTTP ${response.status}${body ? `: ${body.slice(0, 200)}` : ''}`, response.status);
      }

      let data: unknown;
      try {
        data = await response.json();
      } catch (err) {
        throw new MalformedResponseError(`Response body is not JSON: ${errorMessage(err)}`);
      }

      const parsed = chatCompletionSchema.safeParse(data);
      if (!parsed.success) {
        throw new MalformedResponseError('Response has no choices[0].message.content');
      }
      return parsed.data.choices[0].message.content;
    },
  };
}
