import { describe, it, expect, vi, beforeEach } from 'vitest';
import {
  createAnthropicTransport,
  createChatCompletionsTransport,
  MalformedResponseError,
  TransportError,
  type ChatRequest,
} from './transport';

const { create, FakeAPIError } = vi.hoisted(() => {
  class FakeAPIError extends Error {
    constructor(
      readonly status: number | undefined,
      message: string
    ) {
      super(message);
    }
  }
  return { create: vi.fn(), FakeAPIError };
});

vi.mock('@anthropic-ai/sdk', () => {
  class Anthropic {
    static APIError = FakeAPIError;
    messages = { create };
  }
  return { default: Anthropic };
});

const request: ChatRequest = { model: 'test-model', system: 'sys', user: 'usr' };
const signal = new AbortController().signal;

async function failure(promise: Promise<string>): Promise<unknown> {
  return promise.then(
    () => new Error('expected a rejection'),
    (err: unknown) => err
  );
}

// ============================================
// Chat Completions
// ============================================

describe('chat completions transport', () => {
  const completion = (content: string) => new Response(JSON.stringify({ choices: [{ message: { content } }] }));

  it('posts the system and user messages with a bearer token', async () => {
    const fetchMock = vi.fn<typeof fetch>(async () => completion('[]'));
    const transport = createChatCompletionsTransport({ apiKey: 'test-secret', fetch: fetchMock });

    expect(await transport.complete(request, signal)).toBe('[]');

    expect(transport.name).toBe('api.perplexity.ai');
    const [url, init] = fetchMock.mock.calls[0];
    expect(url).toBe('https://api.perplexity.ai/chat/completions');
    expect(init?.method).toBe('POST');
    expect(init?.headers).toEqual({ Authorization: 'Bearer test-secret', 'Content-Type': 'application/json' });
    expect(JSON.parse(String(init?.body))).toEqual({
      model: 'test-model',
      messages: [
        { role: 'system', content: 'sys' },
        { role: 'user', content: 'usr' },
      ],
    });
  });

  it('is named after the host it talks to', () => {
    const transport = createChatCompletionsTransport({
      url: 'https://llm.internal.example/v1/chat/completions',
      apiKey: 'test-secret',
    });

    expect(transport.name).toBe('llm.internal.example');
  });

  it('carries the status of a non-2xx answer', async () => {
    const transport = createChatCompletionsTransport({
      apiKey: 'test-secret',
      fetch: async () => new Response('slow down', { status: 429 }),
    });

    const err = await failure(transport.complete(request, signal));

    expect(err).toBeInstanceOf(TransportError);
    if (err instanceof TransportError) {
      expect(err.status).toBe(429);
      expect(err.message).toBe('HTTP 429: slow down');
    }
  });

  it('reports network failures without a status', async () => {
    const transport = createChatCompletionsTransport({
      apiKey: 'test-secret',
      fetch: async () => {
        throw new TypeError('fetch failed');
      },
    });

    const err = await failure(transport.complete(request, signal));

    expect(err).toBeInstanceOf(TransportError);
    if (err instanceof TransportError) {
      expect(err.status).toBeNull();
      expect(err.message).toBe('fetch failed');
    }
  });

  it('rejects bodies that are not a chat completion', async () => {
    const html = createChatCompletionsTransport({ apiKey: 'test-secret', fetch: async () => new Response('<html>') });
    const empty = createChatCompletionsTransport({
      apiKey: 'test-secret',
      fetch: async () => new Response(JSON.stringify({ choices: [] })),
    });

    expect(await failure(html.complete(request, signal))).toBeInstanceOf(MalformedResponseError);
    await expect(empty.complete(request, signal)).rejects.toThrow('Response has no choices[0].message.content');
  });
});

// ============================================
// Anthropic
// ============================================

describe('anthropic transport', () => {
  beforeEach(() => {
    create.mockReset();
  });

  it('sends one user message and joins the text blocks', async () => {
    create.mockResolvedValue({
      content: [
        { type: 'text', text: '[{"email_index": 0,' },
        { type: 'tool_use', id: 't', name: 'n', input: {} },
        { type: 'text', text: ' "category": "PRO"}]' },
      ],
    });
    const transport = createAnthropicTransport({ apiKey: 'test-secret' });

    expect(await transport.complete(request, signal)).toBe('[{"email_index": 0, "category": "PRO"}]');
    expect(create).toHaveBeenCalledWith(
      {
        model: 'test-model',
        max_tokens: 2048,
        temperature: 0.2,
        system: 'sys',
        messages: [{ role: 'user', content: 'usr' }],
      },
      { signal }
    );
  });

  it('treats a reply without text as malformed', async () => {
    create.mockResolvedValue({ content: [] });
    const transport = createAnthropicTransport({ apiKey: 'test-secret' });

    await expect(transport.complete(request, signal)).rejects.toThrow('Response contained no text block');
  });

  it('maps API errors to their HTTP status', async () => {
    create.mockRejectedValue(new FakeAPIError(529, 'Overloaded'));
    const transport = createAnthropicTransport({ apiKey: 'test-secret' });

    const err = await failure(transport.complete(request, signal));

    expect(err).toBeInstanceOf(TransportError);
    if (err instanceof TransportError) {
      expect(err.status).toBe(529);
      expect(err.message).toBe('Overloaded');
    }
  });

  it('maps other failures to a transport error without a status', async () => {
    create.mockRejectedValue(new Error('socket closed'));
    const transport = createAnthropicTransport({ apiKey: 'test-secret' });

    const err = await failure(transport.complete(request, signal));

    expect(err).toBeInstanceOf(TransportError);
    if (err instanceof TransportError) expect(err.status).toBeNull();
  });
});
