/**
 * Remote Classification Adapters
 */

export { createRemoteClassifier, DEFAULT_REMOTE_TIMEOUT_MS, DEFAULT_REMOTE_RETRIES } from './remote-classifier';
export type { RemoteClassifierOptions } from './remote-classifier';
export {
  createAnthropicTransport,
  createChatCompletionsTransport,
  TransportError,
  MalformedResponseError,
  DEFAULT_ANTHROPIC_MODEL,
  DEFAULT_CHAT_API_URL,
  DEFAULT_CHAT_MODEL,
} from './transport';
export type { ChatTransport, ChatRequest } from './transport';
export { buildBatchPrompt, parseBatchResponse, sanitize } from './prompt';
