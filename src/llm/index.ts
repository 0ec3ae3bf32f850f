export { BaseCompletionClient, RateLimiter, createCompletionClient } from './provider.js';
export { OpenAICompletionClient, toChatMessages, type ChatCompletionMessage, type OpenAIClientOptions } from './openai.js';
export { RawCompletionEventSchema } from './schema.js';
export type {
  CompletionClient,
  RawCompletionEvent,
  RawCompletionChoice,
  RawToolCallDelta,
  StreamOptions
} from './types.js';
