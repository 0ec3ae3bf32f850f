import type { Message } from '../core/messages.js';
import type { RunContext, ToolSchema } from '../core/types.js';

export type { LLMConfig, RateLimitConfig, RetryConfig, TokenUsage, ToolSchema } from '../core/types.js';

/** One tool-call fragment inside a streamed delta. */
export interface RawToolCallDelta {
  index?: number;
  id?: string | null;
  type?: string | null;
  function?: {
    name?: string | null;
    arguments?: string | null;
  } | null;
}

export interface RawCompletionChoice {
  index?: number;
  delta?: {
    role?: string | null;
    content?: string | null;
    tool_calls?: RawToolCallDelta[] | null;
  } | null;
  finish_reason?: string | null;
}

/**
 * A single event of a streamed completion, in the chat-completions chunk shape.
 * Backends speaking another protocol translate into this shape.
 */
export interface RawCompletionEvent {
  id?: string;
  model?: string;
  choices?: RawCompletionChoice[];
  usage?: {
    prompt_tokens: number;
    completion_tokens: number;
    total_tokens?: number;
  } | null;
}

export interface StreamOptions {
  tools?: ToolSchema[];
  signal?: AbortSignal;
  context?: RunContext;
}

export interface CompletionClient {
  readonly name: string;
  readonly model: string;
  stream(messages: Message[], options?: StreamOptions): AsyncIterable<RawCompletionEvent>;
}
