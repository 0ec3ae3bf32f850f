import { BaseCompletionClient } from './provider.js';
import { RawCompletionEventSchema } from './schema.js';
import type { LLMConfig, RawCompletionEvent, StreamOptions } from './types.js';
import type { Message, UserContentPart } from '../core/messages.js';
import type { Logger, RetryConfig } from '../core/types.js';
import { ConfigurationError, LLMError, LLMRateLimitError, RunCancelledError, errorMessage } from '../core/errors.js';
import { Retrier } from '../core/retry.js';
import { silentLogger } from '../core/logger.js';

const DEFAULT_RETRY: RetryConfig = {
  maxAttempts: 3,
  baseDelayMs: 1000,
  maxDelayMs: 10000,
  jitterFactor: 0.1
};

interface ChatToolCall {
  id: string;
  type: 'function';
  function: { name: string; arguments: string };
}

type ChatContentPart =
  | { type: 'text'; text: string }
  | { type: 'image_url'; image_url: { url: string; detail?: string } };

interface AssistantChatMessage {
  role: 'assistant';
  content: string | null;
  tool_calls?: ChatToolCall[];
}

export type ChatCompletionMessage =
  | { role: 'system'; content: string }
  | { role: 'user'; content: string | ChatContentPart[] }
  | AssistantChatMessage
  | { role: 'tool'; tool_call_id: string; content: string };

/**
 * Folds internal messages into chat-completions messages: consecutive function
 * calls attach to the preceding assistant message as `tool_calls`, outputs
 * become `tool` messages and transfer records are dropped.
 */
export function toChatMessages(messages: Message[]): ChatCompletionMessage[] {
  const result: ChatCompletionMessage[] = [];
  let openAssistant: AssistantChatMessage | null = null;

  for (const message of messages) {
    switch (message.type) {
      case 'system':
        result.push({ role: 'system', content: message.content });
        openAssistant = null;
        break;
      case 'user':
        result.push({ role: 'user', content: formatUserContent(message.content) });
        openAssistant = null;
        break;
      case 'assistant': {
        const assistant: AssistantChatMessage = { role: 'assistant', content: message.content };
        result.push(assistant);
        openAssistant = assistant;
        break;
      }
      case 'function_call': {
        const call: ChatToolCall = {
          id: message.callId,
          type: 'function',
          function: { name: message.name, arguments: message.arguments }
        };
        if (!openAssistant) {
          openAssistant = { role: 'assistant', content: null };
          result.push(openAssistant);
        }
        openAssistant.tool_calls = [...(openAssistant.tool_calls ?? []), call];
        break;
      }
      case 'function_call_output':
        result.push({ role: 'tool', tool_call_id: message.callId, content: message.output });
        openAssistant = null;
        break;
      case 'transfer':
        break;
    }
  }

  return result;
}

function formatUserContent(content: string | UserContentPart[]): string | ChatContentPart[] {
  if (typeof content === 'string') return content;
  const parts: ChatContentPart[] = [];
  for (const part of content) {
    if (part.type === 'text') {
      parts.push({ type: 'text', text: part.text });
    } else if (part.imageUrl) {
      parts.push({
        type: 'image_url',
        image_url: part.detail ? { url: part.imageUrl, detail: part.detail } : { url: part.imageUrl }
      });
    }
  }
  return parts;
}

export interface OpenAIClientOptions extends Omit<LLMConfig, 'provider'> {
  logger?: Logger;
}

export class OpenAICompletionClient extends BaseCompletionClient {
  readonly name = 'openai';
  readonly model: string;

  private readonly baseUrl: string;
  private readonly apiKey: string;
  private readonly temperature?: number;
  private readonly maxTokens?: number;
  private readonly retrier: Retrier;
  private readonly logger: Logger;

  constructor(config: OpenAIClientOptions) {
    super(config);
    this.model = config.model;
    this.baseUrl = config.baseUrl ?? 'https://api.openai.com/v1';
    this.apiKey = config.apiKey ?? '';
    this.temperature = config.temperature;
    this.maxTokens = config.maxTokens;
    this.logger = config.logger ?? silentLogger;
    this.retrier = new Retrier(config.retry ?? DEFAULT_RETRY, this.logger);

    if (!this.apiKey) {
      throw new ConfigurationError('OpenAI API key is required');
    }
  }

  async *stream(messages: Message[], options?: StreamOptions): AsyncIterable<RawCompletionEvent> {
    await this.checkRateLimit(options?.signal);

    const toolDefs = options?.tools?.map(t => ({
      type: 'function' as const,
      function: {
        name: t.name,
        description: t.description,
        parameters: t.parameters
      }
    }));

    const body: Record<string, unknown> = {
      model: this.model,
      messages: toChatMessages(messages),
      stream: true,
      stream_options: { include_usage: true }
    };

    if (toolDefs && toolDefs.length > 0) {
      body['tools'] = toolDefs;
      body['tool_choice'] = 'auto';
    }
    if (this.temperature !== undefined) body['temperature'] = this.temperature;
    if (this.maxTokens !== undefined) body['max_tokens'] = this.maxTokens;

    const signal = options?.signal;
    const response = await this.retrier.execute(() => this.open(body, signal), signal);

    if (!response.body) throw new LLMError('No response body', this.name);

    const reader = response.body.getReader();
    const decoder = new TextDecoder();
    let buffer = '';
    let drained = false;

    try {
      while (true) {
        const { done, value } = await reader.read();
        if (done) {
          drained = true;
          break;
        }

        buffer += decoder.decode(value, { stream: true });
        const lines = buffer.split('\n');
        buffer = lines.pop() || '';

        for (const line of lines) {
          const trimmed = line.trim();
          if (trimmed === '') continue;
          if (trimmed === 'data: [DONE]') return;
          if (!trimmed.startsWith('data: ')) continue;

          const event = this.parseEvent(trimmed.slice(6));
          if (event) yield event;
        }
      }
    } catch (error) {
      if (signal?.aborted) throw new RunCancelledError('stream aborted');
      if (error instanceof LLMError) throw error;
      throw new LLMError(`OpenAI stream failed: ${errorMessage(error)}`, this.name);
    } finally {
      // Early exits leave the connection open until the body is cancelled.
      if (!drained) {
        await reader.cancel().catch((error: unknown) => {
          this.logger.debug('Failed to cancel response body', { error: errorMessage(error) });
        });
      }
      reader.releaseLock();
    }
  }

  private parseEvent(data: string): RawCompletionEvent | null {
    let parsed: unknown;
    try {
      parsed = JSON.parse(data);
    } catch (error) {
      this.logger.warn('Skipping undecodable stream event', { error: errorMessage(error) });
      return null;
    }
    const result = RawCompletionEventSchema.safeParse(parsed);
    if (!result.success) {
      this.logger.warn('Skipping malformed stream event', { issues: result.error.issues.length });
      return null;
    }
    return result.data;
  }

  private async open(body: Record<string, unknown>, signal?: AbortSignal): Promise<Response> {
    let response: Response;
    try {
      response = await fetch(`${this.baseUrl}/chat/completions`, {
        method: 'POST',
        headers: {
          'Content-Type': 'application/json',
          'Authorization': `Bearer ${this.apiKey}`
        },
        body: JSON.stringify(body),
        signal
      });
    } catch (error) {
      if (signal?.aborted) throw new RunCancelledError('request aborted');
      throw new LLMError(`OpenAI request failed: ${errorMessage(error)}`, this.name);
    }

    if (response.status === 429) {
      const retryAfter = Number(response.headers.get('retry-after'));
      throw new LLMRateLimitError(this.name, Number.isFinite(retryAfter) && retryAfter > 0 ? retryAfter : undefined);
    }

    if (!response.ok) {
      const errorText = await response.text().catch(() => 'Unable to read error');
      throw new LLMError(`OpenAI stream error: ${response.status} ${response.statusText} - ${errorText}`, this.name);
    }

    return response;
  }
}
