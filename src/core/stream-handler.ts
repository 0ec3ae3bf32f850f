import type { Chunk, ToolCallCompletedChunk } from './chunks.js';
import type { Logger, TokenUsage } from './types.js';
import type { RawCompletionEvent, RawToolCallDelta } from '../llm/types.js';
import { RawCompletionEventSchema } from '../llm/schema.js';
import { newCallId } from './messages.js';
import { RunCancelledError } from './errors.js';
import { silentLogger } from './logger.js';

export interface CompletedToolCall {
  callId: string;
  name: string;
  arguments: string;
  /** Decode error; the call is answered with an error output instead of running. */
  error?: string;
}

export interface StreamedTurn {
  content: string;
  toolCalls: CompletedToolCall[];
  finishReason: string | null;
  usage?: TokenUsage;
}

interface PendingCall {
  callId?: string;
  name: string;
  arguments: string;
}

export function validateArguments(name: string, args: string): string | undefined {
  let parsed: unknown;
  try {
    parsed = JSON.parse(args);
  } catch (error) {
    return `Invalid JSON arguments for ${name}: ${error instanceof Error ? error.message : String(error)}`;
  }
  if (parsed === null || typeof parsed !== 'object' || Array.isArray(parsed)) {
    return `Arguments for ${name} must be a JSON object`;
  }
  return undefined;
}

/**
 * Turns raw completion events into chunks. Tool-call fragments are buffered
 * per call and completed on `finish_reason` or at the end of the stream; the
 * generator returns the reassembled turn.
 */
export class StreamHandler {
  private readonly logger: Logger;

  constructor(logger: Logger = silentLogger) {
    this.logger = logger;
  }

  async *process(
    events: AsyncIterable<RawCompletionEvent>,
    signal?: AbortSignal
  ): AsyncGenerator<Chunk, StreamedTurn> {
    const pending = new Map<string, PendingCall>();
    // Fragment index or id -> key of the pending call it currently extends.
    const slots = new Map<string, string>();
    const completed: CompletedToolCall[] = [];
    let content = '';
    let finishReason: string | null = null;
    let usage: TokenUsage | undefined;
    let lastKey: string | undefined;
    let sequence = 0;

    const flush = function* (): Generator<ToolCallCompletedChunk> {
      for (const call of pending.values()) {
        const done = finalize(call);
        completed.push(done);
        const chunk: ToolCallCompletedChunk = {
          type: 'tool_call_completed',
          callId: done.callId,
          name: done.name,
          arguments: done.arguments
        };
        if (done.error !== undefined) chunk.error = done.error;
        yield chunk;
      }
      pending.clear();
      slots.clear();
      lastKey = undefined;
    };

    for await (const event of events) {
      if (signal?.aborted) throw new RunCancelledError('stream aborted');

      yield { type: 'completion_raw', raw: event };

      const result = RawCompletionEventSchema.safeParse(event);
      if (!result.success) {
        this.logger.warn('Skipping malformed completion event', {
          issues: result.error.issues.map(issue => issue.message)
        });
        continue;
      }
      const parsed = result.data;

      if (parsed.usage) {
        usage = {
          promptTokens: parsed.usage.prompt_tokens,
          completionTokens: parsed.usage.completion_tokens,
          totalTokens: parsed.usage.total_tokens ?? parsed.usage.prompt_tokens + parsed.usage.completion_tokens
        };
        yield { type: 'usage', usage };
      }

      const choice = parsed.choices?.[0];
      if (!choice) continue;

      const delta = choice.delta;
      if (delta?.content) {
        content += delta.content;
        yield { type: 'content_delta', delta: delta.content };
      }

      for (const fragment of delta?.tool_calls ?? []) {
        const slot = fragmentKey(fragment);
        let key = slot === undefined ? lastKey : slots.get(slot);
        let call = key === undefined ? undefined : pending.get(key);
        // A new id under a slot already in use starts a new call.
        if (!call || (fragment.id && call.callId !== undefined && call.callId !== fragment.id)) {
          key = `call:${sequence++}`;
          call = { name: '', arguments: '' };
          pending.set(key, call);
          if (slot !== undefined) slots.set(slot, key);
        }
        lastKey = key;

        if (fragment.id) call.callId = fragment.id;
        if (fragment.function?.name) call.name += fragment.function.name;
        const argumentsDelta = fragment.function?.arguments ?? '';
        if (argumentsDelta) {
          call.arguments += argumentsDelta;
          yield {
            type: 'tool_call_delta',
            callId: call.callId ?? '',
            name: call.name,
            argumentsDelta
          };
        }
      }

      if (choice.finish_reason) {
        finishReason = choice.finish_reason;
        yield* flush();
      }
    }

    if (signal?.aborted) throw new RunCancelledError('stream aborted');

    yield* flush();

    const turn: StreamedTurn = { content, toolCalls: completed, finishReason };
    if (usage) turn.usage = usage;
    return turn;
  }
}

function fragmentKey(fragment: RawToolCallDelta): string | undefined {
  if (fragment.index !== undefined) return `index:${fragment.index}`;
  if (fragment.id) return `id:${fragment.id}`;
  return undefined;
}

function finalize(call: PendingCall): CompletedToolCall {
  const args = call.arguments.trim() === '' ? '{}' : call.arguments;
  const callId = call.callId ?? newCallId();

  let error: string | undefined;
  if (!call.callId) {
    error = `Tool call ${call.name || '<unnamed>'} is missing an id`;
  } else if (!call.name) {
    error = 'Tool call is missing a function name';
  } else {
    error = validateArguments(call.name, args);
  }

  const done: CompletedToolCall = { callId, name: call.name, arguments: args };
  if (error !== undefined) done.error = error;
  return done;
}
