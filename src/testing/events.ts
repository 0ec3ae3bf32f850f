import type { RawCompletionEvent } from '../llm/types.js';

export interface UsageOptions {
  promptTokens: number;
  completionTokens: number;
}

function split(text: string, size: number): string[] {
  if (text === '') return [];
  const parts: string[] = [];
  for (let i = 0; i < text.length; i += size) {
    parts.push(text.slice(i, i + size));
  }
  return parts;
}

export function usageEvent(usage: UsageOptions): RawCompletionEvent {
  return {
    choices: [],
    usage: {
      prompt_tokens: usage.promptTokens,
      completion_tokens: usage.completionTokens,
      total_tokens: usage.promptTokens + usage.completionTokens
    }
  };
}

export interface TextTurnOptions {
  /** Characters per content delta; the whole text in one delta by default. */
  chunkSize?: number;
  usage?: UsageOptions;
}

/** A streamed plain-text answer ending with `finish_reason: stop`. */
export function textTurn(text: string, options: TextTurnOptions = {}): RawCompletionEvent[] {
  const events: RawCompletionEvent[] = split(text, options.chunkSize ?? Math.max(text.length, 1)).map(delta => ({
    choices: [{ index: 0, delta: { content: delta } }]
  }));
  events.push({ choices: [{ index: 0, delta: {}, finish_reason: 'stop' }] });
  if (options.usage) events.push(usageEvent(options.usage));
  return events;
}

export interface ScriptedToolCall {
  id?: string;
  name: string;
  arguments?: Record<string, unknown> | string;
}

export interface ToolCallTurnOptions {
  /** Assistant text streamed before the calls. */
  content?: string;
  /** Characters per argument fragment; whole arguments in one fragment by default. */
  fragmentSize?: number;
  usage?: UsageOptions;
}

/** A streamed response calling the given tools, ending with `finish_reason: tool_calls`. */
export function toolCallTurn(calls: ScriptedToolCall[], options: ToolCallTurnOptions = {}): RawCompletionEvent[] {
  const events: RawCompletionEvent[] = [];
  if (options.content) {
    events.push({ choices: [{ index: 0, delta: { role: 'assistant', content: options.content } }] });
  }

  calls.forEach((call, index) => {
    const args = typeof call.arguments === 'string' ? call.arguments : JSON.stringify(call.arguments ?? {});
    events.push({
      choices: [{
        index: 0,
        delta: {
          tool_calls: [{ index, id: call.id ?? `call_${index + 1}`, type: 'function', function: { name: call.name, arguments: '' } }]
        }
      }]
    });
    for (const fragment of split(args, options.fragmentSize ?? Math.max(args.length, 1))) {
      events.push({
        choices: [{ index: 0, delta: { tool_calls: [{ index, function: { arguments: fragment } }] } }]
      });
    }
  });

  events.push({ choices: [{ index: 0, delta: {}, finish_reason: 'tool_calls' }] });
  if (options.usage) events.push(usageEvent(options.usage));
  return events;
}
