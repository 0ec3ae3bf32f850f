import { describe, it, expect, vi } from 'vitest';
import { StreamHandler, type StreamedTurn } from '../../src/core/stream-handler.js';
import { RunCancelledError } from '../../src/core/errors.js';
import { textTurn, toolCallTurn, usageEvent } from '../../src/testing/events.js';
import type { Chunk } from '../../src/core/chunks.js';
import type { RawCompletionEvent } from '../../src/llm/types.js';

async function* toStream(events: RawCompletionEvent[]): AsyncGenerator<RawCompletionEvent> {
  for (const event of events) {
    yield event;
  }
}

async function drain(
  handler: StreamHandler,
  events: RawCompletionEvent[],
  signal?: AbortSignal
): Promise<{ chunks: Chunk[]; turn: StreamedTurn }> {
  const generator = handler.process(toStream(events), signal);
  const chunks: Chunk[] = [];
  while (true) {
    const result = await generator.next();
    if (result.done) return { chunks, turn: result.value };
    chunks.push(result.value);
  }
}

function createLogger() {
  return { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
}

describe('StreamHandler', () => {
  it('should forward raw events and concatenate content deltas', async () => {
    const { chunks, turn } = await drain(new StreamHandler(), textTurn('Hello world', { chunkSize: 5 }));

    expect(chunks.map(c => c.type)).toEqual([
      'completion_raw', 'content_delta',
      'completion_raw', 'content_delta',
      'completion_raw', 'content_delta',
      'completion_raw'
    ]);
    expect(chunks.flatMap(c => (c.type === 'content_delta' ? [c.delta] : []))).toEqual(['Hello', ' worl', 'd']);
    expect(turn).toEqual({ content: 'Hello world', toolCalls: [], finishReason: 'stop' });
  });

  it('should reassemble fragmented tool call arguments', async () => {
    const events = toolCallTurn(
      [{ id: 'call_1', name: 'get_weather', arguments: { city: 'Paris' } }],
      { fragmentSize: 4 }
    );
    const { chunks, turn } = await drain(new StreamHandler(), events);

    const deltas = chunks.flatMap(c => (c.type === 'tool_call_delta' ? [c] : []));
    expect(deltas.map(d => d.argumentsDelta)).toEqual(['{"ci', 'ty":', '"Par', 'is"}']);
    expect(deltas.every(d => d.callId === 'call_1' && d.name === 'get_weather')).toBe(true);

    const completed = chunks.filter(c => c.type === 'tool_call_completed');
    expect(completed).toEqual([
      { type: 'tool_call_completed', callId: 'call_1', name: 'get_weather', arguments: '{"city":"Paris"}' }
    ]);
    expect(turn.finishReason).toBe('tool_calls');
    expect(turn.toolCalls).toEqual([{ callId: 'call_1', name: 'get_weather', arguments: '{"city":"Paris"}' }]);
  });

  it('should keep interleaved calls apart and complete them in arrival order', async () => {
    const events: RawCompletionEvent[] = [
      { choices: [{ delta: { tool_calls: [{ index: 0, id: 'a', function: { name: 'first', arguments: '{"x":' } }] } }] },
      { choices: [{ delta: { tool_calls: [{ index: 1, id: 'b', function: { name: 'second', arguments: '{"y":' } }] } }] },
      { choices: [{ delta: { tool_calls: [{ index: 0, function: { arguments: '1}' } }] } }] },
      { choices: [{ delta: { tool_calls: [{ index: 1, function: { arguments: '2}' } }] } }] },
      { choices: [{ delta: {}, finish_reason: 'tool_calls' }] }
    ];

    const { turn } = await drain(new StreamHandler(), events);

    expect(turn.toolCalls).toEqual([
      { callId: 'a', name: 'first', arguments: '{"x":1}' },
      { callId: 'b', name: 'second', arguments: '{"y":2}' }
    ]);
  });

  it('should start a new call when a new id reuses an index', async () => {
    const events: RawCompletionEvent[] = [
      { choices: [{ delta: { tool_calls: [{ index: 0, id: 'call_a', function: { name: 'a', arguments: '{"x":1}' } }] } }] },
      { choices: [{ delta: { tool_calls: [{ index: 0, id: 'call_b', function: { name: 'b', arguments: '{"y":' } }] } }] },
      { choices: [{ delta: { tool_calls: [{ index: 0, function: { arguments: '2}' } }] } }] },
      { choices: [{ delta: {}, finish_reason: 'tool_calls' }] }
    ];

    const { chunks, turn } = await drain(new StreamHandler(), events);

    expect(turn.toolCalls).toEqual([
      { callId: 'call_a', name: 'a', arguments: '{"x":1}' },
      { callId: 'call_b', name: 'b', arguments: '{"y":2}' }
    ]);
    expect(chunks.flatMap(c => (c.type === 'tool_call_delta' ? [c.callId] : []))).toEqual(['call_a', 'call_b', 'call_b']);
  });

  it('should complete pending calls when the stream ends without a finish reason', async () => {
    const events: RawCompletionEvent[] = [
      { choices: [{ delta: { tool_calls: [{ index: 0, id: 'a', function: { name: 'ping', arguments: '' } }] } }] }
    ];

    const { chunks, turn } = await drain(new StreamHandler(), events);

    expect(turn.finishReason).toBeNull();
    expect(turn.toolCalls).toEqual([{ callId: 'a', name: 'ping', arguments: '{}' }]);
    expect(chunks[chunks.length - 1]?.type).toBe('tool_call_completed');
  });

  it('should flag calls whose arguments are not valid JSON', async () => {
    const events = toolCallTurn([{ id: 'a', name: 'first', arguments: '{"x":' }]);
    const { turn } = await drain(new StreamHandler(), events);

    expect(turn.toolCalls).toHaveLength(1);
    expect(turn.toolCalls[0]?.error).toMatch(/^Invalid JSON arguments for first/);
  });

  it('should flag calls whose arguments are not an object', async () => {
    const events = toolCallTurn([{ id: 'a', name: 'first', arguments: '[1,2]' }]);
    const { turn } = await drain(new StreamHandler(), events);

    expect(turn.toolCalls[0]?.error).toBe('Arguments for first must be a JSON object');
  });

  it('should give calls without an id a generated id and an error', async () => {
    const events: RawCompletionEvent[] = [
      { choices: [{ delta: { tool_calls: [{ index: 0, function: { name: 'ping', arguments: '{}' } }] } }] },
      { choices: [{ delta: {}, finish_reason: 'tool_calls' }] }
    ];

    const { turn } = await drain(new StreamHandler(), events);

    expect(turn.toolCalls[0]?.callId).toMatch(/^call_/);
    expect(turn.toolCalls[0]?.error).toBe('Tool call ping is missing an id');
  });

  it('should emit usage chunks', async () => {
    const events = [...textTurn('ok'), usageEvent({ promptTokens: 10, completionTokens: 5 })];
    const { chunks, turn } = await drain(new StreamHandler(), events);

    const usage = chunks.filter(c => c.type === 'usage');
    expect(usage).toEqual([{ type: 'usage', usage: { promptTokens: 10, completionTokens: 5, totalTokens: 15 } }]);
    expect(turn.usage).toEqual({ promptTokens: 10, completionTokens: 5, totalTokens: 15 });
  });

  it('should skip malformed events with a warning', async () => {
    const logger = createLogger();
    const malformed: RawCompletionEvent = JSON.parse('{"choices":"not-a-list"}');
    const events = [malformed, ...textTurn('fine')];

    const { chunks, turn } = await drain(new StreamHandler(logger), events);

    expect(chunks[0]).toEqual({ type: 'completion_raw', raw: malformed });
    expect(turn.content).toBe('fine');
    expect(logger.warn).toHaveBeenCalledTimes(1);
    expect(logger.warn.mock.calls[0]?.[0]).toBe('Skipping malformed completion event');
  });

  it('should stop with RunCancelledError when aborted', async () => {
    const controller = new AbortController();
    controller.abort();

    await expect(drain(new StreamHandler(), textTurn('never'), controller.signal)).rejects.toThrow(RunCancelledError);
  });
});
