import { describe, it, expect, vi } from 'vitest';
import { z } from 'zod';
import { ToolRegistry, serializeOutput } from '../../src/tools/registry.js';
import { formatToolError } from '../../src/tools/errors.js';
import { taskDoneTool } from '../../src/tools/task-done.js';
import { TimeoutError } from '../../src/core/errors.js';
import type { Tool, ToolContext } from '../../src/tools/types.js';

const ctx: ToolContext = { context: {}, agent: 'Tester', callId: 'call_1', history: [] };

const addTool: Tool = {
  kind: 'sync',
  name: 'add',
  description: 'Add two numbers',
  parameters: {
    type: 'object',
    properties: { a: { type: 'number' }, b: { type: 'number' } },
    required: ['a', 'b']
  },
  schema: z.object({ a: z.number(), b: z.number() }),
  execute: (args) => Number(args['a']) + Number(args['b'])
};

describe('ToolRegistry', () => {
  it('should list schemas with a default parameter object', () => {
    const registry = new ToolRegistry([addTool, { kind: 'sync', name: 'ping', description: 'Ping', execute: () => 'pong' }]);

    expect(registry.listSchemas()).toHaveLength(2);
    expect(registry.listSchemas()[1]).toEqual({
      name: 'ping',
      description: 'Ping',
      parameters: { type: 'object', properties: {} }
    });
  });

  it('should validate and run tools', async () => {
    const registry = new ToolRegistry([addTool]);

    expect(await registry.call('add', '{"a":2,"b":3}', ctx)).toEqual({ output: '5', isError: false });
    expect(await registry.call('add', '{"a":2}', ctx)).toEqual({
      output: 'Error: Invalid arguments for add: b: Required',
      isError: true
    });
  });

  it('should treat empty arguments as an empty object', async () => {
    const execute = vi.fn(() => 'pong');
    const registry = new ToolRegistry([{ kind: 'sync', name: 'ping', description: 'Ping', execute }]);

    await registry.call('ping', '  ', ctx);

    expect(execute).toHaveBeenCalledWith({}, ctx);
  });

  it('should reject arguments that are not objects', async () => {
    const registry = new ToolRegistry([addTool]);

    expect(await registry.call('add', '[1,2]', ctx)).toEqual({
      output: 'Error: Arguments for add must be a JSON object',
      isError: true
    });
  });

  it('should report unknown tools', async () => {
    expect(await new ToolRegistry().call('missing', '{}', ctx)).toEqual({
      output: 'Error: Tool not found: missing',
      isError: true
    });
  });

  it('should await async tools', async () => {
    const registry = new ToolRegistry([{
      kind: 'async',
      name: 'fetch_user',
      description: 'Fetch a user',
      execute: async (args) => ({ id: args['id'], name: 'Ada' })
    }]);

    expect(await registry.call('fetch_user', '{"id":7}', ctx)).toEqual({
      output: '{"id":7,"name":"Ada"}',
      isError: false
    });
  });

  it('should turn rejected promises into error outputs', async () => {
    const registry = new ToolRegistry([{
      kind: 'async',
      name: 'flaky',
      description: 'Fails',
      execute: async () => {
        throw new Error('disk full');
      }
    }]);

    expect(await registry.call('flaky', '{}', ctx)).toEqual({ output: 'Error: flaky failed: disk full', isError: true });
  });

  it('should track confirmation flags and unregister tools', () => {
    const registry = new ToolRegistry([{ ...addTool, requireConfirmation: true }]);

    expect(registry.requiresConfirmation('add')).toBe(true);
    expect(registry.requiresConfirmation('missing')).toBe(false);
    expect(registry.unregister('add')).toBe(true);
    expect(registry.has('add')).toBe(false);
  });
});

describe('serializeOutput', () => {
  it('should keep strings and serialize everything else', () => {
    expect(serializeOutput('plain')).toBe('plain');
    expect(serializeOutput(undefined)).toBe('');
    expect(serializeOutput(null)).toBe('null');
    expect(serializeOutput([1, 'a'])).toBe('[1,"a"]');
  });
});

describe('formatToolError', () => {
  it('should describe network and HTTP failures', () => {
    const refused = Object.assign(new Error('connect ECONNREFUSED'), { code: 'ECONNREFUSED' });
    const unauthorized = Object.assign(new Error('401'), { status: 401 });

    expect(formatToolError('search', refused)).toBe('search failed: connection refused');
    expect(formatToolError('search', unauthorized)).toBe('search failed: HTTP 401 Unauthorized - check API key');
    expect(formatToolError('search', new TimeoutError(500, 'search'))).toBe('search timed out after 500ms');
    expect(formatToolError('search', 'odd')).toBe('search failed: odd');
  });
});

describe('task_done', () => {
  it('should confirm completion with an optional summary', async () => {
    const registry = new ToolRegistry([taskDoneTool]);

    expect((await registry.call('task_done', '{"summary":"sent the report"}', ctx)).output).toBe(
      'Task completed: sent the report'
    );
    expect((await registry.call('task_done', '{}', ctx)).output).toBe('Task completed.');
  });
});
