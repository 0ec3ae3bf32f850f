import type { Tool, ToolContext, ToolResult, ToolSchema } from './types.js';
import { formatToolError, formatZodIssues } from './errors.js';

export type { Tool, ToolContext, ToolResult, ToolSchema };

export function serializeOutput(value: unknown): string {
  if (typeof value === 'string') return value;
  if (value === undefined) return '';
  return JSON.stringify(value);
}

export function errorResult(message: string): ToolResult {
  return { output: `Error: ${message}`, isError: true };
}

export class ToolRegistry {
  private tools: Map<string, Tool> = new Map();

  constructor(tools: readonly Tool[] = []) {
    for (const tool of tools) {
      this.register(tool);
    }
  }

  register(tool: Tool): void {
    this.tools.set(tool.name, tool);
  }

  unregister(name: string): boolean {
    return this.tools.delete(name);
  }

  has(name: string): boolean {
    return this.tools.has(name);
  }

  listSchemas(): ToolSchema[] {
    return Array.from(this.tools.values()).map(t => ({
      name: t.name,
      description: t.description,
      parameters: t.parameters ?? { type: 'object', properties: {} }
    }));
  }

  requiresConfirmation(name: string): boolean {
    return this.tools.get(name)?.requireConfirmation === true;
  }

  /** Decodes the serialized arguments, validates them and runs the tool. */
  async call(name: string, rawArgs: string, ctx: ToolContext): Promise<ToolResult> {
    const tool = this.tools.get(name);
    if (!tool) {
      return errorResult(`Tool not found: ${name}`);
    }

    let decoded: unknown;
    try {
      decoded = rawArgs.trim() === '' ? {} : JSON.parse(rawArgs);
    } catch (error) {
      return errorResult(`Invalid JSON arguments for ${name}: ${error instanceof Error ? error.message : String(error)}`);
    }
    if (decoded === null || typeof decoded !== 'object' || Array.isArray(decoded)) {
      return errorResult(`Arguments for ${name} must be a JSON object`);
    }

    let args: Record<string, unknown> = { ...decoded };
    if (tool.schema) {
      const parsed = tool.schema.safeParse(decoded);
      if (!parsed.success) {
        return errorResult(`Invalid arguments for ${name}: ${formatZodIssues(parsed.error)}`);
      }
      args = parsed.data;
    }

    try {
      const value = tool.kind === 'async' ? await tool.execute(args, ctx) : tool.execute(args, ctx);
      return { output: serializeOutput(value), isError: false };
    } catch (error) {
      return errorResult(formatToolError(name, error));
    }
  }
}
