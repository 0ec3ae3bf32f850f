import type { CompletionClient, RawCompletionEvent } from '../llm/types.js';
import type { Tool, ToolContext, ToolResult } from '../tools/types.js';
import type { CompletionCondition, Logger, LoggerConfig, RunContext, ToolSchema } from './types.js';
import type { MessageTransfer } from './message-transfers.js';
import { ToolRegistry } from '../tools/registry.js';
import { TASK_DONE, TASK_DONE_INSTRUCTIONS, taskDoneTool } from '../tools/task-done.js';
import { systemMessage, type FunctionCallMessage, type Message } from './messages.js';
import { ConfigurationError, HandoffError } from './errors.js';
import {
  isHandoffToolName,
  transferToAgentSchema,
  transferToParentSchema,
  walk,
  type HandoffNode
} from './handoff.js';
import { renderTemplate } from './template.js';
import { resolveLogger } from './logger.js';

export interface AgentOptions {
  name: string;
  /** Template rendered against the run context before every request. */
  instructions: string;
  client: CompletionClient;
  tools?: Tool[];
  handoffs?: Agent[];
  completionCondition?: CompletionCondition;
  messageTransfer?: MessageTransfer;
  logger?: Logger | LoggerConfig;
}

export interface CompleteOptions {
  context?: RunContext;
  signal?: AbortSignal;
}

export class Agent implements HandoffNode<Agent> {
  readonly name: string;
  readonly instructions: string;
  readonly client: CompletionClient;
  readonly completionCondition: CompletionCondition;
  readonly messageTransfer?: MessageTransfer;

  private readonly registry: ToolRegistry;
  private readonly children: Agent[] = [];
  private parent: string | undefined;
  private readonly logger: Logger;

  constructor(options: AgentOptions) {
    if (!options.name.trim()) {
      throw new ConfigurationError('Agent name must not be empty');
    }

    this.name = options.name;
    this.instructions = options.instructions;
    this.client = options.client;
    this.completionCondition = options.completionCondition ?? 'stop';
    this.messageTransfer = options.messageTransfer;
    this.logger = resolveLogger(options.logger);
    this.registry = new ToolRegistry();

    for (const tool of options.tools ?? []) {
      if (isHandoffToolName(tool.name) || tool.name === TASK_DONE) {
        throw new ConfigurationError(`Tool name is reserved: ${tool.name}`);
      }
      this.registry.register(tool);
    }
    if (this.completionCondition === 'call') {
      this.registry.register(taskDoneTool);
    }

    for (const child of options.handoffs ?? []) {
      this.addHandoff(child);
    }
  }

  get handoffs(): readonly Agent[] {
    return this.children;
  }

  get parentName(): string | undefined {
    return this.parent;
  }

  addHandoff(child: Agent): void {
    if (child === this) {
      throw new HandoffError(`Agent '${this.name}' cannot hand off to itself`, this.name);
    }
    if (child.parent !== undefined) {
      throw new HandoffError(`Agent '${child.name}' already has a parent: ${child.parent}`, child.name);
    }

    const subtree = walk(child);
    if (subtree.includes(this)) {
      throw new HandoffError(`Adding '${child.name}' under '${this.name}' would create a cycle`, child.name);
    }

    const existing = new Set(walk<Agent>(this).map(agent => agent.name));
    const clash = subtree.find(agent => existing.has(agent.name));
    if (clash) {
      throw new HandoffError(`Duplicate agent name in handoff tree: ${clash.name}`, clash.name);
    }

    child.parent = this.name;
    this.children.push(child);
  }

  requiresConfirmation(name: string): boolean {
    return this.registry.requiresConfirmation(name);
  }

  getToolSchemas(): ToolSchema[] {
    const schemas = this.registry.listSchemas();
    if (this.children.length > 0) {
      schemas.push(transferToAgentSchema(this.children.map(child => child.name)));
    }
    if (this.parent !== undefined) {
      schemas.push(transferToParentSchema());
    }
    return schemas;
  }

  buildInstructions(context: RunContext = {}): string {
    const rendered = `You are ${this.name}. ${renderTemplate(this.instructions, context)}`;
    return this.completionCondition === 'call' ? `${rendered}\n\n${TASK_DONE_INSTRUCTIONS}` : rendered;
  }

  /** System instructions followed by the model-visible history. */
  prepareMessages(history: readonly Message[], context: RunContext = {}): Message[] {
    const visible = history.filter(message => message.type !== 'transfer');
    const transferred = this.messageTransfer ? this.messageTransfer(visible) : visible;
    return [systemMessage(this.buildInstructions(context)), ...transferred];
  }

  complete(history: readonly Message[], options: CompleteOptions = {}): AsyncIterable<RawCompletionEvent> {
    const tools = this.getToolSchemas();
    this.logger.debug('Requesting completion', {
      agent: this.name,
      model: this.client.model,
      messages: history.length,
      tools: tools.length
    });
    return this.client.stream(this.prepareMessages(history, options.context), {
      tools,
      signal: options.signal,
      context: options.context
    });
  }

  async executeTool(
    call: FunctionCallMessage,
    ctx: Omit<ToolContext, 'agent' | 'callId'>
  ): Promise<ToolResult> {
    const started = Date.now();
    const result = await this.registry.call(call.name, call.arguments, {
      ...ctx,
      agent: this.name,
      callId: call.callId
    });
    const data = {
      agent: this.name,
      tool: call.name,
      callId: call.callId,
      durationMs: Date.now() - started
    };
    if (result.isError) {
      this.logger.warn('Tool call failed', { ...data, output: result.output });
    } else {
      this.logger.debug('Tool call finished', data);
    }
    return result;
  }
}
