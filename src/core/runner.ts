import type { Agent } from './agent.js';
import type { Chunk, ChunkType, ToolCallResultChunk } from './chunks.js';
import type { Logger, LoggerConfig, RunContext } from './types.js';
import type { RawCompletionEvent } from '../llm/types.js';
import type { ToolResult } from '../tools/types.js';
import { DEFAULT_INCLUDES } from './chunks.js';
import {
  assistantMessage,
  functionCallMessage,
  functionCallOutputMessage,
  isFunctionCallOutput,
  normalizeInput,
  normalizeMessage,
  transferMessage,
  type FunctionCallMessage,
  type Message,
  type MessageInput,
  type MessageMeta,
  type UserInput
} from './messages.js';
import {
  ConfigurationError,
  ConfirmationRequiredError,
  HandoffError,
  RunCancelledError,
  RunnerBusyError
} from './errors.js';
import { duplicateNames, isHandoffToolName, resolveTransfer } from './handoff.js';
import { StreamHandler } from './stream-handler.js';
import { TranscriptRecorder } from './recorder.js';
import { resolveLogger } from './logger.js';
import { TASK_DONE } from '../tools/task-done.js';

const DEFAULT_MAX_STEPS = 20;

const CANCELLED_OUTPUT = 'Error: Tool call cancelled because a new run started before it was resolved.';

const ABANDONED_OUTPUT = 'Error: Tool call cancelled because the conversation continued before it was resolved.';

export interface RunOptions {
  /** Model requests allowed in this run. */
  maxSteps?: number;
  includes?: readonly ChunkType[];
  context?: RunContext;
  recordTo?: string | TranscriptRecorder;
  signal?: AbortSignal;
}

export interface ContinueOptions extends RunOptions {
  /** Decision for the pending confirmation; required while one is pending. */
  approve?: boolean;
}

export interface RunnerOptions {
  maxSteps?: number;
  recordTo?: string | TranscriptRecorder;
  logger?: Logger | LoggerConfig;
}

interface QueuedCall {
  call: FunctionCallMessage;
  /** The agent that issued the call; it executes the call. */
  agent: Agent;
  /** Output decided before execution (decode errors, replayed transfers). */
  resolved?: ToolResult;
}

interface ReplayState {
  history: Message[];
  current: Agent;
  queue: QueuedCall[];
}

interface RunState {
  maxSteps: number;
  context: RunContext;
  signal?: AbortSignal;
  recorder?: TranscriptRecorder;
  steps: number;
  taskDone: boolean;
  approval?: boolean;
}

function validateTree(root: Agent): void {
  const duplicates = duplicateNames(root);
  const first = duplicates[0];
  if (first !== undefined) {
    throw new HandoffError(`Agent names must be unique in a handoff tree: ${duplicates.join(', ')}`, first);
  }
}

/**
 * Drives one conversation: owns the history, runs the step loop against the
 * current agent and switches agents on transfer calls.
 */
export class Runner {
  private history: Message[] = [];
  private root: Agent;
  private current: Agent;
  private queue: QueuedCall[] = [];
  private running = false;

  private readonly defaultMaxSteps: number;
  private readonly defaultRecordTo?: string | TranscriptRecorder;
  private readonly recorders = new Map<string, TranscriptRecorder>();
  private readonly handler: StreamHandler;
  private readonly logger: Logger;

  constructor(agent: Agent, options: RunnerOptions = {}) {
    validateTree(agent);
    this.root = agent;
    this.current = agent;
    this.defaultMaxSteps = options.maxSteps ?? DEFAULT_MAX_STEPS;
    this.defaultRecordTo = options.recordTo;
    this.logger = resolveLogger(options.logger);
    this.handler = new StreamHandler(this.logger);
  }

  get agent(): Agent {
    return this.current;
  }

  get rootAgent(): Agent {
    return this.root;
  }

  get messages(): readonly Message[] {
    return this.history;
  }

  get isRunning(): boolean {
    return this.running;
  }

  /** The call the loop is halted on, waiting for `runContinue({ approve })`. */
  get pendingConfirmation(): FunctionCallMessage | undefined {
    const head = this.queue[0];
    if (!head || head.resolved || isHandoffToolName(head.call.name)) return undefined;
    return head.agent.requiresConfirmation(head.call.name) ? head.call : undefined;
  }

  /**
   * Appends the input to the history and returns the step loop. Calls left
   * unresolved by an earlier run are answered with a cancellation output first.
   */
  run(input: UserInput, options: RunOptions = {}): AsyncGenerator<Chunk, void> {
    this.assertIdle();
    const incoming = normalizeInput(input);
    const state = this.createState(options);
    const prelude = [...this.cancelQueue(), ...incoming];
    this.history.push(...prelude);
    return this.filter(this.drive(state, prelude), options.includes);
  }

  /** Resumes a halted run: settles the pending confirmation, drains the queue and continues the loop. */
  runContinue(options: ContinueOptions = {}): AsyncGenerator<Chunk, void> {
    this.assertIdle();
    const pending = this.pendingConfirmation;
    if (pending && options.approve === undefined) {
      throw new ConfirmationRequiredError(pending.callId, pending.name);
    }
    const state = this.createState(options);
    if (pending) state.approval = options.approve;
    return this.filter(this.drive(state, []), options.includes);
  }

  async runUntilComplete(input: UserInput, options: RunOptions = {}): Promise<Chunk[]> {
    const chunks: Chunk[] = [];
    for await (const chunk of this.run(input, options)) {
      chunks.push(chunk);
    }
    return chunks;
  }

  /**
   * Replaces the history and recomputes the current agent by replaying its
   * transfer calls from the root. Calls without outputs at the end of the
   * history become the queue `runContinue` resumes; unanswered calls followed
   * by later conversation are closed with a cancellation output.
   */
  setChatHistory(messages: readonly MessageInput[], rootAgent?: Agent): void {
    this.assertIdle();
    const normalized = messages.flatMap(message => normalizeMessage(message));
    const root = rootAgent ?? this.root;
    if (rootAgent) validateTree(rootAgent);

    const answered = new Set(normalized.filter(isFunctionCallOutput).map(message => message.callId));
    const state: ReplayState = { history: [], current: root, queue: [] };
    for (const message of normalized) {
      this.fold(state, message, root, answered);
    }

    this.root = root;
    this.history = state.history;
    this.current = state.current;
    this.queue = state.queue;
    this.logger.debug('Chat history replaced', {
      messages: state.history.length,
      agent: state.current.name,
      unresolved: state.queue.length
    });
  }

  /**
   * Appends without running, folding the messages in the way `setChatHistory`
   * replays them: transfer calls switch the current agent and an output for a
   * queued call settles that call.
   */
  appendMessage(message: MessageInput): void {
    this.assertIdle();
    const normalized = normalizeMessage(message);
    const state: ReplayState = { history: this.history, current: this.current, queue: this.queue };
    for (const entry of normalized) {
      this.fold(state, entry, this.root);
    }
    this.current = state.current;
    this.queue = state.queue;
  }

  clearHistory(): void {
    this.assertIdle();
    this.history = [];
    this.queue = [];
    this.current = this.root;
  }

  private assertIdle(): void {
    if (this.running) throw new RunnerBusyError();
  }

  private createState(options: RunOptions): RunState {
    const maxSteps = options.maxSteps ?? this.defaultMaxSteps;
    if (!Number.isInteger(maxSteps) || maxSteps < 0) {
      throw new ConfigurationError(`maxSteps must be a non-negative integer, got ${maxSteps}`);
    }
    const state: RunState = {
      maxSteps,
      context: options.context ?? {},
      steps: 0,
      taskDone: false
    };
    if (options.signal) state.signal = options.signal;
    const recorder = this.resolveRecorder(options.recordTo ?? this.defaultRecordTo);
    if (recorder) state.recorder = recorder;
    return state;
  }

  private resolveRecorder(target: string | TranscriptRecorder | undefined): TranscriptRecorder | undefined {
    if (target === undefined || target instanceof TranscriptRecorder) return target;
    let recorder = this.recorders.get(target);
    if (!recorder) {
      recorder = new TranscriptRecorder(target, this.logger);
      this.recorders.set(target, recorder);
    }
    return recorder;
  }

  private cancelQueue(): Message[] {
    if (this.queue.length === 0) return [];
    this.logger.warn('Cancelling unresolved tool calls', {
      calls: this.queue.map(entry => entry.call.callId)
    });
    const outputs = this.queue.map(entry => functionCallOutputMessage(entry.call.callId, CANCELLED_OUTPUT, true));
    this.queue = [];
    return outputs;
  }

  private async *filter(
    source: AsyncGenerator<Chunk, void>,
    includes: readonly ChunkType[] = DEFAULT_INCLUDES
  ): AsyncGenerator<Chunk, void> {
    const allowed = new Set<ChunkType>(includes);
    for await (const chunk of source) {
      if (allowed.has(chunk.type)) yield chunk;
    }
  }

  private async *drive(state: RunState, prelude: readonly Message[]): AsyncGenerator<Chunk, void> {
    if (this.running) throw new RunnerBusyError();
    this.running = true;

    try {
      for (const message of prelude) {
        await state.recorder?.recordMessage(message, this.current.name);
      }

      if (this.queue.length > 0) {
        const halted = yield* this.processQueue(state);
        if (halted || state.taskDone) return;
      }

      while (true) {
        if (state.steps >= state.maxSteps) {
          this.logger.warn('Step limit reached', { maxSteps: state.maxSteps, agent: this.current.name });
          await state.recorder?.recordStepLimit(state.maxSteps, this.current.name);
          yield { type: 'step_limit', maxSteps: state.maxSteps };
          return;
        }
        state.steps++;

        const agent = this.current;
        state.recorder?.beginTurn();
        const started = Date.now();
        const events = this.tap(
          agent.complete(this.history, { context: state.context, signal: state.signal }),
          state,
          agent
        );
        const turn = yield* this.handler.process(events, state.signal);
        const hasCalls = turn.toolCalls.length > 0;

        // The whole turn is committed before anything else is yielded.
        let committed: Chunk | undefined;
        if (turn.content !== '' || !hasCalls) {
          const meta: MessageMeta = { latencyMs: Date.now() - started };
          if (turn.usage) meta.usage = turn.usage;
          const message = assistantMessage(turn.content, meta);
          await this.commit(state, message);
          committed = { type: 'assistant_message', message, finishReason: turn.finishReason };
        }
        for (const toolCall of turn.toolCalls) {
          const call = functionCallMessage(toolCall.callId, toolCall.name, toolCall.arguments);
          await this.commit(state, call);
          this.queue.push(
            toolCall.error === undefined
              ? { call, agent }
              : { call, agent, resolved: { output: `Error: ${toolCall.error}`, isError: true } }
          );
        }
        if (committed) yield committed;

        if (!hasCalls) {
          if (agent.completionCondition === 'stop') return;
          continue;
        }

        const halted = yield* this.processQueue(state);
        if (halted || state.taskDone) return;
      }
    } finally {
      this.running = false;
    }
  }

  private async *tap(
    events: AsyncIterable<RawCompletionEvent>,
    state: RunState,
    agent: Agent
  ): AsyncGenerator<RawCompletionEvent, void> {
    for await (const event of events) {
      await state.recorder?.recordRaw(event, agent.name);
      yield event;
    }
  }

  /** Settles queued calls in arrival order; returns true when halted for confirmation. */
  private async *processQueue(state: RunState): AsyncGenerator<Chunk, boolean> {
    while (true) {
      const entry = this.queue[0];
      if (!entry) return false;
      if (state.signal?.aborted) throw new RunCancelledError('aborted between tool calls');

      const { call, agent } = entry;

      if (entry.resolved) {
        yield await this.settle(state, entry, entry.resolved);
        continue;
      }

      if (isHandoffToolName(call.name)) {
        const from = this.current;
        const resolution = resolveTransfer(this.root, from, call.name, call.arguments);
        const result = await this.settle(state, entry, {
          output: resolution.output,
          isError: resolution.target === undefined
        });

        if (!resolution.target) {
          this.logger.debug('Transfer not applied', { agent: from.name, output: resolution.output });
          yield result;
          continue;
        }

        const to = resolution.target;
        this.current = to;
        await this.commit(state, transferMessage(from.name, to.name));
        await state.recorder?.recordAgentSwitch(from.name, to.name);
        this.logger.info('Agent switched', { from: from.name, to: to.name });
        yield result;
        yield { type: 'agent_switch', from: from.name, to: to.name };
        continue;
      }

      let outcome: ToolResult;
      if (agent.requiresConfirmation(call.name)) {
        if (state.approval === undefined) {
          this.logger.info('Tool call awaiting confirmation', { tool: call.name, callId: call.callId });
          yield { type: 'require_confirm', call, agent: agent.name };
          return true;
        }
        const approved = state.approval;
        state.approval = undefined;
        outcome = approved
          ? await this.execute(state, entry)
          : { output: `Error: The user denied the call to ${call.name}.`, isError: true };
      } else {
        outcome = await this.execute(state, entry);
      }

      if (call.name === TASK_DONE && agent.completionCondition === 'call' && !outcome.isError) {
        state.taskDone = true;
      }
      yield await this.settle(state, entry, outcome);
    }
  }

  private execute(state: RunState, entry: QueuedCall): Promise<ToolResult> {
    const ctx = { context: state.context, history: this.history, signal: state.signal };
    return entry.agent.executeTool(entry.call, ctx);
  }

  /** Commits the output of the queue head and removes it from the queue. */
  private async settle(state: RunState, entry: QueuedCall, result: ToolResult): Promise<ToolCallResultChunk> {
    await this.commit(state, functionCallOutputMessage(entry.call.callId, result.output, result.isError));
    this.queue.shift();
    return {
      type: 'tool_call_result',
      callId: entry.call.callId,
      name: entry.call.name,
      output: result.output,
      isError: result.isError
    };
  }

  private async commit(state: RunState, message: Message): Promise<void> {
    this.history.push(message);
    await state.recorder?.recordMessage(message, this.current.name);
  }

  /**
   * Applies one history message to a replay state. A call enters the queue
   * unless `answered` shows an output for it later on; a conversation message
   * closes whatever is still queued.
   */
  private fold(state: ReplayState, message: Message, root: Agent, answered?: ReadonlySet<string>): void {
    switch (message.type) {
      case 'function_call': {
        const issuer = state.current;
        let resolved: ToolResult | undefined;

        if (isHandoffToolName(message.name)) {
          const resolution = resolveTransfer(root, issuer, message.name, message.arguments);
          if (resolution.target) {
            state.current = resolution.target;
          } else {
            this.logger.debug('Skipping unresolved transfer during replay', {
              agent: issuer.name,
              callId: message.callId,
              output: resolution.output
            });
          }
          resolved = { output: resolution.output, isError: resolution.target === undefined };
        }

        state.history.push(message);
        if (!answered?.has(message.callId)) {
          state.queue.push(resolved ? { call: message, agent: issuer, resolved } : { call: message, agent: issuer });
        }
        return;
      }
      case 'function_call_output':
        state.history.push(message);
        state.queue = state.queue.filter(queued => queued.call.callId !== message.callId);
        return;
      case 'transfer':
        state.history.push(message);
        return;
      default:
        if (state.queue.length > 0) {
          this.logger.warn('Closing unanswered tool calls', {
            calls: state.queue.map(entry => entry.call.callId)
          });
          state.history.push(...state.queue.map(entry =>
            functionCallOutputMessage(
              entry.call.callId,
              entry.resolved?.output ?? ABANDONED_OUTPUT,
              entry.resolved?.isError ?? true
            )
          ));
          state.queue = [];
        }
        state.history.push(message);
    }
  }
}
