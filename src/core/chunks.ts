import type { AssistantMessage, FunctionCallMessage } from './messages.js';
import type { TokenUsage } from './types.js';
import type { RawCompletionEvent } from '../llm/types.js';

export interface CompletionRawChunk {
  type: 'completion_raw';
  raw: RawCompletionEvent;
}

export interface UsageChunk {
  type: 'usage';
  usage: TokenUsage;
}

export interface ContentDeltaChunk {
  type: 'content_delta';
  delta: string;
}

export interface ToolCallDeltaChunk {
  type: 'tool_call_delta';
  callId: string;
  name: string;
  argumentsDelta: string;
}

export interface ToolCallCompletedChunk {
  type: 'tool_call_completed';
  callId: string;
  name: string;
  arguments: string;
  /** Set when the reassembled call cannot be executed. */
  error?: string;
}

export interface AssistantMessageChunk {
  type: 'assistant_message';
  message: AssistantMessage;
  finishReason: string | null;
}

export interface ToolCallResultChunk {
  type: 'tool_call_result';
  callId: string;
  name: string;
  output: string;
  isError: boolean;
}

export interface AgentSwitchChunk {
  type: 'agent_switch';
  from: string;
  to: string;
}

export interface RequireConfirmChunk {
  type: 'require_confirm';
  call: FunctionCallMessage;
  agent: string;
}

export interface StepLimitChunk {
  type: 'step_limit';
  maxSteps: number;
}

export type Chunk =
  | CompletionRawChunk
  | UsageChunk
  | ContentDeltaChunk
  | ToolCallDeltaChunk
  | ToolCallCompletedChunk
  | AssistantMessageChunk
  | ToolCallResultChunk
  | AgentSwitchChunk
  | RequireConfirmChunk
  | StepLimitChunk;

export type ChunkType = Chunk['type'];

export const ALL_CHUNK_TYPES: readonly ChunkType[] = [
  'completion_raw',
  'usage',
  'content_delta',
  'tool_call_delta',
  'tool_call_completed',
  'assistant_message',
  'tool_call_result',
  'agent_switch',
  'require_confirm',
  'step_limit'
];

export const DEFAULT_INCLUDES: readonly ChunkType[] = ALL_CHUNK_TYPES.filter(type => type !== 'completion_raw');
