import type { z } from 'zod';
import type { Message } from '../core/messages.js';
import type { RunContext, ToolParameters } from '../core/types.js';

export type { ToolParameters, ToolParameterProperty, ToolSchema } from '../core/types.js';

export interface ToolContext {
  /** Caller-supplied context of the current run. */
  context: RunContext;
  /** Name of the agent that issued the call. */
  agent: string;
  callId: string;
  history: readonly Message[];
  signal?: AbortSignal;
}

interface ToolBase {
  name: string;
  description: string;
  parameters?: ToolParameters;
  /** Validates decoded arguments before execution. */
  schema?: z.ZodType<Record<string, unknown>, z.ZodTypeDef, unknown>;
  requireConfirmation?: boolean;
}

export interface SyncTool extends ToolBase {
  kind: 'sync';
  execute: (args: Record<string, unknown>, ctx: ToolContext) => unknown;
}

export interface AsyncTool extends ToolBase {
  kind: 'async';
  execute: (args: Record<string, unknown>, ctx: ToolContext) => Promise<unknown>;
}

export type Tool = SyncTool | AsyncTool;

export interface ToolResult {
  output: string;
  isError: boolean;
}
