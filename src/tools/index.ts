export { ToolRegistry, serializeOutput, errorResult } from './registry.js';
export type {
  Tool,
  SyncTool,
  AsyncTool,
  ToolContext,
  ToolResult
} from './types.js';
export { formatToolError, formatZodIssues } from './errors.js';
export { taskDoneTool, TASK_DONE, TASK_DONE_INSTRUCTIONS } from './task-done.js';
