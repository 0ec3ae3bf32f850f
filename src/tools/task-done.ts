import { z } from 'zod';
import type { SyncTool } from './types.js';

export const TASK_DONE = 'task_done';

export const TASK_DONE_INSTRUCTIONS =
  `When you have completed your assigned task, call the ${TASK_DONE} function ` +
  'with a short summary of what you did. The conversation keeps going until you call it.';

export const taskDoneTool: SyncTool = {
  kind: 'sync',
  name: TASK_DONE,
  description: 'Call this function when you have completed your assigned task',
  parameters: {
    type: 'object',
    properties: {
      summary: {
        type: 'string',
        description: 'Short summary of the completed work'
      }
    }
  },
  schema: z.object({ summary: z.string().optional() }),
  execute: (args) => {
    const summary = args['summary'];
    return typeof summary === 'string' && summary.trim() !== ''
      ? `Task completed: ${summary}`
      : 'Task completed.';
  }
};
