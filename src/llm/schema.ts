import { z } from 'zod';
import type { RawCompletionEvent } from './types.js';

const RawToolCallDeltaSchema = z.object({
  index: z.number().int().nonnegative().optional(),
  id: z.string().nullish(),
  type: z.string().nullish(),
  function: z
    .object({
      name: z.string().nullish(),
      arguments: z.string().nullish()
    })
    .nullish()
});

const RawCompletionChoiceSchema = z.object({
  index: z.number().optional(),
  delta: z
    .object({
      role: z.string().nullish(),
      content: z.string().nullish(),
      tool_calls: z.array(RawToolCallDeltaSchema).nullish()
    })
    .nullish(),
  finish_reason: z.string().nullish()
});

export const RawCompletionEventSchema: z.ZodType<RawCompletionEvent> = z.object({
  id: z.string().optional(),
  model: z.string().optional(),
  choices: z.array(RawCompletionChoiceSchema).optional(),
  usage: z
    .object({
      prompt_tokens: z.number(),
      completion_tokens: z.number(),
      total_tokens: z.number().optional()
    })
    .nullish()
});
