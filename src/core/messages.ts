import { randomUUID } from 'crypto';
import { z } from 'zod';
import { MessageValidationError } from './errors.js';
import type { TokenUsage } from './types.js';

export interface MessageMeta {
  sentAt?: string;
  latencyMs?: number;
  usage?: TokenUsage;
}

export type ImageDetail = 'low' | 'high' | 'auto';

export interface TextPart {
  type: 'text';
  text: string;
}

export interface ImagePart {
  type: 'image';
  imageUrl?: string;
  fileId?: string;
  detail?: ImageDetail;
}

export type UserContentPart = TextPart | ImagePart;

export interface UserMessage {
  type: 'user';
  content: string | UserContentPart[];
  meta?: MessageMeta;
}

export interface AssistantMessage {
  type: 'assistant';
  content: string;
  meta?: MessageMeta;
}

export interface SystemMessage {
  type: 'system';
  content: string;
  meta?: MessageMeta;
}

export interface FunctionCallMessage {
  type: 'function_call';
  callId: string;
  name: string;
  /** Serialized JSON, exactly as the model produced it. */
  arguments: string;
  meta?: MessageMeta;
}

export interface FunctionCallOutputMessage {
  type: 'function_call_output';
  callId: string;
  output: string;
  isError?: boolean;
  meta?: MessageMeta;
}

/** Bookkeeping record of an agent switch. Never sent to the model. */
export interface TransferMessage {
  type: 'transfer';
  from: string;
  to: string;
  meta?: MessageMeta;
}

export type Message =
  | UserMessage
  | AssistantMessage
  | SystemMessage
  | FunctionCallMessage
  | FunctionCallOutputMessage
  | TransferMessage;

export type MessageType = Message['type'];

/** Any representation accepted at the Runner boundary. */
export type MessageInput = Message | Record<string, unknown>;

export type UserInput = string | MessageInput | MessageInput[];

function now(): string {
  return new Date().toISOString();
}

export function newCallId(): string {
  return `call_${randomUUID()}`;
}

export function userMessage(content: string | UserContentPart[]): UserMessage {
  return { type: 'user', content, meta: { sentAt: now() } };
}

export function assistantMessage(content: string, meta: MessageMeta = {}): AssistantMessage {
  return { type: 'assistant', content, meta: { sentAt: now(), ...meta } };
}

export function systemMessage(content: string): SystemMessage {
  return { type: 'system', content, meta: { sentAt: now() } };
}

export function functionCallMessage(callId: string, name: string, args: string): FunctionCallMessage {
  return { type: 'function_call', callId, name, arguments: args, meta: { sentAt: now() } };
}

export function functionCallOutputMessage(
  callId: string,
  output: string,
  isError = false
): FunctionCallOutputMessage {
  const message: FunctionCallOutputMessage = {
    type: 'function_call_output',
    callId,
    output,
    meta: { sentAt: now() }
  };
  if (isError) message.isError = true;
  return message;
}

export function transferMessage(from: string, to: string): TransferMessage {
  return { type: 'transfer', from, to, meta: { sentAt: now() } };
}

export function isFunctionCall(message: Message): message is FunctionCallMessage {
  return message.type === 'function_call';
}

export function isFunctionCallOutput(message: Message): message is FunctionCallOutputMessage {
  return message.type === 'function_call_output';
}

/** Plain text of a user/assistant/system message; empty for the other variants. */
export function messageText(message: Message): string {
  switch (message.type) {
    case 'user':
      return typeof message.content === 'string'
        ? message.content
        : message.content
            .map(part => (part.type === 'text' ? part.text : ''))
            .join('');
    case 'assistant':
    case 'system':
      return message.content;
    default:
      return '';
  }
}

// --- Boundary schemas ---

const DetailSchema = z.enum(['low', 'high', 'auto']);

const MetaSchema = z.object({
  sentAt: z.string().optional(),
  latencyMs: z.number().optional(),
  usage: z
    .object({
      promptTokens: z.number(),
      completionTokens: z.number(),
      totalTokens: z.number().optional()
    })
    .optional()
});

const TextPartSchema = z
  .object({ type: z.enum(['text', 'input_text']), text: z.string() })
  .transform((part): UserContentPart => ({ type: 'text', text: part.text }));

const ImagePartSchema = z
  .object({
    type: z.literal('image'),
    imageUrl: z.string().optional(),
    fileId: z.string().optional(),
    detail: DetailSchema.optional()
  })
  .transform((part): UserContentPart => compactImage(part.imageUrl, part.fileId, part.detail));

const ImageUrlPartSchema = z
  .object({
    type: z.literal('image_url'),
    image_url: z.union([z.string(), z.object({ url: z.string(), detail: DetailSchema.optional() })])
  })
  .transform((part): UserContentPart =>
    typeof part.image_url === 'string'
      ? compactImage(part.image_url)
      : compactImage(part.image_url.url, undefined, part.image_url.detail)
  );

const InputImagePartSchema = z
  .object({
    type: z.literal('input_image'),
    image_url: z.string().nullish(),
    file_id: z.string().nullish(),
    detail: DetailSchema.optional()
  })
  .transform((part): UserContentPart =>
    compactImage(part.image_url ?? undefined, part.file_id ?? undefined, part.detail)
  );

const ContentPartSchema = z.union([TextPartSchema, ImagePartSchema, ImageUrlPartSchema, InputImagePartSchema]);

const UserContentSchema = z.union([z.string(), z.array(ContentPartSchema)]);

function compactImage(imageUrl?: string, fileId?: string, detail?: ImageDetail): ImagePart {
  const part: ImagePart = { type: 'image' };
  if (imageUrl !== undefined) part.imageUrl = imageUrl;
  if (fileId !== undefined) part.fileId = fileId;
  if (detail !== undefined) part.detail = detail;
  return part;
}

const ArgumentsSchema = z
  .union([z.string(), z.record(z.unknown())])
  .transform(args => (typeof args === 'string' ? args : JSON.stringify(args)));

const UserInputSchema = z.object({
  content: UserContentSchema,
  meta: MetaSchema.optional()
});

const TextInputSchema = z.object({
  content: z.string(),
  meta: MetaSchema.optional()
});

const AssistantInputSchema = z.object({
  content: z.string().nullish(),
  meta: MetaSchema.optional(),
  tool_calls: z
    .array(
      z.object({
        id: z.string(),
        function: z.object({ name: z.string(), arguments: ArgumentsSchema.optional() })
      })
    )
    .optional()
});

const ToolRoleInputSchema = z.object({
  tool_call_id: z.string(),
  content: z.string()
});

const FunctionCallInputSchema = z
  .object({
    callId: z.string().optional(),
    call_id: z.string().optional(),
    name: z.string(),
    arguments: ArgumentsSchema.optional(),
    meta: MetaSchema.optional()
  })
  .refine(value => value.callId !== undefined || value.call_id !== undefined, {
    message: 'function_call requires callId or call_id'
  });

const FunctionCallOutputInputSchema = z
  .object({
    callId: z.string().optional(),
    call_id: z.string().optional(),
    output: z.string(),
    isError: z.boolean().optional(),
    meta: MetaSchema.optional()
  })
  .refine(value => value.callId !== undefined || value.call_id !== undefined, {
    message: 'function_call_output requires callId or call_id'
  });

const TransferInputSchema = z.object({
  from: z.string(),
  to: z.string(),
  meta: MetaSchema.optional()
});

function parseWith<T extends z.ZodTypeAny>(schema: T, value: unknown, label: string): z.output<T> {
  const result = schema.safeParse(value);
  if (!result.success) {
    const detail = result.error.issues
      .map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new MessageValidationError(`Invalid ${label} message: ${detail}`);
  }
  return result.data;
}

function withMeta<M extends Message>(message: M, meta: MessageMeta | undefined): M {
  return { ...message, meta: { sentAt: now(), ...meta } };
}

function normalizeRole(role: string, raw: Record<string, unknown>): Message[] {
  switch (role) {
    case 'user': {
      const parsed = parseWith(UserInputSchema, raw, 'user');
      return [withMeta({ type: 'user', content: parsed.content }, parsed.meta)];
    }
    case 'system':
    case 'developer': {
      const parsed = parseWith(TextInputSchema, raw, role);
      return [withMeta({ type: 'system', content: parsed.content }, parsed.meta)];
    }
    case 'assistant': {
      const parsed = parseWith(AssistantInputSchema, raw, 'assistant');
      const messages: Message[] = [];
      const content = parsed.content ?? '';
      if (content !== '' || !parsed.tool_calls?.length) {
        messages.push(withMeta({ type: 'assistant', content }, parsed.meta));
      }
      for (const call of parsed.tool_calls ?? []) {
        messages.push(functionCallMessage(call.id, call.function.name, call.function.arguments ?? ''));
      }
      return messages;
    }
    case 'tool': {
      const parsed = parseWith(ToolRoleInputSchema, raw, 'tool');
      return [functionCallOutputMessage(parsed.tool_call_id, parsed.content)];
    }
    default:
      throw new MessageValidationError(`Unsupported message role: ${role}`);
  }
}

/**
 * Converts one external message representation into internal messages.
 * A chat-completions assistant message carrying `tool_calls` expands into an
 * assistant message followed by one function call per tool call.
 */
export function normalizeMessage(input: unknown): Message[] {
  if (typeof input === 'string') {
    return [userMessage(input)];
  }
  if (typeof input !== 'object' || input === null || Array.isArray(input)) {
    throw new MessageValidationError('Message must be a string or an object');
  }

  const raw: Record<string, unknown> = Object.fromEntries(Object.entries(input));
  const type = raw['type'];
  const role = raw['role'];

  if (typeof type === 'string' && type !== 'message') {
    switch (type) {
      case 'user':
      case 'assistant':
      case 'system':
        return normalizeRole(type, raw);
      case 'function_call': {
        const parsed = parseWith(FunctionCallInputSchema, raw, 'function_call');
        const callId = parsed.callId ?? parsed.call_id ?? '';
        return [withMeta(functionCallMessage(callId, parsed.name, parsed.arguments ?? ''), parsed.meta)];
      }
      case 'function_call_output': {
        const parsed = parseWith(FunctionCallOutputInputSchema, raw, 'function_call_output');
        const callId = parsed.callId ?? parsed.call_id ?? '';
        return [
          withMeta(functionCallOutputMessage(callId, parsed.output, parsed.isError ?? false), parsed.meta)
        ];
      }
      case 'transfer': {
        const parsed = parseWith(TransferInputSchema, raw, 'transfer');
        return [withMeta(transferMessage(parsed.from, parsed.to), parsed.meta)];
      }
      default:
        throw new MessageValidationError(`Unsupported message type: ${type}`);
    }
  }

  if (typeof role === 'string') {
    return normalizeRole(role, raw);
  }

  throw new MessageValidationError("Message must have a 'role' or 'type' field.");
}

export function normalizeInput(input: UserInput): Message[] {
  if (Array.isArray(input)) {
    return input.flatMap(item => normalizeMessage(item));
  }
  return normalizeMessage(input);
}
