import fs, { type FileHandle } from 'fs/promises';
import path from 'path';
import { z } from 'zod';
import type { Logger } from './types.js';
import type { RawCompletionEvent } from '../llm/types.js';
import { normalizeMessage, type Message } from './messages.js';
import { errorMessage } from './errors.js';
import { silentLogger } from './logger.js';

export type TranscriptEntryType = 'message' | 'completion_raw' | 'agent_switch' | 'step_limit';

export interface TranscriptEntry {
  seq: number;
  timestamp: string;
  type: TranscriptEntryType;
  /** Model request counter of the recorder; raw events of one response share it. */
  turn: number;
  agent: string;
  data: unknown;
}

const TranscriptEntrySchema = z.object({
  seq: z.number().int(),
  timestamp: z.string(),
  type: z.enum(['message', 'completion_raw', 'agent_switch', 'step_limit']),
  turn: z.number().int(),
  agent: z.string(),
  data: z.unknown()
});

/**
 * Append-only JSONL transcript. Writes are serialized and awaited by the
 * caller; a failed write is logged and never rethrown.
 */
export class TranscriptRecorder {
  readonly path: string;
  private readonly logger: Logger;
  private seq = 0;
  private turn = 0;
  private initialized = false;
  private tail: Promise<void> = Promise.resolve();

  constructor(filePath: string, logger: Logger = silentLogger) {
    this.path = filePath;
    this.logger = logger;
  }

  get lastSeq(): number {
    return this.seq;
  }

  beginTurn(): void {
    this.turn++;
  }

  recordMessage(message: Message, agent: string): Promise<void> {
    return this.append('message', agent, message);
  }

  recordRaw(event: RawCompletionEvent, agent: string): Promise<void> {
    return this.append('completion_raw', agent, event);
  }

  recordAgentSwitch(from: string, to: string): Promise<void> {
    return this.append('agent_switch', to, { from, to });
  }

  recordStepLimit(maxSteps: number, agent: string): Promise<void> {
    return this.append('step_limit', agent, { maxSteps });
  }

  private append(type: TranscriptEntryType, agent: string, data: unknown): Promise<void> {
    const write = this.tail.then(async () => {
      try {
        await this.init();
        const entry: TranscriptEntry = {
          seq: this.seq + 1,
          timestamp: new Date().toISOString(),
          type,
          turn: this.turn,
          agent,
          data
        };
        await fs.appendFile(this.path, JSON.stringify(entry) + '\n');
        this.seq = entry.seq;
      } catch (error) {
        this.logger.error('Failed to write transcript entry', {
          path: this.path,
          type,
          error: errorMessage(error)
        });
      }
    });
    this.tail = write;
    return write;
  }

  private async init(): Promise<void> {
    if (this.initialized) return;

    await fs.mkdir(path.dirname(this.path), { recursive: true });
    const last = await readLastLine(this.path);
    if (last !== undefined) {
      const parsed = parseEntry(last);
      if (parsed) {
        this.seq = parsed.seq;
        // Turns begun before the first write count on from the recorded ones.
        this.turn += parsed.turn;
      } else {
        this.logger.warn('Ignoring unreadable last transcript line', { path: this.path });
      }
    }
    this.initialized = true;
  }
}

function parseEntry(line: string): TranscriptEntry | undefined {
  try {
    const result = TranscriptEntrySchema.safeParse(JSON.parse(line));
    return result.success ? { ...result.data, data: result.data.data } : undefined;
  } catch {
    return undefined;
  }
}

/** Last non-empty line of a file, reading backwards in blocks. */
async function readLastLine(filePath: string): Promise<string | undefined> {
  let handle: FileHandle;
  try {
    handle = await fs.open(filePath, 'r');
  } catch {
    return undefined;
  }

  try {
    const { size } = await handle.stat();
    const blockSize = 1024;
    let position = size;
    let text = '';

    while (position > 0) {
      const readSize = Math.min(blockSize, position);
      position -= readSize;
      const buffer = Buffer.alloc(readSize);
      await handle.read(buffer, 0, readSize, position);
      text = buffer.toString('utf-8') + text;

      const trimmed = text.trimEnd();
      const newline = trimmed.lastIndexOf('\n');
      if (newline !== -1) return trimmed.slice(newline + 1);
    }

    const trimmed = text.trimEnd();
    return trimmed === '' ? undefined : trimmed;
  } finally {
    await handle.close();
  }
}

export async function readTranscript(filePath: string): Promise<TranscriptEntry[]> {
  const content = await fs.readFile(filePath, 'utf-8');
  const entries: TranscriptEntry[] = [];
  for (const line of content.split('\n')) {
    if (!line.trim()) continue;
    const entry = parseEntry(line);
    if (entry) entries.push(entry);
  }
  return entries;
}

/** Committed messages of a transcript, in order, ready for `setChatHistory`. */
export async function loadTranscriptMessages(filePath: string): Promise<Message[]> {
  const entries = await readTranscript(filePath);
  return entries
    .filter(entry => entry.type === 'message')
    .flatMap(entry => normalizeMessage(entry.data));
}
