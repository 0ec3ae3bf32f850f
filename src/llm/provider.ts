import type { Message } from '../core/messages.js';
import type {
  CompletionClient,
  LLMConfig,
  RateLimitConfig,
  RawCompletionEvent,
  StreamOptions
} from './types.js';
import type { Logger } from '../core/types.js';
import { ConfigurationError } from '../core/errors.js';
import { silentLogger } from '../core/logger.js';
import { sleep } from '../core/retry.js';

export abstract class BaseCompletionClient implements CompletionClient {
  abstract readonly name: string;
  abstract readonly model: string;

  abstract stream(messages: Message[], options?: StreamOptions): AsyncIterable<RawCompletionEvent>;

  protected rateLimiter: RateLimiter | null = null;

  constructor(config?: { rateLimit?: RateLimitConfig; logger?: Logger }) {
    if (config?.rateLimit) {
      this.rateLimiter = new RateLimiter(config.rateLimit, config.logger);
    }
  }

  protected async checkRateLimit(signal?: AbortSignal): Promise<void> {
    if (this.rateLimiter) {
      await this.rateLimiter.acquire(signal);
    }
  }
}

const WINDOW_MS = 60_000;

/** Sliding one-minute window over request start times. */
export class RateLimiter {
  private timestamps: number[] = [];
  private readonly maxPerMinute: number;
  private readonly logger: Logger;

  constructor(config: RateLimitConfig, logger: Logger = silentLogger) {
    this.maxPerMinute = config.maxPerMinute;
    this.logger = logger;
  }

  /** Milliseconds until a request may start; 0 when the window has room. */
  waitTime(now = Date.now()): number {
    this.timestamps = this.timestamps.filter(ts => ts > now - WINDOW_MS);
    const blocking = this.timestamps[this.timestamps.length - this.maxPerMinute];
    if (this.timestamps.length < this.maxPerMinute || blocking === undefined) return 0;
    return blocking + WINDOW_MS - now;
  }

  async acquire(signal?: AbortSignal): Promise<void> {
    let waitMs = this.waitTime();
    while (waitMs > 0) {
      this.logger.debug('Waiting for rate limit window', { waitMs, maxPerMinute: this.maxPerMinute });
      await sleep(waitMs, signal, 'aborted while waiting for the rate limit');
      waitMs = this.waitTime();
    }
    this.timestamps.push(Date.now());
  }
}

export async function createCompletionClient(config: LLMConfig): Promise<CompletionClient> {
  switch (config.provider) {
    case 'openai': {
      const { OpenAICompletionClient } = await import('./openai.js');
      return new OpenAICompletionClient(config);
    }
    default:
      throw new ConfigurationError(`Unknown LLM provider: ${String(config.provider)}`);
  }
}
