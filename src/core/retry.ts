import { LLMRateLimitError, RunCancelledError, errorMessage, isRetryable } from './errors.js';
import type { Logger, RetryConfig } from './types.js';
import { silentLogger } from './logger.js';

export function sleep(ms: number, signal?: AbortSignal, reason = 'aborted while waiting to retry'): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(new RunCancelledError(reason));
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      reject(new RunCancelledError(reason));
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

/** Retries retryable failures with capped exponential backoff. */
export class Retrier {
  private readonly config: RetryConfig;
  private readonly logger: Logger;

  constructor(config: RetryConfig, logger: Logger = silentLogger) {
    this.config = config;
    this.logger = logger;
  }

  async execute<T>(fn: (attempt: number) => Promise<T>, signal?: AbortSignal): Promise<T> {
    for (let attempt = 1; ; attempt++) {
      try {
        return await fn(attempt);
      } catch (error) {
        if (attempt >= this.config.maxAttempts || !isRetryable(error) || signal?.aborted) {
          throw error instanceof Error ? error : new Error(String(error));
        }

        const delayMs = this.delayFor(attempt, error);
        this.logger.warn('Retrying after failure', {
          attempt,
          maxAttempts: this.config.maxAttempts,
          delayMs: Math.round(delayMs),
          error: errorMessage(error)
        });
        await sleep(delayMs, signal);
      }
    }
  }

  /** A server-supplied `retryAfter` (seconds) wins over the backoff, within `maxDelayMs`. */
  delayFor(attempt: number, error?: unknown): number {
    if (error instanceof LLMRateLimitError && error.retryAfter !== undefined) {
      return Math.min(error.retryAfter * 1000, this.config.maxDelayMs);
    }

    const exponential = Math.min(this.config.baseDelayMs * 2 ** (attempt - 1), this.config.maxDelayMs);
    const jitter = this.config.jitterFactor
      ? exponential * this.config.jitterFactor * (Math.random() * 2 - 1)
      : 0;
    return Math.max(0, exponential + jitter);
  }
}
