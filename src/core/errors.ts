export class TandemError extends Error {
  public readonly code: string;
  public readonly timestamp: Date;

  constructor(message: string, code: string) {
    super(message);
    this.name = 'TandemError';
    this.code = code;
    this.timestamp = new Date();
    Error.captureStackTrace(this, this.constructor);
  }
}

export class ConfigurationError extends TandemError {
  constructor(message: string) {
    super(message, 'CONFIG_ERROR');
    this.name = 'ConfigurationError';
  }
}

export class HandoffError extends TandemError {
  public readonly agentName: string;

  constructor(message: string, agentName: string) {
    super(message, 'HANDOFF_ERROR');
    this.name = 'HandoffError';
    this.agentName = agentName;
  }
}

export class MessageValidationError extends TandemError {
  constructor(message: string) {
    super(message, 'MESSAGE_VALIDATION_ERROR');
    this.name = 'MessageValidationError';
  }
}

export class LLMError extends TandemError {
  public readonly provider?: string;

  constructor(message: string, provider?: string) {
    super(message, 'LLM_ERROR');
    this.name = 'LLMError';
    this.provider = provider;
  }
}

export class LLMRateLimitError extends LLMError {
  public readonly retryAfter?: number;

  constructor(provider: string, retryAfter?: number) {
    super('LLM rate limit exceeded', provider);
    this.name = 'LLMRateLimitError';
    this.retryAfter = retryAfter;
  }
}

export class ToolError extends TandemError {
  public readonly toolName: string;

  constructor(message: string, toolName: string) {
    super(message, 'TOOL_ERROR');
    this.name = 'ToolError';
    this.toolName = toolName;
  }
}

export class ConfirmationRequiredError extends TandemError {
  public readonly callId: string;

  constructor(callId: string, toolName: string) {
    super(`Tool call ${callId} (${toolName}) is waiting for confirmation`, 'CONFIRMATION_REQUIRED');
    this.name = 'ConfirmationRequiredError';
    this.callId = callId;
  }
}

export class RunnerBusyError extends TandemError {
  constructor() {
    super('Runner already has a run in progress', 'RUNNER_BUSY');
    this.name = 'RunnerBusyError';
  }
}

export class RunCancelledError extends TandemError {
  constructor(reason?: string) {
    super(reason ? `Run cancelled: ${reason}` : 'Run cancelled', 'RUN_CANCELLED');
    this.name = 'RunCancelledError';
  }
}

export class TimeoutError extends TandemError {
  public readonly timeoutMs: number;

  constructor(timeoutMs: number, operation: string) {
    super(
      `Operation timed out after ${timeoutMs}ms: ${operation}`,
      'TIMEOUT_ERROR'
    );
    this.name = 'TimeoutError';
    this.timeoutMs = timeoutMs;
  }
}

export function isRetryable(error: unknown): boolean {
  if (error instanceof LLMRateLimitError) return true;
  if (error instanceof TimeoutError) return true;
  if (error instanceof RunCancelledError) return false;
  if (error instanceof LLMError) return true;
  return false;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
