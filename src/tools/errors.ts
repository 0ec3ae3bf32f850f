import { ZodError } from 'zod';
import { TimeoutError } from '../core/errors.js';

function errorCode(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

function errorStatus(error: unknown): number | undefined {
  if (error instanceof Error && 'status' in error && typeof error.status === 'number') {
    return error.status;
  }
  return undefined;
}

export function formatZodIssues(error: ZodError): string {
  return error.issues
    .map(issue => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}

export function formatToolError(tool: string, error: unknown): string {
  if (error instanceof ZodError) {
    return `Invalid arguments for ${tool}: ${formatZodIssues(error)}`;
  }

  if (error instanceof TimeoutError) {
    return `${tool} timed out after ${error.timeoutMs}ms`;
  }

  // Network errors
  const code = errorCode(error);
  if (code === 'ECONNREFUSED') return `${tool} failed: connection refused`;
  if (code === 'ETIMEDOUT') return `${tool} failed: connection timed out`;
  if (code === 'ENOTFOUND') return `${tool} failed: host not found`;

  // HTTP errors
  const status = errorStatus(error);
  if (status !== undefined) {
    const statusMessages: Record<number, string> = {
      400: 'Bad request',
      401: 'Unauthorized - check API key',
      403: 'Forbidden - insufficient permissions',
      404: 'Not found',
      429: 'Rate limited - try again later',
      500: 'Server error',
      502: 'Bad gateway',
      503: 'Service unavailable'
    };
    return `${tool} failed: HTTP ${status} ${statusMessages[status] ?? 'Unknown error'}`;
  }

  const message = error instanceof Error ? error.message : String(error);
  return `${tool} failed: ${message}`;
}
