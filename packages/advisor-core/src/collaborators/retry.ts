/**
 * Bounded retry for collaborator calls
 */

import { errorMessage } from '../shared/guards';
import { createAgentLogger, type TraceContext } from '../tracing';

const log = createAgentLogger('Retry');

export interface RetryOptions {
  /** Extra attempts after the first one */
  retries?: number;
  /** Backoff before the first retry; doubles for each further retry */
  delayMs?: number;
  signal?: AbortSignal;
  /** Name used in retry logs */
  operation?: string;
  traceContext?: TraceContext;
}

export function isAbortError(error: unknown): boolean {
  return error instanceof Error && (error.name === 'AbortError' || error.message === 'Aborted');
}

const sleep = (ms: number): Promise<void> =>
  new Promise((resolve) => setTimeout(resolve, ms));

/**
 * Call `fn`, retrying failed attempts up to `retries` times with
 * exponential backoff. Aborts are rethrown without retrying.
 */
export async function withRetry<T>(
  fn: (attempt: number) => Promise<T>,
  options: RetryOptions = {}
): Promise<T> {
  const { retries = 1, delayMs = 0, signal, operation = 'collaborator call', traceContext } = options;
  const maxAttempts = Math.max(0, Math.floor(retries)) + 1;
  let lastError: unknown;

  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    if (signal?.aborted) {
      throw signal.reason ?? new Error('Aborted');
    }

    try {
      return await fn(attempt);
    } catch (error) {
      lastError = error;

      if (isAbortError(error) || signal?.aborted) {
        throw error;
      }

      if (attempt < maxAttempts) {
        log.warnWithTrace(traceContext, `Retrying ${operation}...`, {
          attempt,
          maxAttempts,
          error: errorMessage(error),
        });

        if (delayMs > 0) {
          await sleep(delayMs * Math.pow(2, attempt - 1));
        }
      }
    }
  }

  throw lastError;
}
