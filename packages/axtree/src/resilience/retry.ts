import { errorMessage, RetryExhaustedError, TimeoutError, ValidationError } from '../errors';
import { getLogger, type Logger } from '../monitoring/logger';
import { validateRetryCount, validateRetryDelay, validateTimeout } from '../validation';
import { sleep, withTimeout } from './timeout';

export interface RetryEvent {
  operation: string;
  attempt: number;
  maxAttempts: number;
  delayMs: number;
  error: unknown;
}

export interface RetryOptions {
  /** Total number of invocations, including the first. */
  maxAttempts: number;
  /** Pause between attempts in milliseconds. */
  delayMs: number;
  logger?: Logger;
  /** Called before sleeping ahead of the next attempt. */
  onRetry?: (event: RetryEvent) => void;
}

export interface TimeoutRetryOptions extends RetryOptions {
  /** Deadline applied to each individual attempt. */
  timeoutMs: number;
}

/**
 * Invoke `operation` up to `maxAttempts` times and return the first success.
 *
 * After the last failed attempt its own error is rethrown, except a timeout,
 * which becomes RetryExhaustedError carrying it. Argument errors are thrown
 * immediately without retrying.
 */
export async function withRetry<T>(
  options: RetryOptions,
  operation: (attempt: number) => Promise<T>,
  label = 'operation',
): Promise<T> {
  const maxAttempts = validateRetryCount(options.maxAttempts);
  const delayMs = validateRetryDelay(options.delayMs);
  const logger = options.logger ?? getLogger();

  let lastError: unknown;

  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    try {
      return await operation(attempt);
    } catch (err) {
      if (err instanceof ValidationError) throw err;
      lastError = err;

      if (attempt < maxAttempts) {
        logger.warn('retrying_operation', {
          operation: label,
          attempt,
          maxAttempts,
          delayMs,
          error: errorMessage(err),
        });
        options.onRetry?.({ operation: label, attempt, maxAttempts, delayMs, error: err });
        if (delayMs > 0) await sleep(delayMs);
      }
    }
  }

  if (lastError instanceof TimeoutError) {
    throw new RetryExhaustedError(label, maxAttempts, lastError);
  }
  throw lastError;
}

/** withRetry where each attempt is raced against its own deadline. */
export async function withTimeoutAndRetry<T>(
  options: TimeoutRetryOptions,
  operation: (signal: AbortSignal, attempt: number) => Promise<T>,
  label = 'operation',
): Promise<T> {
  const timeoutMs = validateTimeout(options.timeoutMs);
  return withRetry(
    options,
    (attempt) => withTimeout(timeoutMs, (signal) => operation(signal, attempt), label),
    label,
  );
}
