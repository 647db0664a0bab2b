import type { Logger } from '../monitoring/logger';
import { type AxTreeError, formatError, toAxTreeError } from './index';

export type Result<T> = { ok: true; value: T } | { ok: false; error: AxTreeError };

/** Run an operation and capture its outcome instead of throwing. */
export async function settle<T>(operation: () => Promise<T>, label?: string): Promise<Result<T>> {
  try {
    return { ok: true, value: await operation() };
  } catch (err) {
    return { ok: false, error: toAxTreeError(err, label) };
  }
}

/**
 * Run an operation; on failure log the formatted error and return the
 * fallback. Backs every non-throwing variant the engine exposes.
 */
export async function attempt<T>(
  operation: () => Promise<T>,
  fallback: T,
  logger: Logger,
  label?: string,
): Promise<T> {
  const result = await settle(operation, label);
  if (result.ok) return result.value;
  logger.error('operation_failed', {
    operation: label,
    code: result.error.code,
    error: formatError(result.error),
  });
  return fallback;
}
