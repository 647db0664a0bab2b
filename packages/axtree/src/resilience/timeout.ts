import { TimeoutError } from '../errors';
import { validateTimeout } from '../validation';

/**
 * Work raced against a deadline. The signal is aborted when the deadline
 * passes; cooperative work (a tree walk) checks it between provider calls.
 */
export type AbortableOperation<T> = (signal: AbortSignal) => Promise<T>;

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Run `operation` and reject with TimeoutError once `durationMs` elapses.
 *
 * The provider offers no cancellation, so a timed-out call may keep running
 * in the background; its eventual result or rejection is dropped.
 */
export async function withTimeout<T>(
  durationMs: number,
  operation: AbortableOperation<T>,
  label = 'operation',
): Promise<T> {
  validateTimeout(durationMs);

  const controller = new AbortController();
  let timer: ReturnType<typeof setTimeout> | undefined;

  const deadline = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      const error = new TimeoutError(label, durationMs);
      controller.abort(error);
      reject(error);
    }, durationMs);
  });

  // Deferred so a synchronous throw inside operation() still becomes a rejection.
  const work = Promise.resolve().then(() => operation(controller.signal));

  try {
    return await Promise.race([work, deadline]);
  } finally {
    clearTimeout(timer);
  }
}

/** Throw the abort reason if the signal has fired. */
export function throwIfAborted(signal: AbortSignal | undefined): void {
  if (signal?.aborted) {
    throw signal.reason instanceof Error ? signal.reason : new TimeoutError('operation', 0);
  }
}
