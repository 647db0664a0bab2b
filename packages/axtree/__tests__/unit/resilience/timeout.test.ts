import { describe, expect, test, vi } from 'vitest';
import { withTimeout, sleep, throwIfAborted } from '../../../src/resilience/timeout';
import { TimeoutError, ValidationError } from '../../../src/errors';

describe('withTimeout', () => {
  test('returns the result when the operation finishes within the deadline', async () => {
    const result = await withTimeout(200, async () => {
      await sleep(5);
      return 42;
    });
    expect(result).toBe(42);
  });

  test('rejects with TimeoutError when the operation never settles', async () => {
    const started = Date.now();
    const pending = withTimeout(100, () => new Promise<never>(() => {}), 'hanging call');

    await expect(pending).rejects.toBeInstanceOf(TimeoutError);
    const elapsed = Date.now() - started;
    expect(elapsed).toBeGreaterThanOrEqual(90);
    expect(elapsed).toBeLessThan(1000);
  });

  test('timeout error names the operation and duration', async () => {
    const error = await withTimeout(20, () => new Promise<never>(() => {}), 'read title').catch(
      (err: unknown) => err,
    );
    expect(error).toBeInstanceOf(TimeoutError);
    if (!(error instanceof TimeoutError)) return;
    expect(error.operation).toBe('read title');
    expect(error.durationMs).toBe(20);
    expect(error.message).toBe("Operation 'read title' timed out after 20ms");
    expect(error.errorCode).toBe(300);
  });

  test('propagates the operation error unchanged', async () => {
    const boom = new Error('provider exploded');
    await expect(withTimeout(100, async () => { throw boom; })).rejects.toBe(boom);
  });

  test('a synchronous throw inside the operation becomes a rejection', async () => {
    await expect(
      withTimeout(100, () => {
        throw new Error('sync failure');
      }),
    ).rejects.toThrow('sync failure');
  });

  test('aborts the signal handed to the operation when the deadline passes', async () => {
    let seen: AbortSignal | undefined;
    await withTimeout(20, (signal) => {
      seen = signal;
      return new Promise<never>(() => {});
    }).catch(() => undefined);

    expect(seen?.aborted).toBe(true);
    expect(seen?.reason).toBeInstanceOf(TimeoutError);
  });

  test('clears the deadline timer once the operation settles', async () => {
    const clearSpy = vi.spyOn(globalThis, 'clearTimeout');
    await withTimeout(1000, async () => 'done');
    expect(clearSpy).toHaveBeenCalled();
    clearSpy.mockRestore();
  });

  test.each([0, -5, 300_001])('rejects an invalid duration of %d before running', async (duration) => {
    const operation = vi.fn(async () => 'never');
    await expect(withTimeout(duration, operation)).rejects.toBeInstanceOf(ValidationError);
    expect(operation).not.toHaveBeenCalled();
  });
});

describe('throwIfAborted', () => {
  test('does nothing for a missing or live signal', () => {
    expect(() => throwIfAborted(undefined)).not.toThrow();
    expect(() => throwIfAborted(new AbortController().signal)).not.toThrow();
  });

  test('throws the abort reason', () => {
    const controller = new AbortController();
    const reason = new TimeoutError('walk', 10);
    controller.abort(reason);
    expect(() => throwIfAborted(controller.signal)).toThrow(reason);
  });
});
