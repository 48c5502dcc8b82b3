import { describe, expect, it, vi } from 'vitest';
import { TimeoutError, withTimeout } from '../../src/utils/timeout.js';

describe('withTimeout', () => {
  it('resolves with the task result inside the bound', async () => {
    await expect(withTimeout(async () => 'fast', 1_000, 'Quick task')).resolves.toBe('fast');
  });

  it('rejects and aborts the signal when the bound elapses', async () => {
    vi.useFakeTimers();
    try {
      let seen: AbortSignal | null = null;
      const pending = withTimeout((signal) => {
        seen = signal;
        return new Promise<string>(() => undefined);
      }, 500, 'Summary generation');
      const outcome = pending.catch((error: unknown) => error);

      await vi.advanceTimersByTimeAsync(500);
      const error = await outcome;
      expect(error).toBeInstanceOf(TimeoutError);
      expect(error).toMatchObject({ message: 'Summary generation timed out after 500ms.', timeoutMs: 500 });
      expect(seen).toMatchObject({ aborted: true });
    } finally {
      vi.useRealTimers();
    }
  });

  it('treats a non-positive bound as unbounded', async () => {
    await expect(withTimeout(async (signal) => signal.aborted, 0, 'Unbounded')).resolves.toBe(false);
  });
});
