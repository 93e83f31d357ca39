import { describe, it, expect, vi } from 'vitest';
import { withRetry } from './retry';

describe('withRetry', () => {
  it('returns the first successful result', async () => {
    const fn = vi.fn(async (attempt: number) => {
      if (attempt < 3) throw new Error(`attempt ${attempt} failed`);
      return 'ok';
    });

    await expect(withRetry(fn, { maxAttempts: 3, baseDelayMs: 1 })).resolves.toBe('ok');
    expect(fn).toHaveBeenCalledTimes(3);
  });

  it('doubles the delay up to the cap', async () => {
    const delays: number[] = [];

    await expect(withRetry(async () => {
      throw new Error('down');
    }, {
      maxAttempts: 4,
      baseDelayMs: 1,
      maxDelayMs: 3,
      onRetry: (_attempt, _error, delayMs) => delays.push(delayMs),
    })).rejects.toThrow('down');

    expect(delays).toEqual([1, 2, 3]);
  });

  it('stops early when the error is not retryable', async () => {
    const fn = vi.fn(async () => {
      throw new Error('fatal');
    });

    await expect(withRetry(fn, { maxAttempts: 5, baseDelayMs: 1, shouldRetry: () => false })).rejects.toThrow('fatal');
    expect(fn).toHaveBeenCalledTimes(1);
  });

  it('wraps thrown values that are not errors', async () => {
    await expect(withRetry(async () => {
      throw 'boom';
    }, { maxAttempts: 1 })).rejects.toThrow(new Error('boom'));
  });
});
