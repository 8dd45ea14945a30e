import { describe, it, expect, vi } from 'vitest';

import { withRetry } from './retry';

describe('withRetry', () => {
  it('should return the first successful result', async () => {
    const fn = vi.fn().mockResolvedValue('ok');

    await expect(withRetry(fn, { delayMs: 0 })).resolves.toBe('ok');
    expect(fn).toHaveBeenCalledTimes(1);
  });

  it('should retry until the operation succeeds', async () => {
    const fn = vi
      .fn<() => Promise<number>>()
      .mockRejectedValueOnce(new Error('timeout'))
      .mockRejectedValueOnce(new Error('timeout'))
      .mockResolvedValue(3);

    await expect(withRetry(fn, { retries: 2, delayMs: 0 })).resolves.toBe(3);
    expect(fn).toHaveBeenCalledTimes(3);
  });

  it('should rethrow the last error once the retries are spent', async () => {
    const fn = vi
      .fn<() => Promise<never>>()
      .mockRejectedValueOnce(new Error('first'))
      .mockRejectedValueOnce(new Error('last'));

    await expect(withRetry(fn, { retries: 1, delayMs: 0 })).rejects.toThrow('last');
    expect(fn).toHaveBeenCalledTimes(2);
  });

  it('should wrap non-error rejections', async () => {
    const fn = vi.fn<() => Promise<never>>().mockRejectedValue('boom');

    await expect(withRetry(fn, { retries: 0 })).rejects.toThrow('boom');
  });

  it('should wait longer before each attempt', async () => {
    vi.useFakeTimers();
    try {
      const fn = vi
        .fn<() => Promise<string>>()
        .mockRejectedValueOnce(new Error('a'))
        .mockRejectedValueOnce(new Error('b'))
        .mockResolvedValue('done');

      const pending = withRetry(fn, { retries: 2, delayMs: 100 });

      await vi.advanceTimersByTimeAsync(99);
      expect(fn).toHaveBeenCalledTimes(1);
      await vi.advanceTimersByTimeAsync(1);
      expect(fn).toHaveBeenCalledTimes(2);
      await vi.advanceTimersByTimeAsync(199);
      expect(fn).toHaveBeenCalledTimes(2);
      await vi.advanceTimersByTimeAsync(1);

      await expect(pending).resolves.toBe('done');
      expect(fn).toHaveBeenCalledTimes(3);
    } finally {
      vi.useRealTimers();
    }
  });
});
