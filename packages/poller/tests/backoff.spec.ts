import { ProviderRequestError } from '@converge/contracts';
import { describe, expect, it, vi } from 'vitest';

import { computeDelay, isRetryableProviderError, resolveBackoff, waitFor, withBackoff, withDeadline } from '../src/index';

const FAST = { baseDelayMs: 1, jitterFactor: 0 };

describe('backoff', () => {
  describe('isRetryableProviderError', () => {
    it('should retry throttling, server errors and transient network failures', () => {
      expect(isRetryableProviderError({ code: 'ECONNRESET' })).toBe(true);
      expect(isRetryableProviderError({ statusCode: 429 })).toBe(true);
      expect(isRetryableProviderError({ status: 503 })).toBe(true);
      expect(isRetryableProviderError(new Error('Throttled by server'))).toBe(true);
      expect(isRetryableProviderError(new ProviderRequestError('Busy', { statusCode: 502 }))).toBe(true);
    });

    it('should not retry client errors', () => {
      expect(isRetryableProviderError({ statusCode: 404 })).toBe(false);
      expect(isRetryableProviderError(new Error('Invalid parameter'))).toBe(false);
      expect(isRetryableProviderError(null)).toBe(false);
      expect(isRetryableProviderError('ECONNRESET')).toBe(false);
    });
  });

  describe('computeDelay', () => {
    const config = resolveBackoff({ baseDelayMs: 100, factor: 2, maxDelayMs: 1000, jitterFactor: 0 });

    it('should grow exponentially up to the cap', () => {
      expect(computeDelay(1, config)).toBe(100);
      expect(computeDelay(3, config)).toBe(400);
      expect(computeDelay(5, config)).toBe(1000);
    });

    it('should spread delays by the jitter factor', () => {
      const jittered = { ...config, jitterFactor: 0.5 };

      expect(computeDelay(1, jittered, () => 1)).toBe(150);
      expect(computeDelay(1, jittered, () => 0)).toBe(50);
    });

    it('should keep a fixed delay with factor 1', () => {
      const fixed = resolveBackoff({ baseDelayMs: 20, factor: 1, jitterFactor: 0 });

      expect(computeDelay(4, fixed)).toBe(20);
    });
  });

  describe('withBackoff', () => {
    it('should retry retryable failures until one succeeds', async () => {
      const fn = vi
        .fn()
        .mockRejectedValueOnce(new ProviderRequestError('Unavailable', { statusCode: 503 }))
        .mockRejectedValueOnce(new ProviderRequestError('Unavailable', { statusCode: 503 }))
        .mockResolvedValue('ok');

      await expect(withBackoff(fn, FAST)).resolves.toBe('ok');
      expect(fn).toHaveBeenCalledTimes(3);
    });

    it('should not retry a non-retryable failure', async () => {
      const fn = vi.fn().mockRejectedValue(new ProviderRequestError('Bad request', { statusCode: 400 }));

      await expect(withBackoff(fn, FAST)).rejects.toThrow('Bad request');
      expect(fn).toHaveBeenCalledTimes(1);
    });

    it('should rethrow the last error once attempts run out', async () => {
      const fn = vi
        .fn()
        .mockRejectedValueOnce(new ProviderRequestError('first', { statusCode: 500 }))
        .mockRejectedValueOnce(new ProviderRequestError('second', { statusCode: 500 }));

      await expect(withBackoff(fn, { ...FAST, maxAttempts: 2 })).rejects.toThrow('second');
      expect(fn).toHaveBeenCalledTimes(2);
    });

    it('should stop when the next delay would exceed the wait budget', async () => {
      const fn = vi.fn().mockRejectedValue(new ProviderRequestError('Unavailable', { statusCode: 503 }));

      await expect(withBackoff(fn, { baseDelayMs: 50, jitterFactor: 0, maxTotalWaitMs: 10 })).rejects.toThrow('Unavailable');
      expect(fn).toHaveBeenCalledTimes(1);
    });

    it('should honour a custom retry predicate and pass the attempt number', async () => {
      const fn = vi.fn().mockRejectedValueOnce(new Error('Invalid parameter')).mockResolvedValue('done');

      await expect(withBackoff(fn, { ...FAST, shouldRetry: () => true })).resolves.toBe('done');
      expect(fn).toHaveBeenNthCalledWith(2, 2);
    });

    it('should use the server-requested delay', async () => {
      const fn = vi.fn().mockRejectedValueOnce(new ProviderRequestError('Throttled', { statusCode: 429, retryAfterMs: 0 })).mockResolvedValue('ok');

      await expect(withBackoff(fn, { baseDelayMs: 60_000, maxTotalWaitMs: 1 })).resolves.toBe('ok');
    });
  });

  describe('waitFor', () => {
    it('should resolve true once the predicate holds', async () => {
      const predicate = vi.fn().mockResolvedValueOnce(false).mockResolvedValueOnce(false).mockResolvedValue(true);

      await expect(waitFor(predicate, { ...FAST, maxAttempts: 5 })).resolves.toBe(true);
      expect(predicate).toHaveBeenCalledTimes(3);
    });

    it('should resolve false when the budget is spent', async () => {
      const predicate = vi.fn().mockResolvedValue(false);

      await expect(waitFor(predicate, { ...FAST, maxAttempts: 3 })).resolves.toBe(false);
      expect(predicate).toHaveBeenCalledTimes(3);
    });
  });

  describe('withDeadline', () => {
    it('should pass through a value that arrives in time', async () => {
      await expect(withDeadline(Promise.resolve('running'), 1000)).resolves.toBe('running');
    });

    it('should resolve undefined once the deadline passes', async () => {
      vi.useFakeTimers();
      try {
        const pending = withDeadline(new Promise<string>(() => undefined), 500);
        await vi.advanceTimersByTimeAsync(500);

        await expect(pending).resolves.toBeUndefined();
        expect(vi.getTimerCount()).toBe(0);
      } finally {
        vi.useRealTimers();
      }
    });

    it('should pass through a rejection', async () => {
      await expect(withDeadline(Promise.reject(new Error('socket hang up')), 1000)).rejects.toThrow('socket hang up');
    });
  });
});
