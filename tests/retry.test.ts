import { describe, it, expect, vi } from 'vitest';
import { withRetry, calculateDelay, isRetryable, RetryConfig } from '../src/utils/retry';
import { TransientNetworkError, RateLimitError, DataError, AuthenticationError } from '../src/utils/errors';

const noSleep = vi.fn(async (_ms: number) => undefined);

const BASE_CONFIG: RetryConfig = {
  maxAttempts: 4,
  initialDelayMs: 1000,
  maxDelayMs: 60000,
  backoffMultiplier: 2,
  jitterFactor: 0,
  sleep: noSleep,
};

describe('Retry utilities', () => {
  describe('withRetry', () => {
    it('should succeed on first try', async () => {
      const operation = vi.fn().mockResolvedValue('success');

      const result = await withRetry(operation, 'test-op', { sleep: noSleep });

      expect(result.success).toBe(true);
      if (result.success) {
        expect(result.data).toBe('success');
      }
      expect(result.attempts).toBe(1);
      expect(operation).toHaveBeenCalledTimes(1);
    });

    it('should retry on retryable failure and eventually succeed', async () => {
      const sleep = vi.fn(async (_ms: number) => undefined);
      const operation = vi
        .fn()
        .mockRejectedValueOnce(new TransientNetworkError('fail1'))
        .mockRejectedValueOnce(new TransientNetworkError('fail2'))
        .mockResolvedValue('success');

      const result = await withRetry(operation, 'test-op', {
        maxAttempts: 5,
        initialDelayMs: 10,
        sleep,
      });

      expect(result.success).toBe(true);
      expect(result.attempts).toBe(3);
      expect(result.totalDelayMs).toBe(30);
      expect(sleep.mock.calls.map((call) => call[0])).toEqual([10, 20]);
      expect(operation).toHaveBeenCalledTimes(3);
    });

    it('should fail after max attempts with retryable error', async () => {
      const operation = vi.fn().mockRejectedValue(new TransientNetworkError('always fails'));

      const result = await withRetry(operation, 'test-op', {
        maxAttempts: 3,
        initialDelayMs: 10,
        sleep: noSleep,
      });

      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error).toBeInstanceOf(TransientNetworkError);
        expect(result.error.message).toBe('always fails');
      }
      expect(result.attempts).toBe(3);
      expect(operation).toHaveBeenCalledTimes(3);
    });

    it('should not retry non-retryable errors', async () => {
      const operation = vi.fn().mockRejectedValue(new DataError('bad payload'));

      const result = await withRetry(operation, 'test-op', {
        maxAttempts: 5,
        initialDelayMs: 10,
        sleep: noSleep,
      });

      expect(result.success).toBe(false);
      expect(result.attempts).toBe(1);
      expect(operation).toHaveBeenCalledTimes(1);
    });

    it('should not retry plain errors', async () => {
      const operation = vi.fn().mockRejectedValue(new Error('bug'));

      const result = await withRetry(operation, 'test-op', { maxAttempts: 3, sleep: noSleep });

      expect(result.attempts).toBe(1);
    });
  });

  describe('calculateDelay', () => {
    it('should back off exponentially', () => {
      expect(calculateDelay(1, BASE_CONFIG)).toBe(1000);
      expect(calculateDelay(2, BASE_CONFIG)).toBe(2000);
      expect(calculateDelay(3, BASE_CONFIG)).toBe(4000);
    });

    it('should cap at maxDelayMs', () => {
      expect(calculateDelay(10, { ...BASE_CONFIG, maxDelayMs: 5000 })).toBe(5000);
    });

    it('should honour a declared retry-after', () => {
      expect(calculateDelay(1, BASE_CONFIG, new RateLimitError(7000))).toBe(7000);
    });

    it('should fall back to backoff when retry-after is unknown', () => {
      expect(calculateDelay(2, BASE_CONFIG, new RateLimitError(0))).toBe(2000);
    });
  });

  describe('isRetryable', () => {
    it('should classify errors', () => {
      expect(isRetryable(new TransientNetworkError('x'))).toBe(true);
      expect(isRetryable(new RateLimitError(0))).toBe(true);
      expect(isRetryable(new AuthenticationError('x'))).toBe(false);
      expect(isRetryable(new DataError('x'))).toBe(false);
      expect(isRetryable(new Error('x'))).toBe(false);
    });
  });
});
