import { logger } from './logger';
import { RateLimitError, isCollectorError } from './errors';

export interface RetryConfig {
  maxAttempts: number;
  initialDelayMs: number;
  maxDelayMs: number;
  backoffMultiplier: number;
  jitterFactor: number;  // 0-1, adds randomness to delay
  sleep: (ms: number) => Promise<void>;
}

const DEFAULT_CONFIG: RetryConfig = {
  maxAttempts: 4,
  initialDelayMs: 5000,
  maxDelayMs: 60000,
  backoffMultiplier: 2,
  jitterFactor: 0,
  sleep: (ms: number) => new Promise((resolve) => setTimeout(resolve, ms)),
};

export type RetryResult<T> =
  | { success: true; data: T; attempts: number; totalDelayMs: number }
  | { success: false; error: Error; attempts: number; totalDelayMs: number };

export function calculateDelay(attempt: number, config: RetryConfig, error?: Error): number {
  // Honour a provider-declared retry-after
  if (error instanceof RateLimitError && error.retryAfter > 0) {
    return Math.min(error.retryAfter, config.maxDelayMs);
  }

  let delay = config.initialDelayMs * Math.pow(config.backoffMultiplier, attempt - 1);
  delay = Math.min(delay, config.maxDelayMs);

  if (config.jitterFactor > 0) {
    const jitter = delay * config.jitterFactor * (Math.random() * 2 - 1);
    delay = Math.max(0, delay + jitter);
  }

  return Math.floor(delay);
}

/**
 * Only errors we classified ourselves are retried. Anything else (a bug, a
 * schema mismatch, an auth failure) is surfaced on the first attempt.
 */
export function isRetryable(error: unknown): boolean {
  return isCollectorError(error) && error.isRetryable;
}

export async function withRetry<T>(
  operation: () => Promise<T>,
  operationName: string,
  customConfig?: Partial<RetryConfig>
): Promise<RetryResult<T>> {
  const config: RetryConfig = { ...DEFAULT_CONFIG, ...customConfig };
  let lastError: Error | undefined;
  let totalDelayMs = 0;

  for (let attempt = 1; attempt <= config.maxAttempts; attempt++) {
    try {
      const data = await operation();
      return {
        success: true,
        data,
        attempts: attempt,
        totalDelayMs,
      };
    } catch (error) {
      lastError = error instanceof Error ? error : new Error(String(error));
      const retryable = isRetryable(error);

      if (attempt === config.maxAttempts || !retryable) {
        logger.warn('Retry', `${operationName} failed after ${attempt} attempts`, {
          error: lastError.message,
          attempts: attempt,
          retryable,
        });

        return {
          success: false,
          error: lastError,
          attempts: attempt,
          totalDelayMs,
        };
      }

      const delay = calculateDelay(attempt, config, lastError);
      totalDelayMs += delay;

      logger.warn('Retry', `${operationName} attempt ${attempt} failed, retrying in ${delay}ms`, {
        error: lastError.message,
        nextAttempt: attempt + 1,
        maxAttempts: config.maxAttempts,
      });

      await config.sleep(delay);
    }
  }

  return {
    success: false,
    error: lastError ?? new Error(`${operationName} was not attempted`),
    attempts: config.maxAttempts,
    totalDelayMs,
  };
}
