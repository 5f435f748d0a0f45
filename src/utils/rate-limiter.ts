import { logger } from './logger';

export interface Clock {
  now(): number;
  sleep(ms: number): Promise<void>;
}

export const systemClock: Clock = {
  now: () => Date.now(),
  sleep: (ms: number) => new Promise((resolve) => setTimeout(resolve, ms)),
};

export interface RateLimitConfig {
  minDelayMs: number;       // Minimum gap between one call returning and the next starting
}

/**
 * Serializes calls against a single provider credential.
 *
 * One call is in flight at a time, and each call starts no earlier than
 * `minDelayMs` after the previous one returned (successfully or not). The
 * limiter owns its own clock state, so separate instances never share a
 * cadence.
 */
export class RateLimiter {
  private config: RateLimitConfig;
  private clock: Clock;
  private lastCompletedAt: number | null = null;
  private tail: Promise<void> = Promise.resolve();
  private pending = 0;
  private completed = 0;

  constructor(config: RateLimitConfig, clock: Clock = systemClock) {
    if (!Number.isFinite(config.minDelayMs) || config.minDelayMs < 0) {
      throw new RangeError(`minDelayMs must be a non-negative number, got ${config.minDelayMs}`);
    }
    this.config = config;
    this.clock = clock;
  }

  /** Earliest epoch ms at which the next call may start. */
  nextAllowedTime(): number {
    if (this.lastCompletedAt === null) {
      return 0;
    }
    return this.lastCompletedAt + this.config.minDelayMs;
  }

  getWaitTime(): number {
    return Math.max(0, this.nextAllowedTime() - this.clock.now());
  }

  async schedule<T>(endpoint: string, task: () => Promise<T>): Promise<T> {
    this.pending++;

    const run = this.tail.then(async () => {
      const waitTime = this.getWaitTime();
      if (waitTime > 0) {
        logger.debug('RateLimiter', `Waiting ${waitTime}ms before ${endpoint}`);
        await this.clock.sleep(waitTime);
      }

      try {
        return await task();
      } finally {
        this.lastCompletedAt = this.clock.now();
        this.pending--;
        this.completed++;
      }
    });

    // The chain only orders calls; each caller sees its own failure through `run`.
    this.tail = run.then(
      () => undefined,
      () => undefined
    );

    return run;
  }

  getStats(): { pending: number; completed: number; minDelayMs: number; nextAllowedTime: number } {
    return {
      pending: this.pending,
      completed: this.completed,
      minDelayMs: this.config.minDelayMs,
      nextAllowedTime: this.nextAllowedTime(),
    };
  }
}
