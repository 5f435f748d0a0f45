export { logger } from './logger';
export type { LogLevel } from './logger';
export {
  CollectorError,
  TransientNetworkError,
  RateLimitError,
  AuthenticationError,
  DataError,
  ConfigurationError,
  DatabaseError,
  ErrorCode,
  handleError,
  isCollectorError,
} from './errors';
export { RateLimiter, systemClock } from './rate-limiter';
export type { Clock, RateLimitConfig } from './rate-limiter';
export { withRetry, calculateDelay, isRetryable } from './retry';
export type { RetryConfig, RetryResult } from './retry';
export {
  parseTradingDate,
  toCompactDate,
  toTradingDate,
  formatRunTimestamp,
  addDays,
  isTradingDate,
} from './dates';
export type { TradingDate } from './dates';
