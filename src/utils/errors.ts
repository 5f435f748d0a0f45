export enum ErrorCode {
  // Network errors (1xxx)
  NETWORK_ERROR = 1001,
  API_TIMEOUT = 1002,
  RATE_LIMITED = 1003,
  SERVER_ERROR = 1004,

  // Authentication errors (2xxx)
  AUTH_FAILED = 2001,
  TOKEN_REJECTED = 2002,

  // Data errors (3xxx)
  MALFORMED_RESPONSE = 3001,
  PROVIDER_ERROR = 3002,

  // Database errors (5xxx)
  DB_CONNECTION_ERROR = 5001,
  DB_QUERY_ERROR = 5002,

  // System errors (6xxx)
  SYSTEM_ERROR = 6001,
  CONFIG_ERROR = 6002,
}

export class CollectorError extends Error {
  public readonly code: ErrorCode;
  public readonly details?: Record<string, unknown>;
  public readonly isRetryable: boolean;
  public readonly timestamp: Date;

  constructor(
    code: ErrorCode,
    message: string,
    details?: Record<string, unknown>,
    isRetryable: boolean = false
  ) {
    super(message);
    this.name = 'CollectorError';
    this.code = code;
    this.details = details;
    this.isRetryable = isRetryable;
    this.timestamp = new Date();

    // Maintain proper stack trace
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, CollectorError);
    }
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      details: this.details,
      isRetryable: this.isRetryable,
      timestamp: this.timestamp.toISOString(),
    };
  }
}

/** Timeout, connection reset or 5xx. Safe to retry. */
export class TransientNetworkError extends CollectorError {
  constructor(message: string, details?: Record<string, unknown>, code: ErrorCode = ErrorCode.NETWORK_ERROR) {
    super(code, message, details, true);
    this.name = 'TransientNetworkError';
  }
}

export class RateLimitError extends CollectorError {
  public readonly retryAfter: number;

  constructor(retryAfter: number, details?: Record<string, unknown>) {
    super(ErrorCode.RATE_LIMITED, `Rate limited. Retry after ${retryAfter}ms`, details, true);
    this.name = 'RateLimitError';
    this.retryAfter = retryAfter;
  }
}

export class AuthenticationError extends CollectorError {
  public readonly status?: number;
  public readonly providerMessage?: string;

  constructor(
    message: string = 'Authentication failed',
    status?: number,
    providerMessage?: string,
    code: ErrorCode = ErrorCode.AUTH_FAILED
  ) {
    super(code, message, { status, providerMessage }, false);
    this.name = 'AuthenticationError';
    this.status = status;
    this.providerMessage = providerMessage;
  }
}

/** The provider answered, but not in the shape we expect. Retrying will not help. */
export class DataError extends CollectorError {
  constructor(message: string, details?: Record<string, unknown>, code: ErrorCode = ErrorCode.MALFORMED_RESPONSE) {
    super(code, message, details, false);
    this.name = 'DataError';
  }
}

export class ConfigurationError extends CollectorError {
  public readonly field?: string;

  constructor(message: string, field?: string, details?: Record<string, unknown>) {
    super(ErrorCode.CONFIG_ERROR, message, { ...details, field }, false);
    this.name = 'ConfigurationError';
    this.field = field;
  }
}

export class DatabaseError extends CollectorError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(ErrorCode.DB_CONNECTION_ERROR, message, details, true);
    this.name = 'DatabaseError';
  }
}

// Error handler helper
export function handleError(error: unknown): CollectorError {
  if (error instanceof CollectorError) {
    return error;
  }

  if (error instanceof Error) {
    const message = error.message;
    if (message.includes('ECONNREFUSED') || message.includes('ECONNRESET') || message.includes('ETIMEDOUT')) {
      return new TransientNetworkError(message);
    }
    if (message.includes('rate limit') || message.includes('429')) {
      return new RateLimitError(60000);
    }

    return new CollectorError(ErrorCode.SYSTEM_ERROR, message, { originalError: error.name });
  }

  return new CollectorError(ErrorCode.SYSTEM_ERROR, 'Unknown error occurred', { error: String(error) });
}

// Type guard
export function isCollectorError(error: unknown): error is CollectorError {
  return error instanceof CollectorError;
}
