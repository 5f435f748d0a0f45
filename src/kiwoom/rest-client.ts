import axios, { AxiosInstance, AxiosResponse } from 'axios';
import { SessionToken } from '../types';
import {
  logger,
  RateLimiter,
  withRetry,
  Clock,
  systemClock,
  handleError,
  ErrorCode,
  TransientNetworkError,
  RateLimitError,
  AuthenticationError,
  DataError,
  TradingDate,
  toCompactDate,
} from '../utils';
import {
  Continuation,
  DAILY_PRICE_ENDPOINT,
  DailyPricePage,
  KiwoomEndpoint,
  RawResponse,
  dailyPriceResponseSchema,
  envelopeSchema,
} from './types';

// return_code values that mean the bearer token was refused
const AUTH_RETURN_CODES = new Set([3, 8005]);
// return_code for "request quota exceeded"
const RATE_LIMIT_RETURN_CODES = new Set([5]);

export interface KiwoomRestClientOptions {
  baseUrl: string;
  timeoutMs?: number;
  minDelayMs?: number;
  /** Takes the place of a limiter built from `minDelayMs`. */
  rateLimiter?: RateLimiter;
  maxRetries?: number;
  retryBackoffBaseMs?: number;
  clock?: Clock;
  http?: AxiosInstance;
}

/** The slice of the client the collector depends on. */
export interface DailyPriceSource {
  fetchDailyPrices(
    stockCode: string,
    queryDate: TradingDate,
    token: SessionToken,
    continuation?: Continuation
  ): Promise<DailyPricePage>;
}

const NO_CONTINUATION: Continuation = { hasMore: false, nextKey: '' };

function headerValue(headers: AxiosResponse['headers'], name: string): string | undefined {
  const value: unknown = headers[name];
  return typeof value === 'string' ? value : undefined;
}

function readContinuation(headers: AxiosResponse['headers']): Continuation {
  return {
    hasMore: headerValue(headers, 'cont-yn') === 'Y',
    nextKey: headerValue(headers, 'next-key') ?? '',
  };
}

function toNetworkError(error: unknown, apiId: string): Error {
  if (axios.isAxiosError(error)) {
    if (error.code === 'ECONNABORTED' || error.code === 'ETIMEDOUT') {
      return new TransientNetworkError(`Request timeout on ${apiId}: ${error.message}`, { code: error.code }, ErrorCode.API_TIMEOUT);
    }
    return new TransientNetworkError(`Network error on ${apiId}: ${error.message}`, { code: error.code });
  }
  return handleError(error);
}

/**
 * Sequential, rate-limited access to the Kiwoom REST API.
 *
 * One request in flight, and a fixed gap between a response arriving and the
 * next request leaving. The limiter may be shared with a {@link KiwoomSession}.
 */
export class KiwoomRestClient implements DailyPriceSource {
  private http: AxiosInstance;
  private rateLimiter: RateLimiter;
  private clock: Clock;
  private baseUrl: string;
  private maxAttempts: number;
  private retryBackoffBaseMs: number;

  constructor(options: KiwoomRestClientOptions) {
    this.baseUrl = options.baseUrl;
    this.clock = options.clock ?? systemClock;
    this.maxAttempts = (options.maxRetries ?? 3) + 1;
    this.retryBackoffBaseMs = options.retryBackoffBaseMs ?? 5000;
    this.rateLimiter = options.rateLimiter ?? new RateLimiter({ minDelayMs: options.minDelayMs ?? 1000 }, this.clock);
    this.http =
      options.http ??
      axios.create({
        timeout: options.timeoutMs ?? 30000,
      });

    logger.info('Kiwoom', `Using ${this.baseUrl}`, {
      minDelayMs: this.rateLimiter.getStats().minDelayMs,
      maxAttempts: this.maxAttempts,
    });
  }

  getRateLimiter(): RateLimiter {
    return this.rateLimiter;
  }

  /**
   * One logical request: rate-limited, retried on transient failures.
   * Authentication failures are thrown on the first occurrence so the caller
   * can decide whether to refresh the token.
   */
  async fetch(
    endpoint: KiwoomEndpoint,
    params: Record<string, string>,
    token: SessionToken,
    continuation: Continuation = NO_CONTINUATION
  ): Promise<RawResponse> {
    const result = await withRetry(
      () => this.rateLimiter.schedule(endpoint.apiId, () => this.send(endpoint, params, token, continuation)),
      `Kiwoom.${endpoint.apiId}`,
      {
        maxAttempts: this.maxAttempts,
        initialDelayMs: this.retryBackoffBaseMs,
        sleep: (ms) => this.clock.sleep(ms),
      }
    );

    if (!result.success) {
      throw result.error;
    }
    return result.data;
  }

  async fetchDailyPrices(
    stockCode: string,
    queryDate: TradingDate,
    token: SessionToken,
    continuation?: Continuation
  ): Promise<DailyPricePage> {
    const raw = await this.fetch(
      DAILY_PRICE_ENDPOINT,
      { stk_cd: stockCode, qry_dt: toCompactDate(queryDate), indc_tp: '0' },
      token,
      continuation
    );

    const parsed = dailyPriceResponseSchema.safeParse(raw.body);
    if (!parsed.success) {
      throw new DataError(`Malformed daily price response for ${stockCode}`, {
        stockCode,
        issues: parsed.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`),
      });
    }

    return { rows: parsed.data.daly_stkpc, continuation: raw.continuation };
  }

  private async send(
    endpoint: KiwoomEndpoint,
    params: Record<string, string>,
    token: SessionToken,
    continuation: Continuation
  ): Promise<RawResponse> {
    const startedAt = this.clock.now();
    let response: AxiosResponse<unknown>;

    try {
      response = await this.http.post<unknown>(`${this.baseUrl}${endpoint.path}`, params, {
        headers: {
          'Content-Type': 'application/json;charset=UTF-8',
          authorization: `Bearer ${token.value}`,
          'api-id': endpoint.apiId,
          'cont-yn': continuation.hasMore ? 'Y' : 'N',
          'next-key': continuation.nextKey,
        },
        validateStatus: () => true,
      });
    } catch (error) {
      logger.warn('Kiwoom', 'Request failed before a response arrived', {
        apiId: endpoint.apiId,
        error: error instanceof Error ? error.message : String(error),
      });
      throw toNetworkError(error, endpoint.apiId);
    }

    const latencyMs = this.clock.now() - startedAt;
    logger.api('POST', endpoint.apiId, response.status, latencyMs);

    this.checkResponse(response, endpoint);

    return {
      status: response.status,
      body: response.data,
      continuation: readContinuation(response.headers),
      latencyMs,
    };
  }

  private checkResponse(response: AxiosResponse<unknown>, endpoint: KiwoomEndpoint): void {
    const { status } = response;

    if (status === 401 || status === 403) {
      throw new AuthenticationError(`Token rejected by ${endpoint.apiId}`, status, undefined, ErrorCode.TOKEN_REJECTED);
    }
    if (status === 429) {
      const retryAfterSeconds = Number(headerValue(response.headers, 'retry-after'));
      throw new RateLimitError(Number.isFinite(retryAfterSeconds) ? retryAfterSeconds * 1000 : 0, { apiId: endpoint.apiId });
    }
    if (status >= 500) {
      throw new TransientNetworkError(`Server error ${status} from ${endpoint.apiId}`, { status }, ErrorCode.SERVER_ERROR);
    }
    if (status < 200 || status >= 300) {
      throw new DataError(`Unexpected HTTP ${status} from ${endpoint.apiId}`, { status }, ErrorCode.PROVIDER_ERROR);
    }

    const envelope = envelopeSchema.safeParse(response.data);
    if (!envelope.success) {
      throw new DataError(`Response from ${endpoint.apiId} is not a JSON object`, { status });
    }

    const returnCode = envelope.data.return_code ?? 0;
    if (returnCode === 0) return;

    const providerMessage = envelope.data.return_msg ?? '';
    if (AUTH_RETURN_CODES.has(returnCode)) {
      throw new AuthenticationError(
        `Token rejected by ${endpoint.apiId} (return_code ${returnCode})`,
        status,
        providerMessage,
        ErrorCode.TOKEN_REJECTED
      );
    }
    if (RATE_LIMIT_RETURN_CODES.has(returnCode)) {
      throw new RateLimitError(0, { apiId: endpoint.apiId, returnCode, providerMessage });
    }
    throw new DataError(
      `Provider error from ${endpoint.apiId} (return_code ${returnCode}): ${providerMessage}`,
      { returnCode, providerMessage },
      ErrorCode.PROVIDER_ERROR
    );
  }
}
