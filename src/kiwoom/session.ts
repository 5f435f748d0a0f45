import axios, { AxiosInstance, AxiosResponse } from 'axios';
import { SessionToken } from '../types';
import { AuthenticationError, Clock, RateLimiter, logger, parseTradingDate, systemClock } from '../utils';
import { TOKEN_PATH, tokenResponseSchema } from './types';

export interface SessionProvider {
  acquire(): Promise<SessionToken>;
  isValid(token: SessionToken | null | undefined): boolean;
}

export interface KiwoomSessionOptions {
  appKey: string;
  secretKey: string;
  baseUrl: string;
  timeoutMs?: number;
  clock?: Clock;
  http?: AxiosInstance;
  /** Shared with the REST client so token requests keep the same cadence. */
  rateLimiter?: RateLimiter;
}

export const TOKEN_SAFETY_MARGIN_MS = 30 * 1000;
// Used when the provider does not say when the token expires
export const DEFAULT_TOKEN_LIFETIME_MS = 60 * 60 * 1000;

const KST_OFFSET_HOURS = 9;

/**
 * `expires_dt` is a Korea Standard Time wall-clock stamp, `YYYYMMDDHHmmss`.
 */
export function parseKstTimestamp(value: string | undefined): number | null {
  if (!value) return null;
  const match = /^(\d{4})(\d{2})(\d{2})(\d{2})(\d{2})(\d{2})$/.exec(value.trim());
  if (!match || parseTradingDate(`${match[1]}${match[2]}${match[3]}`) === null) return null;

  const [year, month, day, hour, minute, second] = match.slice(1).map(Number);
  if (hour > 23 || minute > 59 || second > 59) {
    return null;
  }
  return Date.UTC(year, month - 1, day, hour - KST_OFFSET_HOURS, minute, second);
}

export function maskKey(key: string): string {
  return key.length <= 6 ? '***' : `${key.slice(0, 6)}***`;
}

/**
 * Exchanges the app key / secret pair for a bearer token. Tokens live in
 * memory only; every process starts by acquiring a fresh one.
 */
export class KiwoomSession implements SessionProvider {
  private http: AxiosInstance;
  private clock: Clock;
  private appKey: string;
  private secretKey: string;
  private tokenUrl: string;
  private timeoutMs: number;
  private rateLimiter?: RateLimiter;

  constructor(options: KiwoomSessionOptions) {
    this.appKey = options.appKey;
    this.secretKey = options.secretKey;
    this.tokenUrl = `${options.baseUrl}${TOKEN_PATH}`;
    this.timeoutMs = options.timeoutMs ?? 30000;
    this.clock = options.clock ?? systemClock;
    this.http = options.http ?? axios.create();
    this.rateLimiter = options.rateLimiter;
  }

  async acquire(): Promise<SessionToken> {
    const issuedAt = this.clock.now();
    let response: AxiosResponse<unknown>;

    logger.info('Session', 'Requesting access token', { appKey: maskKey(this.appKey) });

    const post = () =>
      this.http.post<unknown>(
        this.tokenUrl,
        {
          grant_type: 'client_credentials',
          appkey: this.appKey,
          secretkey: this.secretKey,
        },
        {
          headers: { 'Content-Type': 'application/json;charset=UTF-8' },
          timeout: this.timeoutMs,
          validateStatus: () => true,
        }
      );

    try {
      response = this.rateLimiter ? await this.rateLimiter.schedule(TOKEN_PATH, post) : await post();
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new AuthenticationError(`Token request failed: ${message}`);
    }

    const parsed = tokenResponseSchema.safeParse(response.data);
    if (!parsed.success) {
      throw new AuthenticationError('Token response was not understood', response.status);
    }

    const body = parsed.data;
    const returnCode = body.return_code ?? 0;
    if (response.status !== 200 || returnCode !== 0 || !body.token) {
      throw new AuthenticationError(
        `Token request rejected (HTTP ${response.status}, return_code ${returnCode})`,
        response.status,
        body.return_msg
      );
    }

    const declaredExpiry = parseKstTimestamp(body.expires_dt);
    const expiresAt = declaredExpiry ?? issuedAt + DEFAULT_TOKEN_LIFETIME_MS;

    logger.info('Session', 'Access token obtained', {
      expiresAt: new Date(expiresAt).toISOString(),
      declaredExpiry: declaredExpiry !== null,
    });

    return {
      value: body.token,
      tokenType: body.token_type ?? 'bearer',
      issuedAt,
      expiresAt,
    };
  }

  getRateLimiter(): RateLimiter | undefined {
    return this.rateLimiter;
  }

  isValid(token: SessionToken | null | undefined): boolean {
    if (!token || !token.value) return false;
    return this.clock.now() < token.expiresAt - TOKEN_SAFETY_MARGIN_MS;
  }
}
