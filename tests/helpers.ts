import axios, { AxiosAdapter, AxiosError, AxiosHeaders, AxiosInstance, InternalAxiosRequestConfig } from 'axios';
import { Clock } from '../src/utils';
import { SessionToken } from '../src/types';
import { KiwoomDailyPriceRow } from '../src/kiwoom';

/** Time only moves when someone sleeps or the test advances it. */
export class FakeClock implements Clock {
  public sleeps: number[] = [];
  private current: number;

  constructor(start: number = Date.UTC(2024, 0, 15, 0, 0, 0)) {
    this.current = start;
  }

  now(): number {
    return this.current;
  }

  async sleep(ms: number): Promise<void> {
    this.sleeps.push(ms);
    this.current += ms;
  }

  advance(ms: number): void {
    this.current += ms;
  }
}

export interface RecordedRequest {
  url: string;
  body: unknown;
  headers: Record<string, string>;
}

export interface FakeReply {
  status?: number;
  data?: unknown;
  headers?: Record<string, string>;
}

export type Responder = (request: RecordedRequest, index: number) => FakeReply;

function plainHeaders(config: InternalAxiosRequestConfig): Record<string, string> {
  const headers: Record<string, string> = {};
  for (const [name, value] of Object.entries(config.headers.toJSON())) {
    if (value !== null && value !== undefined) {
      headers[name.toLowerCase()] = String(value);
    }
  }
  return headers;
}

/**
 * An axios instance whose adapter answers in process. The responder may
 * throw (see {@link networkFailure}) to simulate a request that never got
 * a response.
 */
export function fakeHttp(responder: Responder): { http: AxiosInstance; requests: RecordedRequest[] } {
  const requests: RecordedRequest[] = [];

  const adapter: AxiosAdapter = async (config) => {
    const body: unknown = typeof config.data === 'string' ? JSON.parse(config.data) : config.data;
    const request: RecordedRequest = { url: config.url ?? '', body, headers: plainHeaders(config) };
    requests.push(request);

    const reply = responder(request, requests.length - 1);
    return {
      data: reply.data ?? {},
      status: reply.status ?? 200,
      statusText: 'OK',
      headers: new AxiosHeaders(reply.headers ?? {}),
      config,
    };
  };

  return { http: axios.create({ adapter }), requests };
}

export function networkFailure(code: string, message: string = `simulated ${code}`): AxiosError {
  return new AxiosError(message, code);
}

export function testToken(overrides: Partial<SessionToken> = {}): SessionToken {
  return {
    value: 'test-token',
    tokenType: 'bearer',
    issuedAt: 0,
    expiresAt: Number.MAX_SAFE_INTEGER,
    ...overrides,
  };
}

/** A provider row as the daily price endpoint returns it. */
export function priceRow(date: string, close: number, overrides: Record<string, string> = {}): KiwoomDailyPriceRow {
  return {
    date,
    open_pric: `+${close - 100}`,
    high_pric: `+${close + 200}`,
    low_pric: `-${close - 300}`,
    close_pric: `+${close}`,
    pred_rt: '+100',
    flu_rt: '+0.28',
    trde_qty: '1,234,567',
    amt_mn: '45,678',
    crd_rt: '0.12',
    for_rt: '-0.05',
    for_poss: '+1,000',
    for_wght: '55.31',
    ...overrides,
  };
}

/** `count` consecutive calendar days ending at `endCompact`, newest first. */
export function priceRows(endCompact: string, count: number, close: number = 70000): KiwoomDailyPriceRow[] {
  const year = Number(endCompact.slice(0, 4));
  const month = Number(endCompact.slice(4, 6));
  const day = Number(endCompact.slice(6, 8));
  const rows: KiwoomDailyPriceRow[] = [];
  for (let i = 0; i < count; i++) {
    const date = new Date(Date.UTC(year, month - 1, day - i));
    const compact =
      `${date.getUTCFullYear()}` +
      `${String(date.getUTCMonth() + 1).padStart(2, '0')}` +
      `${String(date.getUTCDate()).padStart(2, '0')}`;
    rows.push(priceRow(compact, close + i * 10));
  }
  return rows;
}
