import { z } from 'zod';

export const MOCK_API_URL = 'https://mockapi.kiwoom.com';
export const PRODUCTION_API_URL = 'https://api.kiwoom.com';

export interface KiwoomEndpoint {
  path: string;
  apiId: string;
}

// 주식일별주가요청: daily OHLCV plus credit/foreign ownership per stock
export const DAILY_PRICE_ENDPOINT: KiwoomEndpoint = {
  path: '/api/dostk/mrkcond',
  apiId: 'ka10086',
};

export const TOKEN_PATH = '/oauth2/token';

// Every response carries return_code (0 = success) and return_msg.
const envelope = {
  return_code: z.coerce.number().optional(),
  return_msg: z.string().optional(),
};

export const tokenResponseSchema = z
  .object({
    ...envelope,
    token: z.string().min(1).optional(),
    token_type: z.string().optional(),
    expires_dt: z.string().optional(),
  })
  .passthrough();

export type KiwoomTokenResponse = z.infer<typeof tokenResponseSchema>;

/**
 * Rows stay unchecked at the response level: a row that is not an object is
 * dropped by the normalizer, while a response without a row list is rejected.
 */
export const dailyPriceRowSchema = z.record(z.string(), z.unknown());

export const dailyPriceResponseSchema = z
  .object({
    ...envelope,
    daly_stkpc: z.array(z.unknown()),
  })
  .passthrough();

export type KiwoomDailyPriceRow = z.infer<typeof dailyPriceRowSchema>;
export type KiwoomDailyPriceResponse = z.infer<typeof dailyPriceResponseSchema>;

export const envelopeSchema = z.object(envelope).passthrough();

/** Pagination state carried in the `cont-yn` / `next-key` headers. */
export interface Continuation {
  hasMore: boolean;
  nextKey: string;
}

export interface RawResponse {
  status: number;
  body: unknown;
  continuation: Continuation;
  latencyMs: number;
}

/** Reads one row as a field map, or null when it is not an object. */
export function asDailyPriceRow(value: unknown): KiwoomDailyPriceRow | null {
  const parsed = dailyPriceRowSchema.safeParse(value);
  return parsed.success ? parsed.data : null;
}

export interface DailyPricePage {
  rows: unknown[];
  continuation: Continuation;
}
