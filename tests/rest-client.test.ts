import { describe, it, expect } from 'vitest';
import { KiwoomRestClient } from '../src/kiwoom/rest-client';
import {
  AuthenticationError,
  DataError,
  ErrorCode,
  TransientNetworkError,
} from '../src/utils/errors';
import { FakeClock, Responder, fakeHttp, networkFailure, priceRows, testToken } from './helpers';

const BASE_URL = 'https://mock.test';

function createClient(responder: Responder) {
  const clock = new FakeClock();
  const { http, requests } = fakeHttp(responder);
  const client = new KiwoomRestClient({
    baseUrl: BASE_URL,
    minDelayMs: 1000,
    maxRetries: 3,
    retryBackoffBaseMs: 5000,
    clock,
    http,
  });
  return { client, requests, clock };
}

const okPage = (rows: unknown[] = priceRows('20240131', 3)) => ({ data: { return_code: 0, return_msg: 'ok', daly_stkpc: rows } });

describe('KiwoomRestClient', () => {
  describe('fetchDailyPrices', () => {
    it('should send the daily price request', async () => {
      const { client, requests } = createClient(() => okPage());

      const page = await client.fetchDailyPrices('005930', '2024-01-31', testToken());

      expect(page.rows).toHaveLength(3);
      expect(page.continuation).toEqual({ hasMore: false, nextKey: '' });
      expect(requests).toHaveLength(1);
      expect(requests[0].url).toBe(`${BASE_URL}/api/dostk/mrkcond`);
      expect(requests[0].body).toEqual({ stk_cd: '005930', qry_dt: '20240131', indc_tp: '0' });
      expect(requests[0].headers['authorization']).toBe('Bearer test-token');
      expect(requests[0].headers['api-id']).toBe('ka10086');
      expect(requests[0].headers['cont-yn']).toBe('N');
    });

    it('should read and forward continuation headers', async () => {
      const { client, requests } = createClient((_request, index) =>
        index === 0 ? { ...okPage(), headers: { 'cont-yn': 'Y', 'next-key': 'key-2' } } : okPage()
      );

      const first = await client.fetchDailyPrices('005930', '2024-01-31', testToken());
      expect(first.continuation).toEqual({ hasMore: true, nextKey: 'key-2' });

      const second = await client.fetchDailyPrices('005930', '2024-01-31', testToken(), first.continuation);
      expect(second.continuation.hasMore).toBe(false);
      expect(requests[1].headers['cont-yn']).toBe('Y');
      expect(requests[1].headers['next-key']).toBe('key-2');
    });

    it('should reject a response without the price array', async () => {
      const { client, requests } = createClient(() => ({ data: { return_code: 0, return_msg: 'ok' } }));

      const error = await client.fetchDailyPrices('000660', '2024-01-31', testToken()).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(DataError);
      if (error instanceof DataError) {
        expect(error.message).toBe('Malformed daily price response for 000660');
      }
      expect(requests).toHaveLength(1);
    });

    it('should pass unreadable rows through for the normalizer to drop', async () => {
      const { client } = createClient(() => okPage([...priceRows('20240131', 2), null]));

      const page = await client.fetchDailyPrices('005930', '2024-01-31', testToken());

      expect(page.rows).toHaveLength(3);
      expect(page.rows[2]).toBeNull();
    });
  });

  describe('error classification', () => {
    it('should retry server errors up to the bound and then give up', async () => {
      const { client, requests, clock } = createClient(() => ({ status: 503, data: {} }));

      const error = await client.fetchDailyPrices('005930', '2024-01-31', testToken()).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(TransientNetworkError);
      if (error instanceof TransientNetworkError) {
        expect(error.code).toBe(ErrorCode.SERVER_ERROR);
      }
      expect(requests).toHaveLength(4);
      expect(clock.sleeps).toEqual([5000, 10000, 20000]);
    });

    it('should recover when a retry succeeds', async () => {
      const { client, requests } = createClient((_request, index) =>
        index === 0 ? { status: 502, data: {} } : okPage()
      );

      const page = await client.fetchDailyPrices('005930', '2024-01-31', testToken());

      expect(page.rows).toHaveLength(3);
      expect(requests).toHaveLength(2);
    });

    it('should retry timeouts as transient failures', async () => {
      const { client, requests } = createClient(() => {
        throw networkFailure('ECONNABORTED', 'timeout of 30000ms exceeded');
      });

      const error = await client.fetchDailyPrices('005930', '2024-01-31', testToken()).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(TransientNetworkError);
      if (error instanceof TransientNetworkError) {
        expect(error.code).toBe(ErrorCode.API_TIMEOUT);
      }
      expect(requests).toHaveLength(4);
    });

    it('should surface 401 immediately as an authentication failure', async () => {
      const { client, requests } = createClient(() => ({ status: 401, data: {} }));

      const error = await client.fetchDailyPrices('005930', '2024-01-31', testToken()).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(AuthenticationError);
      if (error instanceof AuthenticationError) {
        expect(error.status).toBe(401);
        expect(error.code).toBe(ErrorCode.TOKEN_REJECTED);
      }
      expect(requests).toHaveLength(1);
    });

    it('should treat an expired-token return code as an authentication failure', async () => {
      const { client, requests } = createClient(() => ({ data: { return_code: 8005, return_msg: 'token expired' } }));

      const error = await client.fetchDailyPrices('005930', '2024-01-31', testToken()).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(AuthenticationError);
      if (error instanceof AuthenticationError) {
        expect(error.providerMessage).toBe('token expired');
      }
      expect(requests).toHaveLength(1);
    });

    it('should wait out a 429 and retry', async () => {
      const { client, requests, clock } = createClient((_request, index) =>
        index === 0 ? { status: 429, data: {}, headers: { 'retry-after': '2' } } : okPage()
      );

      await client.fetchDailyPrices('005930', '2024-01-31', testToken());

      expect(requests).toHaveLength(2);
      expect(clock.sleeps).toEqual([2000]);
    });

    it('should not retry other provider errors', async () => {
      const { client, requests } = createClient(() => ({ data: { return_code: 1, return_msg: 'invalid stk_cd' } }));

      const error = await client.fetchDailyPrices('999999', '2024-01-31', testToken()).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(DataError);
      if (error instanceof DataError) {
        expect(error.code).toBe(ErrorCode.PROVIDER_ERROR);
        expect(error.message).toBe('Provider error from ka10086 (return_code 1): invalid stk_cd');
      }
      expect(requests).toHaveLength(1);
    });

    it('should not retry unexpected client errors', async () => {
      const { client, requests } = createClient(() => ({ status: 400, data: {} }));

      await expect(client.fetchDailyPrices('005930', '2024-01-31', testToken())).rejects.toBeInstanceOf(DataError);
      expect(requests).toHaveLength(1);
    });
  });

  describe('rate limiting', () => {
    it('should space consecutive requests', async () => {
      const { client, clock } = createClient(() => okPage());

      await client.fetchDailyPrices('005930', '2024-01-31', testToken());
      await client.fetchDailyPrices('000660', '2024-01-31', testToken());
      await client.fetchDailyPrices('035720', '2024-01-31', testToken());

      expect(clock.sleeps).toEqual([1000, 1000]);
      expect(client.getRateLimiter().getStats().completed).toBe(3);
    });
  });
});
