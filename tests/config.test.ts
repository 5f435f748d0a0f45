import { describe, it, expect } from 'vitest';
import { loadConfig } from '../src/config';
import { ConfigurationError } from '../src/utils/errors';

const REQUIRED = {
  KIWOOM_APP_KEY: 'test-app-key',
  KIWOOM_SECRET_KEY: 'test-secret',
};

describe('loadConfig', () => {
  it('should apply defaults', () => {
    const config = loadConfig({ ...REQUIRED });

    expect(config).toEqual({
      kiwoom: {
        appKey: 'test-app-key',
        secretKey: 'test-secret',
        useTestServer: true,
        baseUrl: 'https://mockapi.kiwoom.com',
        rateLimitDelayMs: 1000,
        maxRetries: 3,
        retryBackoffBaseMs: 5000,
        requestTimeoutMs: 30000,
        maxPages: 20,
      },
      database: { url: null },
      output: { dir: 'data/raw/korean_stocks/kiwoom' },
    });
  });

  it('should switch to the production server', () => {
    const config = loadConfig({ ...REQUIRED, KIWOOM_USE_TEST_SERVER: 'false' });

    expect(config.kiwoom.useTestServer).toBe(false);
    expect(config.kiwoom.baseUrl).toBe('https://api.kiwoom.com');
  });

  it('should convert second-based delays to milliseconds', () => {
    const config = loadConfig({ ...REQUIRED, KIWOOM_RATE_LIMIT_DELAY: '0.5', KIWOOM_RETRY_DELAY: '2' });

    expect(config.kiwoom.rateLimitDelayMs).toBe(500);
    expect(config.kiwoom.retryBackoffBaseMs).toBe(2000);
  });

  it('should read the database url and output dir', () => {
    const config = loadConfig({
      ...REQUIRED,
      DATABASE_URL: 'postgres://localhost/test',
      OUTPUT_DIR: '/tmp/bars',
    });

    expect(config.database.url).toBe('postgres://localhost/test');
    expect(config.output.dir).toBe('/tmp/bars');
  });

  it('should treat empty values as unset', () => {
    const config = loadConfig({ ...REQUIRED, KIWOOM_MAX_RETRIES: '', DATABASE_URL: '  ' });

    expect(config.kiwoom.maxRetries).toBe(3);
    expect(config.database.url).toBeNull();
  });

  it('should require the app key', () => {
    expect(() => loadConfig({ KIWOOM_SECRET_KEY: 'test-secret' })).toThrow(
      'Invalid configuration: KIWOOM_APP_KEY is required'
    );
  });

  it('should name the offending field', () => {
    const error = (() => {
      try {
        loadConfig({ ...REQUIRED, KIWOOM_MAX_RETRIES: '-1' });
        return null;
      } catch (e) {
        return e;
      }
    })();

    expect(error).toBeInstanceOf(ConfigurationError);
    if (error instanceof ConfigurationError) {
      expect(error.field).toBe('KIWOOM_MAX_RETRIES');
    }
  });

  it('should reject an unreadable flag', () => {
    expect(() => loadConfig({ ...REQUIRED, KIWOOM_USE_TEST_SERVER: 'maybe' })).toThrow(
      'Invalid configuration: KIWOOM_USE_TEST_SERVER must be true or false'
    );
  });
});
