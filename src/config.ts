import { z } from 'zod';
import { MOCK_API_URL, PRODUCTION_API_URL } from './kiwoom/types';
import { ConfigurationError } from './utils';

export interface Config {
  kiwoom: {
    appKey: string;
    secretKey: string;
    useTestServer: boolean;
    baseUrl: string;
    rateLimitDelayMs: number;
    maxRetries: number;
    retryBackoffBaseMs: number;
    requestTimeoutMs: number;
    maxPages: number;
  };
  database: {
    url: string | null;
  };
  output: {
    dir: string;
  };
}

const booleanFlag = z
  .string()
  .trim()
  .toLowerCase()
  .refine((value) => ['true', 'false', '1', '0', 'yes', 'no'].includes(value), 'must be true or false')
  .transform((value) => value === 'true' || value === '1' || value === 'yes');

const envSchema = z.object({
  KIWOOM_APP_KEY: z.string({ required_error: 'is required' }).trim().min(1, 'is required'),
  KIWOOM_SECRET_KEY: z.string({ required_error: 'is required' }).trim().min(1, 'is required'),
  KIWOOM_USE_TEST_SERVER: booleanFlag.default('true'),
  KIWOOM_MOCK_API_URL: z.string().url().default(MOCK_API_URL),
  KIWOOM_PRODUCTION_API_URL: z.string().url().default(PRODUCTION_API_URL),
  KIWOOM_RATE_LIMIT_DELAY: z.coerce.number().min(0).max(60).default(1.0),
  KIWOOM_MAX_RETRIES: z.coerce.number().int().min(0).max(10).default(3),
  KIWOOM_RETRY_DELAY: z.coerce.number().min(0).max(300).default(5.0),
  KIWOOM_REQUEST_TIMEOUT_MS: z.coerce.number().int().min(1000).max(120000).default(30000),
  KIWOOM_MAX_PAGES: z.coerce.number().int().min(1).max(500).default(20),
  DATABASE_URL: z.string().trim().min(1).optional(),
  OUTPUT_DIR: z.string().trim().min(1).default('data/raw/korean_stocks/kiwoom'),
});

/** Treats empty variables as unset so defaults apply. */
function withoutEmpty(env: NodeJS.ProcessEnv): Record<string, string> {
  const cleaned: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && value.trim() !== '') {
      cleaned[key] = value;
    }
  }
  return cleaned;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const parsed = envSchema.safeParse(withoutEmpty(env));

  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const field = issue.path.join('.');
    throw new ConfigurationError(`Invalid configuration: ${field} ${issue.message}`, field, {
      issues: parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`),
    });
  }

  const vars = parsed.data;
  return {
    kiwoom: {
      appKey: vars.KIWOOM_APP_KEY,
      secretKey: vars.KIWOOM_SECRET_KEY,
      useTestServer: vars.KIWOOM_USE_TEST_SERVER,
      baseUrl: vars.KIWOOM_USE_TEST_SERVER ? vars.KIWOOM_MOCK_API_URL : vars.KIWOOM_PRODUCTION_API_URL,
      rateLimitDelayMs: Math.round(vars.KIWOOM_RATE_LIMIT_DELAY * 1000),
      maxRetries: vars.KIWOOM_MAX_RETRIES,
      retryBackoffBaseMs: Math.round(vars.KIWOOM_RETRY_DELAY * 1000),
      requestTimeoutMs: vars.KIWOOM_REQUEST_TIMEOUT_MS,
      maxPages: vars.KIWOOM_MAX_PAGES,
    },
    database: {
      url: vars.DATABASE_URL ?? null,
    },
    output: {
      dir: vars.OUTPUT_DIR,
    },
  };
}
