export { KiwoomSession, parseKstTimestamp, maskKey, TOKEN_SAFETY_MARGIN_MS, DEFAULT_TOKEN_LIFETIME_MS } from './session';
export type { SessionProvider, KiwoomSessionOptions } from './session';
export { KiwoomRestClient } from './rest-client';
export type { KiwoomRestClientOptions, DailyPriceSource } from './rest-client';
export * from './types';
