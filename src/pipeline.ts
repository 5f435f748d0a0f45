import { Config } from './config';
import { BarSink } from './types';
import { KiwoomRestClient, KiwoomSession } from './kiwoom';
import { CollectionOrchestrator, OutputAggregator } from './data';
import { Clock, RateLimiter, systemClock, logger } from './utils';

export interface Pipeline {
  session: KiwoomSession;
  client: KiwoomRestClient;
  orchestrator: CollectionOrchestrator;
  aggregator: OutputAggregator;
}

export interface PipelineOverrides {
  sink?: BarSink;
  clock?: Clock;
}

/** Wires the collection components from a loaded {@link Config}. */
export function createPipeline(config: Config, overrides: PipelineOverrides = {}): Pipeline {
  const clock = overrides.clock ?? systemClock;
  const { kiwoom } = config;

  logger.info('Pipeline', `Using Kiwoom ${kiwoom.useTestServer ? 'MOCK' : 'PRODUCTION'} server`, {
    baseUrl: kiwoom.baseUrl,
  });

  // Token and data requests share one provider cadence
  const rateLimiter = new RateLimiter({ minDelayMs: kiwoom.rateLimitDelayMs }, clock);

  const session = new KiwoomSession({
    appKey: kiwoom.appKey,
    secretKey: kiwoom.secretKey,
    baseUrl: kiwoom.baseUrl,
    timeoutMs: kiwoom.requestTimeoutMs,
    clock,
    rateLimiter,
  });

  const client = new KiwoomRestClient({
    baseUrl: kiwoom.baseUrl,
    timeoutMs: kiwoom.requestTimeoutMs,
    rateLimiter,
    maxRetries: kiwoom.maxRetries,
    retryBackoffBaseMs: kiwoom.retryBackoffBaseMs,
    clock,
  });

  const orchestrator = new CollectionOrchestrator(client, session, {
    maxPages: kiwoom.maxPages,
    sink: overrides.sink,
    clock,
  });

  return {
    session,
    client,
    orchestrator,
    aggregator: new OutputAggregator(config.output.dir),
  };
}
