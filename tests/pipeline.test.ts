import { describe, it, expect } from 'vitest';
import { loadConfig } from '../src/config';
import { createPipeline } from '../src/pipeline';
import { CollectionOrchestrator, OutputAggregator } from '../src/data';
import { KiwoomRestClient, KiwoomSession } from '../src/kiwoom';

describe('createPipeline', () => {
  it('should wire the components from config', () => {
    const config = loadConfig({
      KIWOOM_APP_KEY: 'test-app-key',
      KIWOOM_SECRET_KEY: 'test-secret',
      KIWOOM_RATE_LIMIT_DELAY: '0.25',
    });

    const pipeline = createPipeline(config);

    expect(pipeline.session).toBeInstanceOf(KiwoomSession);
    expect(pipeline.client).toBeInstanceOf(KiwoomRestClient);
    expect(pipeline.orchestrator).toBeInstanceOf(CollectionOrchestrator);
    expect(pipeline.aggregator).toBeInstanceOf(OutputAggregator);
    expect(pipeline.client.getRateLimiter().getStats().minDelayMs).toBe(250);
  });

  it('should give the session and the client one limiter', () => {
    const config = loadConfig({ KIWOOM_APP_KEY: 'test-app-key', KIWOOM_SECRET_KEY: 'test-secret' });

    const pipeline = createPipeline(config);

    expect(pipeline.session.getRateLimiter()).toBe(pipeline.client.getRateLimiter());
  });
});
