import { describe, expect, it, vi } from 'vitest';
import { DEFAULT_USER_AGENT } from '../../../shared/config';
import type { Fetcher } from '../../fetch/httpFetcher';
import { ScraperBuilder } from '../builder';

describe('ScraperBuilder', () => {
  it('returns a new builder from every with* call', () => {
    const base = ScraperBuilder.create();
    const custom = base.withUserAgent('test-agent').withTimeout(5_000);

    expect(base.config.userAgent).toBe(DEFAULT_USER_AGENT);
    expect(custom.config.userAgent).toBe('test-agent');
    expect(custom.config.timeoutMs).toBe(5_000);
  });

  it('validates the configuration on build', () => {
    expect(() => ScraperBuilder.create().withDelayRange(5_000, 1_000).build()).toThrow(
      'delayMinMs must not exceed delayMaxMs',
    );
    expect(() => ScraperBuilder.create().withMaxRetries(0).build()).toThrow();
  });

  it('wires supplied stages into the orchestrator', async () => {
    const fetch = vi.fn<Fetcher['fetch']>(async (url) => ({
      url,
      finalUrl: url,
      status: 200,
      contentType: 'text/html',
      body: '<html><head><title>Blog</title></head><body><p>Latest article about gardening</p></body></html>',
    }));
    const orchestrator = ScraperBuilder.create().withFetcher({ fetch }).build();

    const outcome = await orchestrator.scrapeUrl('https://example.com/blog/post');

    expect(fetch).toHaveBeenCalledWith('https://example.com/blog/post', undefined);
    expect(outcome.ok && outcome.record.category).toBe('news');
  });
});
