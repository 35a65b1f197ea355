import { describe, expect, it } from 'vitest';
import { DEFAULT_SCRAPING_CONFIG, ScrapingConfigSchema } from '../config';

describe('ScrapingConfigSchema', () => {
  it('accepts the defaults', () => {
    expect(ScrapingConfigSchema.parse(DEFAULT_SCRAPING_CONFIG)).toEqual(DEFAULT_SCRAPING_CONFIG);
  });

  it('accepts an equal delay range', () => {
    expect(ScrapingConfigSchema.safeParse({ ...DEFAULT_SCRAPING_CONFIG, delayMinMs: 0, delayMaxMs: 0 }).success).toBe(true);
  });

  it('rejects non-positive timeouts and unknown label styles', () => {
    expect(ScrapingConfigSchema.safeParse({ ...DEFAULT_SCRAPING_CONFIG, timeoutMs: 0 }).success).toBe(false);
    expect(ScrapingConfigSchema.safeParse({ ...DEFAULT_SCRAPING_CONFIG, labelStyle: 'short' }).success).toBe(false);
  });
});
