import request from 'supertest';
import { describe, expect, it } from 'vitest';
import type { ExportStore } from '../../../shared/exportStore';
import { buildConfig } from '../../config/config';
import type { FetchedPage, Fetcher } from '../../fetch/httpFetcher';
import { createSilentLogger } from '../../obs/logger';
import { ScraperBuilder } from '../../scraper/builder';
import { createApp } from '../app';

const PAGE = '<html><head><title>Shop</title></head><body><main><p>Garden rakes on sale today.</p></main></body></html>';

const page = (url: string): FetchedPage => ({ url, finalUrl: url, status: 200, contentType: 'text/html', body: PAGE });

const memoryStore: ExportStore = {
  write: async (kind, filename, extension) => `/exports/${kind}/${filename}.${extension}`,
};

const makeApp = (options: { fetch?: Fetcher['fetch']; store?: ExportStore } = {}) => {
  let builder = ScraperBuilder.create()
    .withFetcher({ fetch: options.fetch ?? (async (url) => page(url)) })
    .withSleep(async () => undefined);
  if (options.store) {
    builder = builder.withExportStore(options.store);
  }
  return createApp({ config: buildConfig({}), orchestrator: builder.build(), logger: createSilentLogger() });
};

const deferred = () => {
  let resolve: () => void = () => undefined;
  const promise = new Promise<void>((done) => {
    resolve = done;
  });
  return { promise, resolve };
};

const parseSse = (text: string) =>
  text
    .split('\n\n')
    .filter((frame) => frame.startsWith('event: '))
    .map((frame) => {
      const [eventLine, dataLine] = frame.split('\n');
      return { event: eventLine.slice('event: '.length), data: JSON.parse(dataLine.slice('data: '.length)) };
    });

describe('http app', () => {
  it('answers health and public config', async () => {
    const app = makeApp();

    const health = await request(app).get('/api/healthz');
    const config = await request(app).get('/api/config');

    expect(health.status).toBe(200);
    expect(health.body.ok).toBe(true);
    expect(config.body.llm).toEqual({ enabled: false, model: 'gemini-2.5-flash', enhance: false });
  });

  it('validates URLs and rejects malformed bodies', async () => {
    const app = makeApp();

    const blocked = await request(app).post('/api/validate').send({ url: 'https://www.facebook.com/x' });
    const malformed = await request(app).post('/api/validate').send({});

    expect(blocked.body).toEqual({ isValid: false, reason: 'Domain www.facebook.com is blocked for scraping' });
    expect(malformed.status).toBe(400);
    expect(malformed.body).toEqual({ error: 'Invalid request body', issues: ['url: Required'] });
  });

  it('categorizes with the rule set', async () => {
    const response = await request(makeApp()).post('/api/categorize').send({ url: 'https://example.com/blog/x' });

    expect(response.body).toEqual({ category: 'news', label: 'news', confidence: 1, source: 'rules' });
  });

  it('streams a scrape batch and keeps the records for statistics', async () => {
    const app = makeApp();

    const response = await request(app).post('/api/scrape-stream').send({ urls: ['https://example.com/shop/a'] });
    const frames = parseSse(response.text);

    expect(response.headers['content-type']).toContain('text/event-stream');
    expect(frames.map((frame) => frame.event)).toEqual(['stage-event', 'stage-event', 'stage-event', 'scrape-result']);
    expect(frames[3].data.records[0].category).toBe('ecommerce');

    const stats = await request(app).get('/api/statistics');
    expect(stats.body.statistics.totalScraped).toBe(1);
    expect(stats.body.statistics.categories).toEqual({ ecommerce: 1 });
    expect(stats.body.analysis.totalAnalyzed).toBe(0);
  });

  it('refuses an empty batch', async () => {
    const response = await request(makeApp()).post('/api/scrape-stream').send({ urls: [] });

    expect(response.status).toBe(400);
  });

  it('refuses a second batch while one is running', async () => {
    const started = deferred();
    const gate = deferred();
    const app = makeApp({
      fetch: async (url) => {
        started.resolve();
        await gate.promise;
        return page(url);
      },
    });

    const first = request(app).post('/api/scrape-stream').send({ urls: ['https://example.com/a'] }).then((res) => res);
    await started.promise;

    const second = await request(app).post('/api/scrape-stream').send({ urls: ['https://example.com/b'] });
    gate.resolve();
    const firstResponse = await first;

    expect(second.status).toBe(409);
    expect(second.body).toEqual({ error: 'A scrape batch is already running' });
    expect(parseSse(firstResponse.text).at(-1)?.event).toBe('scrape-result');
  });

  it('exports through the store', async () => {
    const response = await request(makeApp({ store: memoryStore })).post('/api/export').send({
      format: 'CSV',
      filename: 'batch',
    });

    expect(response.body).toEqual({ path: '/exports/csv/batch.csv' });
  });

  it('returns a null insights path when nothing was analysed', async () => {
    const response = await request(makeApp({ store: memoryStore })).post('/api/export').send({ format: 'insights' });

    expect(response.body).toEqual({ path: null });
  });

  it('rejects unknown formats and reports store problems', async () => {
    const unknown = await request(makeApp({ store: memoryStore })).post('/api/export').send({ format: 'yaml' });
    const noStore = await request(makeApp()).post('/api/export').send({ format: 'json' });

    expect(unknown.status).toBe(400);
    expect(unknown.body).toEqual({
      error: "Unsupported format 'yaml'. Supported formats: json, csv, xml, report, insights, all",
    });
    expect(noStore.status).toBe(500);
    expect(noStore.body).toEqual({ error: 'Export failed: No export store configured' });
  });
});
