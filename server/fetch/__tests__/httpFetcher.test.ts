import { afterEach, describe, expect, it, vi } from 'vitest';
import { HttpFetcher, type FetcherConfig } from '../httpFetcher';

const config: FetcherConfig = {
  timeoutMs: 5_000,
  maxRetries: 3,
  userAgent: 'test-agent',
  delayMinMs: 100,
};

const html = (body: string, status = 200) =>
  new Response(body, { status, headers: { 'content-type': 'text/html; charset=utf-8' } });

describe('HttpFetcher', () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it('returns the page on a 200 and sends the configured user agent', async () => {
    const fetchMock = vi.fn(async (_url: string | URL | Request, _init?: RequestInit) => html('<p>hi</p>'));
    vi.stubGlobal('fetch', fetchMock);
    const sleep = vi.fn(async () => {});

    const page = await new HttpFetcher({ config, sleep }).fetch('https://example.com/a');

    expect(page).toEqual({
      url: 'https://example.com/a',
      finalUrl: 'https://example.com/a',
      status: 200,
      contentType: 'text/html; charset=utf-8',
      body: '<p>hi</p>',
    });
    expect(fetchMock).toHaveBeenCalledTimes(1);
    const headers = new Headers(fetchMock.mock.calls[0][1]?.headers);
    expect(headers.get('user-agent')).toBe('test-agent');
    expect(sleep).not.toHaveBeenCalled();
  });

  it('backs off exponentially on 429 and then succeeds', async () => {
    const fetchMock = vi
      .fn()
      .mockResolvedValueOnce(html('', 429))
      .mockResolvedValueOnce(html('', 429))
      .mockResolvedValueOnce(html('<p>ok</p>'));
    vi.stubGlobal('fetch', fetchMock);
    const sleep = vi.fn(async (_ms: number) => {});

    const page = await new HttpFetcher({ config, sleep }).fetch('https://example.com/a');

    expect(page?.body).toBe('<p>ok</p>');
    expect(sleep.mock.calls.map(([ms]) => ms)).toEqual([100, 200]);
  });

  it('retries other statuses with the base delay and gives up with null', async () => {
    const fetchMock = vi.fn(async () => html('', 500));
    vi.stubGlobal('fetch', fetchMock);
    const sleep = vi.fn(async (_ms: number) => {});

    const page = await new HttpFetcher({ config, sleep }).fetch('https://example.com/a');

    expect(page).toBeNull();
    expect(fetchMock).toHaveBeenCalledTimes(3);
    expect(sleep.mock.calls.map(([ms]) => ms)).toEqual([100, 100]);
  });

  it('treats network errors like failed attempts', async () => {
    const fetchMock = vi
      .fn()
      .mockRejectedValueOnce(new TypeError('fetch failed'))
      .mockResolvedValueOnce(html('<p>second</p>'));
    vi.stubGlobal('fetch', fetchMock);

    const page = await new HttpFetcher({ config, sleep: async () => {} }).fetch('https://example.com/a');

    expect(page?.body).toBe('<p>second</p>');
    expect(fetchMock).toHaveBeenCalledTimes(2);
  });

  it('rejects when the caller has already aborted', async () => {
    const fetchMock = vi.fn(async () => html('<p>never</p>'));
    vi.stubGlobal('fetch', fetchMock);
    const controller = new AbortController();
    controller.abort();

    await expect(
      new HttpFetcher({ config, sleep: async () => {} }).fetch('https://example.com/a', controller.signal),
    ).rejects.toThrow('Aborted');
    expect(fetchMock).not.toHaveBeenCalled();
  });
});
