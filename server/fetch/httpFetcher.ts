import type { ScrapingConfig } from '../../shared/config';
import type { Logger } from '../obs/logger';
import { createSilentLogger } from '../obs/logger';
import { sleep as defaultSleep, type SleepFn } from '../utils/async';

export interface FetchedPage {
  url: string;
  /** URL after redirects. */
  finalUrl: string;
  status: number;
  contentType: string | null;
  body: string;
}

export interface Fetcher {
  /** Resolves to null once every attempt has failed; rejects only when the caller aborts. */
  fetch: (url: string, signal?: AbortSignal) => Promise<FetchedPage | null>;
}

export type FetcherConfig = Pick<ScrapingConfig, 'timeoutMs' | 'maxRetries' | 'userAgent' | 'delayMinMs'>;

export interface HttpFetcherOptions {
  config: FetcherConfig;
  logger?: Logger;
  sleep?: SleepFn;
}

type Attempt = { kind: 'page'; page: FetchedPage } | { kind: 'status'; status: number };

export class HttpFetcher implements Fetcher {
  private readonly config: FetcherConfig;
  private readonly logger: Logger;
  private readonly sleep: SleepFn;

  constructor(options: HttpFetcherOptions) {
    this.config = options.config;
    this.logger = options.logger ?? createSilentLogger();
    this.sleep = options.sleep ?? defaultSleep;
  }

  async fetch(url: string, signal?: AbortSignal): Promise<FetchedPage | null> {
    const { maxRetries, delayMinMs } = this.config;

    for (let attempt = 0; attempt < maxRetries; attempt += 1) {
      const isLast = attempt === maxRetries - 1;
      try {
        const outcome = await this.attempt(url, signal);
        if (outcome.kind === 'page') {
          return outcome.page;
        }
        if (outcome.status === 429) {
          const waitMs = delayMinMs * 2 ** attempt;
          this.logger.warn('Rate limited, backing off', { url, attempt, waitMs });
          await this.sleep(waitMs, signal);
          continue;
        }
        this.logger.warn('Unexpected HTTP status', { url, attempt, status: outcome.status });
      } catch (error) {
        if (signal?.aborted) {
          throw error;
        }
        this.logger.warn('Request failed', {
          url,
          attempt,
          error: error instanceof Error ? error.message : String(error),
        });
      }
      if (isLast) {
        return null;
      }
      await this.sleep(delayMinMs, signal);
    }

    return null;
  }

  private async attempt(url: string, signal?: AbortSignal): Promise<Attempt> {
    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), this.config.timeoutMs);
    let abortListener: (() => void) | null = null;

    if (signal) {
      if (signal.aborted) {
        clearTimeout(timer);
        throw new Error('Aborted');
      }
      abortListener = () => controller.abort();
      signal.addEventListener('abort', abortListener, { once: true });
    }

    try {
      const response = await fetch(url, {
        method: 'GET',
        headers: {
          'User-Agent': this.config.userAgent,
          Accept: 'text/html,application/xhtml+xml',
          'Accept-Language': 'en-US,en;q=0.9',
        },
        redirect: 'follow',
        signal: controller.signal,
      });
      if (response.status !== 200) {
        await response.body?.cancel();
        return { kind: 'status', status: response.status };
      }
      return {
        kind: 'page',
        page: {
          url,
          finalUrl: response.url || url,
          status: response.status,
          contentType: response.headers.get('content-type'),
          body: await response.text(),
        },
      };
    } finally {
      clearTimeout(timer);
      if (abortListener && signal) {
        signal.removeEventListener('abort', abortListener);
      }
    }
  }
}
