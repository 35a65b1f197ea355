import { randomId } from '../../shared/crypto';
import type { SseStream } from '../../shared/sse';
import type { ScrapeFailure, ScrapeStatistics } from '../../shared/types';
import { toJsonItem, type JsonExportItem } from '../export';
import type { Logger } from '../obs/logger';
import type { ScrapeOrchestrator, ScrapeProgress } from '../scraper/orchestrator';
import { computeStatistics } from '../scraper/statistics';
import { makeStageEmitter } from './stageEmitter';

export interface ScrapeStreamArgs {
  urls: readonly string[];
  orchestrator: ScrapeOrchestrator;
  stream: SseStream;
  logger: Logger;
  signal?: AbortSignal;
  runId?: string;
}

export interface ScrapeProgressData {
  index: number;
  total: number;
  url: string;
  ok: boolean;
  category?: string;
  error?: string;
  succeeded: number;
  failed: number;
}

export interface ScrapeResultPayload {
  runId: string;
  total: number;
  succeeded: number;
  failed: number;
  records: JsonExportItem[];
  failures: ScrapeFailure[];
  /** Statistics over this batch only. */
  statistics: ScrapeStatistics;
}

const toProgressData = ({ index, total, url, outcome, succeeded, failed }: ScrapeProgress): ScrapeProgressData => ({
  index,
  total,
  url,
  ok: outcome.ok,
  category: outcome.ok ? outcome.record.category : undefined,
  error: outcome.ok ? undefined : outcome.error,
  succeeded,
  failed,
});

/**
 * Runs one batch and narrates it over SSE: `scrape` stage events while it runs,
 * then a `scrape-result` event, or `fatal` when the batch itself fails. The
 * stream is always closed on return.
 */
export const handleScrapeStream = async ({
  urls,
  orchestrator,
  stream,
  logger,
  signal,
  runId = randomId(),
}: ScrapeStreamArgs): Promise<void> => {
  const runLogger = logger.child({ runId });
  const stage = makeStageEmitter(runId, 'scrape', (event) => stream.send(event));

  try {
    stage.start({ message: `Scraping ${urls.length} URLs`, data: { total: urls.length } });

    const result = await orchestrator.scrapeMany(urls, {
      signal,
      onProgress: (progress) =>
        stage.progress({
          message: `Processed ${progress.index + 1}/${progress.total}: ${progress.url}`,
          data: toProgressData(progress),
        }),
    });

    stage.success({
      message: `Scraped ${result.succeeded} of ${result.total} URLs`,
      data: { succeeded: result.succeeded, failed: result.failed },
    });

    const payload: ScrapeResultPayload = {
      runId,
      total: result.total,
      succeeded: result.succeeded,
      failed: result.failed,
      records: result.records.map(toJsonItem),
      failures: result.failures,
      statistics: computeStatistics(result.records),
    };
    stream.sendJson('scrape-result', payload);
  } catch (error) {
    if (signal?.aborted) {
      runLogger.info('Scrape stream cancelled by client');
      return;
    }
    const message = error instanceof Error ? error.message : String(error);
    runLogger.error('Scrape stream failed', { error: message });
    stage.failure(error);
    stream.sendJson('fatal', { error: message });
  } finally {
    stream.close();
  }
};
