import type { ScrapingConfig } from '../../shared/config';
import type { ExportStore } from '../../shared/exportStore';
import type {
  AiAnalysisMetadata,
  BatchResult,
  CategoryResult,
  ContentAnalysis,
  EnhancedAnalysis,
  RecordMetadata,
  ScrapeFailure,
  ScrapeFailureStage,
  ScrapeOutcome,
  ScrapeStatistics,
  ScrapedRecord,
} from '../../shared/types';
import { summarizeAnalyses, type AnalysisSummary } from '../categorization/llmCategorizer';
import type { Categorizer } from '../categorization/types';
import { buildExportIndex, buildInsightsReport, buildSummaryReport, createExporter, type ExportedFiles, type ExportFormat } from '../export';
import type { ContentProcessor } from '../extraction/contentExtractor';
import { loadHtml } from '../extraction/html';
import type { MetadataSource } from '../extraction/metadataExtractor';
import type { Fetcher } from '../fetch/httpFetcher';
import type { Logger } from '../obs/logger';
import { sleep as defaultSleep, uniformDelayMs, type SleepFn } from '../utils/async';
import type { UrlAdmission } from '../validation/urlValidator';
import { createRecord } from './record';
import { computeStatistics } from './statistics';

export interface Enhancer {
  enhance: (content: string, label: string) => Promise<EnhancedAnalysis>;
}

export interface ScrapeOrchestratorDeps {
  config: ScrapingConfig;
  validator: UrlAdmission;
  fetcher: Fetcher;
  contentExtractor: ContentProcessor;
  metadataExtractor: MetadataSource;
  categorizer: Categorizer;
  logger: Logger;
  /** Runs after categorization whenever the categorizer produced a model analysis. */
  enhancer?: Enhancer;
  exportStore?: ExportStore;
  sleep?: SleepFn;
  random?: () => number;
  now?: () => Date;
}

export interface ScrapeProgress {
  index: number;
  total: number;
  url: string;
  outcome: ScrapeOutcome;
  succeeded: number;
  failed: number;
}

export interface ScrapeManyOptions {
  signal?: AbortSignal;
  onProgress?: (progress: ScrapeProgress) => void;
}

export interface ExportAllResult extends ExportedFiles {
  index: string;
}

const pad2 = (value: number) => String(value).padStart(2, '0');

/** `YYYYMMDD_HHMMSS` in local time, used in default export filenames. */
export const fileStamp = (date: Date): string =>
  `${date.getFullYear()}${pad2(date.getMonth() + 1)}${pad2(date.getDate())}_` +
  `${pad2(date.getHours())}${pad2(date.getMinutes())}${pad2(date.getSeconds())}`;

const toAiMetadata = (result: CategoryResult, analysis: ContentAnalysis): AiAnalysisMetadata => ({
  label: result.label,
  confidence: analysis.confidence,
  reasoning: analysis.reasoning,
  keywords: analysis.keywords,
  sentiment: analysis.sentiment,
  quality_score: analysis.qualityScore,
  ai_metadata: analysis.metadata,
});

const failure = (url: string, stage: ScrapeFailureStage, error: string): ScrapeOutcome => ({
  ok: false,
  url,
  stage,
  error,
});

/**
 * Runs URLs through admission, fetch, extraction and categorization, keeping
 * every successful record for statistics and export. Per-URL problems come back
 * as failed outcomes; only caller cancellation and export I/O errors throw.
 */
export class ScrapeOrchestrator {
  private readonly deps: ScrapeOrchestratorDeps;
  private readonly sleep: SleepFn;
  private readonly random: () => number;
  private readonly now: () => Date;
  private readonly records: ScrapedRecord[] = [];
  private readonly analyses: ContentAnalysis[] = [];

  constructor(deps: ScrapeOrchestratorDeps) {
    this.deps = deps;
    this.sleep = deps.sleep ?? defaultSleep;
    this.random = deps.random ?? Math.random;
    this.now = deps.now ?? (() => new Date());
  }

  get config(): ScrapingConfig {
    return this.deps.config;
  }

  async scrapeUrl(url: string, signal?: AbortSignal): Promise<ScrapeOutcome> {
    const { validator, fetcher, contentExtractor, metadataExtractor, categorizer, enhancer, logger } = this.deps;

    const admission = validator.validate(url);
    if (!admission.isValid) {
      logger.warn('URL rejected', { url, reason: admission.reason });
      return failure(url, 'validation', `URL validation failed: ${admission.reason}`);
    }

    try {
      const page = await fetcher.fetch(url, signal);
      if (!page) {
        logger.warn('Fetch failed', { url });
        return failure(url, 'fetch', 'Failed to fetch URL');
      }

      const { title, content } = contentExtractor.process(page.body);
      const metadata: RecordMetadata = metadataExtractor.extract(loadHtml(page.body), url);
      const result = await categorizer.categorize({ url, title, content });

      if (result.analysis) {
        metadata.ai_analysis = toAiMetadata(result, result.analysis);
        this.analyses.push(result.analysis);
        if (enhancer && content) {
          try {
            metadata.enhanced_analysis = await enhancer.enhance(content, result.label);
          } catch (error) {
            if (signal?.aborted) {
              throw error;
            }
            logger.warn('Content enhancement failed, keeping record', {
              url,
              error: error instanceof Error ? error.message : String(error),
            });
          }
        }
      }

      const record = createRecord(
        {
          url,
          title,
          content,
          category: this.deps.config.labelStyle === 'native' ? result.label : result.category,
          metadata,
          statusCode: page.status,
        },
        this.now,
      );
      this.records.push(record);
      logger.debug('Scraped URL', { url, category: record.category, source: result.source });
      return { ok: true, record };
    } catch (error) {
      if (signal?.aborted) {
        throw error;
      }
      const message = error instanceof Error ? error.message : String(error);
      logger.error('Scraping error', { url, error: message });
      return failure(url, 'unexpected', `Scraping error: ${message}`);
    }
  }

  async scrapeMany(urls: readonly string[], options: ScrapeManyOptions = {}): Promise<BatchResult> {
    const { config, logger } = this.deps;
    const total = urls.length;
    const records: ScrapedRecord[] = [];
    const failures: ScrapeFailure[] = [];

    logger.info('Starting scrape batch', { total });

    for (const [index, url] of urls.entries()) {
      if (index > 0) {
        await this.sleep(uniformDelayMs(config.delayMinMs, config.delayMaxMs, this.random), options.signal);
      }

      const outcome = await this.scrapeUrl(url, options.signal);
      if (outcome.ok) {
        records.push(outcome.record);
      } else {
        failures.push({ url: outcome.url, stage: outcome.stage, error: outcome.error });
      }

      options.onProgress?.({ index, total, url, outcome, succeeded: records.length, failed: failures.length });

      if ((index + 1) % config.progressInterval === 0) {
        logger.info('Scrape progress', { processed: index + 1, total, succeeded: records.length, failed: failures.length });
      }
    }

    logger.info('Scrape batch complete', { total, succeeded: records.length, failed: failures.length });
    return { total, succeeded: records.length, failed: failures.length, records, failures };
  }

  getRecords(): readonly ScrapedRecord[] {
    return [...this.records];
  }

  getStatistics(): ScrapeStatistics {
    return computeStatistics(this.records);
  }

  getAnalysisSummary(): AnalysisSummary {
    return summarizeAnalyses(this.analyses);
  }

  /** Serializes every record kept so far and returns the written path. */
  async export(format: ExportFormat, filename?: string): Promise<string> {
    const exporter = createExporter(format);
    const exportedAt = this.now();
    const path = await this.requireStore().write(
      exporter.kind,
      filename || `scraped_data_${fileStamp(exportedAt)}`,
      exporter.extension,
      exporter.serialize(this.records, exportedAt),
    );
    this.deps.logger.info('Exported records', { format: exporter.format, count: this.records.length, path });
    return path;
  }

  async exportSummaryReport(): Promise<string> {
    const generatedAt = this.now();
    const report = buildSummaryReport(this.records, this.getStatistics(), generatedAt);
    return this.requireStore().write('reports', `scraping_report_${fileStamp(generatedAt)}`, 'txt', report);
  }

  /** Null when no model analysis has been collected yet. */
  async exportInsightsReport(): Promise<string | null> {
    if (this.analyses.length === 0) {
      return null;
    }
    const generatedAt = this.now();
    const report = buildInsightsReport(this.getAnalysisSummary(), generatedAt);
    return this.requireStore().write('reports', `ai_insights_report_${fileStamp(generatedAt)}`, 'md', report);
  }

  async exportAll(baseFilename?: string): Promise<ExportAllResult> {
    const base = baseFilename || `scraped_data_${fileStamp(this.now())}`;
    const files: ExportedFiles = {
      json: await this.export('json', base),
      csv: await this.export('csv', base),
      xml: await this.export('xml', base),
      report: await this.exportSummaryReport(),
      insights: await this.exportInsightsReport(),
    };
    const generatedAt = this.now();
    const index = await this.requireStore().write(
      'reports',
      `export_index_${fileStamp(generatedAt)}`,
      'md',
      buildExportIndex(files, this.getStatistics(), generatedAt),
    );
    this.deps.logger.info('Exported all formats', { index });
    return { ...files, index };
  }

  private requireStore(): ExportStore {
    if (!this.deps.exportStore) {
      throw new Error('No export store configured');
    }
    return this.deps.exportStore;
  }
}
