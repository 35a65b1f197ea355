import { DEFAULT_SCRAPING_CONFIG, ScrapingConfigSchema, type ScrapingConfig } from '../../shared/config';
import type { ExportStore } from '../../shared/exportStore';
import { RuleBasedCategorizer } from '../categorization/ruleBasedCategorizer';
import type { Categorizer } from '../categorization/types';
import { ContentExtractor, type ContentProcessor } from '../extraction/contentExtractor';
import { MetadataExtractor, type MetadataSource } from '../extraction/metadataExtractor';
import { HttpFetcher, type Fetcher } from '../fetch/httpFetcher';
import { createSilentLogger, type Logger } from '../obs/logger';
import type { SleepFn } from '../utils/async';
import { UrlValidator, type UrlAdmission } from '../validation/urlValidator';
import { ScrapeOrchestrator, type Enhancer } from './orchestrator';

interface BuilderState {
  config: ScrapingConfig;
  validator?: UrlAdmission;
  fetcher?: Fetcher;
  contentExtractor?: ContentProcessor;
  metadataExtractor?: MetadataSource;
  categorizer?: Categorizer;
  enhancer?: Enhancer;
  exportStore?: ExportStore;
  logger?: Logger;
  sleep?: SleepFn;
  random?: () => number;
}

/**
 * Immutable builder: every `with*` call returns a new builder and leaves the
 * receiver untouched, so a configured base can be shared and specialised.
 */
export class ScraperBuilder {
  private constructor(private readonly state: BuilderState) {}

  static create(config: ScrapingConfig = DEFAULT_SCRAPING_CONFIG): ScraperBuilder {
    return new ScraperBuilder({ config: { ...config } });
  }

  private with(patch: Partial<BuilderState>): ScraperBuilder {
    return new ScraperBuilder({ ...this.state, ...patch });
  }

  private withConfigPatch(patch: Partial<ScrapingConfig>): ScraperBuilder {
    return this.with({ config: { ...this.state.config, ...patch } });
  }

  get config(): Readonly<ScrapingConfig> {
    return this.state.config;
  }

  withConfig(config: ScrapingConfig) {
    return this.with({ config: { ...config } });
  }

  withUserAgent(userAgent: string) {
    return this.withConfigPatch({ userAgent });
  }

  withDelayRange(delayMinMs: number, delayMaxMs: number) {
    return this.withConfigPatch({ delayMinMs, delayMaxMs });
  }

  withTimeout(timeoutMs: number) {
    return this.withConfigPatch({ timeoutMs });
  }

  withMaxRetries(maxRetries: number) {
    return this.withConfigPatch({ maxRetries });
  }

  withValidator(validator: UrlAdmission) {
    return this.with({ validator });
  }

  withFetcher(fetcher: Fetcher) {
    return this.with({ fetcher });
  }

  withContentExtractor(contentExtractor: ContentProcessor) {
    return this.with({ contentExtractor });
  }

  withMetadataExtractor(metadataExtractor: MetadataSource) {
    return this.with({ metadataExtractor });
  }

  withCategorizer(categorizer: Categorizer) {
    return this.with({ categorizer });
  }

  withEnhancer(enhancer: Enhancer) {
    return this.with({ enhancer });
  }

  withExportStore(exportStore: ExportStore) {
    return this.with({ exportStore });
  }

  withLogger(logger: Logger) {
    return this.with({ logger });
  }

  withSleep(sleep: SleepFn) {
    return this.with({ sleep });
  }

  withRandom(random: () => number) {
    return this.with({ random });
  }

  /** Validates the accumulated config (throws a ZodError) and fills defaults for missing stages. */
  build(): ScrapeOrchestrator {
    const config = ScrapingConfigSchema.parse(this.state.config);
    const logger = this.state.logger ?? createSilentLogger();
    return new ScrapeOrchestrator({
      config,
      logger,
      validator: this.state.validator ?? new UrlValidator(),
      fetcher: this.state.fetcher ?? new HttpFetcher({ config, logger, sleep: this.state.sleep }),
      contentExtractor: this.state.contentExtractor ?? new ContentExtractor({ maxLength: config.maxContentLength }),
      metadataExtractor: this.state.metadataExtractor ?? new MetadataExtractor(),
      categorizer: this.state.categorizer ?? new RuleBasedCategorizer(),
      enhancer: this.state.enhancer,
      exportStore: this.state.exportStore,
      sleep: this.state.sleep,
      random: this.state.random,
    });
  }
}
