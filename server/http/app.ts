import cors from 'cors';
import express from 'express';
import type { Express, Request, Response } from 'express';
import { z } from 'zod';
import { getPublicConfig, type AppConfig } from '../../shared/config';
import { RuleBasedCategorizer } from '../categorization/ruleBasedCategorizer';
import type { Categorizer } from '../categorization/types';
import { EXPORT_FORMATS, isExportFormat, unsupportedFormatMessage } from '../export';
import type { Logger } from '../obs/logger';
import { handleScrapeStream } from '../pipeline/scrapeStream';
import type { ScrapeOrchestrator } from '../scraper/orchestrator';
import { Mutex } from '../utils/concurrency';
import { UrlValidator, type UrlAdmission } from '../validation/urlValidator';
import { createSseStream } from './sse';

export const MAX_BATCH_URLS = 500;

export interface AppDeps {
  config: AppConfig;
  orchestrator: ScrapeOrchestrator;
  logger: Logger;
  /** Backs `/api/validate`; defaults to the stock blocklist. */
  validator?: UrlAdmission;
  /** Backs `/api/categorize`; defaults to the rule-based categorizer. */
  categorizer?: Categorizer;
}

const ValidateBodySchema = z.object({ url: z.string() });

const CategorizeBodySchema = z.object({
  url: z.string().min(1),
  title: z.string().nullish(),
  content: z.string().nullish(),
});

const ScrapeBodySchema = z.object({
  urls: z.array(z.string()).min(1).max(MAX_BATCH_URLS),
});

const ExportBodySchema = z.object({
  format: z.string().min(1),
  filename: z.string().max(120).optional(),
});

const EXTRA_EXPORTS = ['report', 'insights', 'all'] as const;
type ExtraExport = (typeof EXTRA_EXPORTS)[number];

const isExtraExport = (value: string): value is ExtraExport => EXTRA_EXPORTS.some((kind) => kind === value);

const parseBody = <S extends z.ZodTypeAny>(schema: S, req: Request, res: Response): z.output<S> | null => {
  const result = schema.safeParse(req.body);
  if (result.success) {
    return result.data;
  }
  res.status(400).json({
    error: 'Invalid request body',
    issues: result.error.issues.map((issue) => `${issue.path.join('.') || 'body'}: ${issue.message}`),
  });
  return null;
};

export const createApp = ({ config, orchestrator, logger, validator, categorizer }: AppDeps): Express => {
  const admission = validator ?? new UrlValidator();
  const rules = categorizer ?? new RuleBasedCategorizer();
  // at most one batch runs on the shared orchestrator
  const batchLock = new Mutex();

  const app = express();

  app.use(cors());
  app.use(express.json({ limit: '1mb' }));

  if (config.observability.logLevel === 'debug') {
    app.use((req, res, next) => {
      const startedAt = Date.now();
      logger.debug('HTTP request', { method: req.method, path: req.originalUrl });
      res.on('finish', () => {
        logger.debug('HTTP response', {
          method: req.method,
          path: req.originalUrl,
          status: res.statusCode,
          elapsedMs: Date.now() - startedAt,
        });
      });
      next();
    });
  }

  app.get('/api/healthz', (_req: Request, res: Response) => {
    res.json({ ok: true, ts: new Date().toISOString() });
  });

  app.get('/api/config', (_req: Request, res: Response) => {
    res.json(getPublicConfig(config));
  });

  app.post('/api/validate', (req: Request, res: Response) => {
    const body = parseBody(ValidateBodySchema, req, res);
    if (!body) return;
    res.json(admission.validate(body.url));
  });

  app.post('/api/categorize', async (req: Request, res: Response) => {
    const body = parseBody(CategorizeBodySchema, req, res);
    if (!body) return;
    try {
      res.json(await rules.categorize(body));
    } catch (error) {
      logger.error('Categorize request failed', { error: error instanceof Error ? error.message : String(error) });
      res.status(500).json({ error: 'Failed to categorize' });
    }
  });

  app.post('/api/scrape-stream', async (req: Request, res: Response) => {
    const body = parseBody(ScrapeBodySchema, req, res);
    if (!body) return;

    const release = batchLock.tryAcquire();
    if (!release) {
      res.status(409).json({ error: 'A scrape batch is already running' });
      return;
    }

    try {
      const stream = createSseStream(res, {
        heartbeatMs: config.server.heartbeatIntervalMs,
        onError: (error) =>
          logger.warn('SSE write failed', { error: error instanceof Error ? error.message : String(error) }),
      });
      await handleScrapeStream({
        urls: body.urls,
        orchestrator,
        stream,
        logger,
        signal: stream.controller.signal,
      });
    } finally {
      release();
    }
  });

  app.get('/api/statistics', (_req: Request, res: Response) => {
    res.json({
      statistics: orchestrator.getStatistics(),
      analysis: orchestrator.getAnalysisSummary(),
    });
  });

  app.post('/api/export', async (req: Request, res: Response) => {
    const body = parseBody(ExportBodySchema, req, res);
    if (!body) return;

    const format = body.format.trim().toLowerCase();
    if (!isExportFormat(format) && !isExtraExport(format)) {
      res.status(400).json({ error: unsupportedFormatMessage(format, [...EXPORT_FORMATS, ...EXTRA_EXPORTS]) });
      return;
    }

    try {
      if (format === 'all') {
        res.json({ paths: await orchestrator.exportAll(body.filename) });
      } else if (format === 'report') {
        res.json({ path: await orchestrator.exportSummaryReport() });
      } else if (format === 'insights') {
        res.json({ path: await orchestrator.exportInsightsReport() });
      } else {
        res.json({ path: await orchestrator.export(format, body.filename) });
      }
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      logger.error('Export failed', { format, error: message });
      res.status(500).json({ error: `Export failed: ${message}` });
    }
  });

  return app;
};
