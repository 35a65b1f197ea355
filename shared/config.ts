import { z } from 'zod';

export const LABEL_STYLES = ['canonical', 'native'] as const;
export type LabelStyle = (typeof LABEL_STYLES)[number];

export const ScrapingConfigSchema = z
  .object({
    delayMinMs: z.number().int().nonnegative(),
    delayMaxMs: z.number().int().nonnegative(),
    timeoutMs: z.number().int().positive(),
    maxRetries: z.number().int().positive(),
    userAgent: z.string().min(1),
    maxContentLength: z.number().int().positive(),
    progressInterval: z.number().int().positive(),
    labelStyle: z.enum(LABEL_STYLES),
  })
  .refine((value) => value.delayMinMs <= value.delayMaxMs, {
    message: 'delayMinMs must not exceed delayMaxMs',
    path: ['delayMinMs'],
  });

export const ConfigSchema = z.object({
  environment: z.enum(['development', 'test', 'production']),
  server: z.object({
    port: z.number().int().positive().max(65535),
    heartbeatIntervalMs: z.number().int().positive(),
  }),
  scraping: ScrapingConfigSchema,
  llm: z.object({
    enabled: z.boolean(),
    apiKey: z.string().optional(),
    model: z.string().min(1),
    fallbackModel: z.string().min(1),
    temperature: z.number().min(0).max(2),
    topP: z.number().min(0).max(1),
    maxOutputTokens: z.number().int().positive(),
    requestsPerMinute: z.number().int().positive().max(10),
    enhance: z.boolean(),
  }),
  export: z.object({
    rootDir: z.string().min(1),
  }),
  observability: z.object({
    logLevel: z.enum(['debug', 'info', 'warn', 'error']),
  }),
});

export type AppConfig = z.infer<typeof ConfigSchema>;
export type ScrapingConfig = AppConfig['scraping'];
export type LlmConfig = AppConfig['llm'];

export const DEFAULT_USER_AGENT =
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/122.0 Safari/537.36';

export const DEFAULT_SCRAPING_CONFIG: ScrapingConfig = {
  delayMinMs: 1_000,
  delayMaxMs: 3_000,
  timeoutMs: 30_000,
  maxRetries: 3,
  userAgent: DEFAULT_USER_AGENT,
  maxContentLength: 10_000,
  progressInterval: 5,
  labelStyle: 'canonical',
};

export interface PublicConfig {
  scraping: {
    delayMinMs: number;
    delayMaxMs: number;
    timeoutMs: number;
    maxRetries: number;
    labelStyle: LabelStyle;
  };
  llm: {
    enabled: boolean;
    model: string;
    enhance: boolean;
  };
}

export const getPublicConfig = (config: AppConfig): PublicConfig => ({
  scraping: {
    delayMinMs: config.scraping.delayMinMs,
    delayMaxMs: config.scraping.delayMaxMs,
    timeoutMs: config.scraping.timeoutMs,
    maxRetries: config.scraping.maxRetries,
    labelStyle: config.scraping.labelStyle,
  },
  llm: {
    enabled: config.llm.enabled && Boolean(config.llm.apiKey),
    model: config.llm.model,
    enhance: config.llm.enhance,
  },
});
