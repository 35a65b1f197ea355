import path from 'node:path';
import {
  ConfigSchema,
  DEFAULT_SCRAPING_CONFIG,
  type AppConfig,
  type PublicConfig,
  getPublicConfig as getPublicConfigShared,
} from '../../shared/config';

export type EnvMap = Record<string, string | undefined>;

const numberFromEnv = (value: string | undefined, fallback: number): number => {
  if (value == null || value.trim() === '') {
    return fallback;
  }
  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : fallback;
};

const booleanFromEnv = (value: string | undefined, fallback: boolean): boolean => {
  if (value == null || value.trim() === '') {
    return fallback;
  }
  const normalized = value.trim().toLowerCase();
  if (['1', 'true', 'yes', 'on'].includes(normalized)) {
    return true;
  }
  if (['0', 'false', 'no', 'off'].includes(normalized)) {
    return false;
  }
  return fallback;
};

const stringFromEnv = (value: string | undefined, fallback: string): string => value?.trim() || fallback;

export type { AppConfig, PublicConfig };

/**
 * Builds and validates the application config from an environment map.
 * Throws a ZodError when a value is out of range; that is a deployment error,
 * not something to recover from.
 */
export const buildConfig = (env: EnvMap = process.env): AppConfig => {
  const environment = (env.NODE_ENV || 'development').trim().toLowerCase();
  const apiKey = env.GEMINI_API_KEY?.trim() || undefined;

  const rawConfig = {
    environment: environment === 'production' ? 'production' : environment === 'test' ? 'test' : 'development',
    server: {
      port: numberFromEnv(env.PORT, 3001),
      heartbeatIntervalMs: numberFromEnv(env.HEARTBEAT_INTERVAL_MS, 15_000),
    },
    scraping: {
      delayMinMs: numberFromEnv(env.SCRAPER_DELAY_MIN_MS, DEFAULT_SCRAPING_CONFIG.delayMinMs),
      delayMaxMs: numberFromEnv(env.SCRAPER_DELAY_MAX_MS, DEFAULT_SCRAPING_CONFIG.delayMaxMs),
      timeoutMs: numberFromEnv(env.SCRAPER_TIMEOUT_MS, DEFAULT_SCRAPING_CONFIG.timeoutMs),
      maxRetries: numberFromEnv(env.SCRAPER_MAX_RETRIES, DEFAULT_SCRAPING_CONFIG.maxRetries),
      userAgent: stringFromEnv(env.SCRAPER_USER_AGENT, DEFAULT_SCRAPING_CONFIG.userAgent),
      maxContentLength: numberFromEnv(env.SCRAPER_MAX_CONTENT_LENGTH, DEFAULT_SCRAPING_CONFIG.maxContentLength),
      progressInterval: numberFromEnv(env.SCRAPER_PROGRESS_INTERVAL, DEFAULT_SCRAPING_CONFIG.progressInterval),
      labelStyle: (env.SCRAPER_LABEL_STYLE || DEFAULT_SCRAPING_CONFIG.labelStyle).trim().toLowerCase(),
    },
    llm: {
      enabled: booleanFromEnv(env.LLM_ENABLED, Boolean(apiKey)),
      apiKey,
      model: stringFromEnv(env.GEMINI_MODEL, 'gemini-2.5-flash'),
      fallbackModel: stringFromEnv(env.GEMINI_FALLBACK_MODEL, 'gemini-2.5-flash-lite'),
      temperature: numberFromEnv(env.GEMINI_TEMPERATURE, 0.7),
      topP: numberFromEnv(env.GEMINI_TOP_P, 0.9),
      maxOutputTokens: numberFromEnv(env.GEMINI_MAX_OUTPUT_TOKENS, 1_000),
      // Hard cap: never exceed 10 RPM regardless of environment value
      requestsPerMinute: Math.max(1, Math.min(10, numberFromEnv(env.GEMINI_REQUESTS_PER_MINUTE, 10))),
      enhance: booleanFromEnv(env.LLM_ENHANCE, false),
    },
    export: {
      rootDir: path.resolve(env.EXPORT_ROOT || path.join(process.cwd(), 'exports')),
    },
    observability: {
      logLevel: (env.LOG_LEVEL || 'info').trim().toLowerCase(),
    },
  };

  return ConfigSchema.parse(rawConfig);
};

let cachedConfig: AppConfig | null = null;

export const loadConfig = (): AppConfig => {
  if (cachedConfig) {
    return cachedConfig;
  }
  cachedConfig = buildConfig(process.env);
  return cachedConfig;
};

export const getPublicConfig = (config: AppConfig = loadConfig()): PublicConfig => getPublicConfigShared(config);
