import type { AppConfig } from '../../shared/config';

export type LogLevel = AppConfig['observability']['logLevel'];

export type LogMeta = Record<string, unknown>;

const levelWeights: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

export interface Logger {
  debug: (message: string, meta?: LogMeta) => void;
  info: (message: string, meta?: LogMeta) => void;
  warn: (message: string, meta?: LogMeta) => void;
  error: (message: string, meta?: LogMeta) => void;
  /** Returns a logger that adds `bindings` to every entry. */
  child: (bindings: LogMeta) => Logger;
}

const emit = (level: LogLevel, message: string, meta?: LogMeta) => {
  const payload = JSON.stringify({
    level,
    message,
    ts: new Date().toISOString(),
    ...meta,
  });
  /* eslint-disable no-console */
  if (level === 'error') {
    console.error(payload);
  } else if (level === 'warn') {
    console.warn(payload);
  } else {
    console.log(payload);
  }
  /* eslint-enable no-console */
};

const buildLogger = (threshold: number, bindings: LogMeta): Logger => {
  const log = (level: LogLevel) => (message: string, meta?: LogMeta) => {
    // errors always pass the threshold
    if (level !== 'error' && levelWeights[level] < threshold) return;
    emit(level, message, { ...bindings, ...meta });
  };
  return {
    debug: log('debug'),
    info: log('info'),
    warn: log('warn'),
    error: log('error'),
    child: (extra) => buildLogger(threshold, { ...bindings, ...extra }),
  };
};

export const createLogger = (config: Pick<AppConfig, 'observability'>): Logger =>
  buildLogger(levelWeights[config.observability.logLevel], {});

export const createSilentLogger = (): Logger => {
  const noop = () => {};
  const logger: Logger = {
    debug: noop,
    info: noop,
    warn: noop,
    error: noop,
    child: () => logger,
  };
  return logger;
};
