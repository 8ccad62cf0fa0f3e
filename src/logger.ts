/**
 * Scoped console logger.
 *
 * Plain text for development, one JSON object per line when
 * NODE_ENV=production. The level comes from LOG_LEVEL.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

export type LogMeta = Readonly<Record<string, unknown>>;

export interface Logger {
  debug(message: string, meta?: LogMeta): void;
  info(message: string, meta?: LogMeta): void;
  warn(message: string, meta?: LogMeta): void;
  error(message: string, meta?: LogMeta): void;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

export function isLogLevel(value: string): value is LogLevel {
  return Object.hasOwn(LEVEL_ORDER, value);
}

function currentLevel(): LogLevel {
  const level = process.env.LOG_LEVEL?.toLowerCase();
  return level !== undefined && isLogLevel(level) ? level : 'info';
}

export function createLogger(scope: string, level: LogLevel = currentLevel()): Logger {
  const threshold = LEVEL_ORDER[level];

  function write(messageLevel: Exclude<LogLevel, 'silent'>, message: string, meta?: LogMeta): void {
    if (LEVEL_ORDER[messageLevel] < threshold) return;
    const line = formatLog(scope, messageLevel, message, meta);
    if (messageLevel === 'error') {
      console.error(line);
    } else if (messageLevel === 'warn') {
      console.warn(line);
    } else {
      console.info(line);
    }
  }

  return {
    debug: (message, meta) => write('debug', message, meta),
    info: (message, meta) => write('info', message, meta),
    warn: (message, meta) => write('warn', message, meta),
    error: (message, meta) => write('error', message, meta),
  };
}

function formatLog(scope: string, level: string, message: string, meta?: LogMeta): string {
  if (process.env.NODE_ENV === 'production') {
    return JSON.stringify({
      timestamp: new Date().toISOString(),
      level: level.toUpperCase(),
      scope,
      message,
      ...meta,
    });
  }
  const metaStr = meta && Object.keys(meta).length > 0 ? ` ${JSON.stringify(meta)}` : '';
  return `${level.toUpperCase()} [${scope}] ${message}${metaStr}`;
}
