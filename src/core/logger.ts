import type { Logger, LoggerConfig, LogLevel } from './types.js';

const LEVELS: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40
};

export const silentLogger: Logger = {
  debug: (_message: string, _data?: Record<string, unknown>) => {},
  info: (_message: string, _data?: Record<string, unknown>) => {},
  warn: (_message: string, _data?: Record<string, unknown>) => {},
  error: (_message: string, _data?: Record<string, unknown>) => {}
};

export type LogSink = (line: string) => void;

const stderrSink: LogSink = line => {
  process.stderr.write(line + '\n');
};

export function formatLogLine(
  format: 'pretty' | 'json',
  level: LogLevel,
  message: string,
  data?: Record<string, unknown>,
  time: Date = new Date()
): string {
  if (format === 'json') {
    return JSON.stringify({ time: time.toISOString(), level, message, ...data });
  }
  const suffix = data && Object.keys(data).length > 0 ? ' ' + JSON.stringify(data) : '';
  return `${time.toISOString()} ${level.toUpperCase().padEnd(5)} ${message}${suffix}`;
}

/** Line logger writing to stderr; entries below `level` are dropped. */
export function createLogger(config: LoggerConfig = {}, sink: LogSink = stderrSink): Logger {
  const threshold = LEVELS[config.level ?? 'info'];
  const format = config.format ?? 'pretty';

  const log = (level: LogLevel) => (message: string, data?: Record<string, unknown>): void => {
    if (LEVELS[level] < threshold) return;
    sink(formatLogLine(format, level, message, data));
  };

  return {
    debug: log('debug'),
    info: log('info'),
    warn: log('warn'),
    error: log('error')
  };
}

export function resolveLogger(logger?: Logger | LoggerConfig): Logger {
  if (!logger) return silentLogger;
  if ('info' in logger && typeof logger.info === 'function') {
    return logger;
  }
  return createLogger(logger);
}
