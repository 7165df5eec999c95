export enum LogLevel {
  DEBUG = 'DEBUG',
  INFO = 'INFO',
  WARN = 'WARN',
  ERROR = 'ERROR'
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  [LogLevel.DEBUG]: 0,
  [LogLevel.INFO]: 1,
  [LogLevel.WARN]: 2,
  [LogLevel.ERROR]: 3
};

export interface Logger {
  debug(msg: string, meta?: unknown): void;
  info(msg: string, meta?: unknown): void;
  warn(msg: string, meta?: unknown): void;
  error(msg: string, meta?: unknown): void;
}

export type LogSink = (line: string) => void;

// Error instances have no enumerable fields, so JSON.stringify would print {}
function serializeMeta(meta: unknown): string {
  return JSON.stringify(
    meta,
    (_key, value: unknown) =>
      value instanceof Error ? { name: value.name, message: value.message } : value,
    2
  );
}

export function formatLogLine(
  level: LogLevel,
  message: string,
  meta?: unknown,
  ts = new Date().toISOString()
): string {
  const base = `[${ts}] [${level}] ${message}`;
  return meta === undefined ? base : `${base} ${serializeMeta(meta)}`;
}

// eslint-disable-next-line no-console
const consoleSink: LogSink = (line) => console.log(line);

export function createLogger(minLevel: LogLevel = LogLevel.INFO, sink: LogSink = consoleSink): Logger {
  const log = (level: LogLevel, message: string, meta?: unknown) => {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[minLevel]) return;
    sink(formatLogLine(level, message, meta));
  };

  return {
    debug: (msg, meta) => log(LogLevel.DEBUG, msg, meta),
    info: (msg, meta) => log(LogLevel.INFO, msg, meta),
    warn: (msg, meta) => log(LogLevel.WARN, msg, meta),
    error: (msg, meta) => log(LogLevel.ERROR, msg, meta)
  };
}

export function parseLogLevel(value: string | undefined): LogLevel {
  switch (value?.trim().toUpperCase()) {
    case 'DEBUG':
      return LogLevel.DEBUG;
    case 'WARN':
      return LogLevel.WARN;
    case 'ERROR':
      return LogLevel.ERROR;
    default:
      return LogLevel.INFO;
  }
}

/** Drops everything; handy for tests and scripts. */
export const silentLogger: Logger = createLogger(LogLevel.ERROR, () => undefined);
