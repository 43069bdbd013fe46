/**
 * Structured console logger
 * One instance per scope, handed to services at construction time
 */

export enum LogLevel {
  DEBUG = 'DEBUG',
  INFO = 'INFO',
  WARN = 'WARN',
  ERROR = 'ERROR',
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  [LogLevel.DEBUG]: 10,
  [LogLevel.INFO]: 20,
  [LogLevel.WARN]: 30,
  [LogLevel.ERROR]: 40,
};

export interface Logger {
  debug(message: string, metadata?: Record<string, unknown>): void;
  info(message: string, metadata?: Record<string, unknown>): void;
  warn(message: string, metadata?: Record<string, unknown>): void;
  error(message: string, error?: unknown, metadata?: Record<string, unknown>): void;
  child(scope: string): Logger;
}

interface LogEntry {
  level: LogLevel;
  scope?: string;
  message: string;
  timestamp: string;
  metadata?: Record<string, unknown>;
}

export function parseLogLevel(value: string | undefined, defaultValue: LogLevel = LogLevel.INFO): LogLevel {
  if (!value) return defaultValue;
  const upper = value.toUpperCase();
  for (const level of Object.values(LogLevel)) {
    if (level === upper) return level;
  }
  return defaultValue;
}

export function serializeError(error: unknown): unknown {
  if (error instanceof Error) {
    return {
      name: error.name,
      message: error.message,
      stack: error.stack,
    };
  }
  return error;
}

export function formatLog(entry: LogEntry): string {
  const scopeStr = entry.scope ? ` [${entry.scope}]` : '';
  const metadataStr = entry.metadata
    ? ` ${JSON.stringify(entry.metadata)}`
    : '';
  return `[${entry.timestamp}] ${entry.level}${scopeStr}: ${entry.message}${metadataStr}`;
}

export function createLogger(
  scope?: string,
  threshold: LogLevel = parseLogLevel(process.env.LOG_LEVEL)
): Logger {
  const write = (level: LogLevel, message: string, metadata?: Record<string, unknown>): void => {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[threshold]) return;

    const line = formatLog({
      level,
      scope,
      message,
      timestamp: new Date().toISOString(),
      metadata,
    });

    switch (level) {
      case LogLevel.ERROR:
        console.error(line);
        break;
      case LogLevel.WARN:
        console.warn(line);
        break;
      default:
        console.log(line);
    }
  };

  return {
    debug: (message, metadata) => write(LogLevel.DEBUG, message, metadata),
    info: (message, metadata) => write(LogLevel.INFO, message, metadata),
    warn: (message, metadata) => write(LogLevel.WARN, message, metadata),
    error: (message, error, metadata) =>
      write(LogLevel.ERROR, message, {
        ...metadata,
        error: serializeError(error),
      }),
    child: (childScope) => createLogger(scope ? `${scope}:${childScope}` : childScope, threshold),
  };
}
