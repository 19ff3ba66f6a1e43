/**
 * Structured console logger
 * LOG_LEVEL (DEBUG, INFO, WARN, ERROR) sets the lowest level written
 */

export enum LogLevel {
  DEBUG = 'DEBUG',
  INFO = 'INFO',
  WARN = 'WARN',
  ERROR = 'ERROR',
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  [LogLevel.DEBUG]: 0,
  [LogLevel.INFO]: 1,
  [LogLevel.WARN]: 2,
  [LogLevel.ERROR]: 3,
};

interface LogEntry {
  level: LogLevel;
  message: string;
  timestamp: string;
  metadata?: Record<string, unknown>;
}

function threshold(): LogLevel {
  const configured = (process.env.LOG_LEVEL || '').toUpperCase();
  return Object.values(LogLevel).find(level => level === configured) ?? LogLevel.INFO;
}

function enabled(level: LogLevel): boolean {
  return LEVEL_ORDER[level] >= LEVEL_ORDER[threshold()];
}

export function formatLog(entry: LogEntry): string {
  const metadataStr = entry.metadata
    ? ` ${JSON.stringify(entry.metadata)}`
    : '';
  return `[${entry.timestamp}] ${entry.level}: ${entry.message}${metadataStr}`;
}

export function serializeError(error: unknown): unknown {
  return error instanceof Error
    ? { name: error.name, message: error.message, stack: error.stack }
    : error;
}

function write(level: LogLevel, message: string, metadata?: Record<string, unknown>): void {
  if (!enabled(level)) return;

  const line = formatLog({
    level,
    message,
    timestamp: new Date().toISOString(),
    metadata,
  });

  if (level === LogLevel.ERROR) {
    console.error(line);
  } else if (level === LogLevel.WARN) {
    console.warn(line);
  } else {
    console.log(line);
  }
}

export const logger = {
  debug(message: string, metadata?: Record<string, unknown>): void {
    write(LogLevel.DEBUG, message, metadata);
  },

  info(message: string, metadata?: Record<string, unknown>): void {
    write(LogLevel.INFO, message, metadata);
  },

  warn(message: string, metadata?: Record<string, unknown>): void {
    write(LogLevel.WARN, message, metadata);
  },

  error(message: string, error?: Error | unknown, metadata?: Record<string, unknown>): void {
    write(LogLevel.ERROR, message, {
      ...metadata,
      error: serializeError(error),
    });
  },
};
