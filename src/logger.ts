/**
 * Structured JSON logger: one JSON object per line on stdout, errors on stderr.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export const LOG_LEVELS = ['debug', 'info', 'warn', 'error'] as const;

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  message: string;
  table?: string;
  endpoint?: string;
  rowCount?: number;
  engine?: string;
  error?: {
    code?: string;
    message: string;
  };
  [key: string]: unknown;
}

export type LogFields = Partial<Omit<LogEntry, 'timestamp' | 'level' | 'message'>>;

export interface Logger {
  debug(message: string, fields?: LogFields): void;
  info(message: string, fields?: LogFields): void;
  warn(message: string, fields?: LogFields): void;
  error(message: string, fields?: LogFields): void;
}

const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

function isLogLevel(value: string | undefined): value is LogLevel {
  return LOG_LEVELS.some(level => level === value);
}

let minLevel: LogLevel = isLogLevel(process.env.LOG_LEVEL) ? process.env.LOG_LEVEL : 'info';

export function setLogLevel(level: LogLevel): void {
  minLevel = level;
}

function shouldLog(level: LogLevel): boolean {
  return LOG_LEVEL_PRIORITY[level] >= LOG_LEVEL_PRIORITY[minLevel];
}

function emit(entry: LogEntry): void {
  const line = JSON.stringify(entry, (_key, value: unknown) =>
    typeof value === 'bigint' ? value.toString() : value,
  );
  if (entry.level === 'error') {
    process.stderr.write(line + '\n');
  } else {
    process.stdout.write(line + '\n');
  }
}

export function log(level: LogLevel, message: string, fields?: LogFields): void {
  if (!shouldLog(level)) return;
  emit({
    ...fields,
    timestamp: new Date().toISOString(),
    level,
    message,
  });
}

export const logger: Logger = {
  debug: (message, fields) => log('debug', message, fields),
  info: (message, fields) => log('info', message, fields),
  warn: (message, fields) => log('warn', message, fields),
  error: (message, fields) => log('error', message, fields),
};

/**
 * Error fields for a log entry
 */
export function errorFields(error: unknown): LogEntry['error'] {
  if (error instanceof Error) {
    const code = 'code' in error && typeof error.code === 'string' ? error.code : undefined;
    return code ? { code, message: error.message } : { message: error.message };
  }
  return { message: String(error) };
}
