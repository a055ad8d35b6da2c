export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export interface LoggerOptions {
  level?: LogLevel;
  json?: boolean;
}

type LogFields = Record<string, unknown>;
type LogFn = (msg: string, data?: LogFields) => void;

export interface Logger {
  debug: LogFn;
  info: LogFn;
  warn: LogFn;
  error: LogFn;
  child: (defaults: LogFields) => Logger;
}

const COLORS: Partial<Record<LogLevel, string>> = {
  error: '\x1b[31m', // red
  warn: '\x1b[33m', // yellow
  debug: '\x1b[90m', // grey
};

function write(options: LoggerOptions, level: LogLevel, message: string, data?: LogFields): void {
  if (LOG_LEVELS[level] < LOG_LEVELS[options.level ?? 'info']) return;

  if (options.json) {
    const line = { level, message, timestamp: new Date().toISOString(), ...data };
    process.stderr.write(JSON.stringify(line) + '\n');
    return;
  }

  const prefix = COLORS[level] ?? '';
  const reset = prefix ? '\x1b[0m' : '';
  const dataStr = data ? ` ${JSON.stringify(data)}` : '';
  process.stderr.write(`${prefix}[${level}]${reset} ${message}${dataStr}\n`);
}

function createLogger(getOptions: () => LoggerOptions, defaults: LogFields = {}): Logger {
  const log = (level: LogLevel): LogFn => (msg, data) => {
    const merged = { ...defaults, ...data };
    write(getOptions(), level, msg, Object.keys(merged).length > 0 ? merged : undefined);
  };

  return {
    debug: log('debug'),
    info: log('info'),
    warn: log('warn'),
    error: log('error'),
    child: (extra) => createLogger(getOptions, { ...defaults, ...extra }),
  };
}

let currentOptions: LoggerOptions = {};

/**
 * Global logger. Options are read at call time, so `setLoggerOptions()` also
 * reconfigures child loggers that modules created at import time.
 */
export const logger: Logger = createLogger(() => currentOptions);

export function setLoggerOptions(options: LoggerOptions): void {
  currentOptions = { ...options };
}
