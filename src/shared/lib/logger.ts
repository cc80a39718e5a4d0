export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export interface LoggerOptions {
  level?: LogLevel;
  json?: boolean;
  /** Destination for formatted lines; stderr unless overridden. */
  write?: (line: string) => void;
}

type LogData = Record<string, unknown>;

export interface Logger {
  debug(msg: string, data?: LogData): void;
  info(msg: string, data?: LogData): void;
  warn(msg: string, data?: LogData): void;
  error(msg: string, data?: LogData): void;
  child(defaults: LogData): Logger;
}

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === 'string' && Object.hasOwn(LOG_LEVELS, value);
}

export function createLogger(options: LoggerOptions = {}, defaults: LogData = {}): Logger {
  const minLevel = LOG_LEVELS[options.level ?? 'info'];
  const jsonMode = options.json ?? false;
  const write = options.write ?? ((line: string) => process.stderr.write(line));

  function log(level: LogLevel, message: string, data?: LogData) {
    if (LOG_LEVELS[level] < minLevel) return;
    const fields = { ...defaults, ...data };
    const hasFields = Object.keys(fields).length > 0;

    if (jsonMode) {
      const entry = { level, message, timestamp: new Date().toISOString(), ...fields };
      write(JSON.stringify(entry) + '\n');
    } else {
      const prefix = level === 'error' ? '\x1b[31m' // red
        : level === 'warn' ? '\x1b[33m' // yellow
        : level === 'debug' ? '\x1b[90m' // grey
        : '';
      const reset = prefix ? '\x1b[0m' : '';
      const dataStr = hasFields ? ` ${JSON.stringify(fields)}` : '';
      write(`${prefix}[${level}]${reset} ${message}${dataStr}\n`);
    }
  }

  return {
    debug: (msg, data) => log('debug', msg, data),
    info: (msg, data) => log('info', msg, data),
    warn: (msg, data) => log('warn', msg, data),
    error: (msg, data) => log('error', msg, data),
    child: (childDefaults) => createLogger(options, { ...defaults, ...childDefaults }),
  };
}

function envLevel(): LogLevel | undefined {
  const raw = process.env['GAPFLOW_LOG_LEVEL'];
  return isLogLevel(raw) ? raw : undefined;
}

/** Global logger instance — configure via setLoggerOptions() */
export let logger: Logger = createLogger({ level: envLevel() });

export function setLoggerOptions(options: LoggerOptions): void {
  logger = createLogger(options);
}
