export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

const order: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40, silent: 50 };

function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(order, value);
}

function resolveEnvLevel(): LogLevel {
  const configured = (process.env.LOG_LEVEL ?? '').trim().toLowerCase();
  if (isLogLevel(configured)) {
    return configured;
  }
  return process.env.NODE_ENV === 'production' ? 'warn' : 'info';
}

let activeLevel: LogLevel = resolveEnvLevel();

export function setLogLevel(level: LogLevel): void {
  activeLevel = level;
}

function shouldLog(level: LogLevel) {
  return order[level] >= order[activeLevel];
}

function format(level: LogLevel, msg: string, source?: string) {
  const time = new Date().toISOString();
  return `[${time}]${source ? ` [${source}]` : ''} ${level.toUpperCase()}: ${msg}`;
}

export type Logger = {
  debug(msg: string): void;
  info(msg: string): void;
  warn(msg: string): void;
  error(msg: string): void;
};

export const logger = {
  debug: (msg: string, source?: string) => {
    if (shouldLog('debug')) console.debug(format('debug', msg, source));
  },
  info: (msg: string, source?: string) => {
    if (shouldLog('info')) console.info(format('info', msg, source));
  },
  warn: (msg: string, source?: string) => {
    if (shouldLog('warn')) console.warn(format('warn', msg, source));
  },
  error: (msg: string, source?: string) => {
    if (shouldLog('error')) console.error(format('error', msg, source));
  }
};

/** Binds the shared logger to a source label. */
export function createLogger(source: string): Logger {
  return {
    debug: (msg) => logger.debug(msg, source),
    info: (msg) => logger.info(msg, source),
    warn: (msg) => logger.warn(msg, source),
    error: (msg) => logger.error(msg, source)
  };
}
