export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

function isLogLevel(value: string): value is LogLevel {
  return value in LEVEL_ORDER;
}

const envLevel = process.env.LOG_LEVEL || '';

let currentLevel: LogLevel = isLogLevel(envLevel)
  ? envLevel
  : process.env.NODE_ENV === 'test'
    ? 'silent'
    : 'info';

export function setLogLevel(level: string): void {
  if (isLogLevel(level)) currentLevel = level;
}

export function getLogLevel(): LogLevel {
  return currentLevel;
}

export interface Logger {
  debug(message: string, ...args: unknown[]): void;
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
}

/**
 * Console-backed logger scoped to a component name.
 * Output is filtered by LOG_LEVEL (silent under NODE_ENV=test unless set).
 */
export function createLogger(scope: string): Logger {
  const prefix = `[${scope}]`;
  const enabled = (level: LogLevel) => LEVEL_ORDER[level] >= LEVEL_ORDER[currentLevel];

  return {
    debug(message, ...args) {
      if (enabled('debug')) console.debug(prefix, message, ...args);
    },
    info(message, ...args) {
      if (enabled('info')) console.log(prefix, message, ...args);
    },
    warn(message, ...args) {
      if (enabled('warn')) console.warn(prefix, message, ...args);
    },
    error(message, ...args) {
      if (enabled('error')) console.error(prefix, message, ...args);
    },
  };
}
