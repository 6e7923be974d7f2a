export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

const LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error', 'silent'];

function levelOrder(level: LogLevel): number {
  switch (level) {
    case 'debug':
      return 10;
    case 'info':
      return 20;
    case 'warn':
      return 30;
    case 'error':
      return 40;
    case 'silent':
      return 50;
  }
}

function isLogLevel(value: string): value is LogLevel {
  return (LEVELS as readonly string[]).includes(value);
}

function defaultLevel(nodeEnv: string | undefined): LogLevel {
  if (nodeEnv === 'development') return 'debug';
  if (nodeEnv === 'test') return 'warn';
  return 'info';
}

const ENV_LEVEL = (process.env.GUTTER_LOG_LEVEL ?? '').toLowerCase();
let activeLevel: LogLevel = isLogLevel(ENV_LEVEL) ? ENV_LEVEL : defaultLevel(process.env.NODE_ENV);

/** Override the level picked from the environment. */
export function setLogLevel(level: LogLevel): void {
  activeLevel = level;
}

export function getLogLevel(): LogLevel {
  return activeLevel;
}

function shouldLog(level: LogLevel): boolean {
  return activeLevel !== 'silent' && levelOrder(level) >= levelOrder(activeLevel);
}

export interface Logger {
  debug: (...args: unknown[]) => void;
  info: (...args: unknown[]) => void;
  warn: (...args: unknown[]) => void;
  error: (...args: unknown[]) => void;
}

export function makeLogger(namespace: string): Logger {
  const prefix = `[${namespace}]`;
  return {
    debug: (...args: unknown[]) => {
      if (shouldLog('debug')) console.debug(prefix, ...args);
    },
    info: (...args: unknown[]) => {
      if (shouldLog('info')) console.info(prefix, ...args);
    },
    warn: (...args: unknown[]) => {
      if (shouldLog('warn')) console.warn(prefix, ...args);
    },
    error: (...args: unknown[]) => {
      if (shouldLog('error')) console.error(prefix, ...args);
    },
  };
}
