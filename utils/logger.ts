// Basic logger implementation

export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error';

const getTimestamp = (): string => {
  return new Date().toISOString();
};

// Valid levels: 'trace', 'debug', 'info', 'warn', 'error'
// Default to 'error' in test environment, 'info' otherwise
const getDefaultLogLevel = (): LogLevel => {
  if (process.env.NODE_ENV === 'test') {
    return 'error';
  }
  return 'info';
};

const LEVEL_WEIGHTS: Record<LogLevel, number> = {
  trace: 1,
  debug: 2,
  info: 3,
  warn: 4,
  error: 5,
};

function isLogLevel(value: string): value is LogLevel {
  return value in LEVEL_WEIGHTS;
}

const requestedLevel = process.env.LOG_LEVEL?.toLowerCase() ?? '';
let currentLevel: LogLevel = isLogLevel(requestedLevel) ? requestedLevel : getDefaultLogLevel();

/**
 * Changes the active level at runtime, e.g. after configuration has been loaded.
 */
export function setLogLevel(level: LogLevel): void {
  currentLevel = level;
}

const enabled = (level: LogLevel): boolean => LEVEL_WEIGHTS[currentLevel] <= LEVEL_WEIGHTS[level];

export const logger = {
  trace: (...args: unknown[]): void => {
    if (enabled('trace')) {
      console.debug(`[${getTimestamp()}] [TRACE]`, ...args); // Use console.debug for trace
    }
  },
  debug: (...args: unknown[]): void => {
    if (enabled('debug')) {
      console.debug(`[${getTimestamp()}] [DEBUG]`, ...args);
    }
  },
  info: (...args: unknown[]): void => {
    if (enabled('info')) {
      console.log(`[${getTimestamp()}] [INFO]`, ...args);
    }
  },
  warn: (...args: unknown[]): void => {
    if (enabled('warn')) {
      console.warn(`[${getTimestamp()}] [WARN]`, ...args);
    }
  },
  error: (...args: unknown[]): void => {
    if (enabled('error')) {
      console.error(`[${getTimestamp()}] [ERROR]`, ...args);
    }
  },
};
