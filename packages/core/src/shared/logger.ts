export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
};

export function isLogLevel(value: string | undefined): value is LogLevel {
  return value !== undefined && Object.hasOwn(LOG_LEVELS, value);
}

function defaultLevel(): LogLevel {
  const fromEnv = process.env.LOG_LEVEL?.toLowerCase();
  if (isLogLevel(fromEnv)) return fromEnv;
  return process.env.NODE_ENV === 'production' ? 'info' : 'debug';
}

let currentLevel: LogLevel = defaultLevel();

export function setLogLevel(level: LogLevel) {
  currentLevel = level;
}

export function getLogLevel(): LogLevel {
  return currentLevel;
}

function shouldLog(level: Exclude<LogLevel, 'silent'>): boolean {
  return LOG_LEVELS[level] >= LOG_LEVELS[currentLevel];
}

function header(level: LogLevel, scope: string): string {
  return `${new Date().toISOString()} [${level.toUpperCase().padEnd(5)}] [${scope}]`;
}

export interface Logger {
  debug: (...args: unknown[]) => void;
  info: (...args: unknown[]) => void;
  warn: (...args: unknown[]) => void;
  error: (...args: unknown[]) => void;
  /** Logger whose scope is `parent:suffix`, e.g. `stage2:openai/gpt-5`. */
  child: (suffix: string) => Logger;
}

export function createLogger(scope: string): Logger {
  return {
    debug: (...args) => {
      if (shouldLog('debug')) console.log(header('debug', scope), ...args);
    },
    info: (...args) => {
      if (shouldLog('info')) console.log(header('info', scope), ...args);
    },
    warn: (...args) => {
      if (shouldLog('warn')) console.warn(header('warn', scope), ...args);
    },
    error: (...args) => {
      if (shouldLog('error')) console.error(header('error', scope), ...args);
    },
    child: (suffix) => createLogger(`${scope}:${suffix}`),
  };
}
