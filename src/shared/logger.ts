/**
 * Console Logger
 *
 * Component-prefixed console output (`[AgentLoop] ...`) with a process-wide
 * level threshold.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

export interface Logger {
  debug: (message: string) => void;
  info: (message: string) => void;
  warn: (message: string) => void;
  error: (message: string) => void;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

let currentLevel: LogLevel = 'info';

export function setLogLevel(level: LogLevel): void {
  currentLevel = level;
}

export function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(LEVEL_ORDER, value);
}

function enabled(level: Exclude<LogLevel, 'silent'>): boolean {
  return LEVEL_ORDER[level] >= LEVEL_ORDER[currentLevel];
}

export function createLogger(component: string): Logger {
  const prefix = `[${component}]`;
  return {
    debug: (message) => {
      if (enabled('debug')) console.debug(`${prefix} ${message}`);
    },
    info: (message) => {
      if (enabled('info')) console.log(`${prefix} ${message}`);
    },
    warn: (message) => {
      if (enabled('warn')) console.warn(`${prefix} ${message}`);
    },
    error: (message) => {
      if (enabled('error')) console.error(`${prefix} ${message}`);
    },
  };
}

/** Logger that drops everything, for callers that want no output */
export const silentLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};
