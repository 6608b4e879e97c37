export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
};

export function createConsoleLogger(level: LogLevel = 'warn'): Logger {
  const enabled = (l: LogLevel) => LEVEL_ORDER[l] >= LEVEL_ORDER[level];
  return {
    debug: (message) => {
      if (enabled('debug')) console.log(`[debug] ${message}`);
    },
    info: (message) => {
      if (enabled('info')) console.log(`[info] ${message}`);
    },
    warn: (message) => {
      if (enabled('warn')) console.error(`[warn] ${message}`);
    },
    error: (message) => {
      if (enabled('error')) console.error(`[error] ${message}`);
    },
  };
}

export const silentLogger: Logger = createConsoleLogger('silent');
