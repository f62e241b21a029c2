export const LOG_LEVELS = ['debug', 'info', 'warn', 'error', 'silent'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export interface RunnerLogger {
  debug(message: string, details?: unknown): void;
  info(message: string, details?: unknown): void;
  warn(message: string, details?: unknown): void;
  error(message: string, details?: unknown): void;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

/** Writes to the console; messages below `level` are dropped. */
export function createConsoleLogger(level: LogLevel = 'info'): RunnerLogger {
  const threshold = LEVEL_ORDER[level];
  const emit = (at: Exclude<LogLevel, 'silent'>, message: string, details?: unknown) => {
    if (LEVEL_ORDER[at] < threshold) {
      return;
    }
    const line = `[runner] ${at.toUpperCase()} ${message}`;
    const args = details === undefined ? [line] : [line, details];
    switch (at) {
      case 'debug':
        console.debug(...args);
        return;
      case 'info':
        console.info(...args);
        return;
      case 'warn':
        console.warn(...args);
        return;
      case 'error':
        console.error(...args);
        return;
    }
  };

  return {
    debug: (message, details) => emit('debug', message, details),
    info: (message, details) => emit('info', message, details),
    warn: (message, details) => emit('warn', message, details),
    error: (message, details) => emit('error', message, details),
  };
}

export const silentLogger: RunnerLogger = {
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
};
