
export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

const LEVEL_ORDER: Record<LogLevel, number> = { debug: 0, info: 1, warn: 2, error: 3, silent: 4 };

export interface Logger {
  debug(msg: string, data?: Record<string, unknown>): void;
  info(msg: string, data?: Record<string, unknown>): void;
  warn(msg: string, data?: Record<string, unknown>): void;
  error(msg: string, data?: Record<string, unknown>): void;
  child(component: string): Logger;
}

/**
 * Console logger with a `[component]` prefix on every line.
 * Entries below `minLevel` are dropped.
 */
export function createLogger(component: string, minLevel: LogLevel = 'warn'): Logger {
  const min = LEVEL_ORDER[minLevel];
  const emit = (level: Exclude<LogLevel, 'silent'>, msg: string, data?: Record<string, unknown>): void => {
    if (LEVEL_ORDER[level] < min) return;
    const line = `[${component}] ${msg}`;
    const args: unknown[] = data ? [line, data] : [line];
    switch (level) {
      case 'debug': console.debug(...args); break;
      case 'info': console.info(...args); break;
      case 'warn': console.warn(...args); break;
      case 'error': console.error(...args); break;
    }
  };

  return {
    debug: (msg, data) => emit('debug', msg, data),
    info: (msg, data) => emit('info', msg, data),
    warn: (msg, data) => emit('warn', msg, data),
    error: (msg, data) => emit('error', msg, data),
    child: (sub) => createLogger(`${component}:${sub}`, minLevel),
  };
}
