import { config, LogLevel } from '../config';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

export interface Logger {
  debug(message: string, meta?: Record<string, unknown>): void;
  info(message: string, meta?: Record<string, unknown>): void;
  warn(message: string, meta?: Record<string, unknown>): void;
  error(message: string, meta?: Record<string, unknown>): void;
}

function enabled(level: LogLevel): boolean {
  return LEVEL_ORDER[level] >= LEVEL_ORDER[config.logLevel];
}

/**
 * Console logger that prefixes every line with `[scope]` and honours LOG_LEVEL.
 */
export function createLogger(scope: string): Logger {
  const emit = (level: LogLevel, message: string, meta?: Record<string, unknown>): void => {
    if (!enabled(level)) return;
    const line = `[${scope}] ${message}`;
    const write = level === 'error' ? console.error : level === 'warn' ? console.warn : console.log;
    if (meta) {
      write(line, meta);
    } else {
      write(line);
    }
  };

  return {
    debug: (message, meta) => emit('debug', message, meta),
    info: (message, meta) => emit('info', message, meta),
    warn: (message, meta) => emit('warn', message, meta),
    error: (message, meta) => emit('error', message, meta),
  };
}
