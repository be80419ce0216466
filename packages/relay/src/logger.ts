// Logger - Timestamped, level-filtered diagnostics on stderr
//
// stdout carries relayed payloads, so every level writes to stderr.

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface Logger {
  debug(...args: unknown[]): void;
  info(...args: unknown[]): void;
  warn(...args: unknown[]): void;
  error(...args: unknown[]): void;
}

export type LogWriter = (...args: unknown[]) => void;

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export function createLogger(level: LogLevel = 'info', write: LogWriter = console.error): Logger {
  const emit = (at: LogLevel, args: unknown[]) => {
    if (LEVEL_ORDER[at] < LEVEL_ORDER[level]) return;
    write(new Date().toISOString(), `[${at.toUpperCase()}]`, ...args);
  };

  return {
    debug: (...args) => emit('debug', args),
    info: (...args) => emit('info', args),
    warn: (...args) => emit('warn', args),
    error: (...args) => emit('error', args),
  };
}
