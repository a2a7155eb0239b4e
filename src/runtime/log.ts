import type { LoggerLike } from '../types';

export interface BoundLogger {
  dbg: (...args: unknown[]) => void;
  info: (...args: unknown[]) => void;
  warn: (...args: unknown[]) => void;
  err: (...args: unknown[]) => void;
}

// Levels the logger does not implement are dropped.
export function bindLogger(logger?: LoggerLike): BoundLogger {
  const l = logger || console;
  return {
    dbg: (...args) => { if (typeof l.debug === 'function') l.debug(...args); },
    info: (...args) => { if (typeof l.info === 'function') l.info(...args); },
    warn: (...args) => { if (typeof l.warn === 'function') l.warn(...args); },
    err: (...args) => { if (typeof l.error === 'function') l.error(...args); },
  };
}
