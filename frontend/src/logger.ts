import { LOG_LEVEL, LogLevel } from './config';

// Console-backed client logger. Silent in production unless VITE_LOG_LEVEL says otherwise.

const RANK: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40, silent: 99 };

type LogFn = (message: string, meta?: Record<string, unknown>) => void;

export interface ClientLogger {
  debug: LogFn;
  info: LogFn;
  warn: LogFn;
  error: LogFn;
  child: (scope: string) => ClientLogger;
}

export function createLogger(scope: string, level: LogLevel = LOG_LEVEL): ClientLogger {
  const min = RANK[level];
  const emit = (lvl: Exclude<LogLevel, 'silent'>, message: string, meta?: Record<string, unknown>) => {
    if (RANK[lvl] < min) return;
    const line = `[${scope}] ${message}`;
    if (meta) console[lvl](line, meta);
    else console[lvl](line);
  };
  return {
    debug: (message, meta) => emit('debug', message, meta),
    info: (message, meta) => emit('info', message, meta),
    warn: (message, meta) => emit('warn', message, meta),
    error: (message, meta) => emit('error', message, meta),
    child: (sub) => createLogger(`${scope}:${sub}`, level),
  };
}

export const logger = createLogger('library-dashboard');
