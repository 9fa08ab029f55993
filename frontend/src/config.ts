// Configuration: input file location and display constants
export const DATA_URL: string = import.meta.env.VITE_DATA_URL
  ? import.meta.env.VITE_DATA_URL.trim()
  : '/library_data.csv';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error', 'silent'];

const isLogLevel = (raw: string): raw is LogLevel => LOG_LEVELS.some(level => level === raw);

export function resolveLogLevel(raw: string | undefined, production: boolean): LogLevel {
  const level = (raw || '').trim().toLowerCase();
  if (isLogLevel(level)) return level;
  return production ? 'silent' : 'debug';
}

export const LOG_LEVEL: LogLevel = resolveLogLevel(import.meta.env.VITE_LOG_LEVEL, import.meta.env.PROD);

// Preview table row height (px); keep in sync with .preview-table tr height
export const PREVIEW_ROW_HEIGHT = 32;
export const PREVIEW_VIEWPORT = 420;
// Unified height for dashboard charts
export const CHART_HEIGHT = 360;
