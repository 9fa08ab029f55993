// Runtime error & promise rejection probe installed before React mounts.
// Surfaces module evaluation errors that would otherwise leave a blank page.
import { logger } from './logger';

const MAX_BANNERS = 2;

const stackHead = (stack?: string) => (stack ? stack.split('\n').slice(0, 6).join('\n') : undefined);

export function showRuntimeError(label: string, message: string, detail?: string): void {
  logger.error(`${label}: ${message}`, detail ? { detail } : undefined);
  const root = document.getElementById('root') || document.body;
  // Only keep the first few to avoid flooding
  if (document.querySelectorAll('.runtime-error-banner').length >= MAX_BANNERS) return;
  const banner = document.createElement('div');
  banner.className = 'runtime-error-banner';
  banner.setAttribute('role', 'alert');
  banner.setAttribute('aria-live', 'assertive');
  banner.textContent = `[${label}] ${message}` + (detail ? `\n${detail}` : '');
  root.appendChild(banner);
}

window.addEventListener('error', (e) => {
  if (!e.message) return;
  const err: unknown = e.error;
  showRuntimeError('Error', e.message, err instanceof Error ? stackHead(err.stack) : undefined);
});

window.addEventListener('unhandledrejection', (e) => {
  const reason: unknown = e.reason;
  const msg = typeof reason === 'string' ? reason : reason instanceof Error ? reason.message : String(reason);
  showRuntimeError('PromiseRejection', msg, reason instanceof Error ? stackHead(reason.stack) : undefined);
});
