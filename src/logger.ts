/**
 * Logger sink passed into each stage.
 *
 * Stages log with a bracketed component tag and a metadata object, e.g.
 * `log.info('[scraper] Site done', { site, events })`. The default writes to
 * the console; tests pass a silent or recording logger instead.
 */

export interface Logger {
  info(message: string, meta?: Record<string, unknown>): void;
  warn(message: string, meta?: Record<string, unknown>): void;
  error(message: string, meta?: Record<string, unknown>): void;
}

function write(fn: (...args: unknown[]) => void, message: string, meta?: Record<string, unknown>): void {
  if (meta) fn(message, meta);
  else fn(message);
}

export const consoleLogger: Logger = {
  info: (message, meta) => write(console.log, message, meta),
  warn: (message, meta) => write(console.warn, message, meta),
  error: (message, meta) => write(console.error, message, meta),
};

export const silentLogger: Logger = {
  info: () => {},
  warn: () => {},
  error: () => {},
};

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
