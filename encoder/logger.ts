import { pino, type Logger } from 'pino';

export type { Logger };

/**
 * Root logger for the encoder.
 * Silent unless MARKUP_DEBUG is set; MARKUP_DEBUG=1 turns on trace output
 * of rewinds and cache misses.
 */
export function createLogger(options?: { level?: string; name?: string }): Logger {
  const debugEnabled = typeof process !== 'undefined' && !!process.env.MARKUP_DEBUG;
  const level = options?.level ?? (debugEnabled ? 'trace' : 'silent');

  return pino({
    name: options?.name ?? 'method-markup',
    level,
    formatters: {
      level: (label) => ({ level: label }),
    },
    timestamp: pino.stdTimeFunctions.isoTime,
  });
}

export function createChildLogger(parent: Logger, component: string): Logger {
  return parent.child({ component });
}

let defaultLogger: Logger | undefined;

/** Shared root logger used when a caller passes none. */
export function getDefaultLogger(): Logger {
  defaultLogger ??= createLogger();
  return defaultLogger;
}
