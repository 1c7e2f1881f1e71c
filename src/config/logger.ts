/**
 * Structured logger. pino underneath, with a message-first call shape:
 * `logger.info('text', { meta })`.
 */
import pino from 'pino';

type LogMethod = (message: string, meta?: unknown) => void;

export interface Logger {
  debug: LogMethod;
  info: LogMethod;
  warn: LogMethod;
  error: LogMethod;
}

function toRecord(meta: unknown): Record<string, unknown> {
  if (meta === undefined) return {};
  if (meta instanceof Error) return { err: meta };
  if (typeof meta === 'object' && meta !== null && !Array.isArray(meta)) {
    return Object.fromEntries(Object.entries(meta));
  }
  return { detail: meta };
}

/** Unknown names fall back to info; pino would throw on them. */
export function resolveLevel(level: string | undefined): string {
  if (!level) return 'info';
  return level === 'silent' || level in pino.levels.values ? level : 'info';
}

export function createLogger(level: string | undefined = process.env.LOG_LEVEL): Logger {
  const base = pino({
    level: resolveLevel(level),
    name: 'whisper-http',
    timestamp: pino.stdTimeFunctions.isoTime,
    formatters: {
      level: (label) => ({ level: label }),
    },
  });

  return {
    debug: (message, meta) => base.debug(toRecord(meta), message),
    info: (message, meta) => base.info(toRecord(meta), message),
    warn: (message, meta) => base.warn(toRecord(meta), message),
    error: (message, meta) => base.error(toRecord(meta), message),
  };
}

export const logger = createLogger();
