import pino from 'pino';
import { LogLevelSchema, type LogLevel } from '../config/env.js';

/**
 * Structured logger contract shared by every module.
 * Fastify's `app.log` satisfies it, so routes hand their own logger down.
 */
export interface Logger {
  info: (obj: object, msg?: string) => void;
  warn: (obj: object, msg?: string) => void;
  error: (obj: object, msg?: string) => void;
  debug?: (obj: object, msg?: string) => void;
}

let root: pino.Logger | null = null;

/**
 * Level for a raw LOG_LEVEL value; unset → 'info'.
 * @throws Error on a value pino does not know
 */
export function resolveLogLevel(value: string | undefined): LogLevel {
  const parsed = LogLevelSchema.safeParse(value);
  if (!parsed.success) {
    throw new Error(`[Config] Invalid LOG_LEVEL: ${value}`);
  }
  return parsed.data;
}

export function createLogger(level: LogLevel = resolveLogLevel(process.env.LOG_LEVEL)): pino.Logger {
  return pino({ name: 'sales-insights', level });
}

/** Lazily created root logger for code running outside the HTTP server. */
export function getRootLogger(): pino.Logger {
  if (!root) {
    root = createLogger();
  }
  return root;
}
