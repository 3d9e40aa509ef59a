import pino from 'pino';
import type { Logger } from 'pino';
import { z } from 'zod';
import { ConfigError } from './errors.js';

export const LOG_LEVELS = ['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

const logLevelSchema = z.enum(LOG_LEVELS);

/** `LOG_LEVEL` as pino takes it; unset or empty means info. */
export function resolveLogLevel(value: string | undefined): LogLevel {
  if (!value) {
    return 'info';
  }
  const result = logLevelSchema.safeParse(value);
  if (!result.success) {
    throw new ConfigError(`LOG_LEVEL must be one of ${LOG_LEVELS.join(', ')}, got "${value}"`, {
      cause: result.error,
    });
  }
  return result.data;
}

export function generateCorrelationId(): string {
  return `${Date.now()}-${Math.random().toString(36).substring(2, 9)}`;
}

const level = resolveLogLevel(process.env.LOG_LEVEL);
// Every line carries the process correlation id
const base = { app: 'caddie-intent-engine', correlationId: generateCorrelationId() };

const baseLogger: Logger = pino(
  process.env.NODE_ENV === 'development'
    ? {
        level,
        base,
        transport: {
          target: 'pino-pretty',
          options: {
            colorize: true,
            translateTime: 'HH:MM:ss Z',
            ignore: 'pid,hostname,app',
          },
        },
      }
    : { level, base }
);

/** Child logger carrying `context` on every line, e.g. `{ component: 'server' }`. */
export function createLogger(context: Record<string, unknown> = {}): Logger {
  return baseLogger.child(context);
}
