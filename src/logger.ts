/**
 * Process-wide pino logger.
 *
 * Log lines go to stderr so that command output on stdout stays valid JSON.
 * The level comes from `LOG_LEVEL` at startup and can be changed once the
 * configuration file has been read.
 */

import pino, { type Logger } from 'pino';

export type { Logger };

export const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === 'string' && LOG_LEVELS.some((level) => level === value);
}

const envLevel = process.env.LOG_LEVEL;

export const logger: Logger = pino(
  {
    name: 'worthline',
    level: isLogLevel(envLevel) ? envLevel : 'info',
  },
  pino.destination(2),
);

export function childLogger(module: string): Logger {
  return logger.child({ module });
}

export function setLogLevel(level: LogLevel): void {
  logger.level = level;
}
