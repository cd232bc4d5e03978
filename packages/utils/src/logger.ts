/**
 * Logger
 * 
 * Pino-based structured logger for all packages.
 * Provides consistent logging across the monorepo.
 */

import { pino, levels } from 'pino';

const DEFAULT_LEVEL = 'info';
const NODE_ENV = process.env['NODE_ENV'] ?? 'development';

/**
 * A level pino knows, or `info` for anything else
 */
export function resolveLogLevel(value: string | undefined): string {
  if (value === undefined) {
    return DEFAULT_LEVEL;
  }
  const level = value.trim().toLowerCase();
  return level === 'silent' || Object.hasOwn(levels.values, level) ? level : DEFAULT_LEVEL;
}

export const logger = pino({
  level: resolveLogLevel(process.env['LOG_LEVEL']),
  formatters: {
    level: (label: string) => ({ level: label }),
  },
  timestamp: pino.stdTimeFunctions.isoTime,
  base: {
    service: 'loopcast',
    env: NODE_ENV,
  },
  transport: NODE_ENV === 'development' ? {
    target: 'pino-pretty',
    options: {
      colorize: true,
      ignore: 'pid,hostname,service,env',
    },
  } : undefined,
});

export type Logger = typeof logger;

/**
 * Create a child logger with additional context
 */
export function createLogger(context: Record<string, unknown>): Logger {
  return logger.child(context);
}

/**
 * Change the root logger's level. Existing child loggers keep theirs.
 */
export function setLogLevel(level: string): void {
  logger.level = resolveLogLevel(level);
}
