/**
 * Streamer Logger
 */

import { createLogger, logger as rootLogger, setLogLevel } from '@loopcast/utils';

export const logger = createLogger({ app: 'streamer' });

/**
 * Apply the configured level to the root and app loggers. Call it before
 * creating component loggers: children keep the level they were made with.
 */
export function applyLogLevel(level: string): void {
  setLogLevel(level);
  logger.level = rootLogger.level;
}
