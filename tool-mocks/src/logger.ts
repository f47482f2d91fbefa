import { destination, pino } from 'pino';

import { DEFAULT_LOG_LEVEL, type LogLevel } from './toolConfig.js';

// stdout carries the canned payloads, so diagnostics go to stderr.
export const logger = pino(
  {
    name: 'tool-mocks',
    level: DEFAULT_LOG_LEVEL
  },
  destination(2)
);

/**
 * Switch the shared logger to `level`. pino rebinds every log method on a
 * level change, so an unchanged level is left alone.
 */
export function applyLogLevel(level: LogLevel): void {
  if (logger.level !== level) {
    logger.level = level;
  }
}
