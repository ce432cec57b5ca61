/**
 * Leveled console logger.
 *
 * debug/info are silenced when NODE_ENV is "production" or "test";
 * warnings and errors always go out.
 *
 * Usage:
 * ```typescript
 * import { logger } from './utils/logger';
 *
 * logger.debug('Resolved columns:', columns);
 * logger.warn('Sheet skipped');
 * ```
 */

interface Logger {
  debug: (...args: unknown[]) => void;
  info: (...args: unknown[]) => void;
  warn: (...args: unknown[]) => void;
  error: (...args: unknown[]) => void;
}

const env = process.env.NODE_ENV;
const isVerbose = env !== 'production' && env !== 'test';

export const logger: Logger = {
  debug: isVerbose ? console.log.bind(console) : () => {},
  info: isVerbose ? console.info.bind(console) : () => {},
  warn: console.warn.bind(console),
  error: console.error.bind(console),
};
