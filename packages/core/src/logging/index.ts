/**
 * @fileoverview Logging exports
 */

export {
  DaybookLogger,
  getLogger,
  createLogger,
  resetLogger,
  type LogLevel,
  type LoggerOptions,
  type LogContext,
} from './logger.js';
