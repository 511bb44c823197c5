/**
 * @fileoverview Main entry point for @daybook/core
 *
 * Daybook Core: task state machine, time engine, daily-file persistence
 * and the day session that ties them together.
 */

export * from './logging/index.js';
export * from './errors/index.js';
export * from './settings/index.js';
export * from './domain/index.js';
export * from './persistence/index.js';
export * from './session/index.js';
export * from './runtime/index.js';

// Version info
export const VERSION = '0.1.0';
export const NAME = 'daybook';
