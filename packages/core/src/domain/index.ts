/**
 * @fileoverview Domain exports
 */

export * from './duration.js';
export * from './types.js';
export * from './history.js';
export { TimeTracking } from './time-tracking.js';
export { Item, normalizeTags, type ItemInit } from './item.js';
export * from './views.js';
