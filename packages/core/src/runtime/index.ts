/**
 * @fileoverview Runtime exports
 */

export { Ticker, type TickerOptions } from './ticker.js';
export {
  LogNotificationSink,
  safeNotify,
  type NotificationKind,
  type NotificationSink,
} from './notifications.js';
export { generateReport, type ReportGenerator } from './reports.js';
export { openWorkspace, closeWorkspace, type OpenWorkspaceOptions } from './workspace.js';
