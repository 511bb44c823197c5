/**
 * @fileoverview Notification sink contract
 *
 * Notifications are fire-and-forget: a failing sink is logged and never
 * fails the operation that raised it.
 */

import { createLogger } from '../logging/index.js';

const logger = createLogger('runtime:notifications');

export type NotificationKind = 'task-done' | 'estimate-reached' | 'idle-check' | 'autosave-failed';

export interface NotificationSink {
  notify(kind: NotificationKind, title: string): void | Promise<void>;
}

/**
 * Default sink: writes notifications to the log
 */
export class LogNotificationSink implements NotificationSink {
  notify(kind: NotificationKind, title: string): void {
    logger.info('Notification', { kind, title });
  }
}

export function safeNotify(sink: NotificationSink, kind: NotificationKind, title: string): void {
  let result: void | Promise<void>;
  try {
    result = sink.notify(kind, title);
  } catch (error) {
    logger.warn('Notification failed', { kind, title, error: String(error) });
    return;
  }
  if (result instanceof Promise) {
    result.catch((error: unknown) => {
      logger.warn('Notification failed', { kind, title, error: String(error) });
    });
  }
}
