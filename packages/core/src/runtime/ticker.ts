/**
 * @fileoverview Fixed-period scheduler driving a day session
 *
 * Each tick advances timers, checks the estimate and idle prompts, handles
 * a calendar day change, and autosaves. Saves happen whenever the session
 * is dirty, and periodically while anything runs so the on-disk elapsed
 * stays close to the live value.
 */

import { createLogger } from '../logging/index.js';
import { getSettings, type DaybookSettings } from '../settings/index.js';
import { toError } from '../errors/index.js';
import { MS_PER_SECOND } from '../domain/duration.js';
import type { DaySession } from '../session/day-session.js';
import { LogNotificationSink, safeNotify, type NotificationSink } from './notifications.js';
import { generateReport, type ReportGenerator } from './reports.js';

const logger = createLogger('runtime:ticker');

export interface TickerOptions {
  session: DaySession;
  settings?: DaybookSettings;
  notifications?: NotificationSink;
  reports?: ReportGenerator;
  /** Called after the session has moved on to a new day */
  onDayChanged?: (endedDate: string, newDate: string) => void;
}

export class Ticker {
  private readonly session: DaySession;
  private readonly settings: DaybookSettings;
  private readonly notifications: NotificationSink;
  private readonly reports: ReportGenerator | undefined;
  private readonly onDayChanged: ((endedDate: string, newDate: string) => void) | undefined;
  private timer: ReturnType<typeof setInterval> | null = null;
  private lastSaveAt: number;
  private pendingReport: Promise<boolean> | null = null;

  constructor(options: TickerOptions) {
    this.session = options.session;
    this.settings = options.settings ?? getSettings();
    this.notifications = options.notifications ?? new LogNotificationSink();
    this.reports = options.reports;
    this.onDayChanged = options.onDayChanged;
    this.lastSaveAt = Date.now();
  }

  get isRunning(): boolean {
    return this.timer !== null;
  }

  start(): void {
    if (this.timer) return;
    this.timer = setInterval(() => {
      this.tick();
    }, this.settings.timing.tickIntervalMs);
    logger.debug('Ticker started', { intervalMs: this.settings.timing.tickIntervalMs });
  }

  stop(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
      logger.debug('Ticker stopped');
    }
  }

  /**
   * Wait for a report triggered by a day change
   */
  async flush(): Promise<void> {
    if (this.pendingReport) {
      await this.pendingReport;
      this.pendingReport = null;
    }
  }

  tick(now: Date = new Date()): void {
    this.session.tick(now);
    this.session.checkEstimateBreaches();
    this.session.checkIdle(now);

    if (this.session.hasDayChanged(now)) {
      this.handleDayChange(now);
    }

    this.autosave(now);
  }

  private handleDayChange(now: Date): void {
    let ended: string;
    try {
      ended = this.session.rollover(now);
    } catch (error) {
      this.reportSaveFailure(error);
      return;
    }
    this.lastSaveAt = now.getTime();
    this.pendingReport = generateReport(this.reports, ended);
    this.onDayChanged?.(ended, this.session.date);
  }

  private autosave(now: Date): void {
    const checkpointDue =
      this.session.globalState() === 'running' &&
      now.getTime() - this.lastSaveAt >= this.settings.timing.checkpointIntervalSeconds * MS_PER_SECOND;

    if (!this.session.isDirty && !checkpointDue) return;

    try {
      this.session.save(now);
      this.session.saveJournal();
      this.lastSaveAt = now.getTime();
    } catch (error) {
      this.reportSaveFailure(error);
    }
  }

  private reportSaveFailure(error: unknown): void {
    logger.error('Autosave failed, retrying next tick', toError(error));
    safeNotify(this.notifications, 'autosave-failed', 'Could not save your day');
  }
}
