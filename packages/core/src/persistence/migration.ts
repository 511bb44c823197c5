/**
 * @fileoverview Startup loading and day rollover
 *
 * Today's file wins when a session has already saved to it. Otherwise
 * yesterday's unfinished work is carried over (ahead of anything postponed
 * into today) and yesterday's report is requested. Either way every
 * loaded item has its elapsed rebuilt from history and any Running item is
 * paused, since nothing can have been running across a restart.
 */

import * as path from 'path';
import { createLogger } from '../logging/index.js';
import { addDays, localDateKey } from '../domain/duration.js';
import type { Item } from '../domain/item.js';
import { isActiveStatus } from '../domain/types.js';
import { generateReport, type ReportGenerator } from '../runtime/reports.js';
import {
  LEGACY_DONE_LOG_FILE,
  LEGACY_TODAY_FILE,
  LEGACY_TOMORROW_FILE,
  atomicWrite,
  dailyFilePath,
  metadataFilePath,
  readFileIfExists,
  removeFile,
  truncateFile,
} from './files.js';
import { parseDoneLogForDay } from './legacy.js';
import { loadMetadata } from './metadata.js';
import { parseDailyFile } from './parser.js';
import { serializeDailyFile } from './serializer.js';

const logger = createLogger('persistence:migration');

export type LoadSource = 'today' | 'rollover' | 'fresh';

export interface LoadedDay {
  date: string;
  active: Item[];
  done: Item[];
  archived: Item[];
  source: LoadSource;
}

export interface LoadOptions {
  now?: Date;
  reports?: ReportGenerator;
}

/**
 * Rebuild elapsed from history, then pause anything left running
 */
export function resyncAndPause(items: readonly Item[], now: Date = new Date()): void {
  for (const item of items) {
    item.syncElapsedFromHistory(now);
    item.coerceRunningToPaused(now);
  }
}

function retagToday(items: readonly Item[]): void {
  for (const item of items) {
    item.schedule = 'today';
    for (const sub of item.subtasks) sub.schedule = 'today';
  }
}

/**
 * Yesterday's ACTIVE items retagged to today, or null without a file for
 * yesterday. Requests yesterday's report.
 */
async function carryOver(
  dataDir: string,
  yesterday: string,
  now: Date,
  reports: ReportGenerator | undefined
): Promise<Item[] | null> {
  const content = readFileIfExists(dailyFilePath(dataDir, yesterday));
  if (content === null) return null;
  const { active } = parseDailyFile(content, { now });
  retagToday(active);
  resyncAndPause(active, now);
  await generateReport(reports, yesterday);
  return active;
}

export async function loadAndMigrate(dataDir: string, options: LoadOptions = {}): Promise<LoadedDay> {
  const now = options.now ?? new Date();
  const today = localDateKey(now);
  const yesterday = localDateKey(addDays(now, -1));

  const todayContent = readFileIfExists(dailyFilePath(dataDir, today));
  if (todayContent !== null) {
    const parsed = parseDailyFile(todayContent, { now });
    resyncAndPause(parsed.active, now);

    // Postpone and the legacy import write today's file before any session
    // has opened it; yesterday's work has not been carried in yet.
    const opened = loadMetadata(metadataFilePath(dataDir), now).sessionDate === today;
    const carried = opened ? null : await carryOver(dataDir, yesterday, now, options.reports);
    if (carried) {
      logger.info('Rolled over into a prepared day', { from: yesterday, to: today, carried: carried.length });
      return {
        date: today,
        active: [...carried, ...parsed.active],
        done: parsed.done,
        archived: parsed.archived,
        source: 'rollover',
      };
    }

    logger.info('Loaded today', { date: today, active: parsed.active.length, done: parsed.done.length });
    return { date: today, active: parsed.active, done: parsed.done, archived: parsed.archived, source: 'today' };
  }

  const carried = await carryOver(dataDir, yesterday, now, options.reports);
  if (carried) {
    logger.info('Rolled over from yesterday', { from: yesterday, to: today, active: carried.length });
    return { date: today, active: carried, done: [], archived: [], source: 'rollover' };
  }

  logger.info('Starting a fresh day', { date: today });
  return { date: today, active: [], done: [], archived: [], source: 'fresh' };
}

// =============================================================================
// Legacy layout
// =============================================================================

/**
 * Import the older today.md / tomorrow.md / done.log.md layout into
 * today's daily file. Legacy files are emptied afterwards, so a second run
 * finds nothing to do.
 *
 * @returns true when anything was imported
 */
export function migrateLegacyLayout(dataDir: string, now: Date = new Date()): boolean {
  const todayPath = path.join(dataDir, LEGACY_TODAY_FILE);
  const tomorrowPath = path.join(dataDir, LEGACY_TOMORROW_FILE);
  const doneLogPath = path.join(dataDir, LEGACY_DONE_LOG_FILE);

  const todayContent = readFileIfExists(todayPath);
  const tomorrowContent = readFileIfExists(tomorrowPath);
  const doneLogContent = readFileIfExists(doneLogPath);

  if (![todayContent, tomorrowContent, doneLogContent].some(c => c !== null && c.trim() !== '')) {
    return false;
  }

  const legacyItems = [
    ...parseDailyFile(todayContent ?? '', { now }).active,
    ...parseDailyFile(tomorrowContent ?? '', { now }).active,
  ];
  retagToday(legacyItems);
  resyncAndPause(legacyItems, now);

  const active = legacyItems.filter(i => isActiveStatus(i.status));
  const done = [...legacyItems.filter(i => i.status === 'done'), ...parseDoneLogForDay(doneLogContent ?? '', now)];

  const date = localDateKey(now);
  const dailyPath = dailyFilePath(dataDir, date);
  const existing = parseDailyFile(readFileIfExists(dailyPath) ?? '', { now });

  atomicWrite(
    dailyPath,
    serializeDailyFile(
      {
        date,
        active: [...existing.active, ...active],
        done: [...existing.done, ...done],
        archived: existing.archived,
      },
      now
    )
  );

  if (todayContent !== null) removeFile(todayPath);
  if (tomorrowContent !== null) truncateFile(tomorrowPath);
  if (doneLogContent !== null) truncateFile(doneLogPath);

  logger.info('Imported legacy layout', { date, active: active.length, done: done.length });
  return true;
}
