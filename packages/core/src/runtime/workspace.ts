/**
 * @fileoverview Open and close a data directory as a live day session
 */

import { createLogger } from '../logging/index.js';
import { getSettings, getSettingsPath, setSettingsPath } from '../settings/index.js';
import {
  ensureDataDir,
  journalFilePath,
  metadataFilePath,
  readFileIfExists,
  resolveDataDir,
} from '../persistence/files.js';
import { loadMetadata } from '../persistence/metadata.js';
import { loadAndMigrate, migrateLegacyLayout } from '../persistence/migration.js';
import { DaySession } from '../session/day-session.js';
import type { NotificationSink } from './notifications.js';
import type { ReportGenerator } from './reports.js';

const logger = createLogger('runtime:workspace');

export interface OpenWorkspaceOptions {
  /** Skip discovery and use this directory */
  dataDir?: string;
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  homeDir?: string;
  now?: Date;
  reports?: ReportGenerator;
  notifications?: NotificationSink;
}

export async function openWorkspace(options: OpenWorkspaceOptions = {}): Promise<DaySession> {
  const now = options.now ?? new Date();
  const dataDir =
    options.dataDir ?? resolveDataDir({ cwd: options.cwd, env: options.env, homeDir: options.homeDir });
  ensureDataDir(dataDir);

  setSettingsPath(getSettingsPath(dataDir));
  const settings = getSettings();

  if (migrateLegacyLayout(dataDir, now)) {
    logger.info('Imported legacy files', { dataDir });
  }

  const day = await loadAndMigrate(dataDir, { now, reports: options.reports });
  const journal = readFileIfExists(journalFilePath(dataDir, day.date)) ?? '';
  const metadata = loadMetadata(metadataFilePath(dataDir), now);

  logger.info('Workspace opened', { dataDir, date: day.date, source: day.source });
  return new DaySession({
    dataDir,
    day,
    journal,
    metadata,
    settings,
    notifications: options.notifications,
    now,
  });
}

/**
 * Idle everything still running or paused, then save
 */
export function closeWorkspace(session: DaySession, now: Date = new Date()): void {
  session.autoIdleAll(now);
  session.save(now);
  session.saveJournal();
  logger.info('Workspace closed', { dataDir: session.dataDir, date: session.date });
}
