/**
 * @fileoverview Data directory layout and file I/O
 *
 * All writes are atomic: write a temp file beside the target, fsync, then
 * rename over it. A crash mid-write leaves the previous file intact.
 */

import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { randomUUID } from 'crypto';
import { createLogger } from '../logging/index.js';
import { DataDirError, StorageError, errnoCode } from '../errors/index.js';

const logger = createLogger('persistence:files');

export const DATA_DIR_NAME = '.daybook';
export const DATA_DIR_ENV = 'DAYBOOK_DIR';

export const METADATA_FILE = 'meta.json';
export const LEGACY_TODAY_FILE = 'today.md';
export const LEGACY_TOMORROW_FILE = 'tomorrow.md';
export const LEGACY_DONE_LOG_FILE = 'done.log.md';

const DAILY_FILE_REGEX = /^(\d{4}-\d{2}-\d{2})\.md$/;

// =============================================================================
// Data directory
// =============================================================================

export interface ResolveDataDirOptions {
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  homeDir?: string;
}

function isDirectory(candidate: string): boolean {
  try {
    return fs.statSync(candidate).isDirectory();
  } catch {
    return false;
  }
}

/**
 * Find the data directory: $DAYBOOK_DIR, else the nearest .daybook walking
 * up from cwd, else ~/.daybook
 */
export function resolveDataDir(options: ResolveDataDirOptions = {}): string {
  const env = options.env ?? process.env;
  const override = env[DATA_DIR_ENV];
  if (override) return path.resolve(override);

  let dir = path.resolve(options.cwd ?? process.cwd());
  for (;;) {
    const candidate = path.join(dir, DATA_DIR_NAME);
    if (isDirectory(candidate)) return candidate;
    const parent = path.dirname(dir);
    if (parent === dir) break;
    dir = parent;
  }

  return path.join(options.homeDir ?? os.homedir(), DATA_DIR_NAME);
}

export function ensureDataDir(dataDir: string): void {
  try {
    fs.mkdirSync(dataDir, { recursive: true });
  } catch (error) {
    throw new DataDirError(`Cannot create data directory ${dataDir}`, error);
  }
}

/**
 * Create ./.daybook under cwd. Fails if it already exists.
 */
export function initLocalDataDir(cwd: string = process.cwd()): string {
  const dataDir = path.join(path.resolve(cwd), DATA_DIR_NAME);
  try {
    fs.mkdirSync(dataDir);
  } catch (error) {
    if (errnoCode(error) === 'EEXIST') {
      throw new DataDirError(`Data directory already exists: ${dataDir}`, error);
    }
    throw new DataDirError(`Cannot create data directory ${dataDir}`, error);
  }
  logger.info('Initialized local data directory', { dataDir });
  return dataDir;
}

// =============================================================================
// Paths
// =============================================================================

export function dailyFilePath(dataDir: string, dateKey: string): string {
  return path.join(dataDir, `${dateKey}.md`);
}

export function journalFilePath(dataDir: string, dateKey: string): string {
  return path.join(dataDir, `journal-${dateKey}.md`);
}

export function reportFilePath(dataDir: string, dateKey: string): string {
  return path.join(dataDir, `report-${dateKey}.md`);
}

export function metadataFilePath(dataDir: string): string {
  return path.join(dataDir, METADATA_FILE);
}

/**
 * Date keys of every daily file in the directory, oldest first
 */
export function listDailyFiles(dataDir: string): string[] {
  let entries: string[];
  try {
    entries = fs.readdirSync(dataDir);
  } catch (error) {
    if (errnoCode(error) === 'ENOENT') return [];
    throw new StorageError(`Cannot list ${dataDir}`, dataDir, error);
  }
  return entries
    .map(name => DAILY_FILE_REGEX.exec(name)?.[1])
    .filter((key): key is string => key !== undefined)
    .sort();
}

// =============================================================================
// Reading and writing
// =============================================================================

/**
 * @returns file content, or null when the file does not exist
 */
export function readFileIfExists(filePath: string): string | null {
  try {
    return fs.readFileSync(filePath, 'utf-8');
  } catch (error) {
    if (errnoCode(error) === 'ENOENT') return null;
    throw new StorageError(`Cannot read ${filePath}`, filePath, error);
  }
}

export function atomicWrite(filePath: string, content: string): void {
  const tmpPath = `${filePath}.${randomUUID()}.tmp`;
  try {
    fs.mkdirSync(path.dirname(filePath), { recursive: true });
    const fd = fs.openSync(tmpPath, 'w');
    try {
      fs.writeFileSync(fd, content, 'utf-8');
      fs.fsyncSync(fd);
    } finally {
      fs.closeSync(fd);
    }
    fs.renameSync(tmpPath, filePath);
  } catch (error) {
    removeTempFile(tmpPath);
    throw new StorageError(`Cannot write ${filePath}`, filePath, error);
  }
}

function removeTempFile(tmpPath: string): void {
  try {
    fs.unlinkSync(tmpPath);
  } catch (error) {
    if (errnoCode(error) !== 'ENOENT') {
      logger.warn('Failed to remove temp file', { tmpPath, error: String(error) });
    }
  }
}

export function truncateFile(filePath: string): void {
  atomicWrite(filePath, '');
}

/**
 * Delete a file; a missing file is not an error
 */
export function removeFile(filePath: string): void {
  try {
    fs.unlinkSync(filePath);
  } catch (error) {
    if (errnoCode(error) === 'ENOENT') return;
    throw new StorageError(`Cannot remove ${filePath}`, filePath, error);
  }
}
