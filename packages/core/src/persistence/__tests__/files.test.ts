/**
 * @fileoverview Data directory and atomic file I/O tests
 */
import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';

vi.mock('../../logging/index.js', () => ({
  createLogger: () => ({
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    trace: vi.fn(),
  }),
}));

import {
  atomicWrite,
  dailyFilePath,
  initLocalDataDir,
  journalFilePath,
  listDailyFiles,
  readFileIfExists,
  removeFile,
  reportFilePath,
  resolveDataDir,
  truncateFile,
} from '../files.js';
import { DataDirError, StorageError } from '../../errors/index.js';

describe('files', () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'daybook-files-'));
  });

  afterEach(async () => {
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  describe('resolveDataDir', () => {
    it('should prefer the environment override', () => {
      const dir = resolveDataDir({ cwd: tempDir, env: { DAYBOOK_DIR: path.join(tempDir, 'custom') } });
      expect(dir).toBe(path.join(tempDir, 'custom'));
    });

    it('should find the nearest .daybook walking upward', async () => {
      await fs.mkdir(path.join(tempDir, '.daybook'));
      const nested = path.join(tempDir, 'a', 'b');
      await fs.mkdir(nested, { recursive: true });

      expect(resolveDataDir({ cwd: nested, env: {}, homeDir: '/nowhere' })).toBe(path.join(tempDir, '.daybook'));
    });

    it('should fall back to the home directory', async () => {
      const home = path.join(tempDir, 'home');
      const project = path.join(tempDir, 'project');
      await fs.mkdir(project);

      expect(resolveDataDir({ cwd: project, env: {}, homeDir: home })).toBe(path.join(home, '.daybook'));
    });
  });

  describe('initLocalDataDir', () => {
    it('should create .daybook once', () => {
      const dir = initLocalDataDir(tempDir);

      expect(dir).toBe(path.join(tempDir, '.daybook'));
      expect(() => initLocalDataDir(tempDir)).toThrow(DataDirError);
    });
  });

  describe('paths', () => {
    it('should name daily, journal and report files by date', () => {
      expect(dailyFilePath('/d', '2024-05-01')).toBe(path.join('/d', '2024-05-01.md'));
      expect(journalFilePath('/d', '2024-05-01')).toBe(path.join('/d', 'journal-2024-05-01.md'));
      expect(reportFilePath('/d', '2024-05-01')).toBe(path.join('/d', 'report-2024-05-01.md'));
    });

    it('should list daily files oldest first', async () => {
      for (const name of ['2024-05-02.md', 'journal-2024-05-01.md', '2024-04-30.md', 'meta.json']) {
        await fs.writeFile(path.join(tempDir, name), '');
      }

      expect(listDailyFiles(tempDir)).toEqual(['2024-04-30', '2024-05-02']);
      expect(listDailyFiles(path.join(tempDir, 'missing'))).toEqual([]);
    });
  });

  describe('atomicWrite', () => {
    it('should write content and leave no temp files', async () => {
      const target = path.join(tempDir, 'nested', 'day.md');
      atomicWrite(target, 'first');
      atomicWrite(target, 'second');

      expect(await fs.readFile(target, 'utf-8')).toBe('second');
      expect(await fs.readdir(path.dirname(target))).toEqual(['day.md']);
    });

    it('should raise StorageError and keep the old file when the target is unwritable', async () => {
      const target = path.join(tempDir, 'blocked');
      await fs.mkdir(target);
      await fs.writeFile(path.join(target, 'inner'), 'x');

      expect(() => atomicWrite(target, 'data')).toThrow(StorageError);
      expect(await fs.readdir(tempDir)).toEqual(['blocked']);
    });
  });

  describe('reading and removing', () => {
    it('should return null for missing files', () => {
      expect(readFileIfExists(path.join(tempDir, 'none.md'))).toBeNull();
    });

    it('should truncate and remove files', async () => {
      const file = path.join(tempDir, 'legacy.md');
      await fs.writeFile(file, 'content');

      truncateFile(file);
      expect(readFileIfExists(file)).toBe('');

      removeFile(file);
      expect(readFileIfExists(file)).toBeNull();
      expect(() => removeFile(file)).not.toThrow();
    });
  });
});
