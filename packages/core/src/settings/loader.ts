/**
 * @fileoverview Settings Loader
 *
 * Loads user settings from <data dir>/settings.json and merges them over
 * the defaults. Settings are cached after the first load.
 */

import * as fs from 'fs';
import * as path from 'path';
import { z } from 'zod';
import { createLogger } from '../logging/index.js';
import { errnoCode } from '../errors/index.js';
import type { DaybookSettings, UserSettings } from './types.js';
import { DEFAULT_SETTINGS } from './defaults.js';

const logger = createLogger('settings');

// =============================================================================
// Constants
// =============================================================================

const SETTINGS_FILE = 'settings.json';

const positiveInt = z.number().int().positive();

const userSettingsSchema = z.object({
  version: z.string().optional(),
  timing: z
    .object({
      tickIntervalMs: positiveInt,
      checkpointIntervalSeconds: positiveInt,
      idleCheckMinutes: positiveInt,
      idleGraceMinutes: positiveInt,
    })
    .partial()
    .optional(),
  tasks: z
    .object({
      defaultEstimateMinutes: z.number().int().nonnegative(),
      estimateStepMinutes: positiveInt,
      undoCapacity: positiveInt,
    })
    .partial()
    .optional(),
});

// =============================================================================
// Merge
// =============================================================================

/**
 * Merge user settings over defaults, one section at a time
 */
export function mergeSettings(base: DaybookSettings, user: UserSettings): DaybookSettings {
  return {
    version: user.version ?? base.version,
    timing: { ...base.timing, ...user.timing },
    tasks: { ...base.tasks, ...user.tasks },
  };
}

// =============================================================================
// Settings Loading
// =============================================================================

/**
 * Get the path to the settings file inside a data directory
 */
export function getSettingsPath(dataDir: string): string {
  return path.join(dataDir, SETTINGS_FILE);
}

/**
 * Load user settings from file
 * @returns User settings, or null if the file is missing or invalid
 */
export function loadUserSettings(settingsPath: string): UserSettings | null {
  let content: string;
  try {
    content = fs.readFileSync(settingsPath, 'utf-8');
  } catch (error) {
    // ENOENT is expected if file doesn't exist - not an error
    if (errnoCode(error) !== 'ENOENT') {
      logger.warn('Failed to read settings, using defaults', { settingsPath, error: String(error) });
    }
    return null;
  }

  try {
    const result = userSettingsSchema.safeParse(JSON.parse(content));
    if (!result.success) {
      logger.warn('Invalid settings, using defaults', {
        settingsPath,
        issues: result.error.issues.map(i => `${i.path.join('.')}: ${i.message}`),
      });
      return null;
    }
    return result.data;
  } catch (error) {
    logger.warn('Settings file is not valid JSON, using defaults', { settingsPath, error: String(error) });
    return null;
  }
}

/**
 * Load and merge settings with defaults
 */
export function loadSettings(settingsPath?: string): DaybookSettings {
  const userSettings = settingsPath ? loadUserSettings(settingsPath) : null;

  if (!userSettings) {
    return mergeSettings(DEFAULT_SETTINGS, {});
  }

  return mergeSettings(DEFAULT_SETTINGS, userSettings);
}

// =============================================================================
// Singleton Settings Instance
// =============================================================================

let cachedSettings: DaybookSettings | null = null;

let customSettingsPath: string | undefined;

/**
 * Get the current settings (loads and caches on first call)
 */
export function getSettings(): DaybookSettings {
  if (!cachedSettings) {
    cachedSettings = loadSettings(customSettingsPath);
  }
  return cachedSettings;
}

/**
 * Point the cache at a settings file and clear it
 */
export function setSettingsPath(settingsPath: string | undefined): void {
  customSettingsPath = settingsPath;
  cachedSettings = null;
}

/**
 * Clear the settings cache (forces reload on next access)
 */
export function clearSettingsCache(): void {
  cachedSettings = null;
}
