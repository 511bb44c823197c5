/**
 * @fileoverview Settings exports
 */

export type { DaybookSettings, UserSettings, TimingSettings, TaskSettings } from './types.js';
export { DEFAULT_SETTINGS } from './defaults.js';
export {
  getSettingsPath,
  loadUserSettings,
  loadSettings,
  mergeSettings,
  getSettings,
  setSettingsPath,
  clearSettingsCache,
} from './loader.js';
