/**
 * @fileoverview Default Settings
 *
 * Fallback values used when settings.json is absent or leaves a field out.
 */

import type { DaybookSettings } from './types.js';

export const DEFAULT_SETTINGS: DaybookSettings = {
  version: '0.1.0',

  timing: {
    tickIntervalMs: 250,
    checkpointIntervalSeconds: 30,
    idleCheckMinutes: 30,
    idleGraceMinutes: 30,
  },

  tasks: {
    defaultEstimateMinutes: 60,
    estimateStepMinutes: 15,
    undoCapacity: 10,
  },
};
