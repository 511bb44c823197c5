/**
 * @fileoverview Settings types
 */

export interface TimingSettings {
  /** Period of the ticker driving elapsed re-baselining */
  tickIntervalMs: number;
  /** How often a checkpoint save runs while any item is running */
  checkpointIntervalSeconds: number;
  /** Minutes of uninterrupted running before the idle check opens */
  idleCheckMinutes: number;
  /** Minutes the idle check waits for confirmation before pausing everything */
  idleGraceMinutes: number;
}

export interface TaskSettings {
  /** Estimate given to items created without one */
  defaultEstimateMinutes: number;
  /** Step used by estimate increase/decrease */
  estimateStepMinutes: number;
  /** Number of undo snapshots kept */
  undoCapacity: number;
}

export interface DaybookSettings {
  version: string;
  timing: TimingSettings;
  tasks: TaskSettings;
}

/**
 * Settings as written by a user: every section and field optional
 */
export interface UserSettings {
  version?: string;
  timing?: Partial<TimingSettings>;
  tasks?: Partial<TaskSettings>;
}
