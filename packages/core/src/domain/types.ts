/**
 * @fileoverview Core domain enumerations and the state event record
 */

/** Runtime status of a task or subtask */
export type RunStatus = 'idle' | 'running' | 'paused' | 'done' | 'postponed';

/** Schedule bucket */
export type ScheduleDay = 'today' | 'tomorrow';

/**
 * Global life-context. Every mode except `working` pauses timers.
 */
export type LifeMode = 'working' | 'break' | 'lunch' | 'gym' | 'dinner' | 'personal' | 'sleep';

export const LIFE_MODES: readonly LifeMode[] = [
  'working',
  'break',
  'lunch',
  'gym',
  'dinner',
  'personal',
  'sleep',
];

export function modePausesTimers(mode: LifeMode): boolean {
  return mode !== 'working';
}

/** Aggregate activity across all active items */
export type ActivityState = 'running' | 'paused' | 'idle';

/**
 * One status transition. `from` is absent only for the first event.
 */
export interface StateEvent {
  timestamp: Date;
  from?: RunStatus;
  to: RunStatus;
}

// =============================================================================
// Status tags
// =============================================================================

const STATUS_TAGS: Record<RunStatus, string> = {
  idle: 'IDLE',
  running: 'RUNNING',
  paused: 'PAUSED',
  done: 'DONE',
  postponed: 'POSTPONED',
};

/**
 * Parse a status tag such as "RUNNING" (case-insensitive)
 */
export function statusFromTag(tag: string): RunStatus | null {
  switch (tag.trim().toUpperCase()) {
    case 'IDLE':
      return 'idle';
    case 'RUNNING':
      return 'running';
    case 'PAUSED':
      return 'paused';
    case 'DONE':
      return 'done';
    case 'POSTPONED':
      return 'postponed';
    default:
      return null;
  }
}

export function statusToTag(status: RunStatus): string {
  return STATUS_TAGS[status];
}

/**
 * Statuses written to the ACTIVE section
 */
export function isActiveStatus(status: RunStatus): boolean {
  return status === 'idle' || status === 'running' || status === 'paused';
}
