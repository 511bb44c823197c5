/**
 * @fileoverview Derived views over item lists
 */

import type { DurationMs } from './duration.js';
import type { StateTimes } from './history.js';
import type { Item } from './item.js';
import type { ActivityState } from './types.js';

/**
 * Keep a parent's run state consistent with its subtasks: Running while any
 * subtask runs, Paused once none do. Returns true if the parent changed.
 */
export function syncParentStatus(parent: Item, now: Date = new Date()): boolean {
  if (parent.subtasks.length === 0) return false;

  if (parent.hasRunningSubtask()) {
    return parent.status === 'running' ? false : parent.start(now);
  }
  return parent.pause(now);
}

export interface Totals {
  estimate: DurationMs;
  elapsed: DurationMs;
}

/**
 * Sum estimate and elapsed, counting only leaves: a parent with subtasks
 * contributes its subtasks' numbers, not its own.
 */
export function computeTotals(items: readonly Item[]): Totals {
  const totals: Totals = { estimate: 0, elapsed: 0 };
  for (const item of items) {
    if (item.subtasks.length === 0) {
      totals.estimate += item.estimate;
      totals.elapsed += item.elapsed;
      continue;
    }
    for (const sub of item.subtasks) {
      totals.estimate += sub.estimate;
      totals.elapsed += sub.elapsed;
    }
  }
  return totals;
}

export interface FlatRow {
  taskIndex: number;
  subtaskIndex?: number;
}

/**
 * Selectable rows in display order; subtasks of collapsed parents are hidden
 */
export function flattenRows(items: readonly Item[]): FlatRow[] {
  const rows: FlatRow[] = [];
  items.forEach((item, taskIndex) => {
    rows.push({ taskIndex });
    if (!item.expanded) return;
    item.subtasks.forEach((_, subtaskIndex) => rows.push({ taskIndex, subtaskIndex }));
  });
  return rows;
}

export function globalActivityState(items: readonly Item[]): ActivityState {
  const all = items.flatMap(i => [i, ...i.subtasks]);
  if (all.some(i => i.status === 'running')) return 'running';
  if (all.some(i => i.status === 'paused')) return 'paused';
  return 'idle';
}

/**
 * Time-in-state buckets summed over top-level items
 */
export function stateTimeTotals(items: readonly Item[], now: Date = new Date()): StateTimes {
  const totals: StateTimes = { running: 0, paused: 0, idle: 0 };
  for (const item of items) {
    const times = item.timeInEachState(now);
    totals.running += times.running;
    totals.paused += times.paused;
    totals.idle += times.idle;
  }
  return totals;
}
