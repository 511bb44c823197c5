/**
 * @fileoverview Derived calculations over a state history ledger
 *
 * The ledger is the source of truth for timing: elapsed time is rebuilt
 * from it on load, which repairs any drift left by an unclean shutdown.
 */

import type { DurationMs } from './duration.js';
import type { StateEvent } from './types.js';

export interface StateTimes {
  running: DurationMs;
  paused: DurationMs;
  idle: DurationMs;
}

/**
 * Time spent in each state. Event i lasts until event i+1, the last event
 * until `completedAt` (or `now`). Spans entered by a Done or Postponed
 * event belong to no bucket.
 */
export function timeInEachState(
  history: readonly StateEvent[],
  completedAt?: Date,
  now: Date = new Date()
): StateTimes {
  const times: StateTimes = { running: 0, paused: 0, idle: 0 };
  const end = completedAt ?? now;

  history.forEach((event, i) => {
    const next = history[i + 1];
    const spanEnd = next ? next.timestamp : end;
    const span = spanEnd.getTime() - event.timestamp.getTime();

    switch (event.to) {
      case 'running':
        times.running += span;
        break;
      case 'paused':
        times.paused += span;
        break;
      case 'idle':
        times.idle += span;
        break;
      default:
        break;
    }
  });

  return times;
}

/**
 * Number of Running -> Paused transitions
 */
export function interruptionCount(history: readonly StateEvent[]): number {
  return history.filter(e => e.from === 'running' && e.to === 'paused').length;
}

/**
 * Number of work sessions (transitions into Running)
 */
export function sessionCount(history: readonly StateEvent[]): number {
  return history.filter(e => e.to === 'running').length;
}

export function cloneEvent(event: StateEvent): StateEvent {
  const copy: StateEvent = { timestamp: new Date(event.timestamp.getTime()), to: event.to };
  if (event.from !== undefined) copy.from = event.from;
  return copy;
}
